import type { GitHubClient } from '../github/client.js';
import type { SyncLogger } from '../reconcile/logger.js';
import type { NormalizedConfig } from '../types/config.js';
import type { SyncState } from './types.js';

/**
 * Stands in for a project a dry run would create
 */
export const PENDING_PROJECT_ID = 'pending-project';

/**
 * Project a run syncs into
 */
export interface ProjectTarget {
  projectId: string;
  /** "owner/number" */
  projectRef: string;
  projectUrl?: string;
  /** True when this run created the project */
  created?: boolean;
}

export interface ResolveProjectOptions {
  documentTitle: string;
  dryRun?: boolean;
  logger: SyncLogger;
}

/**
 * "owner/number" reference of the configured project, if any
 */
export function projectRef(config: NormalizedConfig): string | undefined {
  return config.project ? `${config.project.owner}/${config.project.number}` : undefined;
}

/**
 * Default title of a created project
 */
export function defaultProjectTitle(documentTitle: string): string {
  return `Tasks: ${documentTitle}`;
}

/**
 * Find the project to sync into.
 *
 * A configured project is looked up by owner and number unless the state
 * already holds its id. Without one, the project recorded in the state is
 * reused; failing that, a new project is created under the repository
 * owner. Dry runs never create one.
 */
export async function resolveProject(
  client: GitHubClient,
  config: NormalizedConfig,
  state: SyncState,
  options: ResolveProjectOptions
): Promise<ProjectTarget> {
  const configured = config.project;
  if (configured) {
    const ref = `${configured.owner}/${configured.number}`;
    if (state.projectRef === ref && state.projectId) {
      return { projectId: state.projectId, projectRef: ref, projectUrl: state.projectUrl };
    }
    const project = await client.getProject(configured.owner, configured.number, configured.isOrg);
    return { projectId: project.projectId, projectRef: ref };
  }

  if (state.projectId && state.projectRef) {
    return { projectId: state.projectId, projectRef: state.projectRef, projectUrl: state.projectUrl };
  }

  const title = config.projectTitle ?? defaultProjectTitle(options.documentTitle);
  const { owner, name } = config.repository;

  if (options.dryRun) {
    options.logger.info(`Dry run: would create project "${title}" for ${owner}`);
    return { projectId: PENDING_PROJECT_ID, projectRef: `${owner}/new` };
  }

  const repository = await client.getRepository(owner, name);
  const project = await client.createProject(repository.owner.id, title);
  options.logger.info(`Created project #${project.number} "${project.title}": ${project.url}`);

  return {
    projectId: project.id,
    projectRef: `${repository.owner.login}/${project.number}`,
    projectUrl: project.url,
    created: true,
  };
}
