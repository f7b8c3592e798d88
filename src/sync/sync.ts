#!/usr/bin/env node
/**
 * tasks.md to GitHub Projects Sync
 *
 * Reads the config, the tasks document and the sync state, reconciles the
 * document with the project board and writes the new state back.
 *
 * Run CLI with: npm run sync
 * Environment: SPEC_SYNC_CONFIG, GITHUB_TOKEN, DRY_RUN=true, FORCE_SYNC=true
 */

import { parseConfigFile, resolveConfigPath } from '../config/index.js';
import { createGitHubClient } from '../github/client.js';
import { GitHubTracker } from '../github/tracker.js';
import { parseTasksFile } from '../parser/tasks-parser.js';
import { reconcile } from '../reconcile/engine.js';
import { SyncAbortedError } from '../reconcile/errors.js';
import { consoleLogger, type SyncLogger } from '../reconcile/logger.js';
import type { SleepFn } from '../reconcile/remote-call.js';
import { formatSyncSummary } from '../reconcile/summary.js';
import type { RemoteTracker } from '../reconcile/tracker.js';
import type { ReconcileResult } from '../reconcile/types.js';
import type { NormalizedConfig } from '../types/config.js';
import { acquireLock, readSyncState, releaseLock, writeSyncState } from './state.js';
import { projectRef, resolveProject, type ProjectTarget } from './project.js';
import type { SyncState } from './types.js';

/**
 * Options for the sync operation
 */
export interface SyncOptions {
  config: NormalizedConfig;
  /** Overrides config.tasksPath */
  tasksPath?: string;
  /** Overrides config.statePath */
  statePath?: string;
  /** Plan only - don't create or change anything, don't write state */
  dryRun?: boolean;
  /** Ignore the unchanged-document short-circuit */
  force?: boolean;
  /**
   * Hold the state file lock for the whole run (default true).
   * Dry runs never lock.
   */
  useLocking?: boolean;
  /** Tracker to use instead of GitHub; projectId must come with it */
  tracker?: RemoteTracker;
  projectId?: string;
  logger?: SyncLogger;
  signal?: AbortSignal;
  sleep?: SleepFn;
}

export interface RemoteTarget extends Partial<ProjectTarget> {
  tracker: RemoteTracker;
  projectId: string;
}

export interface ConnectOptions {
  /** Title of the parsed document, for naming a created project */
  documentTitle?: string;
  dryRun?: boolean;
  logger?: SyncLogger;
}

/**
 * Build the GitHub tracker. The project id is resolved once and then
 * reused from the state, so an unchanged document needs no remote call.
 */
export async function connectGitHub(
  config: NormalizedConfig,
  state: SyncState,
  options: ConnectOptions = {}
): Promise<RemoteTarget> {
  const token = config.github.token;
  if (!token) {
    throw new Error('GitHub token is required: set github.token in the config or the GITHUB_TOKEN environment variable');
  }

  const client = createGitHubClient(token);
  const tracker = new GitHubTracker({
    client,
    owner: config.repository.owner,
    repo: config.repository.name,
  });

  const project = await resolveProject(client, config, state, {
    documentTitle: options.documentTitle ?? config.repository.name,
    dryRun: options.dryRun,
    logger: options.logger ?? consoleLogger,
  });
  return { tracker, ...project };
}

/**
 * Sync the tasks document to the project board
 *
 * Parse errors abort before any remote call. Running it again with the
 * same document is a no-op; after a partial failure it resumes without
 * creating duplicates.
 */
export async function syncTasks(options: SyncOptions): Promise<ReconcileResult> {
  const {
    config,
    dryRun = false,
    force = false,
    useLocking = true,
    logger = consoleLogger,
  } = options;
  const tasksPath = options.tasksPath ?? config.tasksPath;
  const statePath = options.statePath ?? config.statePath;

  const document = parseTasksFile(tasksPath);

  let lockId: string | undefined;

  try {
    if (useLocking && !dryRun) {
      lockId = await acquireLock(statePath);
    }

    let state = readSyncState(statePath, logger);
    const target: RemoteTarget =
      options.tracker && options.projectId
        ? { tracker: options.tracker, projectId: options.projectId }
        : await connectGitHub(config, state, { documentTitle: document.title, dryRun, logger });

    const ref = target.projectRef ?? projectRef(config) ?? state.projectRef;
    if (target.created) {
      // Record the new project before anything else can fail
      state = {
        ...state,
        projectId: target.projectId,
        projectRef: ref,
        projectUrl: target.projectUrl,
        contentHash: undefined,
      };
      writeSyncState(state, statePath);
    }

    const result = await reconcile({
      document,
      tracker: target.tracker,
      projectId: target.projectId,
      state,
      dryRun,
      force,
      fieldNames: config.fieldNames,
      statusMapping: config.statusFieldMapping,
      retry: config.retry,
      timeoutMs: config.timeoutMs,
      signal: options.signal,
      logger,
      sleep: options.sleep,
    });

    if (!dryRun && result.status !== 'up-to-date') {
      writeSyncState(
        { ...result.state, projectRef: ref, projectUrl: target.projectUrl ?? result.state.projectUrl },
        statePath
      );
    }

    return result;
  } finally {
    if (lockId) {
      releaseLock(statePath, lockId, logger);
    }
  }
}

// CLI entry point
async function main(): Promise<void> {
  console.log('tasks.md to GitHub Projects Sync');
  console.log('================================\n');

  const configPath = resolveConfigPath(process.env);
  const dryRun = process.env.DRY_RUN === 'true';
  const force = process.env.FORCE_SYNC === 'true';

  if (dryRun) {
    console.log('Running in DRY RUN mode - no issues will be created or changed\n');
  }

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort(new SyncAbortedError('Interrupted')));

  try {
    const config = parseConfigFile(configPath);
    const result = await syncTasks({ config, dryRun, force, signal: controller.signal });

    console.log('\n' + formatSyncSummary(result));

    if (result.status === 'partial' || result.status === 'aborted') {
      process.exit(1);
    }
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

// Only run main if this is the entry point
const entry = process.argv[1] ?? '';
const isMainModule = entry.endsWith('sync.ts') || entry.endsWith('sync.js') || entry.endsWith('spec-sync');
if (isMainModule) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
