/**
 * RemoteTracker backed by GitHub issues and Projects v2
 *
 * The repository's issues are read once, lazily, and indexed by the key
 * marker embedded in their bodies. Mutations keep that snapshot current so
 * later lookups in the same run see what was just written; a refreshing
 * lookup reads them again.
 */

import { extractKeyMarker, keyToString, type NaturalKey } from '../reconcile/keys.js';
import {
  RemoteConflictError,
  RemoteFatalError,
  RemoteRateLimitError,
  RemoteTrackerError,
  RemoteTransientError,
} from '../reconcile/errors.js';
import type {
  CreateEntityInput,
  CreatedEntity,
  EntityPatch,
  FieldDataType,
  FieldDefinition,
  FieldIdMap,
  FieldValue,
  LinkResult,
  LookupOptions,
  RateLimitInfo,
  RegistrationResult,
  RemoteItem,
  RemoteTracker,
} from '../reconcile/tracker.js';
import { GitHubClient, GitHubClientError } from './client.js';
import type { IssueNode, ProjectField, ProjectSingleSelectField } from './types.js';

const DEFAULT_RETRY_AFTER_MS = 60_000;

export interface GitHubTrackerOptions {
  client: GitHubClient;
  owner: string;
  repo: string;
}

/**
 * Map a classified client error onto the tracker error taxonomy
 */
export function toTrackerError(error: unknown): Error {
  if (!(error instanceof GitHubClientError)) {
    return error instanceof Error ? error : new RemoteTrackerError(String(error));
  }

  const options = { cause: error };
  switch (error.category) {
    case 'transient':
      return new RemoteTransientError(error.message, options);
    case 'rate-limited':
      return new RemoteRateLimitError(error.message, error.retryAfterMs ?? DEFAULT_RETRY_AFTER_MS, options);
    case 'conflict':
      return new RemoteConflictError(error.message, options);
    case 'fatal':
      return new RemoteFatalError(error.message, options);
    case 'request':
      return new RemoteTrackerError(error.message, options);
  }
}

function isTrackedDataType(dataType: string | undefined): dataType is FieldDataType {
  return dataType === 'TEXT' || dataType === 'SINGLE_SELECT';
}

/**
 * Normalize an issue into the item view for one project
 */
export function toRemoteItem(issue: IssueNode, key: string, projectId: string): RemoteItem {
  const item = issue.projectItems.nodes.find((node) => node.project.id === projectId);

  const fieldValues: Record<string, string> = {};
  for (const node of item?.fieldValues.nodes ?? []) {
    const name = node.field?.name;
    if (!name) {
      continue;
    }
    if ('text' in node && typeof node.text === 'string') {
      fieldValues[name] = node.text;
    } else if ('optionId' in node && typeof node.name === 'string') {
      fieldValues[name] = node.name;
    }
  }

  return {
    key,
    externalId: issue.id,
    number: issue.number,
    url: issue.url,
    title: issue.title,
    body: issue.body,
    parentExternalId: issue.parent?.id,
    projectItemId: item?.id,
    fieldValues,
    blockedBy: issue.blockedBy.nodes.map((node) => node.id),
  };
}

export class GitHubTracker implements RemoteTracker {
  readonly supportsCombinedRegistration = true;

  private readonly client: GitHubClient;
  private readonly owner: string;
  private readonly repo: string;
  private snapshot?: Promise<Map<string, IssueNode>>;
  private repositoryId?: string;

  constructor(options: GitHubTrackerOptions) {
    this.client = options.client;
    this.owner = options.owner;
    this.repo = options.repo;
  }

  async lookupByNaturalKey(key: NaturalKey, projectId: string, options: LookupOptions = {}): Promise<RemoteItem | null> {
    if (options.refresh) {
      this.snapshot = undefined;
    }
    const keyString = keyToString(key);
    const issue = (await this.loadSnapshot()).get(keyString);
    return issue ? toRemoteItem(issue, keyString, projectId) : null;
  }

  async createEntity(input: CreateEntityInput): Promise<CreatedEntity> {
    const snapshot = await this.loadSnapshot();
    const keyString = keyToString(input.key);
    const existing = snapshot.get(keyString);
    if (existing) {
      throw new RemoteConflictError(`Issue #${existing.number} already carries ${keyString}`);
    }
    const repositoryId = await this.getRepositoryId();

    const created = await this.guard(() =>
      this.client.createIssue({
        repositoryId,
        title: input.title,
        body: input.body,
        parentIssueId: input.parentExternalId,
        projectV2Ids: input.projectId ? [input.projectId] : undefined,
      })
    );

    snapshot.set(keyString, {
      id: created.id,
      number: created.number,
      title: input.title,
      body: input.body,
      url: created.url,
      parent: input.parentExternalId ? { id: input.parentExternalId } : null,
      blockedBy: { nodes: [] },
      projectItems: {
        nodes: Object.entries(created.projectItems).map(([projectId, itemId]) => ({
          id: itemId,
          project: { id: projectId },
          fieldValues: { nodes: [] },
        })),
      },
    });

    return {
      externalId: created.id,
      number: created.number,
      url: created.url,
      projectItemId: input.projectId ? created.projectItems[input.projectId] : undefined,
    };
  }

  async updateEntity(externalId: string, patch: EntityPatch): Promise<void> {
    await this.guard(() => this.client.updateIssue(externalId, patch));

    const issue = await this.findIssue(externalId);
    if (issue) {
      Object.assign(issue, patch);
    }
  }

  async registerInProject(externalId: string, projectId: string): Promise<RegistrationResult> {
    const issue = await this.findIssue(externalId);
    const existing = issue?.projectItems.nodes.find((node) => node.project.id === projectId);
    if (existing) {
      return { status: 'already-registered', projectItemId: existing.id };
    }

    const projectItemId = await this.guard(() => this.client.addItemToProject(projectId, externalId));
    issue?.projectItems.nodes.push({ id: projectItemId, project: { id: projectId }, fieldValues: { nodes: [] } });
    return { status: 'registered', projectItemId };
  }

  async ensureFields(projectId: string, definitions: FieldDefinition[]): Promise<FieldIdMap> {
    const fields: Array<ProjectField | ProjectSingleSelectField> = await this.guard(() =>
      this.client.getProjectFields(projectId)
    );

    for (const definition of definitions) {
      if (fields.some((field) => field.name === definition.name)) {
        continue;
      }
      const created = await this.guard(() =>
        this.client.createField(projectId, definition.name, definition.dataType, definition.options)
      );
      fields.push(created);
    }

    const map: FieldIdMap = {};
    for (const field of fields) {
      if (!isTrackedDataType(field.dataType)) {
        continue;
      }
      map[field.name] = {
        fieldId: field.id,
        dataType: field.dataType,
        options:
          'options' in field
            ? Object.fromEntries(field.options.map((option) => [option.name, option.id]))
            : {},
      };
    }
    return map;
  }

  async setFieldValue(projectId: string, itemId: string, fieldId: string, value: FieldValue): Promise<void> {
    await this.guard(() => this.client.updateItemField(projectId, itemId, fieldId, value));
  }

  async linkDependency(blockedId: string, blockerId: string): Promise<LinkResult> {
    const issue = await this.findIssue(blockedId);
    if (issue?.blockedBy.nodes.some((node) => node.id === blockerId)) {
      return 'already-linked';
    }

    try {
      await this.guard(() => this.client.addBlockedBy(blockedId, blockerId));
    } catch (error) {
      if (error instanceof RemoteConflictError) {
        return 'already-linked';
      }
      throw error;
    }

    issue?.blockedBy.nodes.push({ id: blockerId });
    return 'linked';
  }

  rateLimit(): RateLimitInfo | undefined {
    const state = this.client.getRateLimit();
    return state ? { remaining: state.remaining, resetAt: state.resetAt } : undefined;
  }

  private async guard<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw toTrackerError(error);
    }
  }

  private async getRepositoryId(): Promise<string> {
    if (!this.repositoryId) {
      const repository = await this.guard(() => this.client.getRepository(this.owner, this.repo));
      this.repositoryId = repository.id;
    }
    return this.repositoryId;
  }

  private async loadSnapshot(): Promise<Map<string, IssueNode>> {
    this.snapshot ??= this.fetchSnapshot();
    try {
      return await this.snapshot;
    } catch (error) {
      // a failed read is retried on the next lookup
      this.snapshot = undefined;
      throw error;
    }
  }

  private async fetchSnapshot(): Promise<Map<string, IssueNode>> {
    const issues = await this.guard(() => this.client.listRepositoryIssues(this.owner, this.repo));
    const byKey = new Map<string, IssueNode>();
    for (const issue of issues) {
      const key = extractKeyMarker(issue.body);
      // oldest issue wins when a marker was duplicated by hand
      if (key && !byKey.has(key)) {
        byKey.set(key, issue);
      }
    }
    return byKey;
  }

  private async findIssue(externalId: string): Promise<IssueNode | undefined> {
    const snapshot = await this.loadSnapshot();
    for (const issue of snapshot.values()) {
      if (issue.id === externalId) {
        return issue;
      }
    }
    return undefined;
  }
}
