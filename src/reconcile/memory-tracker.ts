/**
 * In-process RemoteTracker
 *
 * Keeps issues, project items and field values in maps. Items are matched
 * by the key marker in their body, exactly like the GitHub tracker. Every
 * call is recorded, and `failWith` can inject an error into any call.
 */

import { RemoteConflictError, RemoteTrackerError } from './errors.js';
import { extractKeyMarker, keyToString, type NaturalKey } from './keys.js';
import type {
  CreateEntityInput,
  CreatedEntity,
  EntityPatch,
  FieldDefinition,
  FieldIdMap,
  FieldValue,
  LinkResult,
  RateLimitInfo,
  RegistrationResult,
  RemoteItem,
  RemoteTracker,
} from './tracker.js';

export type TrackerOperation =
  | 'lookup'
  | 'create'
  | 'update'
  | 'register'
  | 'ensureFields'
  | 'setField'
  | 'link';

export interface TrackerCall {
  operation: TrackerOperation;
  /** Key string of the item involved; the blocked item for links */
  key?: string;
  /** Field name, for setField */
  field?: string;
}

export type FailureInjector = (call: TrackerCall) => Error | undefined;

export interface MemoryIssue {
  externalId: string;
  number: number;
  title: string;
  body: string;
  parentExternalId?: string;
  blockedBy: string[];
  /** Project id -> item id */
  projectItems: Map<string, string>;
}

export interface MemoryTrackerOptions {
  /** Default true */
  combinedRegistration?: boolean;
  /** Options of the built-in Status field */
  statusOptions?: string[];
  failWith?: FailureInjector;
  rateLimit?: RateLimitInfo;
}

const STATUS_FIELD = 'Status';
const DEFAULT_STATUS_OPTIONS = ['Backlog', 'Ready', 'In Progress', 'Done'];

export class MemoryTracker implements RemoteTracker {
  readonly supportsCombinedRegistration: boolean;
  readonly calls: TrackerCall[] = [];
  failWith?: FailureInjector;
  rateLimitInfo?: RateLimitInfo;

  private readonly issues = new Map<string, MemoryIssue>();
  private readonly fields = new Map<string, FieldIdMap>();
  /** Item id -> field id -> text or option id */
  private readonly values = new Map<string, Map<string, string>>();
  private readonly statusOptions: string[];
  private issueSequence = 0;
  private idSequence = 0;

  constructor(options: MemoryTrackerOptions = {}) {
    this.supportsCombinedRegistration = options.combinedRegistration ?? true;
    this.statusOptions = options.statusOptions ?? DEFAULT_STATUS_OPTIONS;
    this.failWith = options.failWith;
    this.rateLimitInfo = options.rateLimit;
  }

  // --------------------------------------------------------------------------
  // Inspection helpers
  // --------------------------------------------------------------------------

  countCalls(operation?: TrackerOperation): number {
    return operation ? this.calls.filter((call) => call.operation === operation).length : this.calls.length;
  }

  /**
   * Calls other than lookups
   */
  mutationCount(): number {
    return this.calls.filter((call) => call.operation !== 'lookup').length;
  }

  resetCalls(): void {
    this.calls.length = 0;
  }

  listIssues(): MemoryIssue[] {
    return [...this.issues.values()];
  }

  findByKey(key: NaturalKey | string): MemoryIssue | undefined {
    const keyString = typeof key === 'string' ? key : keyToString(key);
    return this.listIssues().find((issue) => extractKeyMarker(issue.body) === keyString);
  }

  /**
   * Field name -> value of an issue's item in a project
   */
  fieldValuesOf(externalId: string, projectId: string): Record<string, string> {
    const itemId = this.issues.get(externalId)?.projectItems.get(projectId);
    return itemId ? this.readValues(itemId, projectId) : {};
  }

  /**
   * Change an issue as if someone edited it on the remote side
   */
  editIssue(externalId: string, patch: EntityPatch): void {
    Object.assign(this.requireIssue(externalId), patch);
  }

  // --------------------------------------------------------------------------
  // RemoteTracker
  // --------------------------------------------------------------------------

  async lookupByNaturalKey(key: NaturalKey, projectId: string): Promise<RemoteItem | null> {
    const keyString = keyToString(key);
    this.record({ operation: 'lookup', key: keyString });

    const issue = this.findByKey(keyString);
    if (!issue) {
      return null;
    }

    const projectItemId = issue.projectItems.get(projectId);
    return {
      key: keyString,
      externalId: issue.externalId,
      number: issue.number,
      url: this.urlOf(issue.number),
      title: issue.title,
      body: issue.body,
      parentExternalId: issue.parentExternalId,
      projectItemId,
      fieldValues: projectItemId ? this.readValues(projectItemId, projectId) : {},
      blockedBy: [...issue.blockedBy],
    };
  }

  async createEntity(input: CreateEntityInput): Promise<CreatedEntity> {
    const keyString = keyToString(input.key);
    this.record({ operation: 'create', key: keyString });

    const existing = this.findByKey(keyString);
    if (existing) {
      throw new RemoteConflictError(`Issue #${existing.number} already carries ${keyString}`);
    }

    if (input.parentExternalId && !this.issues.has(input.parentExternalId)) {
      throw new RemoteTrackerError(`Parent issue ${input.parentExternalId} not found`);
    }

    const number = ++this.issueSequence;
    const issue: MemoryIssue = {
      externalId: `ISSUE_${number}`,
      number,
      title: input.title,
      body: input.body,
      parentExternalId: input.parentExternalId,
      blockedBy: [],
      projectItems: new Map(),
    };
    this.issues.set(issue.externalId, issue);

    const projectItemId =
      this.supportsCombinedRegistration && input.projectId
        ? this.addToProject(issue, input.projectId)
        : undefined;

    return { externalId: issue.externalId, number, url: this.urlOf(number), projectItemId };
  }

  async updateEntity(externalId: string, patch: EntityPatch): Promise<void> {
    this.record({ operation: 'update', key: this.keyOf(externalId) });
    const issue = this.requireIssue(externalId);
    if (patch.title !== undefined) {
      issue.title = patch.title;
    }
    if (patch.body !== undefined) {
      issue.body = patch.body;
    }
  }

  async registerInProject(externalId: string, projectId: string): Promise<RegistrationResult> {
    this.record({ operation: 'register', key: this.keyOf(externalId) });
    const issue = this.requireIssue(externalId);

    const existing = issue.projectItems.get(projectId);
    if (existing) {
      return { status: 'already-registered', projectItemId: existing };
    }
    return { status: 'registered', projectItemId: this.addToProject(issue, projectId) };
  }

  async ensureFields(projectId: string, definitions: FieldDefinition[]): Promise<FieldIdMap> {
    this.record({ operation: 'ensureFields' });
    const fields = this.fieldsOf(projectId);

    for (const definition of definitions) {
      if (fields[definition.name]) {
        continue;
      }
      const fieldId = `FIELD_${++this.idSequence}`;
      fields[definition.name] = {
        fieldId,
        dataType: definition.dataType,
        options: Object.fromEntries(
          definition.options.map((option, index) => [option, `${fieldId}_OPT_${index}`])
        ),
      };
    }

    return structuredClone(fields);
  }

  async setFieldValue(projectId: string, itemId: string, fieldId: string, value: FieldValue): Promise<void> {
    const field = Object.entries(this.fieldsOf(projectId)).find(([, entry]) => entry.fieldId === fieldId);
    const owner = this.listIssues().find((issue) => issue.projectItems.get(projectId) === itemId);
    this.record({ operation: 'setField', key: owner ? this.keyOf(owner.externalId) : undefined, field: field?.[0] });

    if (!field) {
      throw new RemoteTrackerError(`Field ${fieldId} not found in project ${projectId}`);
    }
    if (!owner) {
      throw new RemoteTrackerError(`Item ${itemId} not found in project ${projectId}`);
    }

    const [, entry] = field;
    let stored: string;
    if ('text' in value) {
      if (entry.dataType !== 'TEXT') {
        throw new RemoteTrackerError(`Field ${fieldId} does not take text values`);
      }
      stored = value.text;
    } else {
      if (!Object.values(entry.options).includes(value.singleSelectOptionId)) {
        throw new RemoteTrackerError(`Option ${value.singleSelectOptionId} not found in field ${fieldId}`);
      }
      stored = value.singleSelectOptionId;
    }

    const itemValues = this.values.get(itemId) ?? new Map<string, string>();
    itemValues.set(fieldId, stored);
    this.values.set(itemId, itemValues);
  }

  async linkDependency(blockedId: string, blockerId: string): Promise<LinkResult> {
    this.record({ operation: 'link', key: this.keyOf(blockedId) });
    const blocked = this.requireIssue(blockedId);
    this.requireIssue(blockerId);

    if (blocked.blockedBy.includes(blockerId)) {
      return 'already-linked';
    }
    blocked.blockedBy.push(blockerId);
    return 'linked';
  }

  rateLimit(): RateLimitInfo | undefined {
    return this.rateLimitInfo;
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private record(call: TrackerCall): void {
    this.calls.push(call);
    const error = this.failWith?.(call);
    if (error) {
      throw error;
    }
  }

  private requireIssue(externalId: string): MemoryIssue {
    const issue = this.issues.get(externalId);
    if (!issue) {
      throw new RemoteTrackerError(`Issue ${externalId} not found`);
    }
    return issue;
  }

  private keyOf(externalId: string): string | undefined {
    return extractKeyMarker(this.issues.get(externalId)?.body) ?? undefined;
  }

  private urlOf(number: number): string {
    return `https://tracker.test/issues/${number}`;
  }

  private addToProject(issue: MemoryIssue, projectId: string): string {
    const itemId = `ITEM_${++this.idSequence}`;
    issue.projectItems.set(projectId, itemId);
    return itemId;
  }

  private fieldsOf(projectId: string): FieldIdMap {
    let fields = this.fields.get(projectId);
    if (!fields) {
      const fieldId = 'FIELD_STATUS';
      fields = {
        [STATUS_FIELD]: {
          fieldId,
          dataType: 'SINGLE_SELECT',
          options: Object.fromEntries(
            this.statusOptions.map((option, index) => [option, `${fieldId}_OPT_${index}`])
          ),
        },
      };
      this.fields.set(projectId, fields);
    }
    return fields;
  }

  private readValues(itemId: string, projectId: string): Record<string, string> {
    const result: Record<string, string> = {};
    const itemValues = this.values.get(itemId);
    if (!itemValues) {
      return result;
    }

    for (const [name, entry] of Object.entries(this.fieldsOf(projectId))) {
      const stored = itemValues.get(entry.fieldId);
      if (stored === undefined) {
        continue;
      }
      result[name] =
        entry.dataType === 'TEXT'
          ? stored
          : (Object.entries(entry.options).find(([, id]) => id === stored)?.[0] ?? stored);
    }
    return result;
  }
}
