/**
 * Remote collaborator interface
 *
 * The engine only talks to the tracker through these calls. Two
 * implementations exist: GitHubTracker (GraphQL, network) and MemoryTracker
 * (in process, used by tests and dry experiments).
 */

import type { NaturalKey } from './keys.js';

/**
 * Normalized view of a remote item matched by natural key
 */
export interface RemoteItem {
  /** Key string (see keyToString) */
  key: string;
  externalId: string;
  number?: number;
  url?: string;
  title: string;
  body: string;
  parentExternalId?: string;
  /** Item id inside the project the lookup was made against */
  projectItemId?: string;
  /** Field name -> current text or option name */
  fieldValues: Record<string, string>;
  /** External ids of items blocking this one */
  blockedBy: string[];
}

export interface CreateEntityInput {
  key: NaturalKey;
  title: string;
  body: string;
  parentExternalId?: string;
  /** Register in this project as part of the creation call, when supported */
  projectId?: string;
}

export interface CreatedEntity {
  externalId: string;
  number?: number;
  url?: string;
  /** Present when creation also registered the item in a project */
  projectItemId?: string;
}

export interface EntityPatch {
  title?: string;
  body?: string;
}

export interface RegistrationResult {
  status: 'registered' | 'already-registered';
  projectItemId: string;
}

export type LinkResult = 'linked' | 'already-linked';

export type FieldDataType = 'TEXT' | 'SINGLE_SELECT';

export interface FieldDefinition {
  name: string;
  dataType: FieldDataType;
  /** Option names for single-select fields */
  options: string[];
}

export interface FieldIdEntry {
  fieldId: string;
  dataType: FieldDataType;
  /** Option name -> option id */
  options: Record<string, string>;
}

/** Field name -> ids */
export type FieldIdMap = Record<string, FieldIdEntry>;

export type FieldValue = { text: string } | { singleSelectOptionId: string };

export interface LookupOptions {
  /** Read the remote side again instead of any cached view */
  refresh?: boolean;
}

export interface RateLimitInfo {
  remaining: number;
  /** Epoch milliseconds at which the budget resets */
  resetAt: number;
}

export interface RemoteTracker {
  /** createEntity honours `projectId` and registers the item in the same call */
  readonly supportsCombinedRegistration: boolean;

  lookupByNaturalKey(key: NaturalKey, projectId: string, options?: LookupOptions): Promise<RemoteItem | null>;
  createEntity(input: CreateEntityInput): Promise<CreatedEntity>;
  updateEntity(externalId: string, patch: EntityPatch): Promise<void>;
  registerInProject(externalId: string, projectId: string): Promise<RegistrationResult>;
  /**
   * Create missing fields and return ids for every field of the project,
   * including built-in ones such as Status
   */
  ensureFields(projectId: string, definitions: FieldDefinition[]): Promise<FieldIdMap>;
  setFieldValue(projectId: string, itemId: string, fieldId: string, value: FieldValue): Promise<void>;
  linkDependency(blockedId: string, blockerId: string): Promise<LinkResult>;

  /** Remaining request budget last reported by the remote side */
  rateLimit?(): RateLimitInfo | undefined;
}
