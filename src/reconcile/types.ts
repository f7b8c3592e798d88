import type { Task } from '../parser/models.js';
import type { EntityMapping, SyncState } from '../sync/types.js';
import type { EntityKind, NaturalKey } from './keys.js';
import type { EntityPatch, FieldDefinition, FieldIdMap, RemoteItem } from './tracker.js';

/**
 * A field value to write, by field name and text or option name
 */
export interface FieldAssignment {
  field: string;
  value: string;
}

/**
 * How the item ends up registered in the project
 * - combined: requested as part of createEntity
 * - separate: explicit registerInProject call
 * - none: already registered
 */
export type Registration = 'combined' | 'separate' | 'none';

interface EntityPlanBase {
  key: NaturalKey;
  keyString: string;
  kind: EntityKind;
  title: string;
  body: string;
  /** Key string of the parent entity (phase for groups, group or phase for tasks) */
  parentKey?: string;
  registration: Registration;
  /** Only values that differ from the remote item */
  fields: FieldAssignment[];
  task?: Task;
}

export interface CreatePlan extends EntityPlanBase {
  action: 'create';
}

export interface ReusePlan extends EntityPlanBase {
  action: 'reuse';
  remote: RemoteItem;
  /** Title/body to rewrite where the remote item diverges */
  update?: EntityPatch;
}

export type EntityPlan = CreatePlan | ReusePlan;

export interface DependencyPlan {
  task: string;
  blocker: string;
  taskKey: string;
  blockerKey: string;
  action: 'link' | 'existing';
}

export type FailureStage = 'lookup' | 'create' | 'update' | 'register' | 'fields' | 'dependency';

export interface SyncFailure {
  /** Key string, or "<task> <- <blocker>" for dependency edges */
  key: string;
  kind: EntityKind | 'dependency';
  stage: FailureStage;
  message: string;
}

export interface ReconciliationPlan {
  contentHash: string;
  projectId: string;
  entities: EntityPlan[];
  dependencies: DependencyPlan[];
  fieldDefinitions: FieldDefinition[];
  /** Entities whose lookup failed; they and their descendants are not applied */
  lookupFailures: SyncFailure[];
  warnings: string[];
}

export interface KindCounts {
  reused: number;
  created: number;
  updated: number;
  linked: number;
  failed: number;
}

export interface DependencyCounts {
  linked: number;
  existing: number;
  failed: number;
}

export type ReconcileStatus = 'up-to-date' | 'dry-run' | 'synced' | 'partial' | 'aborted';

export interface ReconcileResult {
  status: ReconcileStatus;
  plan?: ReconciliationPlan;
  counts: Record<EntityKind, KindCounts>;
  dependencies: DependencyCounts;
  failures: SyncFailure[];
  warnings: string[];
  /** State to persist; unchanged for up-to-date and dry runs */
  state: SyncState;
  abortReason?: string;
  /** Remote calls issued, retries included */
  remoteCalls: number;
}

/**
 * Outcome of applying a plan, before it is folded into a ReconcileResult
 */
export interface ApplyOutcome {
  counts: Record<EntityKind, KindCounts>;
  dependencies: DependencyCounts;
  failures: SyncFailure[];
  warnings: string[];
  /** Converged entities, by key string */
  entities: Record<string, EntityMapping>;
  fieldIds?: FieldIdMap;
  abortReason?: string;
}

export function emptyKindCounts(): KindCounts {
  return { reused: 0, created: 0, updated: 0, linked: 0, failed: 0 };
}

export function emptyCounts(): Record<EntityKind, KindCounts> {
  return { phase: emptyKindCounts(), group: emptyKindCounts(), task: emptyKindCounts() };
}
