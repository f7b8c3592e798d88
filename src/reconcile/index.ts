export { reconcile, applyPlan, summarizePlan } from './engine.js';
export type { ReconcileInput, ApplyContext } from './engine.js';

export { planReconciliation, describeEntities, planDependencies } from './planner.js';
export type { PlanContext, DesiredEntity } from './planner.js';

export { RemoteCaller, DEFAULT_RETRY_POLICY, createRunSignal, sleep } from './remote-call.js';
export type { RetryPolicy, SleepFn, RemoteCallerOptions, CallOptions } from './remote-call.js';

export { MemoryTracker } from './memory-tracker.js';
export type { MemoryIssue, MemoryTrackerOptions, TrackerCall, TrackerOperation, FailureInjector } from './memory-tracker.js';

export {
  RemoteTrackerError,
  RemoteTransientError,
  RemoteRateLimitError,
  RemoteConflictError,
  RemoteFatalError,
  SyncAbortedError,
  isRunFatal,
} from './errors.js';

export {
  keyToString,
  parseKeyString,
  formatKeyMarker,
  extractKeyMarker,
  phaseKey,
  groupKey,
  taskKey,
} from './keys.js';
export type { EntityKind, NaturalKey } from './keys.js';

export {
  DEFAULT_FIELD_NAMES,
  DEFAULT_STATUS_MAPPING,
  buildFieldDefinitions,
  determineInitialStatus,
} from './fields.js';
export type { FieldNames, StatusMapping } from './fields.js';

export { computeContentHash } from './hash.js';
export { formatSyncSummary } from './summary.js';
export { consoleLogger, silentLogger } from './logger.js';
export type { SyncLogger } from './logger.js';

export type {
  RemoteTracker,
  RemoteItem,
  CreateEntityInput,
  CreatedEntity,
  EntityPatch,
  RegistrationResult,
  LinkResult,
  FieldDataType,
  FieldDefinition,
  FieldIdEntry,
  FieldIdMap,
  FieldValue,
  LookupOptions,
  RateLimitInfo,
} from './tracker.js';

export type {
  EntityPlan,
  CreatePlan,
  ReusePlan,
  DependencyPlan,
  ReconciliationPlan,
  ReconcileResult,
  ReconcileStatus,
  SyncFailure,
  FailureStage,
  KindCounts,
  DependencyCounts,
  FieldAssignment,
} from './types.js';
