export { syncTasks, connectGitHub } from './sync.js';
export type { SyncOptions, RemoteTarget, ConnectOptions } from './sync.js';
export { PENDING_PROJECT_ID, projectRef, defaultProjectTitle, resolveProject } from './project.js';
export type { ProjectTarget, ResolveProjectOptions } from './project.js';

export {
  DEFAULT_STATE_PATH,
  createEmptySyncState,
  acquireLock,
  releaseLock,
  readSyncState,
  writeSyncState,
  verifyStateIntegrity,
} from './state.js';
export type { LockOptions } from './state.js';

export { SyncStateSchema, EntityMappingSchema, FieldIdEntrySchema } from './types.js';
export type { SyncState, EntityMapping } from './types.js';
