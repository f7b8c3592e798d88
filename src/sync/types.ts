import { z } from 'zod';

/**
 * Remote ids recorded for one natural key
 */
export const EntityMappingSchema = z.object({
  kind: z.enum(['phase', 'group', 'task']),
  externalId: z.string(),
  number: z.number().optional(),
  url: z.string().optional(),
  projectItemId: z.string().optional(),
  syncedAt: z.string(),
});

export type EntityMapping = z.infer<typeof EntityMappingSchema>;

export const FieldIdEntrySchema = z.object({
  fieldId: z.string(),
  dataType: z.enum(['TEXT', 'SINGLE_SELECT']),
  options: z.record(z.string(), z.string()),
});

/**
 * Persisted sync state, threaded explicitly through every run
 */
export const SyncStateSchema = z.object({
  version: z.string().default('1.0.0'),
  lastSyncAt: z.string().optional(),
  /** Hash of the last document that fully converged */
  contentHash: z.string().optional(),
  /** Project the hash was recorded against */
  projectId: z.string().optional(),
  /** "owner/number" the projectId was resolved from */
  projectRef: z.string().optional(),
  /** Web URL of a project this sync created */
  projectUrl: z.string().optional(),
  /** Key string -> remote ids */
  entities: z.record(z.string(), EntityMappingSchema).default({}),
  /** Field name -> ids, as last returned by ensureFields */
  fieldIds: z.record(z.string(), FieldIdEntrySchema).default({}),
});

export type SyncState = z.infer<typeof SyncStateSchema>;
