import { z } from 'zod';
import type { FieldNames, StatusMapping } from '../reconcile/fields.js';
import type { RetryPolicy } from '../reconcile/remote-call.js';

// Zod schema for the target project board
export const ProjectConfigSchema = z.object({
  owner: z.string().min(1, 'Project owner (organization or user login) is required'),
  number: z.number().int().positive('Project number must be a positive integer'),
  is_org: z.boolean().optional(),
});

// Zod schema for status field mapping
export const StatusFieldMappingSchema = z.object({
  backlog: z.string().min(1),
  ready: z.string().min(1),
  done: z.string().min(1),
}).partial();

// Zod schema for custom field names
export const FieldNamesSchema = z.object({
  task_id: z.string().min(1),
  phase: z.string().min(1),
  group: z.string().min(1),
  priority: z.string().min(1),
  parallel: z.string().min(1),
  user_story: z.string().min(1),
  status: z.string().min(1),
}).partial();

// Zod schema for retry and rate-limit behaviour
export const RetryConfigSchema = z.object({
  max_attempts: z.number().int().positive(),
  base_delay_ms: z.number().int().nonnegative(),
  max_delay_ms: z.number().int().positive(),
  timeout_ms: z.number().int().positive(),
  low_watermark: z.number().int().nonnegative(),
}).partial();

// Zod schema for GitHub configuration
export const GitHubConfigSchema = z.object({
  token: z.string().optional(),
}).partial();

// Complete configuration schema
export const ConfigSchema = z.object({
  github: GitHubConfigSchema.optional(),
  repository: z.string().regex(/^[^/\s]+\/[^/\s]+$/, 'Repository must be in format "owner/repo"'),
  project: ProjectConfigSchema.optional(),
  project_title: z.string().min(1).optional(),
  tasks_path: z.string().min(1).optional(),
  state_path: z.string().min(1).optional(),
  fields: FieldNamesSchema.optional(),
  status_field_mapping: StatusFieldMappingSchema.optional(),
  retry: RetryConfigSchema.optional(),
});

// TypeScript types derived from Zod schemas
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type StatusFieldMapping = z.infer<typeof StatusFieldMappingSchema>;
export type FieldNamesConfig = z.infer<typeof FieldNamesSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type GitHubConfig = z.infer<typeof GitHubConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;

// Normalized project config
export interface NormalizedProjectConfig {
  owner: string;
  number: number;
  isOrg: boolean;
}

// Normalized complete config
export interface NormalizedConfig {
  github: {
    token: string | undefined;
  };
  repository: {
    owner: string;
    name: string;
  };
  /** Absent when the sync creates its own project */
  project?: NormalizedProjectConfig;
  /** Title for a created project */
  projectTitle?: string;
  tasksPath: string;
  statePath: string;
  fieldNames: FieldNames;
  statusFieldMapping: StatusMapping;
  retry: RetryPolicy;
  /** Overall deadline for one run */
  timeoutMs?: number;
}
