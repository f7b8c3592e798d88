import * as yaml from 'js-yaml';
import * as fs from 'fs';
import * as path from 'path';
import { ConfigSchema, type Config, type NormalizedConfig } from '../types/config.js';
import { DEFAULT_FIELD_NAMES, DEFAULT_STATUS_MAPPING } from '../reconcile/fields.js';
import { DEFAULT_RETRY_POLICY } from '../reconcile/remote-call.js';
import { DEFAULT_STATE_PATH } from '../sync/state.js';

export const DEFAULT_CONFIG_PATH = '.spec-sync.yml';
export const DEFAULT_TASKS_PATH = 'tasks.md';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse and validate YAML configuration string
 */
export function parseConfigString(yamlContent: string, env: NodeJS.ProcessEnv = process.env): NormalizedConfig {
  // Parse YAML to JavaScript object
  const rawConfig = yaml.load(yamlContent);

  if (!isRecord(rawConfig)) {
    throw new Error('Configuration must be a valid YAML object');
  }

  // Validate with Zod
  const validationResult = ConfigSchema.safeParse(rawConfig);

  if (!validationResult.success) {
    const issues = validationResult.error.issues;
    const errors = issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Configuration validation failed:\n${errors}`);
  }

  // Normalize the validated config
  return normalizeConfig(validationResult.data, env);
}

/**
 * Parse configuration from a file path
 */
export function parseConfigFile(filePath: string, env: NodeJS.ProcessEnv = process.env): NormalizedConfig {
  const absolutePath = path.resolve(filePath);

  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Configuration file not found: ${absolutePath}`);
  }

  const content = fs.readFileSync(absolutePath, 'utf-8');
  return parseConfigString(content, env);
}

/**
 * Config file to load: SPEC_SYNC_CONFIG, else .spec-sync.yml
 */
export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.SPEC_SYNC_CONFIG || DEFAULT_CONFIG_PATH;
}

/**
 * Normalize validated config to consistent format
 */
function normalizeConfig(config: Config, env: NodeJS.ProcessEnv): NormalizedConfig {
  const [owner, name] = config.repository.split('/');
  const fields = config.fields ?? {};
  const retry = config.retry ?? {};

  return {
    github: {
      token: config.github?.token ?? env.GITHUB_TOKEN,
    },
    repository: { owner, name },
    project: config.project && {
      owner: config.project.owner,
      number: config.project.number,
      isOrg: config.project.is_org ?? true,
    },
    projectTitle: config.project_title,
    tasksPath: config.tasks_path ?? DEFAULT_TASKS_PATH,
    statePath: config.state_path ?? DEFAULT_STATE_PATH,
    fieldNames: {
      taskId: fields.task_id ?? DEFAULT_FIELD_NAMES.taskId,
      phase: fields.phase ?? DEFAULT_FIELD_NAMES.phase,
      group: fields.group ?? DEFAULT_FIELD_NAMES.group,
      priority: fields.priority ?? DEFAULT_FIELD_NAMES.priority,
      parallel: fields.parallel ?? DEFAULT_FIELD_NAMES.parallel,
      userStory: fields.user_story ?? DEFAULT_FIELD_NAMES.userStory,
      status: fields.status ?? DEFAULT_FIELD_NAMES.status,
    },
    statusFieldMapping: {
      ...DEFAULT_STATUS_MAPPING,
      ...config.status_field_mapping,
    },
    retry: {
      maxAttempts: retry.max_attempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
      baseDelayMs: retry.base_delay_ms ?? DEFAULT_RETRY_POLICY.baseDelayMs,
      maxDelayMs: retry.max_delay_ms ?? DEFAULT_RETRY_POLICY.maxDelayMs,
      lowWatermark: retry.low_watermark ?? DEFAULT_RETRY_POLICY.lowWatermark,
    },
    timeoutMs: retry.timeout_ms,
  };
}
