export {
  parseConfigString,
  parseConfigFile,
  resolveConfigPath,
  DEFAULT_CONFIG_PATH,
  DEFAULT_TASKS_PATH,
} from './parser.js';

export type {
  Config,
  ProjectConfig,
  StatusFieldMapping,
  FieldNamesConfig,
  RetryConfig,
  GitHubConfig,
  NormalizedConfig,
  NormalizedProjectConfig,
} from '../types/config.js';

export {
  ConfigSchema,
  ProjectConfigSchema,
  StatusFieldMappingSchema,
  FieldNamesSchema,
  RetryConfigSchema,
  GitHubConfigSchema,
} from '../types/config.js';
