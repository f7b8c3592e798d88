import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  DEFAULT_CONFIG_PATH,
  parseConfigFile,
  parseConfigString,
  resolveConfigPath,
} from '../config/parser.js';

describe('Config Parser', () => {
  describe('parseConfigString', () => {
    it('parses minimal valid config with defaults', () => {
      const yaml = `
repository: "acme/connectors"
project:
  owner: "acme"
  number: 7
`;
      const config = parseConfigString(yaml, {});

      expect(config).toEqual({
        github: { token: undefined },
        repository: { owner: 'acme', name: 'connectors' },
        project: { owner: 'acme', number: 7, isOrg: true },
        tasksPath: 'tasks.md',
        statePath: '.spec-sync/state.json',
        fieldNames: {
          taskId: 'Task ID',
          phase: 'Phase',
          group: 'Task Group',
          priority: 'Priority',
          parallel: 'Parallel',
          userStory: 'User Story',
          status: 'Status',
        },
        statusFieldMapping: { backlog: 'Backlog', ready: 'Ready', done: 'Done' },
        retry: { maxAttempts: 4, baseDelayMs: 1000, maxDelayMs: 60000, lowWatermark: 50 },
        timeoutMs: undefined,
      });
    });

    it('reads the token from the environment', () => {
      const yaml = `
repository: "acme/connectors"
project:
  owner: "acme"
  number: 7
`;
      const config = parseConfigString(yaml, { GITHUB_TOKEN: 'test-secret' });

      expect(config.github.token).toBe('test-secret');
    });

    it('prefers an explicit token over the environment', () => {
      const yaml = `
github:
  token: "test-config-token"
repository: "acme/connectors"
project:
  owner: "acme"
  number: 7
`;
      const config = parseConfigString(yaml, { GITHUB_TOKEN: 'test-secret' });

      expect(config.github.token).toBe('test-config-token');
    });

    it('parses paths, field names, status mapping and retry settings', () => {
      const yaml = `
repository: "octo/tools"
project:
  owner: "octo"
  number: 2
  is_org: false
tasks_path: "specs/001/tasks.md"
state_path: ".cache/state.json"
fields:
  task_id: "Ref"
  group: "Workstream"
status_field_mapping:
  ready: "Todo"
  done: "Shipped"
retry:
  max_attempts: 6
  timeout_ms: 120000
`;
      const config = parseConfigString(yaml, {});

      expect(config.project?.isOrg).toBe(false);
      expect(config.tasksPath).toBe('specs/001/tasks.md');
      expect(config.statePath).toBe('.cache/state.json');
      expect(config.fieldNames.taskId).toBe('Ref');
      expect(config.fieldNames.group).toBe('Workstream');
      expect(config.fieldNames.phase).toBe('Phase');
      expect(config.statusFieldMapping).toEqual({ backlog: 'Backlog', ready: 'Todo', done: 'Shipped' });
      expect(config.retry).toEqual({ maxAttempts: 6, baseDelayMs: 1000, maxDelayMs: 60000, lowWatermark: 50 });
      expect(config.timeoutMs).toBe(120000);
    });

    it('throws on non-object YAML', () => {
      expect(() => parseConfigString('just a string', {})).toThrow('Configuration must be a valid YAML object');
    });

    it('throws on invalid repository format', () => {
      const yaml = `
repository: "connectors"
project:
  owner: "acme"
  number: 7
`;
      expect(() => parseConfigString(yaml, {})).toThrow(
        'Configuration validation failed:\n  - repository: Repository must be in format "owner/repo"'
      );
    });

    it('leaves the project unset when none is configured', () => {
      const config = parseConfigString('repository: "acme/connectors"\nproject_title: "Connector Work"', {});

      expect(config.project).toBeUndefined();
      expect(config.projectTitle).toBe('Connector Work');
    });

    it('throws on non-positive project number', () => {
      const yaml = `
repository: "acme/connectors"
project:
  owner: "acme"
  number: 0
`;
      expect(() => parseConfigString(yaml, {})).toThrow('project.number: Project number must be a positive integer');
    });

    it('throws on invalid retry settings', () => {
      const yaml = `
repository: "acme/connectors"
project:
  owner: "acme"
  number: 7
retry:
  max_attempts: 0
`;
      expect(() => parseConfigString(yaml, {})).toThrow('retry.max_attempts');
    });
  });

  describe('resolveConfigPath', () => {
    it('defaults to the project config file', () => {
      expect(resolveConfigPath({})).toBe(DEFAULT_CONFIG_PATH);
    });

    it('honors SPEC_SYNC_CONFIG', () => {
      expect(resolveConfigPath({ SPEC_SYNC_CONFIG: 'config/sync.yml' })).toBe('config/sync.yml');
    });
  });

  describe('parseConfigFile', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-test-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('reads a config file from disk', () => {
      const configPath = path.join(tempDir, '.spec-sync.yml');
      fs.writeFileSync(configPath, 'repository: "acme/connectors"\nproject:\n  owner: "acme"\n  number: 7\n');

      expect(parseConfigFile(configPath, {}).repository).toEqual({ owner: 'acme', name: 'connectors' });
    });

    it('throws when the file does not exist', () => {
      const configPath = path.join(tempDir, 'missing.yml');

      expect(() => parseConfigFile(configPath, {})).toThrow(`Configuration file not found: ${configPath}`);
    });
  });
});
