import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

// Mock the client module
const mockGetRepository = vi.fn();
const mockGetProject = vi.fn();
const mockCreateProject = vi.fn();
const mockListRepositoryIssues = vi.fn();
const mockGetRateLimit = vi.fn();

vi.mock('../github/client.js', async () => {
  const actual = await vi.importActual<typeof import('../github/client.js')>('../github/client.js');
  class MockGitHubClient {
    getRepository = mockGetRepository;
    getProject = mockGetProject;
    createProject = mockCreateProject;
    listRepositoryIssues = mockListRepositoryIssues;
    getRateLimit = mockGetRateLimit;
  }
  return {
    ...actual,
    GitHubClient: MockGitHubClient,
    createGitHubClient: () => new MockGitHubClient(),
  };
});

// Import after mocking
import { GitHubClient, GitHubClientError } from '../github/client.js';
import { parseConfigString } from '../config/parser.js';
import { silentLogger } from '../reconcile/logger.js';
import { PENDING_PROJECT_ID, resolveProject } from '../sync/project.js';
import { createEmptySyncState, readSyncState } from '../sync/state.js';
import { syncTasks } from '../sync/sync.js';
import { SAMPLE_TASKS } from './fixtures.js';

const UNCONFIGURED_YAML = 'repository: "acme/connectors"';
const CONFIGURED_YAML = `
repository: "acme/connectors"
project:
  owner: "acme"
  number: 7
`;
const PROJECT_URL = 'https://github.com/orgs/acme/projects/12';

describe('Project Resolution', () => {
  let client: GitHubClient;
  const options = { documentTitle: 'Connector Toolkit', logger: silentLogger };

  beforeEach(() => {
    vi.clearAllMocks();
    client = new GitHubClient({ token: 'test-secret' });
    mockGetRepository.mockResolvedValue({
      id: 'R_1',
      nameWithOwner: 'acme/connectors',
      owner: { id: 'O_acme', login: 'acme' },
    });
    mockCreateProject.mockResolvedValue({
      id: 'PVT_new',
      number: 12,
      title: 'Tasks: Connector Toolkit',
      url: PROJECT_URL,
    });
  });

  describe('resolveProject', () => {
    it('creates a project under the repository owner when none is configured or recorded', async () => {
      const config = parseConfigString(UNCONFIGURED_YAML, {});

      const target = await resolveProject(client, config, createEmptySyncState(), options);

      expect(target).toEqual({ projectId: 'PVT_new', projectRef: 'acme/12', projectUrl: PROJECT_URL, created: true });
      expect(mockGetRepository).toHaveBeenCalledWith('acme', 'connectors');
      expect(mockCreateProject).toHaveBeenCalledWith('O_acme', 'Tasks: Connector Toolkit');
    });

    it('uses the configured project title', async () => {
      const config = parseConfigString(`${UNCONFIGURED_YAML}\nproject_title: "Connector Work"`, {});

      await resolveProject(client, config, createEmptySyncState(), options);

      expect(mockCreateProject).toHaveBeenCalledWith('O_acme', 'Connector Work');
    });

    it('reuses the project recorded in the state', async () => {
      const config = parseConfigString(UNCONFIGURED_YAML, {});
      const state = { ...createEmptySyncState(), projectId: 'PVT_old', projectRef: 'acme/3', projectUrl: PROJECT_URL };

      const target = await resolveProject(client, config, state, options);

      expect(target).toEqual({ projectId: 'PVT_old', projectRef: 'acme/3', projectUrl: PROJECT_URL });
      expect(mockGetRepository).not.toHaveBeenCalled();
      expect(mockCreateProject).not.toHaveBeenCalled();
    });

    it('does not create a project on a dry run', async () => {
      const config = parseConfigString(UNCONFIGURED_YAML, {});

      const target = await resolveProject(client, config, createEmptySyncState(), { ...options, dryRun: true });

      expect(target).toEqual({ projectId: PENDING_PROJECT_ID, projectRef: 'acme/new' });
      expect(mockCreateProject).not.toHaveBeenCalled();
    });

    it('looks up a configured project by owner and number', async () => {
      mockGetProject.mockResolvedValue({ projectId: 'PVT_7', projectNumber: 7, title: 'Board', fields: [], cachedAt: 0 });
      const config = parseConfigString(CONFIGURED_YAML, {});

      const target = await resolveProject(client, config, createEmptySyncState(), options);

      expect(target).toEqual({ projectId: 'PVT_7', projectRef: 'acme/7' });
      expect(mockGetProject).toHaveBeenCalledWith('acme', 7, true);
      expect(mockCreateProject).not.toHaveBeenCalled();
    });

    it('looks up a configured project again when the state recorded another one', async () => {
      mockGetProject.mockResolvedValue({ projectId: 'PVT_7', projectNumber: 7, title: 'Board', fields: [], cachedAt: 0 });
      const config = parseConfigString(CONFIGURED_YAML, {});
      const state = { ...createEmptySyncState(), projectId: 'PVT_new', projectRef: 'acme/12' };

      const target = await resolveProject(client, config, state, options);

      expect(target.projectId).toBe('PVT_7');
    });
  });

  describe('syncTasks', () => {
    let tempDir: string;
    let tasksPath: string;
    let statePath: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'spec-sync-project-'));
      tasksPath = path.join(tempDir, 'tasks.md');
      statePath = path.join(tempDir, 'state.json');
      fs.writeFileSync(tasksPath, SAMPLE_TASKS);
      mockListRepositoryIssues.mockRejectedValue(new GitHubClientError('Bad credentials', 401, 'fatal'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('records a created project before the run can fail, and creates it once', async () => {
      const config = parseConfigString(UNCONFIGURED_YAML, { GITHUB_TOKEN: 'test-secret' });
      const run = () => syncTasks({ config, tasksPath, statePath, logger: silentLogger });

      const first = await run();

      expect(first.status).toBe('aborted');
      expect(first.abortReason).toBe('Bad credentials');
      const state = readSyncState(statePath, silentLogger);
      expect(state.projectId).toBe('PVT_new');
      expect(state.projectRef).toBe('acme/12');
      expect(state.projectUrl).toBe(PROJECT_URL);

      await run();

      expect(mockCreateProject).toHaveBeenCalledTimes(1);
      expect(readSyncState(statePath, silentLogger).projectId).toBe('PVT_new');
    });
  });
});
