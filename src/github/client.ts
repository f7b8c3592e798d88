import { GraphQLClient, ClientError } from 'graphql-request';
import type {
  ProjectV2,
  ProjectContext,
  ProjectField,
  ProjectFieldNode,
  ProjectSingleSelectField,
  IssueNode,
  RateLimitState,
  CreateIssueInput,
  CreatedIssue,
  ProjectFieldValueInput,
  RepositoryInfo,
  GetRepositoryResponse,
  GetUserProjectResponse,
  GetOrgProjectResponse,
  GetProjectFieldsResponse,
  GetRepositoryIssuesResponse,
  CreateProjectResponse,
  CreateIssueResponse,
  UpdateIssueResponse,
  AddProjectItemResponse,
  UpdateProjectItemFieldResponse,
  CreateProjectFieldResponse,
  AddBlockedByResponse,
} from './types.js';
import {
  GET_REPOSITORY,
  GET_USER_PROJECT,
  GET_ORG_PROJECT,
  GET_PROJECT_FIELDS,
  GET_REPOSITORY_ISSUES,
  CREATE_PROJECT,
  CREATE_ISSUE,
  UPDATE_ISSUE,
  ADD_PROJECT_ITEM,
  UPDATE_PROJECT_ITEM_FIELD,
  CREATE_PROJECT_FIELD,
  ADD_BLOCKED_BY,
} from './queries.js';

const GITHUB_GRAPHQL_ENDPOINT = 'https://api.github.com/graphql';
const CACHE_TTL_MS = 60 * 60 * 1000; // 1 hour
const ISSUE_PAGE_SIZE = 50;
const DEFAULT_RETRY_AFTER_MS = 60_000;

export interface GitHubClientOptions {
  token: string;
  endpoint?: string;
}

/**
 * How a failed request should be handled by the caller
 * - transient: 5xx, timeouts, network failures
 * - rate-limited: primary or secondary rate limit
 * - conflict: the change already exists
 * - fatal: authentication or permissions
 * - request: any other rejected request
 */
export type GitHubErrorCategory = 'transient' | 'rate-limited' | 'conflict' | 'fatal' | 'request';

export class GitHubClientError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly category: GitHubErrorCategory = 'request',
    public readonly retryAfterMs?: number
  ) {
    super(message);
    this.name = 'GitHubClientError';
  }
}

function isProjectField(node: ProjectFieldNode): node is ProjectField | ProjectSingleSelectField {
  return typeof node.id === 'string' && typeof node.name === 'string';
}

/**
 * Retry delay from Retry-After (seconds) or x-ratelimit-reset (epoch seconds)
 */
export function retryAfterFromHeaders(headers: Headers | undefined, now: number = Date.now()): number | undefined {
  const retryAfter = headers?.get('retry-after');
  if (retryAfter && !Number.isNaN(Number(retryAfter))) {
    return Number(retryAfter) * 1000;
  }
  const reset = headers?.get('x-ratelimit-reset');
  if (reset && !Number.isNaN(Number(reset))) {
    return Math.max(0, Number(reset) * 1000 - now);
  }
  return undefined;
}

/**
 * GitHub GraphQL client with authentication, project caching and
 * rate-limit tracking. Requests are issued once; retrying is left to the
 * caller, which gets classified GitHubClientErrors.
 */
export class GitHubClient {
  private client: GraphQLClient;
  private projectCache: Map<string, ProjectContext> = new Map();
  private lastRateLimit?: RateLimitState;

  constructor(options: GitHubClientOptions) {
    this.client = new GraphQLClient(options.endpoint ?? GITHUB_GRAPHQL_ENDPOINT, {
      headers: {
        authorization: `Bearer ${options.token}`,
      },
    });
  }

  /**
   * Budget reported by the most recent response
   */
  getRateLimit(): RateLimitState | undefined {
    return this.lastRateLimit;
  }

  /**
   * Resolve a repository node ID
   */
  async getRepository(owner: string, name: string): Promise<RepositoryInfo> {
    const response = await this.execute<GetRepositoryResponse>(GET_REPOSITORY, { owner, name });
    if (!response.repository) {
      throw new GitHubClientError(
        `Repository ${owner}/${name} not found. Ensure it exists and your token has access.`,
        404
      );
    }
    return response.repository;
  }

  /**
   * Get a project by org/user and number, with caching
   */
  async getProject(login: string, projectNumber: number, isOrg: boolean = true): Promise<ProjectContext> {
    const cacheKey = `${login}/${projectNumber}`;
    const cached = this.projectCache.get(cacheKey);

    if (cached && Date.now() - cached.cachedAt < CACHE_TTL_MS) {
      return cached;
    }

    const project = await this.fetchProject(login, projectNumber, isOrg);
    const context: ProjectContext = {
      projectId: project.id,
      projectNumber: project.number,
      title: project.title,
      fields: (project.fields?.nodes ?? []).filter(isProjectField),
      cachedAt: Date.now(),
    };

    this.projectCache.set(cacheKey, context);
    return context;
  }

  /**
   * Fetch a project, falling back from org to user (or the reverse)
   */
  private async fetchProject(login: string, projectNumber: number, isOrg: boolean): Promise<ProjectV2> {
    const variables = { login, number: projectNumber };

    const lookup = async (asOrg: boolean): Promise<ProjectV2 | null> => {
      if (asOrg) {
        const response = await this.execute<GetOrgProjectResponse>(GET_ORG_PROJECT, variables);
        return response.organization?.projectV2 ?? null;
      }
      const response = await this.execute<GetUserProjectResponse>(GET_USER_PROJECT, variables);
      return response.user?.projectV2 ?? null;
    };

    const project = (await this.tryLookup(() => lookup(isOrg))) ?? (await lookup(!isOrg));
    if (!project) {
      throw new GitHubClientError(
        `Project #${projectNumber} not found for ${login}. ` +
        `Ensure the project exists and your token has access.`,
        404
      );
    }
    return project;
  }

  /**
   * GitHub answers a user login queried as an organization with a
   * NOT_FOUND error rather than null; treat that as "not found here"
   */
  private async tryLookup(lookup: () => Promise<ProjectV2 | null>): Promise<ProjectV2 | null> {
    try {
      return await lookup();
    } catch (error) {
      if (error instanceof GitHubClientError && error.category === 'request') {
        return null;
      }
      throw error;
    }
  }

  /**
   * Create a project for a user or organization node
   */
  async createProject(ownerId: string, title: string): Promise<ProjectV2> {
    const response = await this.execute<CreateProjectResponse>(CREATE_PROJECT, {
      input: { ownerId, title },
    });
    return response.createProjectV2.projectV2;
  }

  /**
   * Fields of a project, bypassing the cache
   */
  async getProjectFields(projectId: string): Promise<ProjectField[]> {
    const response = await this.execute<GetProjectFieldsResponse>(GET_PROJECT_FIELDS, { projectId });
    if (!response.node) {
      throw new GitHubClientError(`Project ${projectId} not found`, 404);
    }
    return (response.node.fields?.nodes ?? []).filter(isProjectField);
  }

  /**
   * All issues of a repository, oldest first
   */
  async listRepositoryIssues(owner: string, name: string): Promise<IssueNode[]> {
    const issues: IssueNode[] = [];
    let cursor: string | undefined = undefined;

    // eslint-disable-next-line no-constant-condition
    while (true) {
      const response: GetRepositoryIssuesResponse = await this.execute<GetRepositoryIssuesResponse>(
        GET_REPOSITORY_ISSUES,
        { owner, name, first: ISSUE_PAGE_SIZE, after: cursor }
      );

      if (!response.repository) {
        throw new GitHubClientError(`Repository ${owner}/${name} not found`, 404);
      }

      issues.push(...response.repository.issues.nodes);

      if (!response.repository.issues.pageInfo.hasNextPage) {
        break;
      }
      cursor = response.repository.issues.pageInfo.endCursor ?? undefined;
    }

    return issues;
  }

  /**
   * Create an issue, optionally as a sub-issue and inside projects
   */
  async createIssue(input: CreateIssueInput): Promise<CreatedIssue> {
    const response = await this.execute<CreateIssueResponse>(CREATE_ISSUE, { input });
    const issue = response.createIssue.issue;

    const projectItems: Record<string, string> = {};
    for (const item of issue.projectItems.nodes) {
      projectItems[item.project.id] = item.id;
    }

    return { id: issue.id, number: issue.number, url: issue.url, projectItems };
  }

  async updateIssue(issueId: string, patch: { title?: string; body?: string }): Promise<void> {
    await this.execute<UpdateIssueResponse>(UPDATE_ISSUE, { input: { id: issueId, ...patch } });
  }

  /**
   * Add an issue or PR to a project. Adding an item twice returns the existing item.
   */
  async addItemToProject(projectId: string, contentId: string): Promise<string> {
    const response = await this.execute<AddProjectItemResponse>(
      ADD_PROJECT_ITEM,
      { projectId, contentId }
    );

    return response.addProjectV2ItemById.item.id;
  }

  /**
   * Set a text or single-select field value on a project item
   */
  async updateItemField(
    projectId: string,
    itemId: string,
    fieldId: string,
    value: ProjectFieldValueInput
  ): Promise<void> {
    await this.execute<UpdateProjectItemFieldResponse>(
      UPDATE_PROJECT_ITEM_FIELD,
      { projectId, itemId, fieldId, value }
    );
  }

  /**
   * Create a custom project field
   */
  async createField(
    projectId: string,
    name: string,
    dataType: 'TEXT' | 'SINGLE_SELECT',
    options: string[] = []
  ): Promise<ProjectField | ProjectSingleSelectField> {
    const input: Record<string, unknown> = { projectId, name, dataType };
    if (dataType === 'SINGLE_SELECT') {
      input.singleSelectOptions = options.map((option) => ({
        name: option,
        color: 'GRAY',
        description: '',
      }));
    }

    const response = await this.execute<CreateProjectFieldResponse>(CREATE_PROJECT_FIELD, { input });
    return response.createProjectV2Field.projectV2Field;
  }

  /**
   * Record that `issueId` is blocked by `blockingIssueId`
   */
  async addBlockedBy(issueId: string, blockingIssueId: string): Promise<void> {
    await this.execute<AddBlockedByResponse>(ADD_BLOCKED_BY, { issueId, blockingIssueId });
  }

  /**
   * Execute a GraphQL document once, tracking rate-limit headers
   */
  private async execute<T>(query: string, variables: Record<string, unknown>): Promise<T> {
    try {
      const response = await this.client.rawRequest<T>(query, variables);
      this.trackRateLimit(response.headers);
      if (response.data === undefined || response.data === null) {
        throw new GitHubClientError('Empty response from GitHub', response.status, 'transient');
      }
      return response.data;
    } catch (error) {
      throw this.wrapError(error);
    }
  }

  private trackRateLimit(headers: Headers | undefined): void {
    const remaining = headers?.get('x-ratelimit-remaining');
    const reset = headers?.get('x-ratelimit-reset');
    if (!remaining || !reset) {
      return;
    }
    const limit = headers?.get('x-ratelimit-limit');
    this.lastRateLimit = {
      limit: limit ? Number(limit) : undefined,
      remaining: Number(remaining),
      resetAt: Number(reset) * 1000,
    };
  }

  /**
   * Wrap errors in a classified GitHubClientError
   */
  private wrapError(error: unknown): GitHubClientError {
    if (error instanceof GitHubClientError) {
      return error;
    }

    if (error instanceof ClientError) {
      const status = error.response.status;
      const message = error.response.errors?.[0]?.message ?? error.message;
      const type = graphqlErrorType(error.response.errors?.[0]);
      const rawHeaders: unknown = error.response.headers;
      const headers = rawHeaders instanceof Headers ? rawHeaders : undefined;
      this.trackRateLimit(headers);

      const rateLimited =
        status === 429 ||
        type === 'RATE_LIMITED' ||
        /rate limit/i.test(message) ||
        (status === 403 && headers?.get('x-ratelimit-remaining') === '0');

      if (rateLimited) {
        return new GitHubClientError(
          `Rate limited: ${message}`,
          status,
          'rate-limited',
          retryAfterFromHeaders(headers) ?? DEFAULT_RETRY_AFTER_MS
        );
      }
      if (status === 401) {
        return new GitHubClientError('Authentication failed. Check your GitHub token.', 401, 'fatal');
      }
      if (status === 403) {
        return new GitHubClientError(
          'Access denied. Ensure your token has the required scopes.',
          403,
          'fatal'
        );
      }
      // GraphQL permission errors arrive with status 200
      if (type === 'FORBIDDEN' || type === 'INSUFFICIENT_SCOPES') {
        return new GitHubClientError(`Access denied: ${message}`, status, 'fatal');
      }
      if (status === 502 || status === 503 || status === 504) {
        return new GitHubClientError(`GitHub unavailable (${status}): ${message}`, status, 'transient');
      }
      if (/already (exists|been taken|added|blocked)|duplicate/i.test(message)) {
        return new GitHubClientError(message, status, 'conflict');
      }

      return new GitHubClientError(message, status);
    }

    if (error instanceof Error) {
      // fetch failures and timeouts surface as plain errors
      return new GitHubClientError(error.message, undefined, 'transient');
    }

    return new GitHubClientError('Unknown error occurred');
  }
}

/**
 * GitHub's `type` on a GraphQL error, e.g. NOT_FOUND or FORBIDDEN
 */
function graphqlErrorType(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'type' in error && typeof error.type === 'string') {
    return error.type;
  }
  return undefined;
}

/**
 * Create a GitHub client with the provided token
 */
export function createGitHubClient(token: string): GitHubClient {
  if (!token) {
    throw new GitHubClientError('GitHub token is required');
  }
  return new GitHubClient({ token });
}
