export { GitHubClient, GitHubClientError, createGitHubClient, retryAfterFromHeaders } from './client.js';
export type { GitHubClientOptions, GitHubErrorCategory } from './client.js';
export { GitHubTracker, toTrackerError, toRemoteItem } from './tracker.js';
export type { GitHubTrackerOptions } from './tracker.js';

export type {
  ProjectV2,
  RepositoryInfo,
  ProjectContext,
  ProjectField,
  ProjectSingleSelectField,
  ProjectFieldOption,
  IssueNode,
  IssueProjectItem,
  PageInfo,
  RateLimitState,
  CreateIssueInput,
  CreatedIssue,
} from './types.js';

export {
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
