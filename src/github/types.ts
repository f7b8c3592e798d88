/**
 * GitHub API response types for issues and Projects v2
 */

// GraphQL node interface
export interface GitHubNode {
  id: string;
}

// Project field option (for single-select fields like Status)
export interface ProjectFieldOption {
  id: string;
  name: string;
}

// Project field types. Fields of other kinds come back as empty objects
export interface ProjectField extends GitHubNode {
  name: string;
  dataType?: string;
}

export interface ProjectSingleSelectField extends ProjectField {
  options: ProjectFieldOption[];
}

export type ProjectFieldNode = ProjectField | ProjectSingleSelectField | Record<string, never>;

// Project item field values
export interface ProjectItemFieldValue {
  field?: { name?: string };
}

export interface ProjectItemFieldTextValue extends ProjectItemFieldValue {
  text: string | null;
}

export interface ProjectItemFieldSingleSelectValue extends ProjectItemFieldValue {
  name: string | null;
  optionId: string | null;
}

export type ProjectItemFieldValueNode =
  | ProjectItemFieldTextValue
  | ProjectItemFieldSingleSelectValue
  | Record<string, never>;

export interface IssueProjectItem extends GitHubNode {
  project: GitHubNode;
  fieldValues: {
    nodes: ProjectItemFieldValueNode[];
  };
}

// Issue as read for matching
export interface IssueNode extends GitHubNode {
  number: number;
  title: string;
  body: string;
  url: string;
  parent: GitHubNode | null;
  blockedBy: { nodes: GitHubNode[] };
  projectItems: { nodes: IssueProjectItem[] };
}

// Page info for pagination
export interface PageInfo {
  hasNextPage: boolean;
  endCursor: string | null;
}

// Project v2
export interface ProjectV2 extends GitHubNode {
  title: string;
  number: number;
  url: string;
  fields?: {
    nodes: ProjectFieldNode[];
  };
}

export interface RepositoryInfo extends GitHubNode {
  nameWithOwner: string;
  owner: GitHubNode & { login: string };
}

// API response types
export interface GetRepositoryResponse {
  repository: RepositoryInfo | null;
}

export interface CreateProjectResponse {
  createProjectV2: {
    projectV2: ProjectV2;
  };
}

export interface GetUserProjectResponse {
  user: {
    projectV2: ProjectV2 | null;
  } | null;
}

export interface GetOrgProjectResponse {
  organization: {
    projectV2: ProjectV2 | null;
  } | null;
}

export interface GetProjectFieldsResponse {
  node: {
    fields?: { nodes: ProjectFieldNode[] };
  } | null;
}

export interface GetRepositoryIssuesResponse {
  repository: {
    issues: {
      pageInfo: PageInfo;
      nodes: IssueNode[];
    };
  } | null;
}

export interface CreateIssueResponse {
  createIssue: {
    issue: {
      id: string;
      number: number;
      url: string;
      projectItems: { nodes: Array<GitHubNode & { project: GitHubNode }> };
    };
  };
}

export interface UpdateIssueResponse {
  updateIssue: {
    issue: GitHubNode;
  };
}

export interface AddProjectItemResponse {
  addProjectV2ItemById: {
    item: {
      id: string;
    };
  };
}

export interface UpdateProjectItemFieldResponse {
  updateProjectV2ItemFieldValue: {
    projectV2Item: {
      id: string;
    };
  };
}

export interface CreateProjectFieldResponse {
  createProjectV2Field: {
    projectV2Field: ProjectField | ProjectSingleSelectField;
  };
}

export interface AddBlockedByResponse {
  addBlockedBy: {
    issue: GitHubNode;
  };
}

// Rate limit state from the last response headers
export interface RateLimitState {
  limit?: number;
  remaining: number;
  /** Epoch milliseconds */
  resetAt: number;
}

// Cache entry for project context
export interface ProjectContext {
  projectId: string;
  projectNumber: number;
  title: string;
  fields: ProjectField[];
  cachedAt: number;
}

export interface CreateIssueInput {
  repositoryId: string;
  title: string;
  body: string;
  parentIssueId?: string;
  projectV2Ids?: string[];
}

export interface CreatedIssue {
  id: string;
  number: number;
  url: string;
  /** Item ids keyed by project id, when created with projectV2Ids */
  projectItems: Record<string, string>;
}

export type ProjectFieldValueInput = { text: string } | { singleSelectOptionId: string };
