import { gql } from 'graphql-request';

/**
 * GraphQL documents for issues, Projects v2 and issue dependencies
 */

const PROJECT_FIELDS_FRAGMENT = `
  fields(first: 50) {
    nodes {
      ... on ProjectV2Field {
        id
        name
        dataType
      }
      ... on ProjectV2SingleSelectField {
        id
        name
        dataType
        options {
          id
          name
        }
      }
      ... on ProjectV2IterationField {
        id
        name
        dataType
      }
    }
  }
`;

export const GET_REPOSITORY = gql`
  query GetRepository($owner: String!, $name: String!) {
    repository(owner: $owner, name: $name) {
      id
      nameWithOwner
      owner {
        id
        login
      }
    }
  }
`;

// Get a specific project by number for a user
export const GET_USER_PROJECT = gql`
  query GetUserProject($login: String!, $number: Int!) {
    user(login: $login) {
      projectV2(number: $number) {
        id
        title
        number
        url
        ${PROJECT_FIELDS_FRAGMENT}
      }
    }
  }
`;

// Get a specific project by number for an organization
export const GET_ORG_PROJECT = gql`
  query GetOrgProject($login: String!, $number: Int!) {
    organization(login: $login) {
      projectV2(number: $number) {
        id
        title
        number
        url
        ${PROJECT_FIELDS_FRAGMENT}
      }
    }
  }
`;

// Get project fields by project node ID
export const GET_PROJECT_FIELDS = gql`
  query GetProjectFields($projectId: ID!) {
    node(id: $projectId) {
      ... on ProjectV2 {
        ${PROJECT_FIELDS_FRAGMENT}
      }
    }
  }
`;

// Repository issues with everything needed to match them by key marker
export const GET_REPOSITORY_ISSUES = gql`
  query GetRepositoryIssues($owner: String!, $name: String!, $first: Int = 50, $after: String) {
    repository(owner: $owner, name: $name) {
      issues(first: $first, after: $after, orderBy: { field: CREATED_AT, direction: ASC }) {
        pageInfo {
          hasNextPage
          endCursor
        }
        nodes {
          id
          number
          title
          body
          url
          parent {
            id
          }
          blockedBy(first: 50) {
            nodes {
              id
            }
          }
          projectItems(first: 10) {
            nodes {
              id
              project {
                id
              }
              fieldValues(first: 20) {
                nodes {
                  ... on ProjectV2ItemFieldTextValue {
                    text
                    field {
                      ... on ProjectV2FieldCommon {
                        name
                      }
                    }
                  }
                  ... on ProjectV2ItemFieldSingleSelectValue {
                    name
                    optionId
                    field {
                      ... on ProjectV2FieldCommon {
                        name
                      }
                    }
                  }
                }
              }
            }
          }
        }
      }
    }
  }
`;

// Create a project owned by a user or organization
export const CREATE_PROJECT = gql`
  mutation CreateProject($input: CreateProjectV2Input!) {
    createProjectV2(input: $input) {
      projectV2 {
        id
        number
        title
        url
      }
    }
  }
`;

export const CREATE_ISSUE = gql`
  mutation CreateIssue($input: CreateIssueInput!) {
    createIssue(input: $input) {
      issue {
        id
        number
        url
        projectItems(first: 10) {
          nodes {
            id
            project {
              id
            }
          }
        }
      }
    }
  }
`;

export const UPDATE_ISSUE = gql`
  mutation UpdateIssue($input: UpdateIssueInput!) {
    updateIssue(input: $input) {
      issue {
        id
      }
    }
  }
`;

// Add an item (issue/PR) to a project
export const ADD_PROJECT_ITEM = gql`
  mutation AddProjectItem($projectId: ID!, $contentId: ID!) {
    addProjectV2ItemById(input: { projectId: $projectId, contentId: $contentId }) {
      item {
        id
      }
    }
  }
`;

// Update a project item field (text or single select)
export const UPDATE_PROJECT_ITEM_FIELD = gql`
  mutation UpdateProjectItemField(
    $projectId: ID!
    $itemId: ID!
    $fieldId: ID!
    $value: ProjectV2FieldValue!
  ) {
    updateProjectV2ItemFieldValue(
      input: { projectId: $projectId, itemId: $itemId, fieldId: $fieldId, value: $value }
    ) {
      projectV2Item {
        id
      }
    }
  }
`;

export const CREATE_PROJECT_FIELD = gql`
  mutation CreateProjectField($input: CreateProjectV2FieldInput!) {
    createProjectV2Field(input: $input) {
      projectV2Field {
        ... on ProjectV2Field {
          id
          name
          dataType
        }
        ... on ProjectV2SingleSelectField {
          id
          name
          dataType
          options {
            id
            name
          }
        }
      }
    }
  }
`;

// Mark an issue as blocked by another issue
export const ADD_BLOCKED_BY = gql`
  mutation AddBlockedBy($issueId: ID!, $blockingIssueId: ID!) {
    addBlockedBy(input: { issueId: $issueId, blockingIssueId: $blockingIssueId }) {
      issue {
        id
      }
    }
  }
`;
