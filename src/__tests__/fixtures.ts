/**
 * Shared tasks.md content for the test suites
 */

export const SAMPLE_TASKS = `# Tasks: Connector Toolkit

**Input**: specs/001-connectors/
**Branch**: \`001-connectors\`

## Phase 1: Setup

**Purpose**: Project initialization

- [x] T001 Create project structure in src/app/main.ts
- [ ] T002 [P] Configure linting
- [ ] T003 [P] Add CI workflow

## Phase 2: User Story 1 - Generate Connectors (Priority: P1) 🎯 MVP

**Goal**: Users can generate connectors

### Models (US1)

- [ ] T004 [US1] Create model in \`src/models/connector.ts\`
- [ ] T005 Wire model into CLI
`;

export const PROJECT_ID = 'PROJECT_1';
