import { describe, it, expect } from 'vitest';
import { buildDependencyGraph } from '../graph/dependency-graph.js';
import { parseTasksDocument } from '../parser/tasks-parser.js';
import {
  MAX_TITLE_LENGTH,
  formatGroupBody,
  formatGroupTitle,
  formatPhaseBody,
  formatPhaseTitle,
  formatTaskBody,
  formatTaskTitle,
  normalizeBody,
} from '../reconcile/body.js';
import { computeContentHash } from '../reconcile/hash.js';
import { groupKey, phaseKey, taskKey } from '../reconcile/keys.js';
import { SAMPLE_TASKS } from './fixtures.js';

describe('Issue Bodies', () => {
  const document = parseTasksDocument(SAMPLE_TASKS);
  const graph = buildDependencyGraph(document);
  const [setup, story] = document.phases;
  const models = story.groups[0];

  describe('titles', () => {
    it('should title each kind', () => {
      expect(formatPhaseTitle(story)).toBe('Phase 2: User Story 1 - Generate Connectors');
      expect(formatGroupTitle(models)).toBe('Models');
      expect(formatTaskTitle(setup.tasks[1])).toBe('[T002] Configure linting');
    });

    it('should truncate long titles', () => {
      const task = { ...setup.tasks[1], description: 'x'.repeat(300) };
      const title = formatTaskTitle(task);

      expect(title).toHaveLength(MAX_TITLE_LENGTH);
      expect(title.endsWith('…')).toBe(true);
    });

    it('should count characters, not code units, when truncating', () => {
      const title = formatGroupTitle({ ...models, title: `a${'🎯'.repeat(300)}` });

      expect(title).toBe(`a${'🎯'.repeat(254)}…`);
      expect(Array.from(title)).toHaveLength(MAX_TITLE_LENGTH);
    });
  });

  describe('formatPhaseBody', () => {
    it('should include phase metadata and the key marker', () => {
      expect(formatPhaseBody(story, phaseKey(2))).toBe(
        [
          '**Goal**: Users can generate connectors',
          '',
          '**Priority**: P1',
          '',
          '**MVP**: Yes',
          '',
          '**Tasks**: 2 total',
          '',
          '---',
          '<!-- spec-sync:phase/2 -->',
        ].join('\n')
      );
    });
  });

  describe('formatGroupBody', () => {
    it('should name the user story and phase', () => {
      expect(formatGroupBody(story, models, groupKey(2, 'Models'))).toBe(
        [
          '**User Story**: US1',
          '',
          '**Phase**: Phase 2: User Story 1 - Generate Connectors',
          '',
          '**Tasks**: 2 total',
          '',
          '---',
          '<!-- spec-sync:group/2/Models -->',
        ].join('\n')
      );
    });
  });

  describe('formatTaskBody', () => {
    it('should list files and blockers', () => {
      expect(formatTaskBody(models.tasks[0], story, graph, taskKey(2, 'Models', 'T004'))).toBe(
        [
          '**Task ID**: T004',
          '',
          '**Description**: Create model in `src/models/connector.ts`',
          '',
          '**Phase**: Phase 2: User Story 1 - Generate Connectors',
          '',
          '**Task Group**: Models',
          '',
          '**User Story**: US1',
          '',
          '**Files**:',
          '- `src/models/connector.ts`',
          '',
          '**Blocked by**: T001',
          '',
          '---',
          '<!-- spec-sync:task/2/Models/T004 -->',
        ].join('\n')
      );
    });

    it('should mark parallel tasks', () => {
      const body = formatTaskBody(setup.tasks[1], setup, graph, taskKey(1, null, 'T002'));

      expect(body.split('\n')).toContain('**Parallel**: Yes - can run alongside other parallel tasks');
    });

    it('should omit blockers for the first task', () => {
      const body = formatTaskBody(setup.tasks[0], setup, graph, taskKey(1, null, 'T001'));

      expect(body.includes('**Blocked by**')).toBe(false);
    });
  });

  describe('normalizeBody', () => {
    it('should ignore line endings and surrounding whitespace', () => {
      expect(normalizeBody('  a\r\nb\n\n')).toBe('a\nb');
    });
  });

  describe('computeContentHash', () => {
    it('should be stable across blank lines and spacing', () => {
      const spaced = SAMPLE_TASKS.replace('- [ ] T005 Wire model into CLI', '\n\n- [ ] T005   Wire model  into CLI');

      expect(computeContentHash(parseTasksDocument(spaced))).toBe(computeContentHash(document));
    });

    it('should change when a task is completed', () => {
      const completed = SAMPLE_TASKS.replace('- [ ] T005', '- [x] T005');

      expect(computeContentHash(parseTasksDocument(completed))).not.toBe(computeContentHash(document));
    });
  });
});
