import { describe, it, expect } from 'vitest';
import { buildDependencyGraph } from '../graph/dependency-graph.js';
import { parseTasksDocument } from '../parser/tasks-parser.js';
import { getAllTasks } from '../parser/models.js';
import {
  DEFAULT_FIELD_NAMES,
  DEFAULT_STATUS_MAPPING,
  buildFieldDefinitions,
  determineInitialStatus,
  diffFieldValues,
  groupFieldValues,
  resolveFieldValue,
  statusForExistingTask,
  taskFieldValues,
} from '../reconcile/fields.js';
import type { FieldIdMap } from '../reconcile/tracker.js';
import { SAMPLE_TASKS } from './fixtures.js';

const createFieldIds = (): FieldIdMap => ({
  'Task ID': { fieldId: 'F_TASK', dataType: 'TEXT', options: {} },
  Status: {
    fieldId: 'F_STATUS',
    dataType: 'SINGLE_SELECT',
    options: { Backlog: 'OPT_BACKLOG', Ready: 'OPT_READY', Done: 'OPT_DONE' },
  },
});

describe('Project Fields', () => {
  const document = parseTasksDocument(SAMPLE_TASKS);
  const graph = buildDependencyGraph(document);
  const tasks = getAllTasks(document);
  const [setup, story] = document.phases;

  describe('buildFieldDefinitions', () => {
    it('should define the custom fields with the options the document uses', () => {
      expect(buildFieldDefinitions(document, DEFAULT_FIELD_NAMES)).toEqual([
        { name: 'Task ID', dataType: 'TEXT', options: [] },
        {
          name: 'Phase',
          dataType: 'SINGLE_SELECT',
          options: ['Phase 1: Setup', 'Phase 2: User Story 1 - Generate Connectors'],
        },
        { name: 'Task Group', dataType: 'SINGLE_SELECT', options: ['Models'] },
        { name: 'Priority', dataType: 'SINGLE_SELECT', options: ['P1', 'N/A'] },
        { name: 'Parallel', dataType: 'SINGLE_SELECT', options: ['Yes', 'No'] },
        { name: 'User Story', dataType: 'SINGLE_SELECT', options: ['US1', 'N/A'] },
      ]);
    });

    it('should leave out the group field when there are no groups', () => {
      const flat = parseTasksDocument('## Phase 1: Only\n- [ ] T001 One');
      const names = buildFieldDefinitions(flat, DEFAULT_FIELD_NAMES).map((definition) => definition.name);

      expect(names).toEqual(['Task ID', 'Phase', 'Priority', 'Parallel', 'User Story']);
    });

    it('should use configured field names', () => {
      const names = { ...DEFAULT_FIELD_NAMES, taskId: 'Ref', phase: 'Stage' };

      expect(buildFieldDefinitions(document, names).slice(0, 2).map((definition) => definition.name)).toEqual([
        'Ref',
        'Stage',
      ]);
    });
  });

  describe('values', () => {
    it('should give a direct task no group value', () => {
      expect(taskFieldValues(tasks[1], setup, undefined, DEFAULT_FIELD_NAMES)).toEqual([
        { field: 'Task ID', value: 'T002' },
        { field: 'Phase', value: 'Phase 1: Setup' },
        { field: 'Priority', value: 'N/A' },
        { field: 'Parallel', value: 'Yes' },
        { field: 'User Story', value: 'N/A' },
      ]);
    });

    it('should inherit the user story from the group', () => {
      const group = story.groups[0];
      const values = taskFieldValues(tasks[4], story, group, DEFAULT_FIELD_NAMES);

      expect(values).toContainEqual({ field: 'Task Group', value: 'Models' });
      expect(values).toContainEqual({ field: 'User Story', value: 'US1' });
    });

    it('should describe a group', () => {
      expect(groupFieldValues(story, story.groups[0], DEFAULT_FIELD_NAMES)).toEqual([
        { field: 'Phase', value: 'Phase 2: User Story 1 - Generate Connectors' },
        { field: 'Task Group', value: 'Models' },
        { field: 'Priority', value: 'P1' },
        { field: 'User Story', value: 'US1' },
      ]);
    });
  });

  describe('status', () => {
    it('should start completed tasks as done', () => {
      expect(determineInitialStatus(tasks[0], graph, DEFAULT_STATUS_MAPPING)).toBe('Done');
    });

    it('should start tasks with open blockers in the backlog', () => {
      expect(determineInitialStatus(tasks[4], graph, DEFAULT_STATUS_MAPPING)).toBe('Backlog');
    });

    it('should start tasks whose blockers are done as ready', () => {
      expect(determineInitialStatus(tasks[2], graph, DEFAULT_STATUS_MAPPING)).toBe('Ready');
    });

    it('should honor a custom status mapping', () => {
      const mapping = { backlog: 'Todo', ready: 'Up Next', done: 'Shipped' };

      expect(determineInitialStatus(tasks[4], graph, mapping)).toBe('Todo');
      expect(determineInitialStatus(tasks[0], graph, mapping)).toBe('Shipped');
    });

    it('should only push completion onto existing tasks', () => {
      expect(statusForExistingTask(tasks[0], 'In Progress', DEFAULT_STATUS_MAPPING)).toBe('Done');
      expect(statusForExistingTask(tasks[0], 'done', DEFAULT_STATUS_MAPPING)).toBeUndefined();
      expect(statusForExistingTask(tasks[1], 'Backlog', DEFAULT_STATUS_MAPPING)).toBeUndefined();
    });
  });

  describe('diffFieldValues', () => {
    it('should keep only values that differ', () => {
      const desired = [
        { field: 'Phase', value: 'Phase 1: Setup' },
        { field: 'Priority', value: 'P1' },
        { field: 'Parallel', value: 'No' },
      ];

      expect(diffFieldValues(desired, { Phase: 'Phase 1: Setup', Priority: 'P2' })).toEqual([
        { field: 'Priority', value: 'P1' },
        { field: 'Parallel', value: 'No' },
      ]);
    });
  });

  describe('resolveFieldValue', () => {
    it('should resolve text values', () => {
      expect(resolveFieldValue(createFieldIds(), { field: 'Task ID', value: 'T001' })).toEqual({
        ok: true,
        fieldId: 'F_TASK',
        value: { text: 'T001' },
      });
    });

    it('should match options case-insensitively', () => {
      expect(resolveFieldValue(createFieldIds(), { field: 'Status', value: 'ready' })).toEqual({
        ok: true,
        fieldId: 'F_STATUS',
        value: { singleSelectOptionId: 'OPT_READY' },
      });
    });

    it('should explain a missing option', () => {
      expect(resolveFieldValue(createFieldIds(), { field: 'Status', value: 'Blocked' })).toEqual({
        ok: false,
        reason: 'option "Blocked" not found in field "Status" (available: Backlog, Ready, Done)',
      });
    });

    it('should explain a missing field', () => {
      expect(resolveFieldValue(createFieldIds(), { field: 'Sprint', value: '3' })).toEqual({
        ok: false,
        reason: 'field "Sprint" does not exist in the project',
      });
    });
  });
});
