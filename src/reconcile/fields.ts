/**
 * Project field definitions and per-item values
 *
 * Groups and tasks carry Phase, Task Group, Priority and User Story values;
 * tasks also carry Task ID, Parallel and Status. Phase items carry no field
 * values at all: a phase is never filed under itself.
 */

import type { DependencyGraph } from '../graph/dependency-graph.js';
import { formatPhaseName, type Phase, type Task, type TaskGroup, type TasksDocument } from '../parser/models.js';
import type { FieldDefinition, FieldIdMap, FieldValue } from './tracker.js';
import type { FieldAssignment } from './types.js';

export interface FieldNames {
  taskId: string;
  phase: string;
  group: string;
  priority: string;
  parallel: string;
  userStory: string;
  status: string;
}

/**
 * Status option names for the three initial board columns
 */
export interface StatusMapping {
  backlog: string;
  ready: string;
  done: string;
}

export const DEFAULT_FIELD_NAMES: FieldNames = {
  taskId: 'Task ID',
  phase: 'Phase',
  group: 'Task Group',
  priority: 'Priority',
  parallel: 'Parallel',
  userStory: 'User Story',
  status: 'Status',
};

export const DEFAULT_STATUS_MAPPING: StatusMapping = {
  backlog: 'Backlog',
  ready: 'Ready',
  done: 'Done',
};

export const NOT_APPLICABLE = 'N/A';

function unique(values: Array<string | undefined>): string[] {
  const result: string[] = [];
  for (const value of values) {
    if (value && !result.includes(value)) {
      result.push(value);
    }
  }
  return result;
}

/**
 * Custom fields the document needs, with the options it uses.
 * Status is a built-in field and is not defined here.
 */
export function buildFieldDefinitions(document: TasksDocument, names: FieldNames): FieldDefinition[] {
  const groups = document.phases.flatMap((phase) => phase.groups);
  const tasks = document.phases.flatMap((phase) => [
    ...phase.tasks,
    ...phase.groups.flatMap((group) => group.tasks),
  ]);

  const definitions: FieldDefinition[] = [
    { name: names.taskId, dataType: 'TEXT', options: [] },
    { name: names.phase, dataType: 'SINGLE_SELECT', options: unique(document.phases.map(formatPhaseName)) },
  ];

  const groupTitles = unique(groups.map((group) => group.title));
  if (groupTitles.length > 0) {
    definitions.push({ name: names.group, dataType: 'SINGLE_SELECT', options: groupTitles });
  }

  definitions.push(
    {
      name: names.priority,
      dataType: 'SINGLE_SELECT',
      options: [...unique(document.phases.map((phase) => phase.priority)), NOT_APPLICABLE],
    },
    { name: names.parallel, dataType: 'SINGLE_SELECT', options: ['Yes', 'No'] },
    {
      name: names.userStory,
      dataType: 'SINGLE_SELECT',
      options: [
        ...unique([
          ...document.phases.map((phase) => phase.userStory),
          ...groups.map((group) => group.userStory),
          ...tasks.map((task) => task.userStory),
        ]),
        NOT_APPLICABLE,
      ],
    }
  );

  return definitions;
}

export function groupFieldValues(phase: Phase, group: TaskGroup, names: FieldNames): FieldAssignment[] {
  return [
    { field: names.phase, value: formatPhaseName(phase) },
    { field: names.group, value: group.title },
    { field: names.priority, value: phase.priority ?? NOT_APPLICABLE },
    { field: names.userStory, value: group.userStory ?? phase.userStory ?? NOT_APPLICABLE },
  ];
}

/**
 * Descriptive field values of a task. Status is decided separately.
 */
export function taskFieldValues(
  task: Task,
  phase: Phase,
  group: TaskGroup | undefined,
  names: FieldNames
): FieldAssignment[] {
  const values: FieldAssignment[] = [
    { field: names.taskId, value: task.id },
    { field: names.phase, value: formatPhaseName(phase) },
  ];
  if (group) {
    values.push({ field: names.group, value: group.title });
  }
  values.push(
    { field: names.priority, value: phase.priority ?? NOT_APPLICABLE },
    { field: names.parallel, value: task.parallel ? 'Yes' : 'No' },
    {
      field: names.userStory,
      value: task.userStory ?? group?.userStory ?? phase.userStory ?? NOT_APPLICABLE,
    }
  );
  return values;
}

/**
 * Status for a newly created task item
 *
 * - completed tasks start as done
 * - tasks with a blocker that is not completed go to backlog
 * - everything else is ready
 */
export function determineInitialStatus(
  task: Task,
  graph: DependencyGraph,
  statusMapping: StatusMapping
): string {
  if (task.completed) {
    return statusMapping.done;
  }
  if (graph.hasUnresolvedBlockers(task.id)) {
    return statusMapping.backlog;
  }
  return statusMapping.ready;
}

/**
 * Status to write on an existing task item, if any. The board owns the
 * status once an item exists; only local completion is pushed.
 */
export function statusForExistingTask(
  task: Task,
  currentStatus: string | undefined,
  statusMapping: StatusMapping
): string | undefined {
  if (!task.completed) {
    return undefined;
  }
  if (currentStatus?.toLowerCase() === statusMapping.done.toLowerCase()) {
    return undefined;
  }
  return statusMapping.done;
}

/**
 * Assignments whose value differs from the item's current values
 */
export function diffFieldValues(
  desired: FieldAssignment[],
  current: Record<string, string>
): FieldAssignment[] {
  return desired.filter((assignment) => current[assignment.field] !== assignment.value);
}

export type ResolvedFieldValue =
  | { ok: true; fieldId: string; value: FieldValue }
  | { ok: false; reason: string };

/**
 * Resolve a named assignment to field and option ids. Option names are
 * matched exactly first, then case-insensitively.
 */
export function resolveFieldValue(fieldIds: FieldIdMap, assignment: FieldAssignment): ResolvedFieldValue {
  const field = fieldIds[assignment.field];
  if (!field) {
    return { ok: false, reason: `field "${assignment.field}" does not exist in the project` };
  }

  if (field.dataType === 'TEXT') {
    return { ok: true, fieldId: field.fieldId, value: { text: assignment.value } };
  }

  const wanted = assignment.value.toLowerCase();
  const optionId =
    field.options[assignment.value] ??
    Object.entries(field.options).find(([name]) => name.toLowerCase() === wanted)?.[1];

  if (!optionId) {
    const available = Object.keys(field.options).join(', ');
    return {
      ok: false,
      reason: `option "${assignment.value}" not found in field "${assignment.field}" (available: ${available})`,
    };
  }

  return { ok: true, fieldId: field.fieldId, value: { singleSelectOptionId: optionId } };
}
