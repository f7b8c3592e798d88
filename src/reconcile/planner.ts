/**
 * Planning: describe the desired entities, look each one up by natural
 * key and decide what to create, reuse, rewrite, register and link.
 * Planning only reads from the tracker; dry runs stop here.
 */

import type { DependencyGraph } from '../graph/dependency-graph.js';
import type { Task, TaskGroup, TasksDocument } from '../parser/models.js';
import {
  formatGroupBody,
  formatGroupTitle,
  formatPhaseBody,
  formatPhaseTitle,
  formatTaskBody,
  formatTaskTitle,
  normalizeBody,
} from './body.js';
import { errorMessage, isRunFatal } from './errors.js';
import {
  buildFieldDefinitions,
  determineInitialStatus,
  diffFieldValues,
  groupFieldValues,
  statusForExistingTask,
  taskFieldValues,
  type FieldNames,
  type StatusMapping,
} from './fields.js';
import { groupKey, keyToString, phaseKey, taskKey, type EntityKind, type NaturalKey } from './keys.js';
import type { SyncLogger } from './logger.js';
import type { RemoteCaller } from './remote-call.js';
import type { EntityPatch, RemoteItem } from './tracker.js';
import type {
  DependencyPlan,
  EntityPlan,
  FieldAssignment,
  ReconciliationPlan,
} from './types.js';

export interface PlanContext {
  document: TasksDocument;
  graph: DependencyGraph;
  caller: RemoteCaller;
  projectId: string;
  contentHash: string;
  fieldNames: FieldNames;
  statusMapping: StatusMapping;
  logger: SyncLogger;
}

/**
 * Entity as the document wants it, before any remote lookup
 */
export interface DesiredEntity {
  key: NaturalKey;
  keyString: string;
  kind: EntityKind;
  title: string;
  body: string;
  parentKey?: string;
  /** Phases always have none */
  fields: FieldAssignment[];
  task?: Task;
}

/**
 * Desired entities in application order: each phase, then its direct
 * tasks, then each of its groups followed by the group's tasks
 */
export function describeEntities(
  document: TasksDocument,
  graph: DependencyGraph,
  names: FieldNames
): DesiredEntity[] {
  const entities: DesiredEntity[] = [];

  for (const phase of document.phases) {
    const phaseEntityKey = phaseKey(phase.number);
    const phaseKeyString = keyToString(phaseEntityKey);

    entities.push({
      key: phaseEntityKey,
      keyString: phaseKeyString,
      kind: 'phase',
      title: formatPhaseTitle(phase),
      body: formatPhaseBody(phase, phaseEntityKey),
      fields: [],
    });

    const describeTask = (task: Task, parentKey: string, group?: TaskGroup) => {
      const key = taskKey(phase.number, task.groupTitle, task.id);
      entities.push({
        key,
        keyString: keyToString(key),
        kind: 'task',
        title: formatTaskTitle(task),
        body: formatTaskBody(task, phase, graph, key),
        parentKey,
        fields: taskFieldValues(task, phase, group, names),
        task,
      });
    };

    for (const task of phase.tasks) {
      describeTask(task, phaseKeyString);
    }

    for (const group of phase.groups) {
      const key = groupKey(phase.number, group.title);
      const keyString = keyToString(key);
      entities.push({
        key,
        keyString,
        kind: 'group',
        title: formatGroupTitle(group),
        body: formatGroupBody(phase, group, key),
        parentKey: phaseKeyString,
        fields: groupFieldValues(phase, group, names),
      });

      for (const task of group.tasks) {
        describeTask(task, keyString, group);
      }
    }
  }

  return entities;
}

function planCreate(desired: DesiredEntity, context: PlanContext): EntityPlan {
  const fields = [...desired.fields];
  if (desired.task) {
    fields.push({
      field: context.fieldNames.status,
      value: determineInitialStatus(desired.task, context.graph, context.statusMapping),
    });
  }

  return {
    ...desired,
    action: 'create',
    fields,
    registration: context.caller.tracker.supportsCombinedRegistration ? 'combined' : 'separate',
  };
}

function planReuse(
  desired: DesiredEntity,
  remote: RemoteItem,
  context: PlanContext,
  warnings: string[]
): EntityPlan {
  const update: EntityPatch = {};
  if (remote.title !== desired.title) {
    update.title = desired.title;
  }
  if (normalizeBody(remote.body) !== normalizeBody(desired.body)) {
    update.body = desired.body;
  }

  const diverging = Object.keys(update);
  if (diverging.length > 0) {
    const verb = diverging.length > 1 ? 'differ' : 'differs';
    const warning = `${desired.keyString}: remote ${diverging.join(' and ')} ${verb} from the document; updating`;
    warnings.push(warning);
    context.logger.warn(warning);
  }

  const fields = diffFieldValues(desired.fields, remote.fieldValues);
  if (desired.task) {
    const status = statusForExistingTask(
      desired.task,
      remote.fieldValues[context.fieldNames.status],
      context.statusMapping
    );
    if (status) {
      fields.push({ field: context.fieldNames.status, value: status });
    }
  }

  return {
    ...desired,
    action: 'reuse',
    remote,
    update: diverging.length > 0 ? update : undefined,
    fields,
    registration: remote.projectItemId ? 'none' : 'separate',
  };
}

/**
 * Edges in document order. An edge is "existing" only when both endpoints
 * were matched remotely and the blocked item already lists the blocker.
 */
export function planDependencies(
  graph: DependencyGraph,
  keysByTaskId: ReadonlyMap<string, string>,
  remoteByKey: ReadonlyMap<string, RemoteItem>
): DependencyPlan[] {
  const dependencies: DependencyPlan[] = [];

  for (const edge of graph.edges()) {
    const taskKeyString = keysByTaskId.get(edge.task);
    const blockerKeyString = keysByTaskId.get(edge.blocker);
    if (!taskKeyString || !blockerKeyString) {
      continue;
    }

    const blocked = remoteByKey.get(taskKeyString);
    const blocker = remoteByKey.get(blockerKeyString);
    const exists = blocked !== undefined && blocker !== undefined && blocked.blockedBy.includes(blocker.externalId);

    dependencies.push({
      task: edge.task,
      blocker: edge.blocker,
      taskKey: taskKeyString,
      blockerKey: blockerKeyString,
      action: exists ? 'existing' : 'link',
    });
  }

  return dependencies;
}

/**
 * Build the reconciliation plan. Lookup failures are recorded per entity;
 * fatal errors and cancellation propagate.
 */
export async function planReconciliation(context: PlanContext): Promise<ReconciliationPlan> {
  const { document, graph, caller, projectId } = context;

  const plan: ReconciliationPlan = {
    contentHash: context.contentHash,
    projectId,
    entities: [],
    dependencies: [],
    fieldDefinitions: buildFieldDefinitions(document, context.fieldNames),
    lookupFailures: [],
    warnings: [],
  };

  const remoteByKey = new Map<string, RemoteItem>();
  const keysByTaskId = new Map<string, string>();

  for (const desired of describeEntities(document, graph, context.fieldNames)) {
    if (desired.task) {
      keysByTaskId.set(desired.task.id, desired.keyString);
    }

    let remote: RemoteItem | null;
    try {
      remote = await caller.call(`lookup ${desired.keyString}`, (tracker) =>
        tracker.lookupByNaturalKey(desired.key, projectId)
      );
    } catch (error) {
      if (isRunFatal(error)) {
        throw error;
      }
      plan.lookupFailures.push({
        key: desired.keyString,
        kind: desired.kind,
        stage: 'lookup',
        message: errorMessage(error),
      });
      context.logger.error(`${desired.keyString}: lookup failed: ${errorMessage(error)}`);
      continue;
    }

    if (remote) {
      remoteByKey.set(desired.keyString, remote);
      plan.entities.push(planReuse(desired, remote, context, plan.warnings));
    } else {
      plan.entities.push(planCreate(desired, context));
    }
  }

  plan.dependencies = planDependencies(graph, keysByTaskId, remoteByKey);
  return plan;
}
