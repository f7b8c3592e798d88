/**
 * Reconciliation engine
 *
 * reconcile() hashes the document, short-circuits when nothing changed,
 * plans against the tracker and applies the plan. Failures are contained
 * per entity: a parent that did not converge fails its children, a task
 * without an id blocks every edge touching it, siblings carry on. Fatal
 * tracker errors and cancellation stop the run; the partial id map is
 * still returned so the next run resumes.
 */

import { buildDependencyGraph } from '../graph/dependency-graph.js';
import type { TasksDocument } from '../parser/models.js';
import type { EntityMapping, SyncState } from '../sync/types.js';
import { errorMessage, isRunFatal, RemoteConflictError } from './errors.js';
import {
  DEFAULT_FIELD_NAMES,
  DEFAULT_STATUS_MAPPING,
  resolveFieldValue,
  type FieldNames,
  type StatusMapping,
} from './fields.js';
import { computeContentHash } from './hash.js';
import type { EntityKind } from './keys.js';
import { consoleLogger, type SyncLogger } from './logger.js';
import { planReconciliation } from './planner.js';
import {
  createRunSignal,
  RemoteCaller,
  type RetryPolicy,
  type SleepFn,
} from './remote-call.js';
import type { CreatedEntity, FieldIdMap, RemoteItem, RemoteTracker } from './tracker.js';
import {
  emptyCounts,
  type ApplyOutcome,
  type DependencyCounts,
  type DependencyPlan,
  type EntityPlan,
  type FailureStage,
  type ReconcileResult,
  type ReconciliationPlan,
} from './types.js';

export interface ReconcileInput {
  document: TasksDocument;
  tracker: RemoteTracker;
  projectId: string;
  state: SyncState;
  /** Plan only; no mutation is issued */
  dryRun?: boolean;
  /** Ignore the content hash short-circuit */
  force?: boolean;
  fieldNames?: Partial<FieldNames>;
  statusMapping?: Partial<StatusMapping>;
  retry?: Partial<RetryPolicy>;
  /** Overall deadline for the run */
  timeoutMs?: number;
  signal?: AbortSignal;
  logger?: SyncLogger;
  sleep?: SleepFn;
  /** Epoch milliseconds */
  now?: () => number;
}

export interface ApplyContext {
  caller: RemoteCaller;
  projectId: string;
  logger: SyncLogger;
  now?: () => number;
}

interface ResolvedEntity {
  externalId: string;
  number?: number;
  url?: string;
  projectItemId?: string;
}

function toResolved(entity: ResolvedEntity): ResolvedEntity {
  return {
    externalId: entity.externalId,
    number: entity.number,
    url: entity.url,
    projectItemId: entity.projectItemId,
  };
}

function emptyDependencyCounts(): DependencyCounts {
  return { linked: 0, existing: 0, failed: 0 };
}

/**
 * Applies one plan. Holds the id map built up while entities converge.
 */
class PlanApplier {
  private readonly outcome: ApplyOutcome = {
    counts: emptyCounts(),
    dependencies: emptyDependencyCounts(),
    failures: [],
    warnings: [],
    entities: {},
  };
  private readonly resolved = new Map<string, ResolvedEntity>();
  private readonly failedKeys = new Set<string>();
  private fieldIds?: FieldIdMap;
  private fieldsError?: string;

  constructor(
    private readonly plan: ReconciliationPlan,
    private readonly context: ApplyContext
  ) {}

  async run(): Promise<ApplyOutcome> {
    for (const failure of this.plan.lookupFailures) {
      this.outcome.failures.push(failure);
      if (failure.kind !== 'dependency') {
        this.outcome.counts[failure.kind].failed++;
        this.failedKeys.add(failure.key);
      }
    }

    try {
      for (const entity of this.plan.entities) {
        await this.applyEntity(entity);
      }
      for (const dependency of this.plan.dependencies) {
        await this.applyDependency(dependency);
      }
    } catch (error) {
      if (!isRunFatal(error)) {
        throw error;
      }
      this.outcome.abortReason = errorMessage(error);
      this.context.logger.error(`Sync aborted: ${this.outcome.abortReason}`);
    }

    this.outcome.fieldIds = this.fieldIds;
    return this.outcome;
  }

  private get caller(): RemoteCaller {
    return this.context.caller;
  }

  private fail(key: string, kind: EntityKind, stage: FailureStage, error: unknown): void {
    if (isRunFatal(error)) {
      throw error;
    }
    const message = errorMessage(error);
    this.outcome.failures.push({ key, kind, stage, message });
    if (!this.failedKeys.has(key)) {
      this.failedKeys.add(key);
      this.outcome.counts[kind].failed++;
    }
    this.context.logger.error(`${key}: ${stage} failed: ${message}`);
  }

  private warn(message: string): void {
    this.outcome.warnings.push(message);
    this.context.logger.warn(message);
  }

  private record(entity: EntityPlan, target: ResolvedEntity): void {
    this.resolved.set(entity.keyString, target);
    const mapping: EntityMapping = {
      kind: entity.kind,
      externalId: target.externalId,
      number: target.number,
      url: target.url,
      projectItemId: target.projectItemId,
      syncedAt: new Date(this.context.now?.() ?? Date.now()).toISOString(),
    };
    this.outcome.entities[entity.keyString] = mapping;
  }

  /**
   * Re-read an entity whose write may already have landed
   */
  private async adopt(entity: EntityPlan): Promise<RemoteItem | null> {
    return this.caller.call(`lookup ${entity.keyString}`, (tracker) =>
      tracker.lookupByNaturalKey(entity.key, this.context.projectId, { refresh: true })
    );
  }

  /**
   * After a conflict, the remote item to carry on with. Anything else
   * fails the entity and yields undefined.
   */
  private async adoptOrFail(entity: EntityPlan, stage: FailureStage, error: unknown): Promise<RemoteItem | undefined> {
    if (error instanceof RemoteConflictError) {
      try {
        const existing = await this.adopt(entity);
        if (existing) {
          return existing;
        }
      } catch (lookupError) {
        this.fail(entity.keyString, entity.kind, stage, lookupError);
        return undefined;
      }
    }
    this.fail(entity.keyString, entity.kind, stage, error);
    return undefined;
  }

  private async create(entity: EntityPlan, parentExternalId: string | undefined): Promise<ResolvedEntity | undefined> {
    const counts = this.outcome.counts[entity.kind];
    const recovery: { adopted?: RemoteItem } = {};

    try {
      const created = await this.caller.call<CreatedEntity>(
        `create ${entity.keyString}`,
        (tracker) =>
          tracker.createEntity({
            key: entity.key,
            title: entity.title,
            body: entity.body,
            parentExternalId,
            projectId: entity.registration === 'combined' ? this.context.projectId : undefined,
          }),
        {
          recover: async (tracker) => {
            const existing = await tracker.lookupByNaturalKey(entity.key, this.context.projectId, { refresh: true });
            if (existing) {
              recovery.adopted = existing;
            }
            return existing;
          },
        }
      );
      if (recovery.adopted) {
        counts.reused++;
      } else {
        counts.created++;
      }
      return toResolved(created);
    } catch (error) {
      const existing = await this.adoptOrFail(entity, 'create', error);
      if (existing) {
        counts.reused++;
        return toResolved(existing);
      }
      return undefined;
    }
  }

  private async applyEntity(entity: EntityPlan): Promise<void> {
    const { keyString, kind } = entity;
    const counts = this.outcome.counts[kind];

    let parentExternalId: string | undefined;
    if (entity.parentKey) {
      const parent = this.resolved.get(entity.parentKey);
      if (!parent) {
        this.fail(keyString, kind, 'create', new Error(`parent ${entity.parentKey} did not converge`));
        return;
      }
      parentExternalId = parent.externalId;
    }

    let target: ResolvedEntity;
    if (entity.action === 'create') {
      const created = await this.create(entity, parentExternalId);
      if (!created) {
        return;
      }
      target = created;
    } else {
      const { remote } = entity;
      target = toResolved(remote);
      counts.reused++;

      const patch = entity.update;
      if (patch) {
        try {
          await this.caller.call(`update ${keyString}`, (tracker) =>
            tracker.updateEntity(remote.externalId, patch)
          );
          counts.updated++;
        } catch (error) {
          if (!(error instanceof RemoteConflictError)) {
            this.fail(keyString, kind, 'update', error);
          }
        }
      }
    }

    this.record(entity, target);

    if (!target.projectItemId) {
      const externalId = target.externalId;
      try {
        const registration = await this.caller.call(`register ${keyString}`, (tracker) =>
          tracker.registerInProject(externalId, this.context.projectId)
        );
        target.projectItemId = registration.projectItemId;
      } catch (error) {
        const existing = await this.adoptOrFail(entity, 'register', error);
        if (!existing) {
          return;
        }
        if (!existing.projectItemId) {
          this.fail(keyString, kind, 'register', error);
          return;
        }
        target.projectItemId = existing.projectItemId;
      }
      this.record(entity, target);
    }

    if (target.projectItemId) {
      await this.applyFields(entity, target.projectItemId);
    }
  }

  private async ensureFieldIds(): Promise<FieldIdMap | undefined> {
    if (this.fieldIds || this.fieldsError) {
      return this.fieldIds;
    }
    try {
      this.fieldIds = await this.caller.call('ensure fields', (tracker) =>
        tracker.ensureFields(this.context.projectId, this.plan.fieldDefinitions)
      );
    } catch (error) {
      if (isRunFatal(error)) {
        throw error;
      }
      this.fieldsError = errorMessage(error);
      this.context.logger.error(`Could not ensure project fields: ${this.fieldsError}`);
    }
    return this.fieldIds;
  }

  private async applyFields(entity: EntityPlan, itemId: string): Promise<void> {
    if (entity.fields.length === 0) {
      return;
    }

    const fieldIds = await this.ensureFieldIds();
    if (!fieldIds) {
      this.fail(entity.keyString, entity.kind, 'fields', new Error(`fields unavailable: ${this.fieldsError}`));
      return;
    }

    let written = 0;
    for (const assignment of entity.fields) {
      const resolved = resolveFieldValue(fieldIds, assignment);
      if (!resolved.ok) {
        this.warn(`${entity.keyString}: skipping ${assignment.field}: ${resolved.reason}`);
        continue;
      }

      try {
        await this.caller.call(`set ${assignment.field} on ${entity.keyString}`, (tracker) =>
          tracker.setFieldValue(this.context.projectId, itemId, resolved.fieldId, resolved.value)
        );
        written++;
      } catch (error) {
        if (error instanceof RemoteConflictError) {
          continue;
        }
        this.fail(entity.keyString, entity.kind, 'fields', error);
        return;
      }
    }

    if (written > 0) {
      this.outcome.counts[entity.kind].linked++;
    }
  }

  private failDependency(label: string, message: string): void {
    this.outcome.failures.push({ key: label, kind: 'dependency', stage: 'dependency', message });
    this.outcome.dependencies.failed++;
    this.context.logger.error(`${label}: dependency failed: ${message}`);
  }

  private async applyDependency(dependency: DependencyPlan): Promise<void> {
    const counts = this.outcome.dependencies;
    const label = `${dependency.task} <- ${dependency.blocker}`;

    if (dependency.action === 'existing') {
      counts.existing++;
      return;
    }

    const blocked = this.resolved.get(dependency.taskKey);
    const blocker = this.resolved.get(dependency.blockerKey);
    if (!blocked || !blocker) {
      const missing = blocked ? dependency.blocker : dependency.task;
      this.failDependency(label, `${missing} did not converge`);
      return;
    }

    try {
      const result = await this.caller.call(`link ${label}`, (tracker) =>
        tracker.linkDependency(blocked.externalId, blocker.externalId)
      );
      if (result === 'linked') {
        counts.linked++;
      } else {
        counts.existing++;
      }
    } catch (error) {
      if (isRunFatal(error)) {
        throw error;
      }
      if (error instanceof RemoteConflictError) {
        counts.existing++;
        return;
      }
      this.failDependency(label, errorMessage(error));
    }
  }
}

/**
 * Apply a plan through the caller. Only fatal errors and cancellation end
 * it early (reported through abortReason, never thrown).
 */
export async function applyPlan(plan: ReconciliationPlan, context: ApplyContext): Promise<ApplyOutcome> {
  return new PlanApplier(plan, context).run();
}

/**
 * What a plan would do, in the shape of the run counters
 */
export function summarizePlan(plan: ReconciliationPlan): Pick<ReconcileResult, 'counts' | 'dependencies'> {
  const counts = emptyCounts();
  for (const entity of plan.entities) {
    const kindCounts = counts[entity.kind];
    if (entity.action === 'create') {
      kindCounts.created++;
    } else {
      kindCounts.reused++;
      if (entity.update) {
        kindCounts.updated++;
      }
    }
    if (entity.fields.length > 0) {
      kindCounts.linked++;
    }
  }
  for (const failure of plan.lookupFailures) {
    if (failure.kind !== 'dependency') {
      counts[failure.kind].failed++;
    }
  }

  const dependencies = emptyDependencyCounts();
  for (const dependency of plan.dependencies) {
    if (dependency.action === 'existing') {
      dependencies.existing++;
    } else {
      dependencies.linked++;
    }
  }

  return { counts, dependencies };
}

function nextState(
  previous: SyncState,
  plan: ReconciliationPlan,
  outcome: ApplyOutcome,
  converged: boolean,
  syncedAt: string
): SyncState {
  const entities: Record<string, EntityMapping> = {};
  const keys = [...plan.entities.map((entity) => entity.keyString), ...plan.lookupFailures.map((f) => f.key)];

  for (const key of keys) {
    const mapping = outcome.entities[key] ?? previous.entities[key];
    if (mapping) {
      entities[key] = mapping;
    }
  }

  return {
    ...previous,
    lastSyncAt: syncedAt,
    contentHash: converged ? plan.contentHash : undefined,
    projectId: plan.projectId,
    entities,
    fieldIds: outcome.fieldIds ?? previous.fieldIds,
  };
}

/**
 * Reconcile a parsed document with the remote tracker
 */
export async function reconcile(input: ReconcileInput): Promise<ReconcileResult> {
  const logger = input.logger ?? consoleLogger;
  const now = input.now ?? Date.now;
  const contentHash = computeContentHash(input.document);

  if (!input.force && input.state.contentHash === contentHash && input.state.projectId === input.projectId) {
    logger.info('Document unchanged since the last successful sync; already up to date');
    return {
      status: 'up-to-date',
      counts: emptyCounts(),
      dependencies: emptyDependencyCounts(),
      failures: [],
      warnings: [],
      state: input.state,
      remoteCalls: 0,
    };
  }

  const graph = buildDependencyGraph(input.document);
  const run = createRunSignal(input.signal, input.timeoutMs);
  const caller = new RemoteCaller(input.tracker, {
    policy: input.retry,
    sleep: input.sleep,
    now,
    logger,
    signal: run.signal,
  });

  try {
    let plan: ReconciliationPlan;
    try {
      plan = await planReconciliation({
        document: input.document,
        graph,
        caller,
        projectId: input.projectId,
        contentHash,
        fieldNames: { ...DEFAULT_FIELD_NAMES, ...input.fieldNames },
        statusMapping: { ...DEFAULT_STATUS_MAPPING, ...input.statusMapping },
        logger,
      });
    } catch (error) {
      if (!isRunFatal(error)) {
        throw error;
      }
      const abortReason = errorMessage(error);
      logger.error(`Sync aborted while planning: ${abortReason}`);
      return {
        status: 'aborted',
        counts: emptyCounts(),
        dependencies: emptyDependencyCounts(),
        failures: [],
        warnings: [],
        state: input.state,
        abortReason,
        remoteCalls: caller.calls,
      };
    }

    if (input.dryRun) {
      return {
        status: 'dry-run',
        plan,
        ...summarizePlan(plan),
        failures: [...plan.lookupFailures],
        warnings: [...plan.warnings],
        state: input.state,
        remoteCalls: caller.calls,
      };
    }

    const outcome = await applyPlan(plan, { caller, projectId: input.projectId, logger, now });
    const converged = !outcome.abortReason && outcome.failures.length === 0;

    return {
      status: outcome.abortReason ? 'aborted' : converged ? 'synced' : 'partial',
      plan,
      counts: outcome.counts,
      dependencies: outcome.dependencies,
      failures: outcome.failures,
      warnings: [...plan.warnings, ...outcome.warnings],
      state: nextState(input.state, plan, outcome, converged, new Date(now()).toISOString()),
      abortReason: outcome.abortReason,
      remoteCalls: caller.calls,
    };
  } finally {
    run.dispose();
  }
}
