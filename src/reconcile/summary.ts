import type { EntityKind } from './keys.js';
import type { KindCounts, ReconcileResult } from './types.js';

const KIND_LABELS: Record<EntityKind, string> = {
  phase: 'Phases',
  group: 'Groups',
  task: 'Tasks',
};

function formatKindCounts(counts: KindCounts): string {
  return (
    `created ${counts.created}, reused ${counts.reused}, updated ${counts.updated}, ` +
    `fields set ${counts.linked}, failed ${counts.failed}`
  );
}

/**
 * Format a reconcile result for console output
 */
export function formatSyncSummary(result: ReconcileResult): string {
  const lines: string[] = [];

  lines.push('Sync Summary');
  lines.push('============');

  if (result.status === 'up-to-date') {
    lines.push('Already up to date (document unchanged since the last successful sync)');
    return lines.join('\n');
  }

  lines.push(`Status: ${result.status}${result.status === 'dry-run' ? ' (no changes made)' : ''}`);
  for (const kind of ['phase', 'group', 'task'] as const) {
    lines.push(`${KIND_LABELS[kind]}: ${formatKindCounts(result.counts[kind])}`);
  }
  const deps = result.dependencies;
  lines.push(`Dependencies: linked ${deps.linked}, existing ${deps.existing}, failed ${deps.failed}`);
  lines.push(`Remote calls: ${result.remoteCalls}`);

  if (result.abortReason) {
    lines.push('');
    lines.push(`Aborted: ${result.abortReason}`);
  }

  if (result.warnings.length > 0) {
    lines.push('');
    lines.push('Warnings:');
    for (const warning of result.warnings) {
      lines.push(`  [WARN] ${warning}`);
    }
  }

  if (result.failures.length > 0) {
    lines.push('');
    lines.push('Failures:');
    for (const failure of result.failures) {
      lines.push(`  [FAIL] ${failure.key} (${failure.stage}): ${failure.message}`);
    }
  }

  return lines.join('\n');
}
