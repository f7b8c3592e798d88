/**
 * Issue titles and bodies for phases, groups and tasks
 *
 * Every body ends with a footer carrying the natural key marker, which is
 * how items are found again on later runs.
 */

import type { DependencyGraph } from '../graph/dependency-graph.js';
import { formatPhaseName, getPhaseTasks, type Phase, type Task, type TaskGroup } from '../parser/models.js';
import { formatKeyMarker, type NaturalKey } from './keys.js';

/** GitHub rejects issue titles longer than this many characters */
export const MAX_TITLE_LENGTH = 256;

// Code points, so a surrogate pair is never split
function truncateTitle(title: string): string {
  const characters = Array.from(title);
  return characters.length <= MAX_TITLE_LENGTH
    ? title
    : `${characters.slice(0, MAX_TITLE_LENGTH - 1).join('')}…`;
}

function footer(key: NaturalKey): string[] {
  return ['---', formatKeyMarker(key)];
}

export function formatPhaseTitle(phase: Phase): string {
  return truncateTitle(formatPhaseName(phase));
}

export function formatGroupTitle(group: TaskGroup): string {
  return truncateTitle(group.title);
}

export function formatTaskTitle(task: Task): string {
  return truncateTitle(`[${task.id}] ${task.description}`);
}

/**
 * Body format:
 * **Purpose**: ...
 *
 * **Goal**: ...
 *
 * **Checkpoint**: ...
 *
 * **Independent Test**: ...
 *
 * **Priority**: P1
 *
 * **MVP**: Yes
 *
 * **Tasks**: 4 total
 *
 * ---
 * <!-- spec-sync:phase/1 -->
 */
export function formatPhaseBody(phase: Phase, key: NaturalKey): string {
  const sections: string[] = [];

  if (phase.purpose) {
    sections.push(`**Purpose**: ${phase.purpose}`);
  }
  if (phase.goal) {
    sections.push(`**Goal**: ${phase.goal}`);
  }
  if (phase.checkpoint) {
    sections.push(`**Checkpoint**: ${phase.checkpoint}`);
  }
  if (phase.independentTest) {
    sections.push(`**Independent Test**: ${phase.independentTest}`);
  }
  if (phase.priority) {
    sections.push(`**Priority**: ${phase.priority}`);
  }
  if (phase.isPrimaryDeliverable) {
    sections.push('**MVP**: Yes');
  }
  sections.push(`**Tasks**: ${getPhaseTasks(phase).length} total`);

  return [sections.join('\n\n'), '', ...footer(key)].join('\n');
}

export function formatGroupBody(phase: Phase, group: TaskGroup, key: NaturalKey): string {
  const sections: string[] = [];

  if (group.userStory) {
    sections.push(`**User Story**: ${group.userStory}`);
  }
  sections.push(`**Phase**: ${formatPhaseName(phase)}`);
  sections.push(`**Tasks**: ${group.tasks.length} total`);

  return [sections.join('\n\n'), '', ...footer(key)].join('\n');
}

export function formatTaskBody(task: Task, phase: Phase, graph: DependencyGraph, key: NaturalKey): string {
  const sections: string[] = [];

  sections.push(`**Task ID**: ${task.id}`);
  sections.push(`**Description**: ${task.description}`);
  sections.push(`**Phase**: ${formatPhaseName(phase)}`);

  if (task.groupTitle) {
    sections.push(`**Task Group**: ${task.groupTitle}`);
  }
  if (task.userStory) {
    sections.push(`**User Story**: ${task.userStory}`);
  }
  if (task.parallel) {
    sections.push('**Parallel**: Yes - can run alongside other parallel tasks');
  }
  if (task.filePaths.length > 0) {
    sections.push(['**Files**:', ...task.filePaths.map((filePath) => `- \`${filePath}\``)].join('\n'));
  }

  const blockers = graph.blockersOf(task.id);
  if (blockers.length > 0) {
    sections.push(`**Blocked by**: ${blockers.join(', ')}`);
  }

  return [sections.join('\n\n'), '', ...footer(key)].join('\n');
}

/**
 * Bodies are compared after line-ending normalization and trimming
 */
export function normalizeBody(body: string): string {
  return body.replace(/\r\n/g, '\n').trim();
}
