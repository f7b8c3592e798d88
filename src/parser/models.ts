/**
 * Document model for parsed tasks.md files
 */

/**
 * A single checklist item from tasks.md
 */
export interface Task {
  /** Identifier token, e.g. "T001". Unique across the whole document */
  id: string;
  description: string;
  completed: boolean;
  /** Marked with [P]: may run alongside sibling parallel tasks */
  parallel: boolean;
  /** e.g. "US1" */
  userStory?: string;
  filePaths: string[];
  phaseNumber: number;
  /** Owning group title, or null for tasks declared directly under the phase */
  groupTitle: string | null;
  /** 1-based source line */
  line: number;
}

/**
 * A "### ..." subdivision of a phase. Identified by (phaseNumber, title)
 */
export interface TaskGroup {
  title: string;
  phaseNumber: number;
  userStory?: string;
  tasks: Task[];
  line: number;
}

export interface Phase {
  number: number;
  title: string;
  purpose?: string;
  goal?: string;
  checkpoint?: string;
  independentTest?: string;
  /** e.g. "P1" */
  priority?: string;
  userStory?: string;
  /** Heading carries the MVP / 🎯 marker */
  isPrimaryDeliverable: boolean;
  groups: TaskGroup[];
  /** Tasks declared directly under the phase, outside any group */
  tasks: Task[];
  line: number;
}

export interface TasksDocument {
  title: string;
  inputPath?: string;
  branch?: string;
  phases: Phase[];
}

/**
 * All tasks of a phase in document order, groups and direct tasks interleaved
 */
export function getPhaseTasks(phase: Phase): Task[] {
  const tasks = [...phase.tasks];
  for (const group of phase.groups) {
    tasks.push(...group.tasks);
  }
  return tasks.sort((a, b) => a.line - b.line);
}

/**
 * All tasks of the document, phase by phase, in document order
 */
export function getAllTasks(document: TasksDocument): Task[] {
  return document.phases.flatMap(getPhaseTasks);
}

export function getTaskCount(document: TasksDocument): number {
  return getAllTasks(document).length;
}

export function getCompletedCount(document: TasksDocument): number {
  return getAllTasks(document).filter((task) => task.completed).length;
}

/**
 * Display name used for the phase issue title and the Phase field option
 */
export function formatPhaseName(phase: Pick<Phase, 'number' | 'title'>): string {
  return `Phase ${phase.number}: ${phase.title}`;
}
