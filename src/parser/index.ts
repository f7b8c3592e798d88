/**
 * tasks.md parsing
 */

export type { Task, TaskGroup, Phase, TasksDocument } from './models.js';
export {
  getPhaseTasks,
  getAllTasks,
  getTaskCount,
  getCompletedCount,
  formatPhaseName,
} from './models.js';

export { ParseError, StructuralError, type ConstructKind } from './errors.js';

export {
  parseTasksDocument,
  parseTasksFile,
  parsePhaseHeading,
  parseTaskLine,
  extractFilePaths,
  type PhaseHeading,
  type TaskLine,
} from './tasks-parser.js';
