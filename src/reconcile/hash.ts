import * as crypto from 'node:crypto';
import type { Task, TasksDocument } from '../parser/models.js';

function canonicalTask(task: Task) {
  return {
    id: task.id,
    description: task.description,
    completed: task.completed,
    parallel: task.parallel,
    userStory: task.userStory,
    filePaths: task.filePaths,
  };
}

/**
 * Source line numbers are left out so that blank lines and prose edits
 * do not change the hash
 */
function canonicalDocument(document: TasksDocument) {
  return {
    title: document.title,
    inputPath: document.inputPath,
    branch: document.branch,
    phases: document.phases.map((phase) => ({
      number: phase.number,
      title: phase.title,
      purpose: phase.purpose,
      goal: phase.goal,
      checkpoint: phase.checkpoint,
      independentTest: phase.independentTest,
      priority: phase.priority,
      userStory: phase.userStory,
      isPrimaryDeliverable: phase.isPrimaryDeliverable,
      tasks: phase.tasks.map(canonicalTask),
      groups: phase.groups.map((group) => ({
        title: group.title,
        userStory: group.userStory,
        tasks: group.tasks.map(canonicalTask),
      })),
    })),
  };
}

/**
 * SHA-256 (hex) over a canonical serialization of the document, with
 * whitespace runs collapsed in every string
 */
export function computeContentHash(document: TasksDocument): string {
  const serialized = JSON.stringify(canonicalDocument(document), (_key, value: unknown) =>
    typeof value === 'string' ? value.replace(/\s+/g, ' ').trim() : value
  );
  return crypto.createHash('sha256').update(serialized).digest('hex');
}
