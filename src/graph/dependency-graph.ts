/**
 * Dependency graph over task identifiers
 *
 * Dependencies are inferred from document position: tasks are folded in
 * phase order, document order, carrying the last non-parallel task as the
 * anchor. Every task depends on the anchor current at its position; only
 * non-parallel tasks move the anchor. Each edge therefore points to a task
 * earlier in the traversal, which keeps the graph acyclic.
 */

import { getAllTasks, type Task, type TasksDocument } from '../parser/models.js';

/**
 * `task` is blocked by `blocker`
 */
export interface DependencyEdge {
  task: string;
  blocker: string;
}

interface FoldState {
  anchor: string | null;
  edges: DependencyEdge[];
}

export class DependencyGraph {
  private readonly blockers = new Map<string, string[]>();
  private readonly completed: ReadonlySet<string>;
  private readonly order: readonly string[];

  constructor(edges: DependencyEdge[], tasks: Array<Pick<Task, 'id' | 'completed'>>) {
    this.order = tasks.map((task) => task.id);
    this.completed = new Set(tasks.filter((task) => task.completed).map((task) => task.id));

    for (const edge of edges) {
      const list = this.blockers.get(edge.task) ?? [];
      if (!list.includes(edge.blocker)) {
        list.push(edge.blocker);
      }
      this.blockers.set(edge.task, list);
    }
  }

  /**
   * Direct blockers of a task, in insertion order
   */
  blockersOf(taskId: string): readonly string[] {
    return this.blockers.get(taskId) ?? [];
  }

  hasDependencies(taskId: string): boolean {
    return this.blockersOf(taskId).length > 0;
  }

  /**
   * True when at least one direct blocker is not marked completed
   */
  hasUnresolvedBlockers(taskId: string): boolean {
    return this.blockersOf(taskId).some((blocker) => !this.completed.has(blocker));
  }

  /**
   * All edges, grouped by task in document order
   */
  edges(): DependencyEdge[] {
    return this.order.flatMap((task) =>
      this.blockersOf(task).map((blocker) => ({ task, blocker }))
    );
  }

  get edgeCount(): number {
    let count = 0;
    for (const list of this.blockers.values()) {
      count += list.length;
    }
    return count;
  }

  /**
   * Task identifiers in traversal order
   */
  taskIds(): readonly string[] {
    return this.order;
  }
}

function step(state: FoldState, task: Task): FoldState {
  if (state.anchor) {
    state.edges.push({ task: task.id, blocker: state.anchor });
  }

  return {
    anchor: task.parallel ? state.anchor : task.id,
    edges: state.edges,
  };
}

/**
 * Build the dependency graph for a parsed document
 */
export function buildDependencyGraph(document: TasksDocument): DependencyGraph {
  const tasks = getAllTasks(document);
  const { edges } = tasks.reduce<FoldState>(step, { anchor: null, edges: [] });
  return new DependencyGraph(edges, tasks);
}
