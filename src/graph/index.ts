export {
  DependencyGraph,
  buildDependencyGraph,
  type DependencyEdge,
} from './dependency-graph.js';
