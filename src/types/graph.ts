import type { EdgeKind } from './workspace.js';

export interface GraphNode {
  index: number;
  name: string;
  version: string;
}

/**
 * Internal edge stored as an index pair. `from` depends on `to`.
 */
export interface GraphEdge {
  from: number;
  to: number;
  range: string;
  kind: EdgeKind;
}

export interface ExternalReference {
  from: string;
  range: string;
  kind: EdgeKind;
}

export interface ExternalDependency {
  name: string;
  references: ExternalReference[];
}

export interface DependencyGraph {
  /** Nodes sorted by package name; `nodes[i].index === i` */
  nodes: GraphNode[];
  edges: GraphEdge[];
  /** forward[i]: sorted indices of the packages i depends on */
  forward: number[][];
  /** reverse[i]: sorted indices of the packages depending on i */
  reverse: number[][];
  externals: ExternalDependency[];
  /** Each cycle lists its member names sorted; cycles sorted by first member */
  cycles: string[][];
  /** Dependencies before dependents, lexicographic tie-break, cycles collapsed */
  order: string[];
}
