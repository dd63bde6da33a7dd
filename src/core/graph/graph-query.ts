import type { DependencyGraph, GraphEdge } from '../../types/index.js';
import { GraphError } from '../../utils/errors.js';

/**
 * Read-only queries over a DependencyGraph
 */

export function indexOf(graph: DependencyGraph, name: string): number {
  const index = findIndex(graph, name);
  if (index === undefined) {
    throw new GraphError(`Unknown package "${name}"`, { packageName: name });
  }
  return index;
}

/**
 * Binary search over the name-sorted node array
 */
export function findIndex(graph: DependencyGraph, name: string): number | undefined {
  let low = 0;
  let high = graph.nodes.length - 1;
  while (low <= high) {
    const mid = (low + high) >> 1;
    const node = graph.nodes[mid];
    if (!node) return undefined;
    if (node.name === name) return mid;
    if (node.name < name) low = mid + 1;
    else high = mid - 1;
  }
  return undefined;
}

export function hasPackage(graph: DependencyGraph, name: string): boolean {
  return findIndex(graph, name) !== undefined;
}

function namesOf(graph: DependencyGraph, indices: Iterable<number>): string[] {
  return Array.from(indices, index => graph.nodes[index]?.name ?? '');
}

/** Direct internal dependencies of a package, sorted */
export function dependenciesOf(graph: DependencyGraph, name: string): string[] {
  return namesOf(graph, graph.forward[indexOf(graph, name)] ?? []);
}

/** Direct internal dependents of a package, sorted */
export function dependentsOf(graph: DependencyGraph, name: string): string[] {
  return namesOf(graph, graph.reverse[indexOf(graph, name)] ?? []);
}

/**
 * Breadth-first closure over reverse edges, including the start packages.
 * Names absent from the graph are ignored.
 */
export function transitiveDependents(graph: DependencyGraph, names: Iterable<string>): string[] {
  const seen = new Set<number>();
  const queue: number[] = [];
  for (const name of names) {
    const index = findIndex(graph, name);
    if (index !== undefined && !seen.has(index)) {
      seen.add(index);
      queue.push(index);
    }
  }
  for (let head = 0; head < queue.length; head++) {
    for (const dependent of graph.reverse[queue[head] ?? 0] ?? []) {
      if (!seen.has(dependent)) {
        seen.add(dependent);
        queue.push(dependent);
      }
    }
  }
  return namesOf(graph, Array.from(seen).sort((a, b) => a - b));
}

/** Edges declared by `consumer` on `dependency`, in edge-kind order */
export function edgesBetween(graph: DependencyGraph, consumer: string, dependency: string): GraphEdge[] {
  const from = indexOf(graph, consumer);
  const to = indexOf(graph, dependency);
  return graph.edges.filter(edge => edge.from === from && edge.to === to);
}

/** Every edge pointing at `dependency` */
export function edgesInto(graph: DependencyGraph, dependency: string): GraphEdge[] {
  const to = indexOf(graph, dependency);
  return graph.edges.filter(edge => edge.to === to);
}

/**
 * Edges grouped by target index; each group keeps the graph's edge order
 */
export function incomingEdges(graph: DependencyGraph): GraphEdge[][] {
  const incoming: GraphEdge[][] = graph.nodes.map(() => []);
  for (const edge of graph.edges) {
    incoming[edge.to]?.push(edge);
  }
  return incoming;
}

export function isInCycle(graph: DependencyGraph, name: string): boolean {
  return graph.cycles.some(cycle => cycle.includes(name));
}

/** Cycles that contain at least one of `names` */
export function cyclesTouching(graph: DependencyGraph, names: ReadonlySet<string>): string[][] {
  return graph.cycles.filter(cycle => cycle.some(member => names.has(member)));
}
