import type {
  DependencyGraph,
  ExternalDependency,
  ExternalReference,
  GraphEdge,
  GraphNode,
  Logger,
  WorkspacePackage
} from '../../types/index.js';
import { EDGE_KINDS } from '../../types/index.js';
import { compareStrings } from '../../utils/compare.js';
import { GraphError } from '../../utils/errors.js';
import { logger as defaultLogger } from '../../utils/logger.js';

export interface GraphBuilderOptions {
  logger?: Logger;
}

/**
 * Strongly connected components of an index graph (iterative Tarjan).
 * Components are returned in reverse topological order of the condensation.
 */
export function stronglyConnectedComponents(forward: number[][]): number[][] {
  const count = forward.length;
  const index = new Array<number>(count).fill(-1);
  const lowLink = new Array<number>(count).fill(0);
  const onStack = new Array<boolean>(count).fill(false);
  const stack: number[] = [];
  const components: number[][] = [];
  let nextIndex = 0;

  for (let start = 0; start < count; start++) {
    if (index[start] !== -1) continue;

    // Explicit call stack of [node, next successor position]
    const frames: Array<[number, number]> = [[start, 0]];
    index[start] = lowLink[start] = nextIndex++;
    stack.push(start);
    onStack[start] = true;

    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      if (!frame) break;
      const [node, position] = frame;
      const successors = forward[node] ?? [];

      if (position < successors.length) {
        frame[1] = position + 1;
        const next = successors[position];
        if (next === undefined) continue;
        if (index[next] === -1) {
          index[next] = lowLink[next] = nextIndex++;
          stack.push(next);
          onStack[next] = true;
          frames.push([next, 0]);
        } else if (onStack[next]) {
          lowLink[node] = Math.min(lowLink[node] ?? 0, index[next] ?? 0);
        }
        continue;
      }

      frames.pop();
      const parent = frames[frames.length - 1];
      if (parent) {
        lowLink[parent[0]] = Math.min(lowLink[parent[0]] ?? 0, lowLink[node] ?? 0);
      }
      if (lowLink[node] === index[node]) {
        const component: number[] = [];
        let member: number | undefined;
        do {
          member = stack.pop();
          if (member === undefined) break;
          onStack[member] = false;
          component.push(member);
        } while (member !== node);
        components.push(component.sort((a, b) => a - b));
      }
    }
  }

  return components;
}

/**
 * Dependencies-first order over the condensation. Among ready components the
 * one with the lexicographically smallest member goes first; members of a
 * component are emitted together in name order.
 */
export function topologicalOrder(nodes: GraphNode[], forward: number[][], reverse: number[][], components: number[][]): string[] {
  const componentOf = new Array<number>(nodes.length).fill(0);
  components.forEach((component, id) => component.forEach(node => { componentOf[node] = id; }));

  const pending = components.map((component, id) => {
    const external = new Set<number>();
    for (const node of component) {
      for (const dependency of forward[node] ?? []) {
        const target = componentOf[dependency] ?? id;
        if (target !== id) external.add(target);
      }
    }
    return external.size;
  });

  // Components are sorted internally by index, and indices follow name order
  const keyOf = (id: number): number => components[id]?.[0] ?? 0;
  const ready: number[] = [];
  const enqueue = (id: number): void => {
    const key = keyOf(id);
    let low = 0;
    let high = ready.length;
    while (low < high) {
      const mid = (low + high) >> 1;
      if (keyOf(ready[mid] ?? 0) < key) low = mid + 1;
      else high = mid;
    }
    ready.splice(low, 0, id);
  };
  pending.forEach((count, id) => { if (count === 0) enqueue(id); });

  const order: string[] = [];
  while (ready.length > 0) {
    const id = ready.shift();
    if (id === undefined) break;
    const component = components[id] ?? [];
    for (const node of component) {
      order.push(nodes[node]?.name ?? '');
    }
    const released = new Set<number>();
    for (const node of component) {
      for (const dependent of reverse[node] ?? []) {
        const target: number = componentOf[dependent] ?? id;
        if (target !== id) released.add(target);
      }
    }
    for (const target of released) {
      const remaining = (pending[target] ?? 0) - 1;
      pending[target] = remaining;
      if (remaining === 0) enqueue(target);
    }
  }
  return order;
}

/**
 * Builds the internal dependency graph of a workspace.
 */
export class GraphBuilder {
  private readonly logger: Logger;

  constructor(options: GraphBuilderOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
  }

  build(packages: readonly WorkspacePackage[]): DependencyGraph {
    const sorted = [...packages].sort((a, b) => compareStrings(a.name, b.name));
    const nodes: GraphNode[] = sorted.map((pkg, index) => ({ index, name: pkg.name, version: pkg.version }));
    const indexByName = new Map(nodes.map(node => [node.name, node.index]));

    const edges: GraphEdge[] = [];
    const forwardSets = nodes.map(() => new Set<number>());
    const reverseSets = nodes.map(() => new Set<number>());
    const externalRefs = new Map<string, ExternalReference[]>();
    const kindRank = (kind: string): number => EDGE_KINDS.findIndex(candidate => candidate === kind);

    sorted.forEach((pkg, from) => {
      for (const edge of pkg.dependencies) {
        if (edge.from !== pkg.name) {
          throw new GraphError(
            `Edge ${edge.from} -> ${edge.to} is declared by ${pkg.name}`,
            { packageName: pkg.name, packages: [pkg.name, edge.from] }
          );
        }
        const to = indexByName.get(edge.to);
        if (to === undefined) {
          const references = externalRefs.get(edge.to) ?? [];
          references.push({ from: pkg.name, range: edge.range, kind: edge.kind });
          externalRefs.set(edge.to, references);
          continue;
        }
        edges.push({ from, to, range: edge.range, kind: edge.kind });
        forwardSets[from]?.add(to);
        reverseSets[to]?.add(from);
      }
    });

    edges.sort((a, b) => a.from - b.from || a.to - b.to || kindRank(a.kind) - kindRank(b.kind));
    const forward = forwardSets.map(set => Array.from(set).sort((a, b) => a - b));
    const reverse = reverseSets.map(set => Array.from(set).sort((a, b) => a - b));

    const externals: ExternalDependency[] = Array.from(externalRefs.entries())
      .sort(([a], [b]) => compareStrings(a, b))
      .map(([name, references]) => ({
        name,
        references: references.sort((a, b) => compareStrings(a.from, b.from) || kindRank(a.kind) - kindRank(b.kind))
      }));

    const components = stronglyConnectedComponents(forward);
    const cycles = components
      .filter(component => {
        const first = component[0];
        return component.length > 1 || (first !== undefined && (forward[first] ?? []).includes(first));
      })
      .map(component => component.map(node => nodes[node]?.name ?? '').sort(compareStrings))
      .sort((a, b) => compareStrings(a[0] ?? '', b[0] ?? ''));

    if (cycles.length > 0) {
      this.logger.debug(`Dependency graph contains ${cycles.length} cycle(s)`, { cycles });
    }

    return {
      nodes,
      edges,
      forward,
      reverse,
      externals,
      cycles,
      order: topologicalOrder(nodes, forward, reverse, components)
    };
  }
}
