/**
 * Undirected graph over area nodes, used for MOVE targets and routing.
 *
 * Routing is breadth-first over sorted neighbours, which yields the shortest
 * route by edge count and, among equally short routes, the one whose node id
 * sequence sorts first.
 */
import type { CanonicalWorldState } from "@tickvale/schemas";

export class LocationGraph {
  private adjacency = new Map<string, Set<string>>();

  addArea(id: string): void {
    if (!this.adjacency.has(id)) this.adjacency.set(id, new Set());
  }

  addEdge(a: string, b: string): void {
    if (a === b) return;
    this.addArea(a);
    this.addArea(b);
    this.adjacency.get(a)!.add(b);
    this.adjacency.get(b)!.add(a);
  }

  has(id: string): boolean {
    return this.adjacency.has(id);
  }

  neighbors(id: string): string[] {
    return [...(this.adjacency.get(id) ?? [])].sort();
  }

  areas(): string[] {
    return [...this.adjacency.keys()].sort();
  }

  /**
   * @returns The full route including `start` and `goal`, `[start]` when they
   *          are the same area, or null when `goal` is unreachable.
   */
  shortestPath(start: string, goal: string): string[] | null {
    if (!this.has(start) || !this.has(goal)) return null;
    if (start === goal) return [start];
    const cameFrom = new Map<string, string>();
    const visited = new Set<string>([start]);
    const queue: string[] = [start];
    while (queue.length > 0) {
      const current = queue.shift()!;
      for (const next of this.neighbors(current)) {
        if (visited.has(next)) continue;
        visited.add(next);
        cameFrom.set(next, current);
        if (next === goal) return this.unwind(cameFrom, start, goal);
        queue.push(next);
      }
    }
    return null;
  }

  /** Every area reachable from `start`, excluding `start`, sorted by id. */
  reachableFrom(start: string): string[] {
    if (!this.has(start)) return [];
    const visited = new Set<string>([start]);
    const queue: string[] = [start];
    while (queue.length > 0) {
      const current = queue.shift()!;
      for (const next of this.neighbors(current)) {
        if (visited.has(next)) continue;
        visited.add(next);
        queue.push(next);
      }
    }
    visited.delete(start);
    return [...visited].sort();
  }

  private unwind(cameFrom: Map<string, string>, start: string, goal: string): string[] {
    const path = [goal];
    let current = goal;
    while (current !== start) {
      current = cameFrom.get(current)!;
      path.push(current);
    }
    return path.reverse();
  }
}

export interface LocationGraphOptions {
  edges?: ReadonlyArray<readonly [string, string]>;
  /** Connect every area to its parent area. Default: true. */
  linkNestedAreas?: boolean;
}

export function buildLocationGraph(world: CanonicalWorldState, options: LocationGraphOptions = {}): LocationGraph {
  const graph = new LocationGraph();
  const linkNested = options.linkNestedAreas ?? true;
  for (const node of Object.values(world.nodes)) {
    if (node.kind !== "area") continue;
    graph.addArea(node.id);
    if (linkNested && node.parent_id !== null && world.nodes[node.parent_id]?.kind === "area") {
      graph.addEdge(node.id, node.parent_id);
    }
  }
  for (const [a, b] of options.edges ?? []) {
    graph.addEdge(a, b);
  }
  return graph;
}
