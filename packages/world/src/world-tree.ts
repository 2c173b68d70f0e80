import type { CanonicalWorldState, NodeKind, WorldNode } from "@tickvale/schemas";
import { StructuralInvariantError } from "@tickvale/schemas";

/**
 * Collects every structural problem in a world tree: dangling parents,
 * parent/child disagreement, cycles, unreachable nodes and side tables
 * (objects, agents) that drift from the node arena.
 */
export function collectViolations(world: CanonicalWorldState): string[] {
  const violations: string[] = [];
  const { nodes } = world;
  const root = nodes[world.root_id];

  if (!root) {
    violations.push(`root "${world.root_id}" does not exist`);
    return violations;
  }
  if (root.parent_id !== null) violations.push(`root "${root.id}" has a parent`);
  if (root.kind !== "area") violations.push(`root "${root.id}" is not an area`);

  for (const [key, node] of Object.entries(nodes)) {
    if (node.id !== key) violations.push(`node keyed "${key}" has id "${node.id}"`);
    if (node.kind !== "area" && node.children.length > 0) {
      violations.push(`${node.kind} "${node.id}" has children`);
    }
    if (new Set(node.children).size !== node.children.length) {
      violations.push(`"${node.id}" lists a child twice`);
    }
    for (const childId of node.children) {
      const child = nodes[childId];
      if (!child) violations.push(`"${node.id}" lists missing child "${childId}"`);
      else if (child.parent_id !== node.id) {
        violations.push(`"${childId}" is listed under "${node.id}" but its parent is "${child.parent_id}"`);
      }
    }
    if (key === world.root_id) continue;
    if (node.parent_id === null) {
      violations.push(`"${node.id}" has no parent`);
      continue;
    }
    const parent = nodes[node.parent_id];
    if (!parent) violations.push(`"${node.id}" has dangling parent "${node.parent_id}"`);
    else if (!parent.children.includes(node.id)) {
      violations.push(`"${node.id}" is missing from the children of "${parent.id}"`);
    }
  }

  // Everything must hang off the root exactly once; anything else is a cycle or an orphan.
  const seen = new Set<string>();
  const stack = [root.id];
  while (stack.length > 0) {
    const id = stack.pop()!;
    if (seen.has(id)) {
      violations.push(`"${id}" is reachable twice from the root`);
      continue;
    }
    seen.add(id);
    for (const childId of nodes[id]?.children ?? []) stack.push(childId);
  }
  for (const id of Object.keys(nodes)) {
    if (!seen.has(id)) violations.push(`"${id}" is not reachable from the root`);
  }

  for (const id of Object.keys(world.objects)) {
    if (nodes[id]?.kind !== "object") violations.push(`object record "${id}" has no object node`);
  }
  for (const [id, agent] of Object.entries(world.agents)) {
    const node = nodes[id];
    if (node?.kind !== "agent") {
      violations.push(`agent record "${id}" has no agent node`);
      continue;
    }
    if (nodes[agent.location_id]?.kind !== "area") {
      violations.push(`agent "${id}" is located at non-area "${agent.location_id}"`);
    }
    if (node.parent_id !== agent.location_id) {
      violations.push(`agent "${id}" node sits under "${node.parent_id}" but is located at "${agent.location_id}"`);
    }
  }
  for (const node of Object.values(nodes)) {
    if (node.kind === "object" && !world.objects[node.id]) violations.push(`object "${node.id}" has no record`);
    if (node.kind === "agent" && !world.agents[node.id]) violations.push(`agent "${node.id}" has no record`);
  }

  return violations;
}

export function assertWorldTree(world: CanonicalWorldState): void {
  const violations = collectViolations(world);
  if (violations.length > 0) throw new StructuralInvariantError(violations);
}

/** Re-parents a node, keeping both children lists consistent. */
export function moveNode(world: CanonicalWorldState, nodeId: string, newParentId: string): void {
  const node = world.nodes[nodeId];
  const newParent = world.nodes[newParentId];
  if (!node) throw new StructuralInvariantError([`cannot move missing node "${nodeId}"`]);
  if (!newParent || newParent.kind !== "area") {
    throw new StructuralInvariantError([`cannot move "${nodeId}" under non-area "${newParentId}"`]);
  }
  if (node.parent_id === newParentId) return;
  if (node.parent_id !== null) {
    const oldParent = world.nodes[node.parent_id];
    if (oldParent) oldParent.children = oldParent.children.filter((id) => id !== nodeId);
  }
  newParent.children.push(nodeId);
  node.parent_id = newParentId;
}

export function childrenOfKind(world: CanonicalWorldState, parentId: string, kind: NodeKind): WorldNode[] {
  const parent = world.nodes[parentId];
  if (!parent) return [];
  const result: WorldNode[] = [];
  for (const id of parent.children) {
    const child = world.nodes[id];
    if (child?.kind === kind) result.push(child);
  }
  return result;
}

export function nodeName(world: CanonicalWorldState, id: string): string {
  return world.nodes[id]?.name ?? id;
}

export function cloneWorld(world: CanonicalWorldState): CanonicalWorldState {
  return structuredClone(world);
}

/** Recursively freezes plain objects and arrays. */
export function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== "object" || Object.isFrozen(value)) return value;
  Object.freeze(value);
  for (const inner of Object.values(value)) deepFreeze(inner);
  return value;
}
