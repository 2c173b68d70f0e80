import type { BeliefNode, BeliefState, CanonicalWorldState, PerceptionSlice } from "@tickvale/schemas";

export function createBeliefState(agentId: string): BeliefState {
  return { agent_id: agentId, nodes: {} };
}

/**
 * Refreshes the belief entries for every node the slice saw, copying each
 * node and object state from `world` and stamping it with `tick`.
 *
 * The slice decides which ids are refreshed; `world` decides what they hold.
 * Ids missing from `world` are skipped. Nodes outside the slice are left as
 * they are, however stale, and nothing is ever removed.
 */
export function mergePerception(
  belief: BeliefState,
  slice: PerceptionSlice,
  world: CanonicalWorldState,
  tick: number,
): void {
  const ids = [slice.area.id, ...slice.visible.map((node) => node.id)];
  for (const id of ids) {
    const node = world.nodes[id];
    if (!node) continue;
    const entry: BeliefNode = {
      id: node.id,
      name: node.name,
      kind: node.kind,
      parent_id: node.parent_id,
      children: [...node.children],
      refreshed_at: tick,
    };
    const object = world.objects[id];
    if (object) entry.state = { ...object.state };
    belief.nodes[id] = entry;
  }
}
