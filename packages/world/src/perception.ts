import type {
  CanonicalWorldState,
  ObjectState,
  PerceptionSlice,
  ValidTargets,
  WorldNode,
} from "@tickvale/schemas";
import type { LocationGraph } from "./location-graph.js";

/**
 * An agent sees the area it occupies plus that area's immediate children.
 * Agents in transit occupy a real area at every tick boundary, so the same
 * rule covers the intermediate areas along a route.
 */
export function perceive(world: CanonicalWorldState, agentId: string, tick: number): PerceptionSlice {
  const agent = world.agents[agentId];
  if (!agent) throw new Error(`Unknown agent "${agentId}"`);
  const area = world.nodes[agent.location_id];
  if (!area) throw new Error(`Agent "${agentId}" is located at missing area "${agent.location_id}"`);

  const visible: WorldNode[] = [];
  const objectStates: Record<string, ObjectState> = {};
  for (const id of area.children) {
    const child = world.nodes[id];
    if (!child) continue;
    visible.push(structuredClone(child));
    const object = world.objects[id];
    if (object) objectStates[id] = { ...object.state };
  }

  return {
    agent_id: agentId,
    tick,
    area: structuredClone(area),
    visible,
    object_states: objectStates,
    in_transit: agent.transit.status === "in_transit",
  };
}

/**
 * The admissible arguments for each action kind. An agent in transit gets
 * empty sets: it can neither interact, speak, nor re-route until it arrives.
 */
export function validTargetsFor(world: CanonicalWorldState, graph: LocationGraph, agentId: string): ValidTargets {
  const agent = world.agents[agentId];
  if (!agent || agent.transit.status === "in_transit") {
    return { locations: [], objects: [], agents: [] };
  }
  const area = world.nodes[agent.location_id];
  const objects: string[] = [];
  const agents: string[] = [];
  for (const id of area?.children ?? []) {
    const kind = world.nodes[id]?.kind;
    if (kind === "object") objects.push(id);
    else if (kind === "agent" && id !== agentId) agents.push(id);
  }
  return {
    locations: graph.reachableFrom(agent.location_id),
    objects: objects.sort(),
    agents: agents.sort(),
  };
}

/** One-line summary of a slice, used as observation text and retrieval query. */
export function describePerception(slice: PerceptionSlice, names: (id: string) => string): string {
  const self = names(slice.agent_id);
  const others = slice.visible.filter((node) => node.id !== slice.agent_id).map((node) => node.name);
  const where = slice.in_transit ? `passing through ${slice.area.name}` : `at ${slice.area.name}`;
  if (others.length === 0) return `${self} is ${where}.`;
  return `${self} is ${where}. ${self} sees ${others.join(", ")}.`;
}
