import type { CanonicalWorldState, InTransit, MoveEvent } from "@tickvale/schemas";
import type { LocationGraph } from "./location-graph.js";
import { moveNode } from "./world-tree.js";

export const STATIONARY = Object.freeze({ status: "stationary" as const });

export type StartTransitResult =
  | { started: true; transit: InTransit }
  | { started: false; reason: string };

/**
 * Routes a stationary agent toward `destination`. The agent stays at its
 * origin for the tick the move starts; {@link advanceTransit} walks the
 * route on later ticks.
 */
export function startTransit(
  world: CanonicalWorldState,
  graph: LocationGraph,
  agentId: string,
  destination: string,
): StartTransitResult {
  const agent = world.agents[agentId];
  if (!agent) return { started: false, reason: `unknown agent "${agentId}"` };
  if (agent.transit.status === "in_transit") {
    return { started: false, reason: "already in transit" };
  }
  if (agent.location_id === destination) {
    return { started: false, reason: "already at destination" };
  }
  const path = graph.shortestPath(agent.location_id, destination);
  if (!path) return { started: false, reason: `no route to "${destination}"` };
  const transit: InTransit = {
    status: "in_transit",
    origin: agent.location_id,
    destination,
    path,
    remaining_edges: path.length - 1,
    edge_elapsed: 0,
  };
  agent.transit = transit;
  return { started: true, transit };
}

/**
 * Spends one tick on the current edge. Once `ticksPerEdge` ticks have been
 * spent the agent steps onto the next area. Arrival returns the single MOVE
 * event for the whole trip.
 */
export function advanceTransit(
  world: CanonicalWorldState,
  agentId: string,
  ticksPerEdge: number,
): MoveEvent | null {
  const agent = world.agents[agentId];
  if (!agent || agent.transit.status !== "in_transit") return null;
  const transit = agent.transit;

  transit.edge_elapsed += 1;
  if (transit.edge_elapsed < Math.max(1, ticksPerEdge)) return null;

  const next = transit.path[transit.path.length - transit.remaining_edges];
  if (next === undefined) {
    throw new Error(`Transit for "${agentId}" has no node left with ${transit.remaining_edges} edges remaining`);
  }
  moveNode(world, agentId, next);
  agent.location_id = next;
  transit.remaining_edges -= 1;
  transit.edge_elapsed = 0;

  if (transit.remaining_edges > 0) return null;
  agent.transit = { ...STATIONARY };
  return { kind: "MOVE", agent_id: agentId, from: transit.origin, to: transit.destination };
}
