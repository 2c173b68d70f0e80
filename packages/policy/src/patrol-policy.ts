import type { DecisionPolicy, DecisionRequest } from "@tickvale/schemas";
import { IDLE } from "@tickvale/schemas";

interface PatrolCursor {
  index: number;
  step: 1 | -1;
}

/**
 * Walks each agent back and forth along its patrol route. An agent away from
 * the route heads for its current stop first. Agents in transit, or without
 * at least two stops, stay idle.
 */
export class PatrolPolicy implements DecisionPolicy {
  private routes: Record<string, readonly string[]>;
  private cursors = new Map<string, PatrolCursor>();

  constructor(routes: Record<string, readonly string[]>) {
    this.routes = routes;
  }

  async decide(request: DecisionRequest): Promise<unknown> {
    const route = this.routes[request.agent_id] ?? [];
    if (request.perception.in_transit || route.length < 2) return IDLE;

    const cursor = this.cursors.get(request.agent_id) ?? { index: 0, step: 1 };
    const here = request.perception.area.id;
    if (route[cursor.index] === here) {
      const next = cursor.index + cursor.step;
      if (next < 0 || next >= route.length) cursor.step = cursor.step === 1 ? -1 : 1;
      cursor.index += cursor.step;
    }
    this.cursors.set(request.agent_id, cursor);

    const target = route[cursor.index];
    if (target === undefined || target === here) return IDLE;
    if (!request.valid_targets.locations.includes(target)) return IDLE;
    return { kind: "MOVE", to_location_id: target };
  }
}
