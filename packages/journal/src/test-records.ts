import type { DecisionRecord, TickPayload } from "@tickvale/schemas";

export function makePayload(tick: number): TickPayload {
  return {
    tick,
    state: {
      world: {
        root_id: "square",
        nodes: { square: { id: "square", name: "Square", kind: "area", parent_id: null, children: [] } },
        objects: {},
        agents: {},
        dynamics: { weather: "clear", minute_of_day: 480 + (tick + 1) * 10 },
      },
      beliefs: {},
    },
    events: [{ kind: "TIME_ADVANCED", tick, minute_of_day: 480 + (tick + 1) * 10 }],
  };
}

export const SAMPLE_DECISIONS: DecisionRecord[] = [
  { agent_id: "ada", outcome: "accepted", action: { kind: "MOVE", to_location_id: "park" } },
  { agent_id: "byron", outcome: "policy_timeout", action: { kind: "IDLE" }, reason: "Decision policy timed out after 5ms" },
];
