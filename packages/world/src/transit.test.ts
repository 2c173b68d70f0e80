import { describe, it, expect } from "vitest";
import type { WorldDefinition } from "@tickvale/schemas";
import { buildWorld } from "./world-loader.js";
import { advanceTransit, startTransit } from "./transit.js";
import { collectViolations } from "./world-tree.js";

const XY: WorldDefinition = {
  root_id: "root",
  areas: [{ id: "root" }, { id: "x" }, { id: "y" }, { id: "island" }],
  agents: [{ id: "a", start_area_id: "x" }],
  edges: [["x", "y"]],
  link_nested_areas: false,
};

const TOWN: WorldDefinition = {
  root_id: "town",
  areas: [{ id: "town" }, { id: "cafe" }, { id: "home" }, { id: "kitchen", parent_id: "home" }],
  agents: [{ id: "ada", start_area_id: "cafe" }],
};

describe("transit", () => {
  it("moves X to Y across one edge and emits a single MOVE on arrival", () => {
    const { state, graph } = buildWorld(XY);

    const result = startTransit(state, graph, "a", "y");
    expect(result).toEqual({
      started: true,
      transit: {
        status: "in_transit",
        origin: "x",
        destination: "y",
        path: ["x", "y"],
        remaining_edges: 1,
        edge_elapsed: 0,
      },
    });
    expect(state.agents.a!.location_id).toBe("x");

    const event = advanceTransit(state, "a", 1);
    expect(event).toEqual({ kind: "MOVE", agent_id: "a", from: "x", to: "y" });
    expect(state.agents.a).toEqual({ location_id: "y", transit: { status: "stationary" } });
    expect(state.nodes.y!.children).toEqual(["a"]);
    expect(state.nodes.x!.children).toEqual([]);
    expect(collectViolations(state)).toEqual([]);
  });

  it("occupies every intermediate area along a longer route", () => {
    const { state, graph } = buildWorld(TOWN);
    startTransit(state, graph, "ada", "kitchen");

    expect(advanceTransit(state, "ada", 1)).toBeNull();
    expect(state.agents.ada!.location_id).toBe("town");
    expect(state.nodes.ada!.parent_id).toBe("town");

    expect(advanceTransit(state, "ada", 1)).toBeNull();
    expect(state.agents.ada!.location_id).toBe("home");

    expect(advanceTransit(state, "ada", 1)).toEqual({ kind: "MOVE", agent_id: "ada", from: "cafe", to: "kitchen" });
    expect(state.agents.ada!.location_id).toBe("kitchen");
    expect(collectViolations(state)).toEqual([]);
  });

  it("spends ticksPerEdge ticks on each edge", () => {
    const { state, graph } = buildWorld(XY);
    startTransit(state, graph, "a", "y");

    expect(advanceTransit(state, "a", 2)).toBeNull();
    const transit = state.agents.a!.transit;
    expect(transit.status === "in_transit" && transit.edge_elapsed).toBe(1);
    expect(state.agents.a!.location_id).toBe("x");

    expect(advanceTransit(state, "a", 2)).toEqual({ kind: "MOVE", agent_id: "a", from: "x", to: "y" });
  });

  it("refuses to start a second move while in transit", () => {
    const { state, graph } = buildWorld(TOWN);
    startTransit(state, graph, "ada", "kitchen");
    expect(startTransit(state, graph, "ada", "town")).toEqual({ started: false, reason: "already in transit" });
  });

  it("refuses unreachable and trivial destinations", () => {
    const { state, graph } = buildWorld(XY);
    expect(startTransit(state, graph, "a", "island")).toEqual({ started: false, reason: 'no route to "island"' });
    expect(startTransit(state, graph, "a", "x")).toEqual({ started: false, reason: "already at destination" });
    expect(state.agents.a!.transit).toEqual({ status: "stationary" });
  });

  it("does nothing for a stationary agent", () => {
    const { state } = buildWorld(XY);
    expect(advanceTransit(state, "a", 1)).toBeNull();
    expect(state.agents.a!.location_id).toBe("x");
  });
});
