import { describe, it, expect, beforeEach } from "vitest";
import type { WorldDefinition } from "@tickvale/schemas";
import { buildWorld, type LoadedWorld } from "./world-loader.js";
import { describePerception, perceive, validTargetsFor } from "./perception.js";
import { moveNode } from "./world-tree.js";
import { startTransit } from "./transit.js";

const TOWN: WorldDefinition = {
  root_id: "town",
  areas: [
    { id: "town", name: "Town" },
    { id: "cafe", name: "Cafe" },
    { id: "park", name: "Park" },
    { id: "home", name: "Home" },
    { id: "kitchen", name: "Kitchen", parent_id: "home" },
  ],
  objects: [{ id: "fridge", name: "Fridge", area_id: "kitchen", object_type: "fridge", state: { items: 1 } }],
  agents: [
    { id: "ada", name: "Ada", start_area_id: "cafe" },
    { id: "byron", name: "Byron", start_area_id: "cafe" },
  ],
};

describe("perceive", () => {
  let world: LoadedWorld;
  const names = (id: string) => world.state.nodes[id]?.name ?? id;

  beforeEach(() => {
    world = buildWorld(TOWN);
  });

  it("sees the current area and its immediate children", () => {
    const slice = perceive(world.state, "ada", 0);
    expect(slice.agent_id).toBe("ada");
    expect(slice.tick).toBe(0);
    expect(slice.area.id).toBe("cafe");
    expect(slice.visible.map((n) => n.id)).toEqual(["ada", "byron"]);
    expect(slice.object_states).toEqual({});
    expect(slice.in_transit).toBe(false);
  });

  it("copies object states out of the world", () => {
    moveNode(world.state, "byron", "kitchen");
    world.state.agents.byron!.location_id = "kitchen";

    const slice = perceive(world.state, "byron", 3);
    expect(slice.visible.map((n) => n.id)).toEqual(["fridge", "byron"]);
    expect(slice.object_states).toEqual({ fridge: { items: 1 } });

    slice.object_states.fridge!.items = 0;
    slice.area.children.pop();
    expect(world.state.objects.fridge!.state.items).toBe(1);
    expect(world.state.nodes.kitchen!.children).toEqual(["fridge", "byron"]);
  });

  it("does not see into nested areas", () => {
    moveNode(world.state, "ada", "home");
    world.state.agents.ada!.location_id = "home";
    const slice = perceive(world.state, "ada", 1);
    expect(slice.visible.map((n) => n.id)).toEqual(["kitchen", "ada"]);
    expect(slice.object_states).toEqual({});
  });

  it("throws for an unknown agent", () => {
    expect(() => perceive(world.state, "ghost", 0)).toThrow('Unknown agent "ghost"');
  });

  it("flags agents in transit", () => {
    startTransit(world.state, world.graph, "ada", "park");
    expect(perceive(world.state, "ada", 0).in_transit).toBe(true);
  });

  it("describes a slice in one line", () => {
    expect(describePerception(perceive(world.state, "ada", 0), names)).toBe("Ada is at Cafe. Ada sees Byron.");

    moveNode(world.state, "byron", "park");
    world.state.agents.byron!.location_id = "park";
    expect(describePerception(perceive(world.state, "byron", 0), names)).toBe("Byron is at Park.");
  });

  it("describes an agent in transit as passing through", () => {
    startTransit(world.state, world.graph, "ada", "park");
    expect(describePerception(perceive(world.state, "ada", 0), names)).toBe(
      "Ada is passing through Cafe. Ada sees Byron.",
    );
  });
});

describe("validTargetsFor", () => {
  it("offers reachable areas, local objects and other local agents", () => {
    const world = buildWorld(TOWN);
    expect(validTargetsFor(world.state, world.graph, "ada")).toEqual({
      locations: ["home", "kitchen", "park", "town"],
      objects: [],
      agents: ["byron"],
    });

    moveNode(world.state, "byron", "kitchen");
    world.state.agents.byron!.location_id = "kitchen";
    expect(validTargetsFor(world.state, world.graph, "byron")).toEqual({
      locations: ["cafe", "home", "park", "town"],
      objects: ["fridge"],
      agents: [],
    });
  });

  it("offers nothing to an agent in transit", () => {
    const world = buildWorld(TOWN);
    startTransit(world.state, world.graph, "ada", "park");
    expect(validTargetsFor(world.state, world.graph, "ada")).toEqual({ locations: [], objects: [], agents: [] });
  });

  it("offers nothing to an unknown agent", () => {
    const world = buildWorld(TOWN);
    expect(validTargetsFor(world.state, world.graph, "ghost")).toEqual({ locations: [], objects: [], agents: [] });
  });
});
