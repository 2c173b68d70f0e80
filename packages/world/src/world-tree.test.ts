import { describe, it, expect, beforeEach } from "vitest";
import type { CanonicalWorldState, WorldDefinition } from "@tickvale/schemas";
import { StructuralInvariantError } from "@tickvale/schemas";
import {
  assertWorldTree,
  childrenOfKind,
  cloneWorld,
  collectViolations,
  deepFreeze,
  moveNode,
  nodeName,
} from "./world-tree.js";
import { buildWorld } from "./world-loader.js";

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

describe("world tree", () => {
  let state: CanonicalWorldState;

  beforeEach(() => {
    state = buildWorld(TOWN).state;
  });

  it("accepts a freshly built world", () => {
    expect(collectViolations(state)).toEqual([]);
    expect(() => assertWorldTree(state)).not.toThrow();
  });

  it("moveNode keeps both children lists consistent", () => {
    moveNode(state, "ada", "park");
    expect(state.nodes.cafe!.children).toEqual(["byron"]);
    expect(state.nodes.park!.children).toEqual(["ada"]);
    expect(state.nodes.ada!.parent_id).toBe("park");

    state.agents.ada!.location_id = "park";
    expect(collectViolations(state)).toEqual([]);
  });

  it("reports an agent record that disagrees with its node", () => {
    moveNode(state, "ada", "park");
    expect(collectViolations(state)).toEqual([
      'agent "ada" node sits under "park" but is located at "cafe"',
    ]);
  });

  it("refuses to move a node under a non-area", () => {
    expect(() => moveNode(state, "ada", "fridge")).toThrow(StructuralInvariantError);
    expect(() => moveNode(state, "ghost", "park")).toThrow(StructuralInvariantError);
  });

  it("detects a cycle as unreachable nodes", () => {
    state.nodes.town!.children = ["cafe", "park"];
    state.nodes.home!.parent_id = "kitchen";
    state.nodes.kitchen!.children.push("home");

    const violations = collectViolations(state);
    expect(violations).toContain('"home" is not reachable from the root');
    expect(violations).toContain('"kitchen" is not reachable from the root');
    expect(() => assertWorldTree(state)).toThrow(StructuralInvariantError);
  });

  it("flags children under an object", () => {
    state.nodes.fridge!.children.push("byron");
    expect(collectViolations(state)).toContain('object "fridge" has children');
  });

  it("flags a dangling parent", () => {
    state.nodes.fridge!.parent_id = "attic";
    expect(collectViolations(state)).toContain('"fridge" has dangling parent "attic"');
  });

  it("lists children by kind in child order", () => {
    expect(childrenOfKind(state, "cafe", "agent").map((n) => n.id)).toEqual(["ada", "byron"]);
    expect(childrenOfKind(state, "cafe", "object")).toEqual([]);
    expect(childrenOfKind(state, "nowhere", "area")).toEqual([]);
  });

  it("falls back to the id for unknown names", () => {
    expect(nodeName(state, "ada")).toBe("Ada");
    expect(nodeName(state, "nobody")).toBe("nobody");
  });

  it("cloneWorld is independent of the source", () => {
    const copy = cloneWorld(state);
    copy.objects.fridge!.state.items = 0;
    expect(state.objects.fridge!.state.items).toBe(1);
  });

  it("deepFreeze freezes nested arrays and records", () => {
    const frozen = deepFreeze(cloneWorld(state));
    expect(Object.isFrozen(frozen.nodes.cafe!.children)).toBe(true);
    expect(Object.isFrozen(frozen.objects.fridge!.state)).toBe(true);
    expect(() => {
      frozen.nodes.cafe!.children.push("ghost");
    }).toThrow(TypeError);
    expect(Object.isFrozen(state.nodes.cafe)).toBe(false);
  });
});
