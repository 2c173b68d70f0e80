import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { WorldDefinition } from "@tickvale/schemas";
import { WorldDefinitionError } from "@tickvale/schemas";
import { buildWorld, loadWorldFile, parseWorldDefinition } from "./world-loader.js";

const TOWN: WorldDefinition = {
  name: "Test Town",
  root_id: "town",
  areas: [
    { id: "town", name: "Town" },
    { id: "cafe", name: "Cafe" },
    { id: "home" },
    { id: "kitchen", parent_id: "home" },
  ],
  objects: [{ id: "fridge", area_id: "kitchen", object_type: "fridge", state: { items: 1 } }],
  agents: [
    { id: "ada", name: "Ada", start_area_id: "cafe", goal: "open the cafe", patrol_route: ["cafe", "home"] },
    { id: "byron", start_area_id: "home" },
  ],
  transitions: {
    fridge: [{ verb: "TAKE", when: { items: 1 }, set: { items: 0 }, narration_key: "fridge.take.success" }],
  },
};

function errorsOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof WorldDefinitionError) return err.errors;
    throw err;
  }
  return [];
}

describe("buildWorld", () => {
  it("hangs areas without a parent off the root", () => {
    const { state } = buildWorld(TOWN);
    expect(state.nodes.town!.children).toEqual(["cafe", "home"]);
    expect(state.nodes.home!.children).toEqual(["kitchen", "byron"]);
    expect(state.nodes.kitchen!.parent_id).toBe("home");
    expect(state.nodes.town!.parent_id).toBeNull();
  });

  it("defaults node names to ids", () => {
    const { state } = buildWorld(TOWN);
    expect(state.nodes.cafe!.name).toBe("Cafe");
    expect(state.nodes.fridge!.name).toBe("fridge");
    expect(state.nodes.byron!.name).toBe("byron");
  });

  it("creates object and agent records", () => {
    const { state } = buildWorld(TOWN);
    expect(state.objects).toEqual({ fridge: { object_type: "fridge", state: { items: 1 } } });
    expect(state.agents.ada).toEqual({ location_id: "cafe", transit: { status: "stationary" } });
  });

  it("collects agent profiles", () => {
    const { profiles } = buildWorld(TOWN);
    expect(profiles).toEqual({
      ada: { goal: "open the cafe", patrol_route: ["cafe", "home"] },
      byron: { patrol_route: [] },
    });
  });

  it("sets initial dynamics from defaults, config and options", () => {
    expect(buildWorld(TOWN).state.dynamics).toEqual({ weather: "clear", minute_of_day: 480 });
    const configured = { ...TOWN, weather: "rain", config: { startMinuteOfDay: 360 } };
    expect(buildWorld(configured).state.dynamics).toEqual({ weather: "rain", minute_of_day: 360 });
    expect(buildWorld(configured, { startMinuteOfDay: 0 }).state.dynamics.minute_of_day).toBe(0);
  });

  it("wires the transition tables into the executor", () => {
    const { executor, graph } = buildWorld(TOWN);
    expect(executor.hasTable("fridge")).toBe(true);
    expect(graph.shortestPath("cafe", "kitchen")).toEqual(["cafe", "town", "home", "kitchen"]);
  });

  it("rejects references to unknown areas", () => {
    const broken: WorldDefinition = {
      ...TOWN,
      objects: [{ id: "lamp", area_id: "attic", object_type: "lamp" }],
      edges: [["cafe", "moon"]],
    };
    expect(errorsOf(() => buildWorld(broken))).toEqual([
      'object "lamp" is in unknown area "attic"',
      "edge [cafe, moon] references an unknown area",
    ]);
  });

  it("rejects duplicate ids across kinds", () => {
    const broken: WorldDefinition = { ...TOWN, agents: [{ id: "cafe", start_area_id: "town" }] };
    expect(errorsOf(() => buildWorld(broken))).toEqual(['duplicate id "cafe" (agent)']);
  });

  it("rejects a root that is not an area", () => {
    const broken: WorldDefinition = { ...TOWN, root_id: "nowhere" };
    expect(errorsOf(() => buildWorld(broken))).toContain('root_id "nowhere" is not an area');
  });

  it("rejects unknown patrol stops", () => {
    const broken: WorldDefinition = { ...TOWN, agents: [{ id: "ada", start_area_id: "cafe", patrol_route: ["mars"] }] };
    expect(errorsOf(() => buildWorld(broken))).toEqual(['agent "ada" patrols unknown area "mars"']);
  });
});

describe("parseWorldDefinition", () => {
  it("parses YAML", () => {
    const def = parseWorldDefinition(
      ["root_id: town", "areas:", "  - id: town", "  - id: cafe", "agents:", "  - id: ada", "    start_area_id: cafe"].join(
        "\n",
      ),
    );
    expect(def.areas.map((a) => a.id)).toEqual(["town", "cafe"]);
    expect(def.agents).toEqual([{ id: "ada", start_area_id: "cafe" }]);
  });

  it("reports schema errors as WorldDefinitionError", () => {
    expect(() => parseWorldDefinition("root_id: town\n")).toThrow(WorldDefinitionError);
    expect(() => parseWorldDefinition("{ not json", "json")).toThrow(WorldDefinitionError);
  });
});

describe("loadWorldFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "tickvale-world-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads a JSON world by extension", async () => {
    const file = join(dir, "town.json");
    await writeFile(file, JSON.stringify(TOWN), "utf-8");
    const world = await loadWorldFile(file);
    expect(world.definition.name).toBe("Test Town");
    expect(Object.keys(world.state.agents)).toEqual(["ada", "byron"]);
  });

  it("loads a YAML world", async () => {
    const file = join(dir, "tiny.yaml");
    await writeFile(file, "root_id: r\nareas:\n  - id: r\n", "utf-8");
    const world = await loadWorldFile(file);
    expect(world.state.nodes.r!.kind).toBe("area");
  });
});
