import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import yaml from "js-yaml";
import type {
  CanonicalWorldState,
  TransitionTable,
  WorldDefinition,
  WorldNode,
} from "@tickvale/schemas";
import { WorldDefinitionError, validateWorldDefinitionData, isWorldDefinition } from "@tickvale/schemas";
import { LocationGraph, buildLocationGraph } from "./location-graph.js";
import { ObjectExecutor } from "./object-executor.js";
import { STATIONARY } from "./transit.js";
import { assertWorldTree } from "./world-tree.js";

export const DEFAULT_START_MINUTE = 480;
export const DEFAULT_WEATHER = "clear";

export interface AgentProfile {
  goal?: string;
  patrol_route: string[];
}

export interface LoadedWorld {
  definition: WorldDefinition;
  state: CanonicalWorldState;
  graph: LocationGraph;
  executor: ObjectExecutor;
  transitions: Record<string, TransitionTable>;
  profiles: Record<string, AgentProfile>;
}

export interface BuildWorldOptions {
  /** Overrides `config.startMinuteOfDay` from the definition. */
  startMinuteOfDay?: number;
}

function checkReferences(def: WorldDefinition): string[] {
  const errors: string[] = [];
  const seen = new Set<string>();
  const areaIds = new Set(def.areas.map((a) => a.id));
  const claim = (id: string, what: string) => {
    if (seen.has(id)) errors.push(`duplicate id "${id}" (${what})`);
    seen.add(id);
  };

  for (const area of def.areas) claim(area.id, "area");
  for (const obj of def.objects ?? []) claim(obj.id, "object");
  for (const agent of def.agents ?? []) claim(agent.id, "agent");

  if (!areaIds.has(def.root_id)) errors.push(`root_id "${def.root_id}" is not an area`);
  for (const area of def.areas) {
    if (area.id === def.root_id) {
      if (area.parent_id) errors.push(`root "${area.id}" must not have a parent`);
      continue;
    }
    if (area.parent_id && !areaIds.has(area.parent_id)) {
      errors.push(`area "${area.id}" has unknown parent "${area.parent_id}"`);
    }
  }
  for (const obj of def.objects ?? []) {
    if (!areaIds.has(obj.area_id)) errors.push(`object "${obj.id}" is in unknown area "${obj.area_id}"`);
  }
  for (const agent of def.agents ?? []) {
    if (!areaIds.has(agent.start_area_id)) {
      errors.push(`agent "${agent.id}" starts in unknown area "${agent.start_area_id}"`);
    }
    for (const stop of agent.patrol_route ?? []) {
      if (!areaIds.has(stop)) errors.push(`agent "${agent.id}" patrols unknown area "${stop}"`);
    }
  }
  for (const [a, b] of def.edges ?? []) {
    if (!areaIds.has(a) || !areaIds.has(b)) errors.push(`edge [${a}, ${b}] references an unknown area`);
  }
  return errors;
}

/**
 * Turns a validated definition into canonical state. Areas without a
 * `parent_id` hang off the root. Node children are inserted in definition
 * order: areas, then objects, then agents.
 */
export function buildWorld(def: WorldDefinition, options: BuildWorldOptions = {}): LoadedWorld {
  const validation = validateWorldDefinitionData(def);
  if (!validation.valid) throw new WorldDefinitionError(validation.errors);
  const referenceErrors = checkReferences(def);
  if (referenceErrors.length > 0) throw new WorldDefinitionError(referenceErrors);

  const configured = def.config?.["startMinuteOfDay"];
  const startMinute =
    options.startMinuteOfDay ?? (typeof configured === "number" ? configured : DEFAULT_START_MINUTE);

  const nodes: Record<string, WorldNode> = {};
  const addNode = (id: string, name: string | undefined, kind: WorldNode["kind"], parentId: string | null) => {
    nodes[id] = { id, name: name ?? id, kind, parent_id: parentId, children: [] };
  };

  for (const area of def.areas) {
    const parentId = area.id === def.root_id ? null : (area.parent_id ?? def.root_id);
    addNode(area.id, area.name, "area", parentId);
  }
  for (const area of def.areas) {
    const parentId = nodes[area.id]?.parent_id;
    if (parentId) nodes[parentId]?.children.push(area.id);
  }

  const state: CanonicalWorldState = {
    root_id: def.root_id,
    nodes,
    objects: {},
    agents: {},
    dynamics: { weather: def.weather ?? DEFAULT_WEATHER, minute_of_day: startMinute },
  };

  for (const obj of def.objects ?? []) {
    addNode(obj.id, obj.name, "object", obj.area_id);
    nodes[obj.area_id]?.children.push(obj.id);
    state.objects[obj.id] = { object_type: obj.object_type, state: { ...(obj.state ?? {}) } };
  }

  const profiles: Record<string, AgentProfile> = {};
  for (const agent of def.agents ?? []) {
    addNode(agent.id, agent.name, "agent", agent.start_area_id);
    nodes[agent.start_area_id]?.children.push(agent.id);
    state.agents[agent.id] = { location_id: agent.start_area_id, transit: { ...STATIONARY } };
    const profile: AgentProfile = { patrol_route: [...(agent.patrol_route ?? [])] };
    if (agent.goal !== undefined) profile.goal = agent.goal;
    profiles[agent.id] = profile;
  }

  assertWorldTree(state);

  const graph = buildLocationGraph(state, {
    edges: def.edges ?? [],
    linkNestedAreas: def.link_nested_areas ?? true,
  });
  const transitions = def.transitions ?? {};

  return {
    definition: def,
    state,
    graph,
    executor: new ObjectExecutor(transitions),
    transitions,
    profiles,
  };
}

/** Parses YAML or JSON text into a world definition. */
export function parseWorldDefinition(content: string, format: "yaml" | "json" = "yaml"): WorldDefinition {
  let data: unknown;
  try {
    data = format === "json" ? JSON.parse(content) : yaml.load(content);
  } catch (err) {
    throw new WorldDefinitionError([`unparseable ${format}: ${err instanceof Error ? err.message : String(err)}`]);
  }
  if (!isWorldDefinition(data)) {
    throw new WorldDefinitionError(validateWorldDefinitionData(data).errors);
  }
  return data;
}

export async function loadWorldFile(filePath: string, options: BuildWorldOptions = {}): Promise<LoadedWorld> {
  const content = await readFile(filePath, "utf-8");
  const format = extname(filePath).toLowerCase() === ".json" ? "json" : "yaml";
  return buildWorld(parseWorldDefinition(content, format), options);
}
