import { describe, it, expect } from "vitest";
import {
  validateActionData,
  isAction,
  validateWorldDefinitionData,
  isWorldDefinition,
  validateReplayRecordData,
} from "./validator.js";
import { REPLAY_SCHEMA_VERSION } from "./replay-record.schema.js";

describe("validateActionData", () => {
  it("accepts IDLE", () => {
    expect(validateActionData({ kind: "IDLE" })).toEqual({ valid: true, errors: [] });
  });

  it("accepts a well-formed MOVE, INTERACT and SAY", () => {
    expect(isAction({ kind: "MOVE", to_location_id: "cafe" })).toBe(true);
    expect(isAction({ kind: "INTERACT", object_id: "fridge", verb: "TAKE" })).toBe(true);
    expect(isAction({ kind: "SAY", to_agent_id: "byron", utterance: "Morning!" })).toBe(true);
  });

  it("rejects an unknown kind", () => {
    const result = validateActionData({ kind: "FLY" });
    expect(result.valid).toBe(false);
    expect(result.errors.length).toBeGreaterThan(0);
  });

  it("rejects IDLE carrying arguments", () => {
    expect(isAction({ kind: "IDLE", to_location_id: "cafe" })).toBe(false);
  });

  it("rejects a verb outside the closed set", () => {
    expect(isAction({ kind: "INTERACT", object_id: "fridge", verb: "EAT" })).toBe(false);
  });

  it("rejects MOVE without a destination", () => {
    expect(isAction({ kind: "MOVE" })).toBe(false);
  });

  it("rejects an empty utterance", () => {
    expect(isAction({ kind: "SAY", to_agent_id: "byron", utterance: "" })).toBe(false);
  });

  it("rejects non-objects", () => {
    expect(isAction("IDLE")).toBe(false);
    expect(isAction(null)).toBe(false);
  });
});

describe("validateWorldDefinitionData", () => {
  const minimal = () => ({
    root_id: "town",
    areas: [{ id: "town" }, { id: "cafe", parent_id: "town" }],
  });

  it("accepts a minimal world", () => {
    expect(validateWorldDefinitionData(minimal()).valid).toBe(true);
  });

  it("accepts objects, agents, edges and transitions", () => {
    const world = {
      ...minimal(),
      objects: [{ id: "fridge", area_id: "cafe", object_type: "fridge", state: { items: 1 } }],
      agents: [{ id: "ada", start_area_id: "cafe", patrol_route: ["cafe", "town"] }],
      edges: [["town", "cafe"]],
      transitions: {
        fridge: [{ verb: "TAKE", when: { items: 1 }, set: { items: 0 }, narration_key: "fridge.take" }],
      },
    };
    expect(isWorldDefinition(world)).toBe(true);
  });

  it("rejects a world without areas", () => {
    expect(isWorldDefinition({ root_id: "town", areas: [] })).toBe(false);
  });

  it("rejects an edge with three endpoints", () => {
    const world = { ...minimal(), edges: [["town", "cafe", "park"]] };
    expect(isWorldDefinition(world)).toBe(false);
  });

  it("rejects nested attribute values", () => {
    const world = {
      ...minimal(),
      objects: [{ id: "lamp", area_id: "cafe", object_type: "lamp", state: { power: { on: true } } }],
    };
    expect(isWorldDefinition(world)).toBe(false);
  });

  it("rejects unknown top-level fields", () => {
    const result = validateWorldDefinitionData({ ...minimal(), map_file: "world.map" });
    expect(result.valid).toBe(false);
  });
});

describe("validateReplayRecordData", () => {
  it("accepts a header", () => {
    const result = validateReplayRecordData({
      type: "header",
      schema_version: REPLAY_SCHEMA_VERSION,
      seq: 0,
      run_id: "run-1",
      created_at: "2026-01-01T00:00:00.000Z",
      metadata: {},
    });
    expect(result.valid).toBe(true);
  });

  it("rejects a header with a malformed timestamp", () => {
    const result = validateReplayRecordData({
      type: "header",
      schema_version: REPLAY_SCHEMA_VERSION,
      seq: 0,
      run_id: "run-1",
      created_at: "yesterday",
      metadata: {},
    });
    expect(result.valid).toBe(false);
  });

  it("rejects a tick record without a hash link", () => {
    const result = validateReplayRecordData({
      type: "tick",
      schema_version: REPLAY_SCHEMA_VERSION,
      seq: 1,
      payload: { tick: 0, state: { world: {}, beliefs: {} }, events: [] },
      decisions: [],
    });
    expect(result.valid).toBe(false);
  });
});
