import { describe, it, expect } from "vitest";
import type { NameLookup } from "@tickvale/schemas";
import { TemplateNarrator, fillTemplate } from "./narration.js";

const NAMES: Record<string, string> = { ada: "Ada", byron: "Byron", cafe: "Cafe", park: "Park", fridge: "Fridge" };
const names: NameLookup = (id) => NAMES[id] ?? id;

describe("TemplateNarrator", () => {
  const narrator = new TemplateNarrator({ "fridge.take.empty": "{actor} finds {object} empty." });

  it("narrates actions from the actor's side", () => {
    expect(narrator.narrate({ kind: "IDLE" }, names, "ada")).toBe("Ada waits.");
    expect(narrator.narrate({ kind: "MOVE", to_location_id: "park" }, names, "ada")).toBe("Ada heads for Park.");
    expect(narrator.narrate({ kind: "INTERACT", object_id: "fridge", verb: "OPEN" }, names, "ada")).toBe(
      "Ada tries to open Fridge.",
    );
    expect(narrator.narrate({ kind: "SAY", to_agent_id: "byron", utterance: "Morning!" }, names, "ada")).toBe(
      'Ada says to Byron: "Morning!"',
    );
  });

  it("narrates events", () => {
    expect(narrator.narrate({ kind: "MOVE", agent_id: "ada", from: "cafe", to: "park" }, names)).toBe(
      "Ada arrived at Park from Cafe.",
    );
    expect(
      narrator.narrate({ kind: "SAY", from_agent: "ada", to_agent: "byron", utterance: "Hi", area_id: "cafe" }, names),
    ).toBe('Ada said to Byron: "Hi"');
    expect(narrator.narrate({ kind: "WEATHER_CHANGED", old: "clear", new: "rain" }, names)).toBe(
      "The weather turned from clear to rain.",
    );
    expect(narrator.narrate({ kind: "TIME_ADVANCED", tick: 0, minute_of_day: 490 }, names)).toBe("It is now 08:10.");
  });

  it("uses a template for a known narration key, defaults otherwise", () => {
    const base = {
      kind: "OBJECT_STATE_CHANGED" as const,
      object_id: "fridge",
      agent_id: "ada",
      verb: "TAKE" as const,
      from_state: {},
      to_state: {},
    };
    expect(narrator.narrate({ ...base, success: false, narration_key: "fridge.take.empty" }, names)).toBe(
      "Ada finds Fridge empty.",
    );
    expect(narrator.narrate({ ...base, success: true, narration_key: "fridge.take.success" }, names)).toBe(
      "Ada took from Fridge.",
    );
    expect(narrator.narrate({ ...base, success: false, narration_key: "fridge.take.unavailable" }, names)).toBe(
      "Ada could not take Fridge.",
    );
  });
});

describe("fillTemplate", () => {
  it("keeps unknown placeholders", () => {
    expect(fillTemplate("{actor} and {ghost}", { actor: "Ada" })).toBe("Ada and {ghost}");
  });
});
