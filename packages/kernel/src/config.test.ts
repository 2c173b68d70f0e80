import { describe, it, expect } from "vitest";
import { DEFAULT_SCHEDULER_CONFIG, resolveSchedulerConfig, schedulerConfigFromRecord } from "./config.js";

describe("resolveSchedulerConfig", () => {
  it("fills every default", () => {
    expect(resolveSchedulerConfig()).toEqual({ ...DEFAULT_SCHEDULER_CONFIG, goals: {} });
  });

  it("ignores overrides that are explicitly undefined", () => {
    const config = resolveSchedulerConfig({ seed: undefined, ticksPerEdge: 3 });
    expect(config.seed).toBe("tickvale");
    expect(config.ticksPerEdge).toBe(3);
  });

  it("does not share the default weather states", () => {
    const config = resolveSchedulerConfig();
    config.weather.states.push("snow");
    expect(DEFAULT_SCHEDULER_CONFIG.weather.states).toEqual(["clear", "cloudy", "rain"]);
  });

  it("rejects out-of-range values", () => {
    expect(() => resolveSchedulerConfig({ ticksPerEdge: 0 })).toThrow("ticksPerEdge must be an integer >= 1");
    expect(() => resolveSchedulerConfig({ weather: { states: ["clear"], changeProbability: 2 } })).toThrow(
      "weather.changeProbability must be within [0, 1]",
    );
  });

  it("requires both timeouts to be positive", () => {
    expect(() => resolveSchedulerConfig({ decisionTimeoutMs: 0 })).toThrow(
      "Invalid scheduler config: decisionTimeoutMs must be > 0",
    );
    expect(() => resolveSchedulerConfig({ collaboratorTimeoutMs: 0 })).toThrow(
      "Invalid scheduler config: collaboratorTimeoutMs must be > 0",
    );
    expect(() => resolveSchedulerConfig({ decisionTimeoutMs: -5 })).toThrow("decisionTimeoutMs must be > 0");
    expect(() => resolveSchedulerConfig({ decisionTimeoutMs: Number.NaN })).toThrow("decisionTimeoutMs must be > 0");
  });

  it("keeps the start minute only when given, and checks it is a minute of the day", () => {
    expect(resolveSchedulerConfig().startMinuteOfDay).toBeUndefined();
    expect(resolveSchedulerConfig({ startMinuteOfDay: 600 }).startMinuteOfDay).toBe(600);
    expect(() => resolveSchedulerConfig({ startMinuteOfDay: 1440 })).toThrow(
      "startMinuteOfDay must be an integer within [0, 1440)",
    );
  });

  it("rejects plan slices shorter than a tick", () => {
    expect(() => resolveSchedulerConfig({ planSliceTicks: 0 })).toThrow("planSliceTicks must be an integer >= 1");
  });
});

describe("schedulerConfigFromRecord", () => {
  it("keeps recognised settings and drops the rest", () => {
    expect(
      schedulerConfigFromRecord({
        seed: 42,
        retrievalK: 3,
        goals: { ada: "open the cafe" },
        startMinuteOfDay: 360,
        unrelated: true,
      }),
    ).toEqual({ seed: "42", retrievalK: 3, goals: { ada: "open the cafe" }, startMinuteOfDay: 360 });
  });

  it("reports mistyped settings", () => {
    expect(() => schedulerConfigFromRecord({ retrievalK: "five", weather: "sunny" })).toThrow(
      "Invalid scheduler config: retrievalK must be a number, weather must be { states: string[], changeProbability: number }",
    );
  });
});
