import type { Logger } from "@tickvale/schemas";
import type { WeatherConfig } from "./world-dynamics.js";

export interface SchedulerConfig {
  /** Seeds every random draw in world dynamics. Default: "tickvale" */
  seed: string;
  /** Upper bound on each policy call. Default: 5000 */
  decisionTimeoutMs: number;
  /** Ticks spent on each edge of a route. Default: 1 */
  ticksPerEdge: number;
  /** Memory records handed to the policy per decision. Default: 5 */
  retrievalK: number;
  /** Token budget for those records. Default: 512 */
  contextBudgetTokens: number;
  /** Recency decay per tick. Default: 0.01 */
  recencyDecay: number;
  /** Accumulated importance that triggers a reflection. Default: 30 */
  reflectionThreshold: number;
  /** Default: 10 */
  minutesPerTick: number;
  /** Sets the world clock when the scheduler is built. Default: keep the world's own clock */
  startMinuteOfDay?: number;
  weather: WeatherConfig;
  /** Upper bound on each rater, embedder and insight call. Default: 5000 */
  collaboratorTimeoutMs: number;
  /** Per-agent goal text, appended to the retrieval query. */
  goals: Record<string, string>;
  /** Ticks per plan slice when plans are decomposed. Default: 1 */
  planSliceTicks: number;
  logger?: Logger;
}

export const DEFAULT_SCHEDULER_CONFIG: Readonly<Omit<SchedulerConfig, "logger" | "startMinuteOfDay">> = Object.freeze({
  seed: "tickvale",
  decisionTimeoutMs: 5000,
  ticksPerEdge: 1,
  retrievalK: 5,
  contextBudgetTokens: 512,
  recencyDecay: 0.01,
  reflectionThreshold: 30,
  minutesPerTick: 10,
  weather: { states: ["clear", "cloudy", "rain"], changeProbability: 0.1 },
  collaboratorTimeoutMs: 5000,
  goals: {},
  planSliceTicks: 1,
});

const NUMERIC_FIELDS = [
  "decisionTimeoutMs",
  "ticksPerEdge",
  "retrievalK",
  "contextBudgetTokens",
  "recencyDecay",
  "reflectionThreshold",
  "minutesPerTick",
  "startMinuteOfDay",
  "collaboratorTimeoutMs",
  "planSliceTicks",
] as const;

type NumericField = (typeof NUMERIC_FIELDS)[number];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Picks the recognised scheduler settings out of a loosely typed block, such
 * as the `config` section of a world file. Unknown keys are ignored; known
 * keys with the wrong type are reported.
 */
export function schedulerConfigFromRecord(record: Record<string, unknown>): Partial<SchedulerConfig> {
  const errors: string[] = [];
  const numeric: Partial<Record<NumericField, number>> = {};
  const out: Partial<SchedulerConfig> = {};

  for (const field of NUMERIC_FIELDS) {
    const value = record[field];
    if (value === undefined) continue;
    if (typeof value === "number" && Number.isFinite(value)) numeric[field] = value;
    else errors.push(`${field} must be a number`);
  }
  Object.assign(out, numeric);

  if (record.seed !== undefined) {
    if (typeof record.seed === "string" || typeof record.seed === "number") out.seed = String(record.seed);
    else errors.push("seed must be a string");
  }

  if (record.weather !== undefined) {
    const w = record.weather;
    if (
      isRecord(w) &&
      Array.isArray(w.states) &&
      w.states.every((s): s is string => typeof s === "string") &&
      typeof w.changeProbability === "number"
    ) {
      out.weather = { states: [...w.states], changeProbability: w.changeProbability };
    } else {
      errors.push("weather must be { states: string[], changeProbability: number }");
    }
  }

  if (record.goals !== undefined) {
    const goals = record.goals;
    if (isRecord(goals) && Object.values(goals).every((g) => typeof g === "string")) {
      out.goals = Object.fromEntries(Object.entries(goals).map(([k, v]) => [k, String(v)]));
    } else {
      errors.push("goals must map agent ids to strings");
    }
  }

  if (errors.length > 0) throw new Error(`Invalid scheduler config: ${errors.join(", ")}`);
  return out;
}

/** Fills defaults and checks ranges. */
export function resolveSchedulerConfig(overrides: Partial<SchedulerConfig> = {}): SchedulerConfig {
  const d = DEFAULT_SCHEDULER_CONFIG;
  const weather = overrides.weather ?? d.weather;
  const config: SchedulerConfig = {
    seed: overrides.seed ?? d.seed,
    decisionTimeoutMs: overrides.decisionTimeoutMs ?? d.decisionTimeoutMs,
    ticksPerEdge: overrides.ticksPerEdge ?? d.ticksPerEdge,
    retrievalK: overrides.retrievalK ?? d.retrievalK,
    contextBudgetTokens: overrides.contextBudgetTokens ?? d.contextBudgetTokens,
    recencyDecay: overrides.recencyDecay ?? d.recencyDecay,
    reflectionThreshold: overrides.reflectionThreshold ?? d.reflectionThreshold,
    minutesPerTick: overrides.minutesPerTick ?? d.minutesPerTick,
    weather: { states: [...weather.states], changeProbability: weather.changeProbability },
    collaboratorTimeoutMs: overrides.collaboratorTimeoutMs ?? d.collaboratorTimeoutMs,
    goals: { ...(overrides.goals ?? d.goals) },
    planSliceTicks: overrides.planSliceTicks ?? d.planSliceTicks,
  };
  if (overrides.startMinuteOfDay !== undefined) config.startMinuteOfDay = overrides.startMinuteOfDay;
  if (overrides.logger) config.logger = overrides.logger;
  const errors: string[] = [];
  if (!Number.isInteger(config.ticksPerEdge) || config.ticksPerEdge < 1) errors.push("ticksPerEdge must be an integer >= 1");
  if (!Number.isInteger(config.retrievalK) || config.retrievalK < 0) errors.push("retrievalK must be an integer >= 0");
  if (config.contextBudgetTokens < 0) errors.push("contextBudgetTokens must be >= 0");
  if (config.recencyDecay < 0) errors.push("recencyDecay must be >= 0");
  if (config.reflectionThreshold <= 0) errors.push("reflectionThreshold must be > 0");
  if (!(config.decisionTimeoutMs > 0)) errors.push("decisionTimeoutMs must be > 0");
  if (!(config.collaboratorTimeoutMs > 0)) errors.push("collaboratorTimeoutMs must be > 0");
  if (!Number.isInteger(config.planSliceTicks) || config.planSliceTicks < 1) errors.push("planSliceTicks must be an integer >= 1");
  if (
    config.startMinuteOfDay !== undefined &&
    (!Number.isInteger(config.startMinuteOfDay) || config.startMinuteOfDay < 0 || config.startMinuteOfDay >= 1440)
  ) {
    errors.push("startMinuteOfDay must be an integer within [0, 1440)");
  }
  if (config.minutesPerTick < 0) errors.push("minutesPerTick must be >= 0");
  if (config.weather.changeProbability < 0 || config.weather.changeProbability > 1) {
    errors.push("weather.changeProbability must be within [0, 1]");
  }
  if (config.weather.states.length === 0) errors.push("weather.states must not be empty");
  if (errors.length > 0) throw new Error(`Invalid scheduler config: ${errors.join(", ")}`);
  return config;
}
