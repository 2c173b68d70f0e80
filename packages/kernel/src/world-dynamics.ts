import seedrandom from "seedrandom";
import type { CanonicalWorldState, SimEvent } from "@tickvale/schemas";

export const MINUTES_PER_DAY = 24 * 60;

export interface WeatherConfig {
  states: string[];
  /** Chance per tick that the weather changes at all. */
  changeProbability: number;
}

export interface DynamicsConfig {
  seed: string;
  minutesPerTick: number;
  weather: WeatherConfig;
}

/**
 * Advances the clock and maybe the weather. Randomness is drawn from a
 * generator seeded with `seed:tick`, so the outcome depends on nothing but
 * the seed, the tick and the state being advanced.
 */
export function applyWorldDynamics(world: CanonicalWorldState, tick: number, config: DynamicsConfig): SimEvent[] {
  const events: SimEvent[] = [];
  const dynamics = world.dynamics;

  dynamics.minute_of_day = (dynamics.minute_of_day + config.minutesPerTick) % MINUTES_PER_DAY;
  events.push({ kind: "TIME_ADVANCED", tick, minute_of_day: dynamics.minute_of_day });

  const rng = seedrandom(`${config.seed}:${tick}`);
  if (rng() < config.weather.changeProbability) {
    const options = config.weather.states.filter((s) => s !== dynamics.weather);
    const next = options[Math.floor(rng() * options.length)];
    if (next !== undefined) {
      events.push({ kind: "WEATHER_CHANGED", old: dynamics.weather, new: next });
      dynamics.weather = next;
    }
  }
  return events;
}

export function formatClock(minuteOfDay: number): string {
  const hours = Math.floor(minuteOfDay / 60);
  const minutes = minuteOfDay % 60;
  return `${String(hours).padStart(2, "0")}:${String(minutes).padStart(2, "0")}`;
}
