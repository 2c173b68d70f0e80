import type { DecisionPolicy, Logger } from "@tickvale/schemas";
import type { LoadedWorld } from "@tickvale/world";
import { nodeName } from "@tickvale/world";
import type { SchedulerConfig } from "@tickvale/kernel";
import { TemplateNarrator, TickScheduler, schedulerConfigFromRecord } from "@tickvale/kernel";
import {
  HashEmbedder,
  IdlePolicy,
  KeywordImportanceRater,
  PatrolPolicy,
  TemplateInsightGenerator,
  TemplatePlanner,
} from "@tickvale/policy";

export const POLICY_NAMES = ["idle", "patrol"] as const;
export type PolicyName = (typeof POLICY_NAMES)[number];

export function isPolicyName(value: string): value is PolicyName {
  return POLICY_NAMES.some((name) => name === value);
}

/** Scheduler settings that can be written to a replay header and read back. */
export type RecordableConfig = Omit<SchedulerConfig, "logger">;

export function createPolicy(name: PolicyName, world: LoadedWorld): DecisionPolicy {
  switch (name) {
    case "idle":
      return new IdlePolicy();
    case "patrol": {
      const routes: Record<string, string[]> = {};
      for (const [agentId, profile] of Object.entries(world.profiles)) routes[agentId] = profile.patrol_route;
      return new PatrolPolicy(routes);
    }
  }
}

/**
 * Layers the scheduler settings for a run: the world file's `config` block,
 * then agent goals from the world, then explicit overrides. Goals given in
 * the config block win over goals on the agents.
 */
export function resolveRunConfig(world: LoadedWorld, overrides: Partial<SchedulerConfig> = {}): Partial<SchedulerConfig> {
  const fromFile = schedulerConfigFromRecord(world.definition.config ?? {});
  const goals: Record<string, string> = {};
  for (const [agentId, profile] of Object.entries(world.profiles)) {
    if (profile.goal !== undefined) goals[agentId] = profile.goal;
  }
  const merged: Partial<SchedulerConfig> = { ...fromFile, goals: { ...goals, ...fromFile.goals } };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) Object.assign(merged, { [key]: value });
  }
  return merged;
}

/**
 * Wires a scheduler with the deterministic reference collaborators. Plans
 * follow each agent's patrol route.
 */
export function createSimulation(
  world: LoadedWorld,
  policy: DecisionPolicy,
  config: Partial<SchedulerConfig>,
  logger?: Logger,
): TickScheduler {
  const names = (id: string) => nodeName(world.state, id);
  const routes: Record<string, string[]> = {};
  for (const [agentId, profile] of Object.entries(world.profiles)) routes[agentId] = profile.patrol_route;
  return new TickScheduler({
    world: world.state,
    graph: world.graph,
    executor: world.executor,
    policy,
    embedder: new HashEmbedder(),
    rater: new KeywordImportanceRater(),
    insights: new TemplateInsightGenerator({ names }),
    planner: new TemplatePlanner({ names, routes }),
    narrator: new TemplateNarrator(world.definition.narration ?? {}),
    config: logger ? { ...config, logger } : config,
  });
}
