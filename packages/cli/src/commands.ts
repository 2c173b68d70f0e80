import type { DecisionRecord, Logger, NarrationRenderer, SimEvent, TickPayload } from "@tickvale/schemas";
import { ReplayMismatchError, isWorldDefinition, silentLogger } from "@tickvale/schemas";
import { buildWorld, loadWorldFile, nodeName } from "@tickvale/world";
import type { SchedulerConfig } from "@tickvale/kernel";
import { TemplateNarrator, formatClock, schedulerConfigFromRecord } from "@tickvale/kernel";
import type { ReplayRun } from "@tickvale/journal";
import { MemoryLog, ReplayLog, createRunId, readReplayFile, recordedDecisions, replayFilePath } from "@tickvale/journal";
import { ReplayPolicy } from "@tickvale/policy";
import { MetricsCollector } from "@tickvale/metrics";
import type { PolicyName, RecordableConfig } from "./simulation.js";
import { createPolicy, createSimulation, resolveRunConfig } from "./simulation.js";

export type Print = (line: string) => void;

// ─── Output ─────────────────────────────────────────────────────────

/**
 * One line per event worth telling, plus one per rejected or failed
 * decision. Clock ticks are folded into the line prefix.
 */
export function formatTick(payload: TickPayload, decisions: readonly DecisionRecord[], narrator: NarrationRenderer): string[] {
  const world = payload.state.world;
  const names = (id: string) => nodeName(world, id);
  const prefix = `[tick ${payload.tick} ${formatClock(world.dynamics.minute_of_day)}]`;
  const lines: string[] = [];
  for (const event of payload.events) {
    if (event.kind === "TIME_ADVANCED") continue;
    lines.push(`${prefix} ${narrator.narrate(event, names)}`);
  }
  for (const decision of decisions) {
    if (decision.outcome === "accepted") continue;
    lines.push(`${prefix} ${names(decision.agent_id)} idles (${decision.outcome}: ${decision.reason ?? "no reason"})`);
  }
  return lines;
}

function countBy<T>(items: Iterable<T>, key: (item: T) => string): string {
  const counts = new Map<string, number>();
  for (const item of items) counts.set(key(item), (counts.get(key(item)) ?? 0) + 1);
  if (counts.size === 0) return "(none)";
  return [...counts.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, n]) => `${k}=${n}`)
    .join(", ");
}

// ─── run ────────────────────────────────────────────────────────────

export interface RunOptions {
  ticks: number;
  policy: PolicyName;
  seed?: string;
  decisionTimeoutMs?: number;
  /** Where run directories go. No replay log is written when undefined. */
  replayDir?: string;
  memoryLog?: string;
  /** Print the run's Prometheus metrics once it ends. */
  metrics?: boolean;
  quiet?: boolean;
  logger?: Logger;
}

export interface RunResult {
  run_id: string;
  ticks: number;
  replay_path?: string;
  memory_records?: number;
}

function recordable(config: Partial<SchedulerConfig>): Partial<RecordableConfig> {
  const { logger: _logger, ...rest } = config;
  return rest;
}

export async function runCommand(worldFile: string, options: RunOptions, print: Print): Promise<RunResult> {
  const logger = options.logger ?? silentLogger;
  const world = await loadWorldFile(worldFile);
  const config = resolveRunConfig(world, { seed: options.seed, decisionTimeoutMs: options.decisionTimeoutMs });
  const scheduler = createSimulation(world, createPolicy(options.policy, world), config, logger);
  const narrator = new TemplateNarrator(world.definition.narration ?? {});
  const runId = createRunId();
  const result: RunResult = { run_id: runId, ticks: 0 };

  let replay: ReplayLog | undefined;
  if (options.replayDir !== undefined) {
    result.replay_path = replayFilePath(options.replayDir, runId);
    replay = new ReplayLog(result.replay_path, { logger });
    await replay.init({
      run_id: runId,
      metadata: { world: world.definition, config: recordable(config), policy: options.policy },
    });
  }

  let memoryLog: MemoryLog | undefined;
  if (options.memoryLog !== undefined) {
    memoryLog = new MemoryLog(options.memoryLog, { logger });
    await memoryLog.init();
    scheduler.onMemory(memoryLog.listener());
  }

  let metrics: MetricsCollector | undefined;
  if (options.metrics) {
    metrics = new MetricsCollector({ collectDefault: false });
    metrics.attach(scheduler);
  }

  if (!options.quiet) {
    print(`Running "${world.definition.name ?? world.definition.root_id}" for ${options.ticks} ticks (policy: ${options.policy})`);
  }
  try {
    for (let i = 0; i < options.ticks; i++) {
      const { payload, decisions } = await scheduler.step();
      if (replay) await replay.appendTick(payload, decisions);
      if (!options.quiet) for (const line of formatTick(payload, decisions, narrator)) print(line);
      result.ticks += 1;
    }
  } finally {
    metrics?.detach();
    await replay?.close();
    if (memoryLog) {
      await memoryLog.close();
      result.memory_records = memoryLog.count;
    }
  }

  print(`Finished ${result.ticks} ticks${result.replay_path ? `; replay log: ${result.replay_path}` : ""}`);
  if (metrics) {
    for (const line of (await metrics.getMetrics()).split("\n")) {
      if (line !== "") print(line);
    }
  }
  return result;
}

// ─── replay ─────────────────────────────────────────────────────────

export interface ReplayOptions {
  verify?: boolean;
  summary?: boolean;
  logger?: Logger;
}

export interface ReplayResult {
  run_id: string;
  ticks: number;
  /** Ticks re-simulated and matched; only set with `verify`. */
  verified?: number;
}

function payloadsMatch(fresh: TickPayload, recorded: TickPayload): boolean {
  return JSON.stringify(fresh) === JSON.stringify(recorded);
}

function firstDifference(fresh: TickPayload, recorded: TickPayload): string {
  if (JSON.stringify(fresh.events) !== JSON.stringify(recorded.events)) return "events";
  if (JSON.stringify(fresh.state.world) !== JSON.stringify(recorded.state.world)) return "world state";
  return "beliefs";
}

/**
 * Rebuilds the world recorded in the header and feeds the recorded decisions
 * back through the scheduler. Every fresh payload must equal the recorded one.
 */
async function verifyRun(run: ReplayRun, logger: Logger): Promise<number> {
  const metadata = run.header.metadata;
  const definition = metadata.world;
  if (!isWorldDefinition(definition)) {
    throw new ReplayMismatchError("Replay header carries no usable world definition", 1);
  }
  const rawConfig = metadata.config;
  const config =
    typeof rawConfig === "object" && rawConfig !== null && !Array.isArray(rawConfig)
      ? schedulerConfigFromRecord(Object.fromEntries(Object.entries(rawConfig)))
      : {};

  const world = buildWorld(definition);
  const scheduler = createSimulation(world, new ReplayPolicy(recordedDecisions(run)), config, logger);

  let verified = 0;
  for (const [index, record] of run.ticks.entries()) {
    const { payload } = await scheduler.step();
    if (!payloadsMatch(payload, record.payload)) {
      throw new ReplayMismatchError(
        `Tick ${record.payload.tick} diverged from the recording (${firstDifference(payload, record.payload)})`,
        index + 2,
      );
    }
    verified += 1;
  }
  return verified;
}

export async function replayCommand(runFile: string, options: ReplayOptions, print: Print): Promise<ReplayResult> {
  const logger = options.logger ?? silentLogger;
  const run = await readReplayFile(runFile);
  const result: ReplayResult = { run_id: run.header.run_id, ticks: run.ticks.length };

  if (options.summary) {
    const events: SimEvent[] = run.ticks.flatMap((t) => t.payload.events);
    const decisions: DecisionRecord[] = run.ticks.flatMap((t) => t.decisions);
    print(`Run ${run.header.run_id} (created ${run.header.created_at})`);
    print(`Ticks: ${run.ticks.length}`);
    print(`Events: ${countBy(events, (e) => e.kind)}`);
    print(`Decisions: ${countBy(decisions, (d) => d.outcome)}`);
  } else if (!options.verify) {
    const definition = run.header.metadata.world;
    const narrator = new TemplateNarrator(isWorldDefinition(definition) ? (definition.narration ?? {}) : {});
    for (const record of run.ticks) {
      for (const line of formatTick(record.payload, record.decisions, narrator)) print(line);
    }
  }

  if (options.verify) {
    result.verified = await verifyRun(run, logger);
    print(`Verified ${result.verified} ticks of run ${run.header.run_id}`);
  }
  return result;
}
