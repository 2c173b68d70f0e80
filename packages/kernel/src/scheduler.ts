import type {
  Action,
  BeliefState,
  CanonicalWorldState,
  DecisionPolicy,
  DecisionRecord,
  DecisionRequest,
  Embedder,
  ImportanceRater,
  InsightGenerator,
  Logger,
  MemoryRecord,
  NameLookup,
  NarrationRenderer,
  PerceptionSlice,
  PlanItem,
  Planner,
  RetrievedMemory,
  SimEvent,
  TickPayload,
  TickSink,
  ValidTargets,
} from "@tickvale/schemas";
import { IDLE, KernelHaltedError, TimeoutError, callWithTimeout, silentLogger } from "@tickvale/schemas";
import type { LocationGraph, ObjectExecutor } from "@tickvale/world";
import {
  advanceTransit,
  assertWorldTree,
  cloneWorld,
  createBeliefState,
  deepFreeze,
  describePerception,
  mergePerception,
  nodeName,
  perceive,
  startTransit,
  validTargetsFor,
} from "@tickvale/world";
import { MemoryStream, ReflectionTracker } from "@tickvale/memory";
import type { SchedulerConfig } from "./config.js";
import { resolveSchedulerConfig } from "./config.js";
import { coerceAction } from "./validation.js";
import { activePlanItem, decomposePlan, planExhausted, usablePlanItems } from "./planning.js";
import { applyWorldDynamics } from "./world-dynamics.js";
import { TemplateNarrator } from "./narration.js";
import { TickPublisher } from "./publisher.js";

export interface TickSchedulerOptions {
  world: CanonicalWorldState;
  graph: LocationGraph;
  executor: ObjectExecutor;
  policy: DecisionPolicy;
  embedder: Embedder;
  rater: ImportanceRater;
  insights: InsightGenerator;
  /** Without a planner agents have no plans and retrieval uses goals only. */
  planner?: Planner;
  narrator?: NarrationRenderer;
  config?: Partial<SchedulerConfig>;
}

export type SchedulerStatus = "ready" | "stepping" | "halted";

export interface StepResult {
  payload: TickPayload;
  decisions: DecisionRecord[];
}

export type DecisionListener = (tick: number, decisions: DecisionRecord[]) => void;
export type MemoryListener = (agentId: string, record: MemoryRecord) => void;

type PolicyResult =
  | { ok: true; value: unknown }
  | { ok: false; outcome: "policy_error" | "policy_timeout"; reason: string };

/**
 * Owns the canonical world and advances it one tick per {@link step}.
 *
 * Agents decide concurrently against a frozen snapshot; their validated
 * actions are then applied one agent at a time, in ascending id order, to a
 * working copy that only becomes canonical once it passes the structural
 * check. Any failure past the decide phase halts the scheduler for good.
 */
export class TickScheduler {
  private world: CanonicalWorldState;
  private graph: LocationGraph;
  private executor: ObjectExecutor;
  private policy: DecisionPolicy;
  private planner: Planner | undefined;
  private narrator: NarrationRenderer;
  private config: SchedulerConfig;
  private logger: Logger;
  private publisher: TickPublisher;
  private beliefs: Record<string, BeliefState> = {};
  private streams = new Map<string, MemoryStream>();
  private trackers = new Map<string, ReflectionTracker>();
  private plans = new Map<string, PlanItem[]>();
  private decisionListeners: DecisionListener[] = [];
  private memoryListeners: MemoryListener[] = [];
  private tick = 0;
  private status: SchedulerStatus = "ready";
  private haltCause: unknown;

  constructor(options: TickSchedulerOptions) {
    assertWorldTree(options.world);
    this.world = cloneWorld(options.world);
    this.graph = options.graph;
    this.executor = options.executor;
    this.policy = options.policy;
    this.planner = options.planner;
    this.narrator = options.narrator ?? new TemplateNarrator();
    this.config = resolveSchedulerConfig(options.config);
    this.logger = this.config.logger ?? silentLogger;
    if (this.config.startMinuteOfDay !== undefined) this.world.dynamics.minute_of_day = this.config.startMinuteOfDay;
    this.publisher = new TickPublisher(this.logger);

    for (const agentId of this.agentIds()) {
      this.beliefs[agentId] = createBeliefState(agentId);
      const stream = new MemoryStream(agentId, {
        embedder: options.embedder,
        rater: options.rater,
        recencyDecay: this.config.recencyDecay,
        timeoutMs: this.config.collaboratorTimeoutMs,
        logger: this.logger,
      });
      stream.on((id, record) => this.emitMemory(id, record));
      this.streams.set(agentId, stream);
      this.trackers.set(
        agentId,
        new ReflectionTracker(stream, {
          generator: options.insights,
          threshold: this.config.reflectionThreshold,
          timeoutMs: this.config.collaboratorTimeoutMs,
          logger: this.logger,
        }),
      );
    }
  }

  // ─── Accessors ──────────────────────────────────────────────────────

  getTick(): number {
    return this.tick;
  }

  getStatus(): SchedulerStatus {
    return this.status;
  }

  /** A frozen copy of the canonical world. */
  getWorld(): CanonicalWorldState {
    return deepFreeze(cloneWorld(this.world));
  }

  getBelief(agentId: string): BeliefState | undefined {
    const belief = this.beliefs[agentId];
    return belief ? structuredClone(belief) : undefined;
  }

  getMemory(agentId: string): MemoryRecord[] {
    return this.streams.get(agentId)?.records() ?? [];
  }

  /** The decomposed plan slices an agent is working through. */
  getPlan(agentId: string): PlanItem[] {
    return structuredClone(this.plans.get(agentId) ?? []);
  }

  getConfig(): Readonly<SchedulerConfig> {
    return this.config;
  }

  // ─── Listeners ──────────────────────────────────────────────────────

  subscribe(sink: TickSink): () => void {
    return this.publisher.subscribe(sink);
  }

  onDecisions(listener: DecisionListener): () => void {
    this.decisionListeners.push(listener);
    return () => {
      this.decisionListeners = this.decisionListeners.filter((l) => l !== listener);
    };
  }

  onMemory(listener: MemoryListener): () => void {
    this.memoryListeners.push(listener);
    return () => {
      this.memoryListeners = this.memoryListeners.filter((l) => l !== listener);
    };
  }

  // ─── Tick ───────────────────────────────────────────────────────────

  async step(): Promise<StepResult> {
    if (this.status === "halted") throw new KernelHaltedError(this.tick, this.haltCause);
    if (this.status === "stepping") throw new Error("step() is already in progress");
    this.status = "stepping";
    try {
      const result = await this.runTick();
      this.status = "ready";
      return result;
    } catch (err) {
      this.status = "halted";
      this.haltCause = err;
      this.logger.error("scheduler halted", {
        tick: this.tick,
        error: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }
  }

  /** Runs `count` ticks back to back. */
  async run(count: number): Promise<StepResult[]> {
    const results: StepResult[] = [];
    for (let i = 0; i < count; i++) results.push(await this.step());
    return results;
  }

  private async runTick(): Promise<StepResult> {
    const tick = this.tick;
    const agentIds = this.agentIds();

    // 1. Freeze
    const snapshot = deepFreeze(cloneWorld(this.world));
    const names: NameLookup = (id) => nodeName(snapshot, id);

    // 2. Perceive
    const slices = new Map<string, PerceptionSlice>();
    const targets = new Map<string, ValidTargets>();
    for (const agentId of agentIds) {
      slices.set(agentId, deepFreeze(perceive(snapshot, agentId, tick)));
      targets.set(agentId, deepFreeze(validTargetsFor(snapshot, this.graph, agentId)));
    }

    // 3. Decide: plans and memory first, one agent at a time, then every policy call at once
    const active = new Map<string, PlanItem>();
    const excerpts = new Map<string, RetrievedMemory[]>();
    for (const agentId of agentIds) {
      const plan = await this.planFor(agentId, snapshot, tick);
      if (plan) active.set(agentId, deepFreeze(plan));
      excerpts.set(agentId, deepFreeze(await this.retrieveFor(agentId, slices.get(agentId)!, plan, names, tick)));
    }
    const results = await Promise.all(
      agentIds.map((agentId) => {
        const request: DecisionRequest = {
          agent_id: agentId,
          tick,
          perception: slices.get(agentId)!,
          belief: deepFreeze(structuredClone(this.beliefs[agentId]!)),
          memory: excerpts.get(agentId)!,
          valid_targets: targets.get(agentId)!,
        };
        const plan = active.get(agentId);
        if (plan) request.plan = plan;
        return this.decide(request);
      }),
    );

    // 4. Validate
    const decisions = agentIds.map((agentId, i) => this.judge(agentId, results[i]!, targets.get(agentId)!));

    // 5. Execute
    const working = cloneWorld(this.world);
    const events: SimEvent[] = [];
    decisions.forEach((decision) => {
      const agentId = decision.agent_id;
      if (snapshot.agents[agentId]?.transit.status === "in_transit") {
        const arrival = advanceTransit(working, agentId, this.config.ticksPerEdge);
        if (arrival) events.push(arrival);
        return;
      }
      const event = this.execute(working, agentId, decision.action);
      if (event) events.push(event);
    });

    // 6. World dynamics
    events.push(
      ...applyWorldDynamics(working, tick, {
        seed: this.config.seed,
        minutesPerTick: this.config.minutesPerTick,
        weather: this.config.weather,
      }),
    );

    // 7. Commit
    assertWorldTree(working);
    this.world = working;

    for (const agentId of agentIds) {
      mergePerception(this.beliefs[agentId]!, slices.get(agentId)!, this.world, tick);
    }
    for (const agentId of agentIds) {
      await this.remember(agentId, slices.get(agentId)!, events, names, tick);
    }

    // 8. Publish
    const payload: TickPayload = deepFreeze({
      tick,
      state: { world: cloneWorld(this.world), beliefs: structuredClone(this.beliefs) },
      events,
    });
    this.publisher.publish(payload);
    for (const listener of this.decisionListeners) {
      try {
        listener(tick, decisions);
      } catch (err) {
        this.logger.warn("decision listener failed", { tick, error: String(err) });
      }
    }
    this.tick = tick + 1;
    return { payload, decisions };
  }

  // ─── Phases ─────────────────────────────────────────────────────────

  /**
   * The plan slice for this tick. A new plan is asked for once the current
   * one runs out; each of its items is remembered as a `plan` record. A
   * failing planner leaves the agent without a plan until the next tick.
   */
  private async planFor(agentId: string, snapshot: CanonicalWorldState, tick: number): Promise<PlanItem | undefined> {
    const planner = this.planner;
    const stream = this.streams.get(agentId);
    const location = snapshot.agents[agentId]?.location_id;
    if (!planner || !stream || location === undefined) return undefined;

    const current = this.plans.get(agentId) ?? [];
    if (!planExhausted(current, tick)) return activePlanItem(current, tick);

    const goal = this.config.goals[agentId];
    let items: PlanItem[];
    try {
      items = await callWithTimeout(
        () => planner.plan(agentId, goal === undefined ? { tick, location_id: location } : { tick, location_id: location, goal }),
        this.config.collaboratorTimeoutMs,
        `Planner for "${agentId}"`,
      );
    } catch (err) {
      this.logger.warn("planner failed, will retry next tick", {
        agent_id: agentId,
        tick,
        error: err instanceof Error ? err.message : String(err),
      });
      return undefined;
    }

    const usable = usablePlanItems(items);
    for (const item of usable) await stream.append(item.description, "plan", tick);
    const slices = decomposePlan(usable, this.config.planSliceTicks);
    this.plans.set(agentId, slices);
    this.logger.debug("agent planned", { agent_id: agentId, tick, items: usable.length });
    return activePlanItem(slices, tick);
  }

  private async retrieveFor(
    agentId: string,
    slice: PerceptionSlice,
    plan: PlanItem | undefined,
    names: NameLookup,
    tick: number,
  ): Promise<RetrievedMemory[]> {
    const stream = this.streams.get(agentId);
    if (!stream) return [];
    const goal = this.config.goals[agentId];
    let query = describePerception(slice, names);
    if (plan) query += ` Plan: ${plan.description}`;
    if (goal) query += ` Goal: ${goal}`;
    return stream.retrieve(query, tick, {
      k: this.config.retrievalK,
      budgetTokens: this.config.contextBudgetTokens,
    });
  }

  private async decide(request: DecisionRequest): Promise<PolicyResult> {
    try {
      const value = await callWithTimeout(
        () => this.policy.decide(request),
        this.config.decisionTimeoutMs,
        `Decision policy for "${request.agent_id}"`,
      );
      return { ok: true, value };
    } catch (err) {
      return {
        ok: false,
        outcome: err instanceof TimeoutError ? "policy_timeout" : "policy_error",
        reason: err instanceof Error ? err.message : String(err),
      };
    }
  }

  private judge(agentId: string, result: PolicyResult, targets: ValidTargets): DecisionRecord {
    if (!result.ok) {
      this.logger.warn("policy failed, agent idles", { agent_id: agentId, outcome: result.outcome, reason: result.reason });
      return { agent_id: agentId, outcome: result.outcome, action: IDLE, reason: result.reason };
    }
    const verdict = coerceAction(result.value, targets);
    if (verdict.accepted) return { agent_id: agentId, outcome: "accepted", action: verdict.action };
    this.logger.warn("action rejected, agent idles", { agent_id: agentId, reason: verdict.reason });
    const record: DecisionRecord = { agent_id: agentId, outcome: "rejected", action: verdict.action };
    if (verdict.reason !== undefined) record.reason = verdict.reason;
    return record;
  }

  private execute(working: CanonicalWorldState, agentId: string, action: Action): SimEvent | null {
    switch (action.kind) {
      case "IDLE":
        return null;
      case "MOVE": {
        const started = startTransit(working, this.graph, agentId, action.to_location_id);
        if (!started.started) {
          this.logger.warn("move did not start", { agent_id: agentId, reason: started.reason });
        }
        return null;
      }
      case "INTERACT":
        return this.executor.execute(working, agentId, action.object_id, action.verb);
      case "SAY": {
        const location = working.agents[agentId]?.location_id;
        if (location === undefined) return null;
        return {
          kind: "SAY",
          from_agent: agentId,
          to_agent: action.to_agent_id,
          utterance: action.utterance,
          area_id: location,
        };
      }
      default: {
        const _exhaustive: never = action;
        throw new Error(`Unhandled action ${JSON.stringify(_exhaustive)}`);
      }
    }
  }

  private async remember(
    agentId: string,
    slice: PerceptionSlice,
    events: readonly SimEvent[],
    names: NameLookup,
    tick: number,
  ): Promise<void> {
    const stream = this.streams.get(agentId);
    if (!stream) return;

    await stream.append(describePerception(slice, names), "observation", tick);
    for (const event of events) {
      const role = this.roleIn(agentId, event);
      if (role) await stream.append(this.narrator.narrate(event, names, agentId), role, tick);
    }

    const reflections = await this.trackers.get(agentId)!.maybeReflect(tick);
    if (reflections.length > 0) {
      this.logger.debug("agent reflected", { agent_id: agentId, tick, count: reflections.length });
    }
  }

  /** How an agent remembers an event, if at all. */
  private roleIn(agentId: string, event: SimEvent): "action" | "observation" | null {
    switch (event.kind) {
      case "MOVE":
      case "OBJECT_STATE_CHANGED":
        return event.agent_id === agentId ? "action" : null;
      case "SAY":
        if (event.from_agent === agentId) return "action";
        return event.to_agent === agentId ? "observation" : null;
      default:
        return null;
    }
  }

  private emitMemory(agentId: string, record: MemoryRecord): void {
    for (const listener of this.memoryListeners) {
      try {
        listener(agentId, record);
      } catch (err) {
        this.logger.warn("memory listener failed", { agent_id: agentId, error: String(err) });
      }
    }
  }

  private agentIds(): string[] {
    return Object.keys(this.world.agents).sort();
  }
}
