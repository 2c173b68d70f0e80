/**
 * Tickvale Core Types
 *
 * These are the canonical data models for the whole simulation.
 * Every package references these types. Nothing is implicit.
 */

// ─── World Tree ─────────────────────────────────────────────────────

export const NODE_KINDS = ["area", "object", "agent"] as const;
export type NodeKind = (typeof NODE_KINDS)[number];

export interface WorldNode {
  id: string;
  name: string;
  kind: NodeKind;
  parent_id: string | null;
  children: string[];
}

export type AttributeValue = string | number | boolean;

/** Object-type-specific attributes, e.g. `{ power: "off" }`. */
export type ObjectState = Record<string, AttributeValue>;

export interface ObjectRecord {
  object_type: string;
  state: ObjectState;
}

// ─── Transit ────────────────────────────────────────────────────────

export interface StationaryTransit {
  status: "stationary";
}

export interface InTransit {
  status: "in_transit";
  origin: string;
  destination: string;
  /** Full route, origin first, destination last. */
  path: string[];
  remaining_edges: number;
  /** Ticks spent on the current edge. */
  edge_elapsed: number;
}

export type TransitState = StationaryTransit | InTransit;

export interface AgentRecord {
  location_id: string;
  transit: TransitState;
}

// ─── Canonical State ────────────────────────────────────────────────

export interface WorldDynamics {
  weather: string;
  minute_of_day: number;
}

export interface CanonicalWorldState {
  root_id: string;
  nodes: Record<string, WorldNode>;
  objects: Record<string, ObjectRecord>;
  agents: Record<string, AgentRecord>;
  dynamics: WorldDynamics;
}

// ─── Belief ─────────────────────────────────────────────────────────

export interface BeliefNode extends WorldNode {
  refreshed_at: number;
  state?: ObjectState;
}

export interface BeliefState {
  agent_id: string;
  nodes: Record<string, BeliefNode>;
}

// ─── Perception ─────────────────────────────────────────────────────

export interface PerceptionSlice {
  agent_id: string;
  tick: number;
  area: WorldNode;
  /** Immediate children of the area, in the area's child order. */
  visible: WorldNode[];
  object_states: Record<string, ObjectState>;
  in_transit: boolean;
}

export interface ValidTargets {
  locations: string[];
  objects: string[];
  agents: string[];
}

// ─── Actions ────────────────────────────────────────────────────────

export const INTERACT_VERBS = ["USE", "OPEN", "CLOSE", "TAKE", "DROP"] as const;
export type InteractVerb = (typeof INTERACT_VERBS)[number];

export interface IdleAction {
  kind: "IDLE";
}

export interface MoveAction {
  kind: "MOVE";
  to_location_id: string;
}

export interface InteractAction {
  kind: "INTERACT";
  object_id: string;
  verb: InteractVerb;
}

export interface SayAction {
  kind: "SAY";
  to_agent_id: string;
  utterance: string;
}

export type Action = IdleAction | MoveAction | InteractAction | SayAction;
export type ActionKind = Action["kind"];

export const IDLE: IdleAction = Object.freeze({ kind: "IDLE" });

// ─── Events ─────────────────────────────────────────────────────────

export interface MoveEvent {
  kind: "MOVE";
  agent_id: string;
  from: string;
  to: string;
}

export interface ObjectStateChangedEvent {
  kind: "OBJECT_STATE_CHANGED";
  object_id: string;
  agent_id: string;
  verb: InteractVerb;
  from_state: ObjectState;
  to_state: ObjectState;
  success: boolean;
  narration_key: string;
}

export interface SayEvent {
  kind: "SAY";
  from_agent: string;
  to_agent: string;
  utterance: string;
  area_id: string;
}

export interface WeatherChangedEvent {
  kind: "WEATHER_CHANGED";
  old: string;
  new: string;
}

export interface TimeAdvancedEvent {
  kind: "TIME_ADVANCED";
  tick: number;
  minute_of_day: number;
}

export type SimEvent =
  | MoveEvent
  | ObjectStateChangedEvent
  | SayEvent
  | WeatherChangedEvent
  | TimeAdvancedEvent;
export type SimEventKind = SimEvent["kind"];

// ─── Tick Payload ───────────────────────────────────────────────────

export interface StateSnapshot {
  world: CanonicalWorldState;
  beliefs: Record<string, BeliefState>;
}

export interface TickPayload {
  tick: number;
  state: StateSnapshot;
  events: SimEvent[];
}

export type DecisionOutcome = "accepted" | "rejected" | "policy_error" | "policy_timeout";

/** What the policy proposed for one agent and what the kernel made of it. */
export interface DecisionRecord {
  agent_id: string;
  outcome: DecisionOutcome;
  action: Action;
  reason?: string;
}

// ─── Memory ─────────────────────────────────────────────────────────

export const MEMORY_KINDS = ["observation", "plan", "reflection", "action"] as const;
export type MemoryKind = (typeof MEMORY_KINDS)[number];

export interface MemoryRecord {
  id: string;
  description: string;
  created_at: number;
  last_accessed_at: number;
  importance: number;
  kind: MemoryKind;
  links: string[];
}

/** One line of the memory log. */
export interface MemoryLogEntry {
  agent_id: string;
  record: MemoryRecord;
}

export interface RetrievedMemory {
  record: MemoryRecord;
  score: number;
}

// ─── Object Transition Tables ───────────────────────────────────────

export interface TransitionRule {
  verb: InteractVerb;
  /** Attributes that must match exactly for the rule to apply. */
  when?: ObjectState;
  set?: ObjectState;
  /** Defaults to true. A failing rule never changes state. */
  success?: boolean;
  narration_key: string;
}

export type TransitionTable = TransitionRule[];

// ─── World Definition ───────────────────────────────────────────────

export interface AreaDefinition {
  id: string;
  name?: string;
  parent_id?: string | null;
}

export interface ObjectDefinition {
  id: string;
  name?: string;
  area_id: string;
  object_type: string;
  state?: ObjectState;
}

export interface AgentDefinition {
  id: string;
  name?: string;
  start_area_id: string;
  goal?: string;
  patrol_route?: string[];
}

export interface WorldDefinition {
  name?: string;
  root_id: string;
  areas: AreaDefinition[];
  objects?: ObjectDefinition[];
  agents?: AgentDefinition[];
  edges?: Array<[string, string]>;
  /** Link parent and child areas in the location graph. Default: true. */
  link_nested_areas?: boolean;
  transitions?: Record<string, TransitionTable>;
  /** Narration templates keyed by `narration_key`. */
  narration?: Record<string, string>;
  weather?: string;
  config?: Record<string, unknown>;
}

// ─── Collaborator Contracts ─────────────────────────────────────────

export interface DecisionRequest {
  agent_id: string;
  tick: number;
  perception: PerceptionSlice;
  belief: BeliefState;
  memory: RetrievedMemory[];
  valid_targets: ValidTargets;
  /** The plan slice covering this tick, when the agent has one. */
  plan?: PlanItem;
}

/**
 * Decision policy. Defined here so kernel and policy packages share it without
 * circular deps. Returns a raw action; the kernel coerces and validates it.
 */
export interface DecisionPolicy {
  decide(request: DecisionRequest): Promise<unknown>;
}

export interface ImportanceRater {
  rate(description: string, kind: MemoryKind): Promise<number>;
}

export interface Embedder {
  embed(text: string): Promise<number[]>;
}

export interface Insight {
  text: string;
  supporting_ids: string[];
}

export interface InsightGenerator {
  reflect(agentId: string, records: MemoryRecord[]): Promise<Insight[]>;
}

/** A stretch of an agent's day, covering ticks `[start_tick, end_tick)`. */
export interface PlanItem {
  start_tick: number;
  end_tick: number;
  location_id: string;
  description: string;
}

export interface PlanContext {
  tick: number;
  location_id: string;
  goal?: string;
}

export interface Planner {
  plan(agentId: string, context: PlanContext): Promise<PlanItem[]>;
}

/** Display names by node id, used to render narration. */
export type NameLookup = (id: string) => string;

export interface NarrationRenderer {
  narrate(subject: Action | SimEvent, names: NameLookup, actorId?: string): string;
}

export type TickSink = (payload: TickPayload) => void | Promise<void>;

// ─── Logging ────────────────────────────────────────────────────────

export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

// ─── Replay ─────────────────────────────────────────────────────────

export interface ReplayHeader {
  type: "header";
  schema_version: number;
  seq: number;
  run_id: string;
  created_at: string;
  metadata: Record<string, unknown>;
}

export interface ReplayTickRecord {
  type: "tick";
  schema_version: number;
  seq: number;
  payload: TickPayload;
  decisions: DecisionRecord[];
  hash_prev: string;
}

export type ReplayRecord = ReplayHeader | ReplayTickRecord;

/** Validated actions per tick, then per agent, as read back from a replay log. */
export type RecordedDecisions = Map<number, Map<string, Action>>;
