import {
  Registry,
  Counter,
  Gauge,
  collectDefaultMetrics,
} from "prom-client";
import type { DecisionRecord, MemoryRecord, TickPayload, TickSink } from "@tickvale/schemas";

export interface MetricsCollectorConfig {
  registry?: Registry;
  prefix?: string;
  collectDefault?: boolean;
}

/** The scheduler hooks the collector listens on. */
export interface MetricsSource {
  subscribe(sink: TickSink): () => void;
  onDecisions(listener: (tick: number, decisions: DecisionRecord[]) => void): () => void;
  onMemory(listener: (agentId: string, record: MemoryRecord) => void): () => void;
}

export class MetricsCollector {
  private readonly registry: Registry;
  private readonly prefix: string;
  private unsubscribers: Array<() => void> = [];

  // ─── Tick Metrics ──────────────────────────────────────────────────
  private readonly ticksTotal: Counter;
  private readonly eventsTotal: Counter;
  private readonly objectInteractionsTotal: Counter;
  private readonly agentsInTransit: Gauge;

  // ─── Decision Metrics ──────────────────────────────────────────────
  private readonly decisionsTotal: Counter;

  // ─── Memory Metrics ────────────────────────────────────────────────
  private readonly memoryRecordsTotal: Counter;
  private readonly reflectionsTotal: Counter;

  constructor(config?: MetricsCollectorConfig) {
    this.registry = config?.registry ?? new Registry();
    this.prefix = config?.prefix ?? "tickvale_";

    if (config?.collectDefault !== false) {
      collectDefaultMetrics({ register: this.registry, prefix: this.prefix });
    }

    this.ticksTotal = new Counter({
      name: `${this.prefix}ticks_total`,
      help: "Total number of published ticks",
      registers: [this.registry],
    });

    this.eventsTotal = new Counter({
      name: `${this.prefix}events_total`,
      help: "Total simulation events by kind",
      labelNames: ["kind"] as const,
      registers: [this.registry],
    });

    this.objectInteractionsTotal = new Counter({
      name: `${this.prefix}object_interactions_total`,
      help: "Total object interactions by outcome",
      labelNames: ["success"] as const,
      registers: [this.registry],
    });

    this.agentsInTransit = new Gauge({
      name: `${this.prefix}agents_in_transit`,
      help: "Number of agents in transit after the last tick",
      registers: [this.registry],
    });

    this.decisionsTotal = new Counter({
      name: `${this.prefix}decisions_total`,
      help: "Total agent decisions by outcome",
      labelNames: ["outcome"] as const,
      registers: [this.registry],
    });

    this.memoryRecordsTotal = new Counter({
      name: `${this.prefix}memory_records_total`,
      help: "Total memory records appended by kind",
      labelNames: ["kind"] as const,
      registers: [this.registry],
    });

    this.reflectionsTotal = new Counter({
      name: `${this.prefix}reflections_total`,
      help: "Total reflection records appended",
      registers: [this.registry],
    });
  }

  attach(source: MetricsSource): void {
    this.detach();
    this.unsubscribers = [
      source.subscribe((payload) => this.handleTick(payload)),
      source.onDecisions((_tick, decisions) => this.handleDecisions(decisions)),
      source.onMemory((_agentId, record) => this.handleMemory(record)),
    ];
  }

  detach(): void {
    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.unsubscribers = [];
  }

  handleTick(payload: TickPayload): void {
    this.ticksTotal.inc();
    for (const event of payload.events) {
      this.eventsTotal.inc({ kind: event.kind });
      if (event.kind === "OBJECT_STATE_CHANGED") {
        this.objectInteractionsTotal.inc({ success: String(event.success) });
      }
    }
    const inTransit = Object.values(payload.state.world.agents).filter(
      (agent) => agent.transit.status === "in_transit",
    ).length;
    this.agentsInTransit.set(inTransit);
  }

  handleDecisions(decisions: readonly DecisionRecord[]): void {
    for (const decision of decisions) {
      this.decisionsTotal.inc({ outcome: decision.outcome });
    }
  }

  handleMemory(record: MemoryRecord): void {
    this.memoryRecordsTotal.inc({ kind: record.kind });
    if (record.kind === "reflection") this.reflectionsTotal.inc();
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  getContentType(): string {
    return this.registry.contentType;
  }

  getRegistry(): Registry {
    return this.registry;
  }

  reset(): void {
    this.registry.resetMetrics();
  }
}
