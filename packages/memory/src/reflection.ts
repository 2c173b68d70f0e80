import type { Insight, InsightGenerator, Logger, MemoryRecord } from "@tickvale/schemas";
import { callWithTimeout, silentLogger } from "@tickvale/schemas";
import type { MemoryStream } from "./memory-stream.js";

export const MIN_INSIGHTS_PER_REFLECTION = 3;
export const MAX_INSIGHTS_PER_REFLECTION = 5;
export const DEFAULT_REFLECTION_THRESHOLD = 30;

export interface ReflectionTrackerOptions {
  generator: InsightGenerator;
  /** Accumulated importance that triggers a reflection. Default: 30 */
  threshold?: number;
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Sums the importance of everything appended to a stream since the last
 * reflection, and turns that window into reflection records once the sum
 * reaches the threshold.
 *
 * The sum only grows, except for the reset after a successful reflection.
 * Reflection records count toward the next window.
 *
 * A generator is expected to give 3 to 5 insights. Anything past five is
 * dropped. Fewer than three are still kept, and the shortfall is logged.
 */
export class ReflectionTracker {
  private stream: MemoryStream;
  private generator: InsightGenerator;
  private threshold: number;
  private timeoutMs: number;
  private logger: Logger;
  private accumulated = 0;
  private windowStart: number;
  private unsubscribe: () => void;

  constructor(stream: MemoryStream, options: ReflectionTrackerOptions) {
    this.stream = stream;
    this.generator = options.generator;
    this.threshold = options.threshold ?? DEFAULT_REFLECTION_THRESHOLD;
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.logger = options.logger ?? silentLogger;
    this.windowStart = stream.size;
    this.unsubscribe = stream.on((_agentId, record) => {
      this.accumulated += record.importance;
    });
  }

  get pending(): number {
    return this.accumulated;
  }

  shouldReflect(): boolean {
    return this.accumulated >= this.threshold;
  }

  /**
   * Reflects if the threshold has been reached. Returns the reflection
   * records appended, or an empty list when nothing happened. A failing
   * generator leaves the sum in place so the next call retries.
   */
  async maybeReflect(tick: number): Promise<MemoryRecord[]> {
    if (!this.shouldReflect()) return [];
    const window = this.stream.records(this.windowStart);

    let insights: Insight[];
    try {
      insights = await callWithTimeout(
        () => this.generator.reflect(this.stream.agentId, window),
        this.timeoutMs,
        "Insight generator",
      );
    } catch (err) {
      this.logger.warn("insight generator failed, will retry next tick", {
        agent_id: this.stream.agentId,
        pending: this.accumulated,
        error: err instanceof Error ? err.message : String(err),
      });
      return [];
    }

    this.accumulated = 0;
    this.windowStart = this.stream.size;

    const appended: MemoryRecord[] = [];
    const usable = insights.filter((i) => i.text.trim().length > 0).slice(0, MAX_INSIGHTS_PER_REFLECTION);
    if (usable.length < MIN_INSIGHTS_PER_REFLECTION) {
      this.logger.warn("reflection produced fewer insights than expected", {
        agent_id: this.stream.agentId,
        tick,
        insights: usable.length,
        expected: MIN_INSIGHTS_PER_REFLECTION,
      });
    }
    for (const insight of usable) {
      const links = insight.supporting_ids.filter((id) => this.stream.has(id));
      appended.push(await this.stream.append(insight.text, "reflection", tick, links));
    }
    this.logger.debug("reflected", { agent_id: this.stream.agentId, tick, insights: appended.length });
    return appended;
  }

  dispose(): void {
    this.unsubscribe();
  }
}
