import type { Logger, TickPayload, TickSink } from "@tickvale/schemas";
import { silentLogger } from "@tickvale/schemas";

/**
 * Fans a payload out to every subscribed sink. Sinks are never awaited: a
 * returned promise is only watched for rejection, and a throwing sink does
 * not stop the others.
 */
export class TickPublisher {
  private sinks: TickSink[] = [];
  private logger: Logger;

  constructor(logger: Logger = silentLogger) {
    this.logger = logger;
  }

  subscribe(sink: TickSink): () => void {
    this.sinks.push(sink);
    return () => {
      this.sinks = this.sinks.filter((s) => s !== sink);
    };
  }

  get size(): number {
    return this.sinks.length;
  }

  publish(payload: TickPayload): void {
    for (const sink of [...this.sinks]) {
      try {
        const result = sink(payload);
        if (result instanceof Promise) {
          result.catch((err: unknown) => this.report(payload.tick, err));
        }
      } catch (err) {
        this.report(payload.tick, err);
      }
    }
  }

  private report(tick: number, err: unknown): void {
    this.logger.error("tick sink failed", { tick, error: err instanceof Error ? err.message : String(err) });
  }
}
