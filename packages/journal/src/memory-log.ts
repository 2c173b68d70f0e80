import { appendFile, readFile, mkdir } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname } from "node:path";
import type { Logger, MemoryLogEntry, MemoryRecord } from "@tickvale/schemas";
import { MemoryLogError, isMemoryLogEntry, silentLogger, validateMemoryLogEntryData } from "@tickvale/schemas";

export type { MemoryLogEntry };

/**
 * Append-only JSONL of every memory record written during a run. Writes are
 * queued behind a promise chain so a synchronous listener can feed it.
 */
export class MemoryLog {
  private filePath: string;
  private writeLock: Promise<void> = Promise.resolve();
  private logger: Logger;
  private written = 0;
  private failed = 0;

  constructor(filePath: string, options?: { logger?: Logger }) {
    this.filePath = filePath;
    this.logger = options?.logger ?? silentLogger;
  }

  async init(): Promise<void> {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }
  }

  /** Queues a write. The returned promise settles once it is on disk or logged as failed. */
  append(agentId: string, record: MemoryRecord): Promise<void> {
    const line = JSON.stringify({ agent_id: agentId, record } satisfies MemoryLogEntry) + "\n";
    this.writeLock = this.writeLock
      .then(() => appendFile(this.filePath, line, "utf-8"))
      .then(
        () => { this.written += 1; },
        (err: unknown) => {
          this.failed += 1;
          this.logger.error("memory log write failed", { file: this.filePath, error: String(err) });
        },
      );
    return this.writeLock;
  }

  /** Listener for the scheduler's memory hook. */
  listener(): (agentId: string, record: MemoryRecord) => void {
    return (agentId, record) => {
      void this.append(agentId, record);
    };
  }

  get count(): number {
    return this.written;
  }

  get failures(): number {
    return this.failed;
  }

  /** Reads every entry back. Throws MemoryLogError on the first bad line. */
  async readAll(): Promise<MemoryLogEntry[]> {
    if (!existsSync(this.filePath)) return [];
    const content = await readFile(this.filePath, "utf-8");
    const entries: MemoryLogEntry[] = [];
    for (const [index, line] of content.split("\n").entries()) {
      if (line === "") continue;
      let data: unknown;
      try {
        data = JSON.parse(line);
      } catch {
        throw new MemoryLogError("Unparseable memory log entry", index + 1);
      }
      if (!isMemoryLogEntry(data)) {
        const { errors } = validateMemoryLogEntryData(data);
        throw new MemoryLogError(`Invalid memory log entry: ${errors.join(", ")}`, index + 1);
      }
      entries.push(data);
    }
    return entries;
  }

  async close(): Promise<void> {
    await this.writeLock;
  }
}
