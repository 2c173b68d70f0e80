import { createHash } from "node:crypto";
import { appendFile, readFile, mkdir, writeFile, open, unlink } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname, join } from "node:path";
import { v4 as uuid } from "uuid";
import type {
  DecisionRecord,
  Logger,
  ReplayHeader,
  ReplayRecord,
  ReplayTickRecord,
  TickPayload,
} from "@tickvale/schemas";
import {
  REPLAY_SCHEMA_VERSION,
  ReplayMismatchError,
  silentLogger,
  validateReplayRecordData,
} from "@tickvale/schemas";
import { parseReplayLines } from "./replay-reader.js";

export interface ReplayLogOptions {
  /** fsync after every record. Default: true */
  fsync?: boolean;
  /** If true, acquire an advisory lockfile to prevent multi-process corruption. Default: true */
  lock?: boolean;
  logger?: Logger;
}

export interface ReplayLogInit {
  run_id: string;
  metadata: Record<string, unknown>;
}

export function hashLine(line: string): string {
  return createHash("sha256").update(line).digest("hex");
}

/** Sortable run id: compact UTC timestamp plus a short random suffix. */
export function createRunId(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace(/\.\d{3}Z$/, "Z");
  return `${stamp}-${uuid().slice(0, 8)}`;
}

export function replayFilePath(replayDir: string, runId: string): string {
  return join(replayDir, runId, "run.jsonl");
}

/**
 * Append-only JSONL log of a run: one header line, then one record per
 * committed tick. Every tick record carries the sha256 of the line before it.
 */
export class ReplayLog {
  private filePath: string;
  private lastHash: string | undefined;
  private nextSeq = 0;
  private header: ReplayHeader | undefined;
  private writeLock: Promise<void> = Promise.resolve();
  private fsync: boolean;
  private lockEnabled: boolean;
  private lockPath: string;
  private locked = false;
  private logger: Logger;

  constructor(filePath: string, options?: ReplayLogOptions) {
    this.filePath = filePath;
    this.fsync = options?.fsync ?? true;
    this.lockEnabled = options?.lock ?? true;
    this.lockPath = `${filePath}.lock`;
    this.logger = options?.logger ?? silentLogger;
  }

  /**
   * Opens the log. A fresh file gets a header; an existing one is verified
   * and appended to, after dropping an incomplete last line left by a crash.
   */
  async init(init: ReplayLogInit): Promise<ReplayHeader> {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }
    if (this.lockEnabled) {
      await this.acquireLock();
    }

    if (existsSync(this.filePath)) {
      const content = await readFile(this.filePath, "utf-8");
      const lines = content.split("\n").filter(Boolean);
      if (lines.length > 0) {
        try { JSON.parse(lines[lines.length - 1]!); }
        catch {
          lines.pop();
          await writeFile(this.filePath, lines.length > 0 ? lines.join("\n") + "\n" : "", "utf-8");
          this.logger.warn("truncated incomplete last line from crash", { file: this.filePath });
        }
      }
      if (lines.length > 0) {
        const run = parseReplayLines(lines);
        this.header = run.header;
        this.nextSeq = (run.ticks[run.ticks.length - 1]?.seq ?? run.header.seq) + 1;
        this.lastHash = hashLine(lines[lines.length - 1]!);
        return run.header;
      }
    }

    const header: ReplayHeader = {
      type: "header",
      schema_version: REPLAY_SCHEMA_VERSION,
      seq: 0,
      run_id: init.run_id,
      created_at: new Date().toISOString(),
      metadata: init.metadata,
    };
    await this.write(header);
    this.header = header;
    return header;
  }

  async appendTick(payload: TickPayload, decisions: DecisionRecord[]): Promise<ReplayTickRecord> {
    let releaseLock: () => void;
    const acquired = new Promise<void>((resolve) => { releaseLock = resolve; });
    const prev = this.writeLock;
    this.writeLock = acquired;
    await prev;

    try {
      if (!this.header || this.lastHash === undefined) {
        throw new Error("Replay log is not initialised; call init() first");
      }
      const record: ReplayTickRecord = {
        type: "tick",
        schema_version: REPLAY_SCHEMA_VERSION,
        seq: this.nextSeq,
        payload,
        decisions,
        hash_prev: this.lastHash,
      };
      await this.write(record);
      return record;
    } finally {
      releaseLock!();
    }
  }

  getHeader(): ReplayHeader | undefined {
    return this.header;
  }

  getFilePath(): string {
    return this.filePath;
  }

  /** Waits for pending writes and releases the lockfile. */
  async close(): Promise<void> {
    await this.writeLock;
    if (this.lockEnabled && this.locked) {
      await this.releaseLock();
    }
  }

  private async write(record: ReplayRecord): Promise<void> {
    const validation = validateReplayRecordData(record);
    if (!validation.valid) {
      throw new ReplayMismatchError(`Invalid ${record.type} record: ${validation.errors.join(", ")}`);
    }
    const line = JSON.stringify(record);
    const lineHash = hashLine(line);

    if (this.fsync) {
      const fh = await open(this.filePath, "a");
      try {
        await fh.write(line + "\n", undefined, "utf-8");
        await fh.sync();
      } finally {
        await fh.close();
      }
    } else {
      await appendFile(this.filePath, line + "\n", "utf-8");
    }

    // Only advance the chain after a successful write
    this.nextSeq = record.seq + 1;
    this.lastHash = lineHash;
  }

  private async acquireLock(): Promise<void> {
    try {
      const fh = await open(this.lockPath, "wx");
      await fh.write(String(process.pid), undefined, "utf-8");
      await fh.close();
      this.locked = true;
    } catch (err: unknown) {
      if (!isErrno(err, "EEXIST")) throw err;
      const pid = await this.readLockPid();
      if (pid === null || !processAlive(pid)) {
        await this.removeLockFile();
        return this.acquireLock();
      }
      throw new Error(`Replay log is locked by process ${pid} (lockfile: ${this.lockPath})`);
    }
  }

  private async readLockPid(): Promise<number | null> {
    try {
      const pid = parseInt((await readFile(this.lockPath, "utf-8")).trim(), 10);
      return Number.isNaN(pid) ? null : pid;
    } catch (err) {
      if (isErrno(err, "ENOENT")) return null;
      throw err;
    }
  }

  private async releaseLock(): Promise<void> {
    await this.removeLockFile();
    this.locked = false;
  }

  private async removeLockFile(): Promise<void> {
    try {
      await unlink(this.lockPath);
    } catch (err) {
      // Another process may have cleaned it up already
      if (!isErrno(err, "ENOENT")) throw err;
    }
  }
}

function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

function processAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    if (isErrno(err, "ESRCH")) return false;
    // EPERM: the process exists but belongs to someone else
    return true;
  }
}
