import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm, mkdir, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Logger, MemoryRecord } from "@tickvale/schemas";
import { MemoryLogError } from "@tickvale/schemas";
import { MemoryLog } from "./memory-log.js";

function record(id: string, description: string): MemoryRecord {
  return {
    id,
    description,
    created_at: 0,
    last_accessed_at: 0,
    importance: 2,
    kind: "observation",
    links: [],
  };
}

describe("MemoryLog", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "tickvale-memory-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("appends one JSON line per record, in order", async () => {
    const log = new MemoryLog(join(dir, "logs", "memory.jsonl"));
    await log.init();
    await log.append("ada", record("ada#1", "Ada is at Cafe."));
    await log.append("byron", record("byron#1", "Byron is at Park."));

    expect(await log.readAll()).toEqual([
      { agent_id: "ada", record: record("ada#1", "Ada is at Cafe.") },
      { agent_id: "byron", record: record("byron#1", "Byron is at Park.") },
    ]);
    expect(log.count).toBe(2);
  });

  it("queues writes from a synchronous listener until close", async () => {
    const log = new MemoryLog(join(dir, "memory.jsonl"));
    await log.init();
    const listen = log.listener();
    listen("ada", record("ada#1", "one"));
    listen("ada", record("ada#2", "two"));
    listen("ada", record("ada#3", "three"));
    await log.close();

    expect((await log.readAll()).map((e) => e.record.id)).toEqual(["ada#1", "ada#2", "ada#3"]);
  });

  it("reads nothing before the first write", async () => {
    const log = new MemoryLog(join(dir, "memory.jsonl"));
    expect(await log.readAll()).toEqual([]);
  });

  it("refuses a line that is not JSON", async () => {
    const file = join(dir, "memory.jsonl");
    const good = JSON.stringify({ agent_id: "ada", record: record("ada#1", "one") });
    await writeFile(file, `${good}\n{"agent_id":\n`, "utf-8");
    const read = new MemoryLog(file).readAll();
    await expect(read).rejects.toThrow(MemoryLogError);
    await expect(read).rejects.toThrow("Unparseable memory log entry (line 2)");
  });

  it("refuses an entry whose record has the wrong shape", async () => {
    const file = join(dir, "memory.jsonl");
    const bad = JSON.stringify({ agent_id: "ada", record: { ...record("ada#1", "one"), kind: "dream" } });
    await writeFile(file, `${bad}\n`, "utf-8");
    await expect(new MemoryLog(file).readAll()).rejects.toThrow(
      "Invalid memory log entry: /record/kind: must be equal to one of the allowed values (line 1)",
    );
  });

  it("logs failed writes and keeps the queue moving", async () => {
    const target = join(dir, "blocked");
    await mkdir(target);
    const logger: Logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
    const log = new MemoryLog(target, { logger });

    await log.append("ada", record("ada#1", "one"));
    await log.close();

    expect(log.failures).toBe(1);
    expect(log.count).toBe(0);
    expect(logger.error).toHaveBeenCalledWith("memory log write failed", expect.objectContaining({ file: target }));
  });
});
