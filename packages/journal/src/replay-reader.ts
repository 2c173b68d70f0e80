import { createHash } from "node:crypto";
import { readFile } from "node:fs/promises";
import type { Action, RecordedDecisions, ReplayHeader, ReplayTickRecord } from "@tickvale/schemas";
import {
  REPLAY_SCHEMA_VERSION,
  ReplayMismatchError,
  isAction,
  isReplayHeader,
  isReplayTickRecord,
  validateReplayRecordData,
} from "@tickvale/schemas";

export interface ReplayRun {
  header: ReplayHeader;
  ticks: ReplayTickRecord[];
}

function sha256(line: string): string {
  return createHash("sha256").update(line).digest("hex");
}

function versionOf(data: unknown): unknown {
  if (typeof data !== "object" || data === null || !("schema_version" in data)) return undefined;
  return data.schema_version;
}

/**
 * Parses and verifies the lines of a replay log. Refuses anything it cannot
 * replay exactly: a foreign schema version, a record that fails its schema,
 * a broken hash chain or a gap in the sequence.
 */
export function parseReplayLines(lines: readonly string[]): ReplayRun {
  if (lines.length === 0) throw new ReplayMismatchError("Replay log is empty");

  let header: ReplayHeader | undefined;
  const ticks: ReplayTickRecord[] = [];
  let prevHash: string | undefined;
  let prevSeq = -1;

  for (let index = 0; index < lines.length; index++) {
    const line = lines[index]!;
    const lineNo = index + 1;
    let data: unknown;
    try {
      data = JSON.parse(line);
    } catch {
      throw new ReplayMismatchError("Unparseable record", lineNo);
    }

    const version = versionOf(data);
    if (version !== REPLAY_SCHEMA_VERSION) {
      throw new ReplayMismatchError(
        `Unsupported schema_version ${JSON.stringify(version)}, expected ${REPLAY_SCHEMA_VERSION}`,
        lineNo,
      );
    }
    const validation = validateReplayRecordData(data);
    if (!validation.valid) {
      throw new ReplayMismatchError(`Invalid record: ${validation.errors.join(", ")}`, lineNo);
    }

    if (index === 0) {
      if (!isReplayHeader(data)) throw new ReplayMismatchError("First record must be a header", lineNo);
      header = data;
      prevSeq = data.seq;
    } else {
      if (!isReplayTickRecord(data)) throw new ReplayMismatchError("Expected a tick record", lineNo);
      if (data.hash_prev !== prevHash) throw new ReplayMismatchError("Hash chain broken", lineNo);
      if (data.seq !== prevSeq + 1) {
        throw new ReplayMismatchError(`Sequence gap: expected ${prevSeq + 1}, got ${data.seq}`, lineNo);
      }
      for (const decision of data.decisions) {
        if (!isAction(decision.action)) {
          throw new ReplayMismatchError(`Malformed action recorded for "${decision.agent_id}"`, lineNo);
        }
      }
      ticks.push(data);
      prevSeq = data.seq;
    }
    prevHash = sha256(line);
  }

  if (!header) throw new ReplayMismatchError("Replay log has no header");
  return { header, ticks };
}

export function parseReplay(content: string): ReplayRun {
  return parseReplayLines(content.split("\n").filter(Boolean));
}

export async function readReplayFile(filePath: string): Promise<ReplayRun> {
  return parseReplay(await readFile(filePath, "utf-8"));
}

/** The validated action of every agent on every recorded tick. */
export function recordedDecisions(run: ReplayRun): RecordedDecisions {
  const byTick: RecordedDecisions = new Map();
  for (const record of run.ticks) {
    const actions = new Map<string, Action>();
    for (const decision of record.decisions) actions.set(decision.agent_id, decision.action);
    byTick.set(record.payload.tick, actions);
  }
  return byTick;
}
