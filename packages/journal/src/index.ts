export { ReplayLog, createRunId, replayFilePath, hashLine } from "./replay-log.js";
export type { ReplayLogOptions, ReplayLogInit } from "./replay-log.js";
export { parseReplay, parseReplayLines, readReplayFile, recordedDecisions } from "./replay-reader.js";
export type { ReplayRun } from "./replay-reader.js";
export { MemoryLog } from "./memory-log.js";
export type { MemoryLogEntry } from "./memory-log.js";
