export * from "./types.js";
export * from "./errors.js";
export { ActionSchema } from "./action.schema.js";
export { WorldDefinitionSchema, TransitionRuleSchema } from "./world-definition.schema.js";
export { ReplayHeaderSchema, ReplayTickRecordSchema, REPLAY_SCHEMA_VERSION } from "./replay-record.schema.js";
export { MemoryLogEntrySchema } from "./memory-log-entry.schema.js";
export {
  validateActionData,
  isAction,
  validateWorldDefinitionData,
  isWorldDefinition,
  validateReplayRecordData,
  isReplayHeader,
  isReplayTickRecord,
  validateMemoryLogEntryData,
  isMemoryLogEntry,
} from "./validator.js";
export type { ValidationResult } from "./validator.js";
export { TimeoutError, withTimeout, callWithTimeout } from "./timeout.js";
export { ConsoleLogger, silentLogger } from "./logger.js";
