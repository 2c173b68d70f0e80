import AjvModule, { type ErrorObject } from "ajv";
import addFormatsModule from "ajv-formats";
import { ActionSchema } from "./action.schema.js";
import { WorldDefinitionSchema } from "./world-definition.schema.js";
import { ReplayHeaderSchema, ReplayTickRecordSchema } from "./replay-record.schema.js";
import { MemoryLogEntrySchema } from "./memory-log-entry.schema.js";
import type { Action, MemoryLogEntry, ReplayHeader, ReplayTickRecord, WorldDefinition } from "./types.js";

// Under NodeNext the default import of a CommonJS package is its module object;
// both ajv and ajv-formats also expose themselves on `.default`.
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

const validateAction = ajv.compile<Action>(ActionSchema);
const validateWorldDefinition = ajv.compile<WorldDefinition>(WorldDefinitionSchema);
const validateReplayHeader = ajv.compile<ReplayHeader>(ReplayHeaderSchema);
const validateReplayTickRecord = ajv.compile<ReplayTickRecord>(ReplayTickRecordSchema);
const validateMemoryLogEntry = ajv.compile<MemoryLogEntry>(MemoryLogEntrySchema);

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

function toResult(valid: boolean, errors: ErrorObject[] | null | undefined): ValidationResult {
  if (valid) return { valid: true, errors: [] };
  const msgs = (errors ?? []).map(
    (e: ErrorObject) => `${e.instancePath || "/"}: ${e.message ?? "unknown error"}`
  );
  return { valid: false, errors: msgs };
}

export function validateActionData(data: unknown): ValidationResult {
  const valid = validateAction(data);
  return toResult(valid, validateAction.errors);
}

export function isAction(data: unknown): data is Action {
  return validateAction(data);
}

export function validateWorldDefinitionData(data: unknown): ValidationResult {
  const valid = validateWorldDefinition(data);
  return toResult(valid, validateWorldDefinition.errors);
}

export function isWorldDefinition(data: unknown): data is WorldDefinition {
  return validateWorldDefinition(data);
}

export function validateReplayRecordData(data: unknown): ValidationResult {
  if (typeof data === "object" && data !== null && "type" in data && data.type === "header") {
    const valid = validateReplayHeader(data);
    return toResult(valid, validateReplayHeader.errors);
  }
  const valid = validateReplayTickRecord(data);
  return toResult(valid, validateReplayTickRecord.errors);
}

export function isReplayHeader(data: unknown): data is ReplayHeader {
  return validateReplayHeader(data);
}

export function isReplayTickRecord(data: unknown): data is ReplayTickRecord {
  return validateReplayTickRecord(data);
}

export function validateMemoryLogEntryData(data: unknown): ValidationResult {
  const valid = validateMemoryLogEntry(data);
  return toResult(valid, validateMemoryLogEntry.errors);
}

export function isMemoryLogEntry(data: unknown): data is MemoryLogEntry {
  return validateMemoryLogEntry(data);
}
