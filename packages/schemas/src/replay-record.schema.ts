/** Bump whenever the shape of a replay record changes. */
export const REPLAY_SCHEMA_VERSION = 1;

export const ReplayHeaderSchema = {
  type: "object",
  required: ["type", "schema_version", "seq", "run_id", "created_at", "metadata"],
  properties: {
    type: { const: "header" },
    schema_version: { type: "integer", minimum: 1 },
    seq: { type: "integer", minimum: 0 },
    run_id: { type: "string", minLength: 1 },
    created_at: { type: "string", format: "date-time" },
    metadata: { type: "object" },
  },
  additionalProperties: false,
} as const;

export const ReplayTickRecordSchema = {
  type: "object",
  required: ["type", "schema_version", "seq", "payload", "decisions", "hash_prev"],
  properties: {
    type: { const: "tick" },
    schema_version: { type: "integer", minimum: 1 },
    seq: { type: "integer", minimum: 1 },
    payload: {
      type: "object",
      required: ["tick", "state", "events"],
      properties: {
        tick: { type: "integer", minimum: 0 },
        state: {
          type: "object",
          required: ["world", "beliefs"],
          properties: {
            world: { type: "object", required: ["root_id", "nodes", "objects", "agents", "dynamics"] },
            beliefs: { type: "object" },
          },
        },
        events: {
          type: "array",
          items: { type: "object", required: ["kind"], properties: { kind: { type: "string" } } },
        },
      },
    },
    decisions: {
      type: "array",
      items: {
        type: "object",
        required: ["agent_id", "outcome", "action"],
        properties: {
          agent_id: { type: "string", minLength: 1 },
          outcome: { type: "string", enum: ["accepted", "rejected", "policy_error", "policy_timeout"] },
          action: { type: "object", required: ["kind"] },
          reason: { type: "string" },
        },
      },
    },
    hash_prev: { type: "string", minLength: 64, maxLength: 64 },
  },
  additionalProperties: false,
} as const;
