import { INTERACT_VERBS } from "./types.js";

export const ActionSchema = {
  type: "object",
  required: ["kind"],
  oneOf: [
    {
      properties: { kind: { const: "IDLE" } },
      required: ["kind"],
      additionalProperties: false,
    },
    {
      properties: {
        kind: { const: "MOVE" },
        to_location_id: { type: "string", minLength: 1 },
      },
      required: ["kind", "to_location_id"],
      additionalProperties: false,
    },
    {
      properties: {
        kind: { const: "INTERACT" },
        object_id: { type: "string", minLength: 1 },
        verb: { type: "string", enum: [...INTERACT_VERBS] },
      },
      required: ["kind", "object_id", "verb"],
      additionalProperties: false,
    },
    {
      properties: {
        kind: { const: "SAY" },
        to_agent_id: { type: "string", minLength: 1 },
        utterance: { type: "string", minLength: 1, maxLength: 2000 },
      },
      required: ["kind", "to_agent_id", "utterance"],
      additionalProperties: false,
    },
  ],
} as const;
