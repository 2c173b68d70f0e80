export const MemoryLogEntrySchema = {
  type: "object",
  required: ["agent_id", "record"],
  properties: {
    agent_id: { type: "string", minLength: 1 },
    record: {
      type: "object",
      required: ["id", "description", "created_at", "last_accessed_at", "importance", "kind", "links"],
      properties: {
        id: { type: "string", minLength: 1 },
        description: { type: "string" },
        created_at: { type: "integer", minimum: 0 },
        last_accessed_at: { type: "integer", minimum: 0 },
        importance: { type: "number", minimum: 1, maximum: 10 },
        kind: { enum: ["observation", "plan", "reflection", "action"] },
        links: { type: "array", items: { type: "string" } },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
} as const;
