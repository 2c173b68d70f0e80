import { INTERACT_VERBS } from "./types.js";

const IdSchema = { type: "string", minLength: 1, maxLength: 128 } as const;

const AttributesSchema = {
  type: "object",
  additionalProperties: { type: ["string", "number", "boolean"] },
} as const;

export const TransitionRuleSchema = {
  type: "object",
  required: ["verb", "narration_key"],
  properties: {
    verb: { type: "string", enum: [...INTERACT_VERBS] },
    when: AttributesSchema,
    set: AttributesSchema,
    success: { type: "boolean" },
    narration_key: { type: "string", minLength: 1 },
  },
  additionalProperties: false,
} as const;

export const WorldDefinitionSchema = {
  type: "object",
  required: ["root_id", "areas"],
  properties: {
    name: { type: "string" },
    root_id: IdSchema,
    areas: {
      type: "array",
      minItems: 1,
      items: {
        type: "object",
        required: ["id"],
        properties: {
          id: IdSchema,
          name: { type: "string" },
          parent_id: { type: ["string", "null"] },
        },
        additionalProperties: false,
      },
    },
    objects: {
      type: "array",
      items: {
        type: "object",
        required: ["id", "area_id", "object_type"],
        properties: {
          id: IdSchema,
          name: { type: "string" },
          area_id: IdSchema,
          object_type: { type: "string", minLength: 1 },
          state: AttributesSchema,
        },
        additionalProperties: false,
      },
    },
    agents: {
      type: "array",
      items: {
        type: "object",
        required: ["id", "start_area_id"],
        properties: {
          id: IdSchema,
          name: { type: "string" },
          start_area_id: IdSchema,
          goal: { type: "string" },
          patrol_route: { type: "array", items: IdSchema },
        },
        additionalProperties: false,
      },
    },
    edges: {
      type: "array",
      items: { type: "array", items: IdSchema, minItems: 2, maxItems: 2 },
    },
    link_nested_areas: { type: "boolean" },
    transitions: {
      type: "object",
      additionalProperties: { type: "array", items: TransitionRuleSchema },
    },
    narration: {
      type: "object",
      additionalProperties: { type: "string" },
    },
    weather: { type: "string", minLength: 1 },
    config: { type: "object" },
  },
  additionalProperties: false,
} as const;
