const placement = {
  type: "object",
  required: ["position", "holder"],
  properties: {
    position: { type: "string", enum: ["in", "on", "under"] },
    holder: { type: "string", minLength: 1 },
  },
  additionalProperties: false,
} as const;

const stringMap = {
  type: "object",
  additionalProperties: { type: "string", minLength: 1 },
} as const;

const vocabulary = {
  type: "object",
  additionalProperties: { type: "array", items: { type: "string", minLength: 1 } },
} as const;

export const WorldLayoutSchema = {
  type: "object",
  required: ["name", "entities"],
  properties: {
    name: { type: "string", minLength: 1 },
    entities: {
      type: "array",
      minItems: 1,
      items: {
        type: "object",
        required: ["id"],
        properties: {
          id: { type: "string", pattern: "^[a-z][a-z0-9_]*$" },
          kind: { type: "string", enum: ["entity", "player", "place", "door", "table", "bed", "window", "book"] },
          properties: stringMap,
          attributes: { type: "array", items: { type: "string", minLength: 1 }, uniqueItems: true },
          location: placement,
          exits: stringMap,
          obstacles: stringMap,
          door_to: { type: "string", minLength: 1 },
        },
        additionalProperties: false,
      },
    },
    vocabulary,
    player_vocabulary: vocabulary,
  },
  additionalProperties: false,
} as const;
