export const TranscriptEventSchema = {
  type: "object",
  required: ["event_id", "timestamp", "dialogue_id", "type", "payload"],
  properties: {
    event_id: { type: "string", minLength: 1 },
    timestamp: { type: "string", format: "date-time" },
    dialogue_id: { type: "string", minLength: 1 },
    type: {
      type: "string",
      enum: [
        "dialogue.started", "utterance.added", "policy.failed",
        "dialogue.finished", "batch.summary",
      ],
    },
    payload: { type: "object" },
    hash_prev: { type: "string" },
    seq: { type: "integer", minimum: 0 },
  },
  additionalProperties: false,
} as const;
