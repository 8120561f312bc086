import { describe, it, expect } from "vitest";
import { v4 as uuid } from "uuid";
import { validateWorldLayoutData, validateTranscriptEventData, isWorldLayout, isTranscriptEvent } from "./validator.js";

describe("validateWorldLayoutData", () => {
  const validLayout = () => ({
    name: "tiny",
    entities: [
      { id: "hall", kind: "place", properties: { type: "hall" }, exits: { south: "yard" } },
      { id: "yard", kind: "place", properties: { type: "yard" }, exits: { north: "hall" } },
      {
        id: "ball",
        properties: { type: "ball", color: "red" },
        attributes: ["round"],
        location: { position: "in", holder: "hall" },
      },
    ],
    vocabulary: { color: ["blue"] },
  });

  it("accepts a valid layout", () => {
    const result = validateWorldLayoutData(validLayout());
    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
  });

  it("rejects a layout without entities", () => {
    const result = validateWorldLayoutData({ name: "empty", entities: [] });
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(["/entities: must NOT have fewer than 1 items"]);
  });

  it("rejects an unknown location preposition", () => {
    const layout = validLayout();
    layout.entities[2] = { ...layout.entities[2], location: { position: "beside", holder: "hall" } };
    const result = validateWorldLayoutData(layout);
    expect(result.valid).toBe(false);
    expect(result.errors).toContain("/entities/2/location/position: must be equal to one of the allowed values");
  });

  it("rejects ids that are not snake case", () => {
    const layout = validLayout();
    layout.entities[0] = { ...layout.entities[0], id: "Hall" };
    expect(validateWorldLayoutData(layout).valid).toBe(false);
  });

  it("narrows with the type guard", () => {
    const data: unknown = validLayout();
    expect(isWorldLayout(data)).toBe(true);
    expect(isWorldLayout({ name: 3 })).toBe(false);
  });
});

describe("validateTranscriptEventData", () => {
  const validEvent = () => ({
    event_id: uuid(),
    timestamp: new Date().toISOString(),
    dialogue_id: "dia-1",
    type: "utterance.added",
    payload: { text: "Hans says hello." },
    seq: 0,
  });

  it("accepts a valid event", () => {
    expect(validateTranscriptEventData(validEvent()).valid).toBe(true);
  });

  it("rejects an unknown event type", () => {
    const result = validateTranscriptEventData({ ...validEvent(), type: "session.created" });
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(["/type: must be equal to one of the allowed values"]);
  });

  it("rejects a malformed timestamp", () => {
    const result = validateTranscriptEventData({ ...validEvent(), timestamp: "yesterday" });
    expect(result.valid).toBe(false);
  });

  it("rejects extra fields", () => {
    expect(validateTranscriptEventData({ ...validEvent(), session_id: "x" }).valid).toBe(false);
  });

  it("narrows parsed lines", () => {
    expect(isTranscriptEvent(validEvent())).toBe(true);
    expect(isTranscriptEvent({ ...validEvent(), seq: -1 })).toBe(false);
  });
});
