import { describe, it, expect, beforeEach } from "vitest";
import type { Logger, TranscriptEventType } from "@worldtalk/schemas";
import { InvariantError, SeededRandom, property, say } from "@worldtalk/schemas";
import { type World, bundledLayoutPath, loadWorld } from "@worldtalk/world";
import { DialogueEngine, type TranscriptSink } from "./engine.js";
import { RequestSampler } from "./sampler.js";

const silent: Logger = { info: () => undefined, warn: () => undefined, error: () => undefined, debug: () => undefined };

class RecordingSink implements TranscriptSink {
  events: { dialogueId: string; type: TranscriptEventType; payload: Record<string, unknown> }[] = [];

  async emit(dialogueId: string, type: TranscriptEventType, payload: Record<string, unknown>): Promise<void> {
    this.events.push({ dialogueId, type, payload });
  }
}

let world: World;
let engine: DialogueEngine;

beforeEach(async () => {
  world = await loadWorld(bundledLayoutPath("easy"));
  engine = new DialogueEngine(world, { seed: 5, logger: silent });
});

describe("DialogueEngine.executeUtterances", () => {
  it("keeps turn holders out of the history", () => {
    const added = engine.executeUtterances(
      [{ speaker: "player", statement: { kind: "more-coming" }, trusted: true }],
      new SeededRandom(1),
    );
    expect(added).toEqual([]);
    expect(engine.context.end).toBe(0);
  });

  it("answers an attempt with environment feedback", () => {
    const added = engine.executeUtterances(
      [
        {
          speaker: "player",
          statement: { kind: "tries", actor: "player", attempt: { kind: "go", actor: "player", direction: "south" } },
          trusted: true,
        },
      ],
      new SeededRandom(1),
    );
    expect(added).toHaveLength(2);
    expect(added[1].speaker).toBeNull();
    expect(world.get("player").location?.holder.id).toBe("main_path");
  });

  it("does not learn from untrusted utterances", () => {
    const claim = property("small_ball", "color", "red");
    engine.executeUtterances([{ speaker: "player", statement: say("player", claim), trusted: false }], new SeededRandom(1));
    expect(engine.context.end).toBe(1);
    expect(engine.knowledge.check(claim)).toBeUndefined();
  });
});

describe("DialogueEngine state", () => {
  it("keeps what it learned across a flush", () => {
    const fact = property("small_ball", "color", "red");
    engine.executeUtterances([{ speaker: null, statement: fact, trusted: true }], new SeededRandom(1), {
      skipEnvironment: true,
    });
    engine.flush();

    expect(engine.context.length).toBe(0);
    expect(engine.context.end).toBe(1);
    expect(world.log.length).toBe(0);
    expect(engine.knowledge.check(fact)).toBe(true);
  });

  it("recovers a snapshot", () => {
    const snapshot = engine.save();
    engine.createDialogue("player2", { kind: "go-direction", agent: "player", direction: "south" }).run();
    expect(world.get("player").location?.holder.id).toBe("main_path");

    engine.recover(snapshot);
    expect(world.get("player").location?.holder.id).toBe("barn");
    expect(engine.context.end).toBe(0);
    expect(engine.knowledge.processed).toBe(0);
  });

  it("rejects a dialogue with an unknown player", () => {
    expect(() => engine.createDialogue("ghost", { kind: "look", agent: "player", item: "barn", position: "in" })).toThrow(
      InvariantError,
    );
    expect(() =>
      engine.createDialogue("player", { kind: "go-direction", agent: "ghost", direction: "south" }),
    ).toThrow('unknown player "ghost"');
  });
});

describe("DialogueEngine.runBatch", () => {
  it("journals every dialogue and closes with a summary", async () => {
    const sink = new RecordingSink();
    const sampler = new RequestSampler(world, { seed: 3, kinds: ["go-direction"] });
    const report = await engine.runBatch(2, { sampler, journal: sink, flushAfter: 1 });

    expect(report.total).toBe(2);
    expect(report.succeeded + report.failures.length).toBe(2);
    expect(sink.events.filter((e) => e.type === "dialogue.started")).toHaveLength(2);
    expect(sink.events.filter((e) => e.type === "dialogue.finished")).toHaveLength(2);
    expect(sink.events[0].type).toBe("dialogue.started");

    const summary = sink.events[sink.events.length - 1];
    expect(summary).toEqual({
      dialogueId: report.batchId,
      type: "batch.summary",
      payload: { total: 2, succeeded: report.succeeded, failed: report.failures.length },
    });
    expect(engine.context.length).toBe(0);
  });

  it("numbers the utterances of each dialogue from zero", async () => {
    const sink = new RecordingSink();
    const sampler = new RequestSampler(world, { seed: 8, kinds: ["is-attribute"] });
    await engine.runBatch(1, { sampler, journal: sink });

    const indexes = sink.events.filter((e) => e.type === "utterance.added").map((e) => e.payload.index);
    expect(indexes).toEqual(indexes.map((_, i) => i));
    expect(indexes[0]).toBe(0);
  });
});
