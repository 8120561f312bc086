import { describe, it, expect, beforeEach } from "vitest";
import type { Logger, Request } from "@worldtalk/schemas";
import { UserPolicy } from "@worldtalk/policies";
import { type World, bundledLayoutPath, loadWorld } from "@worldtalk/world";
import { Dialogue, type Participant } from "./dialogue.js";
import { DialogueEngine } from "./engine.js";

const silent: Logger = { info: () => undefined, warn: () => undefined, error: () => undefined, debug: () => undefined };

const south: Request = { kind: "go-direction", agent: "player", direction: "south" };

let world: World;
let engine: DialogueEngine;

beforeEach(async () => {
  world = await loadWorld(bundledLayoutPath("easy"));
  engine = new DialogueEngine(world, { seed: 1, logger: silent });
});

describe("Dialogue", () => {
  it("runs a move to success in one round", () => {
    const dialogue = engine.createDialogue("player2", south);
    expect(dialogue.run()).toBe(1);
    expect(dialogue.counter).toBe(1);
    expect(dialogue.utterances.map((u) => u.speaker)).toEqual(["player2", "player", null]);
    expect(world.get("player").location?.holder.id).toBe("main_path");
    expect(engine.context.end).toBe(3);
  });

  it("is not over after the user spoke", () => {
    const dialogue = engine.createDialogue("player2", south);
    dialogue.step();
    expect(dialogue.nextPolicy).toBe(1);
    expect(dialogue.isOver()).toBe(false);
    expect(dialogue.reward).toBe(0);
  });

  it("puts everything back after a fake run", () => {
    const dialogue = engine.createDialogue("player2", south);
    expect(dialogue.run(true)).toBe(1);

    expect(world.get("player").location?.holder.id).toBe("barn");
    expect(dialogue.utterances).toEqual([]);
    expect(dialogue.counter).toBe(0);
    expect(dialogue.reward).toBe(0);
    expect(engine.context.end).toBe(0);
    expect(engine.knowledge.processed).toBe(0);
  });

  it("says the same things when replayed after a fake run", async () => {
    const dialogue = engine.createDialogue("player2", south, { seed: 42 });
    dialogue.run(true);
    dialogue.run();

    const other = new DialogueEngine(await loadWorld(bundledLayoutPath("easy")), { logger: silent });
    const fresh = other.createDialogue("player2", south, { seed: 42 });
    fresh.run();
    expect(dialogue.utterances).toEqual(fresh.utterances);
  });

  it("runs a compound request across two agents", () => {
    const dialogue = engine.createDialogue("bear", {
      kind: "and",
      parts: [
        { kind: "go-direction", agent: "player", direction: "south" },
        { kind: "go-direction", agent: "player2", direction: "south" },
      ],
    });
    expect(dialogue.participants.map((p) => p.player)).toEqual(["bear", "player", "player2"]);
    expect(dialogue.run()).toBe(1);
    expect(dialogue.utterances.map((u) => u.speaker)).toEqual(["bear", "player", null, "player2", null]);
  });

  it("treats a throwing policy as a silent turn", () => {
    const broken: Participant = {
      player: "dog",
      respond: () => {
        throw new Error("boom");
      },
    };
    const dialogue = new Dialogue(engine, [new UserPolicy("player2", south), broken], {
      logger: silent,
      maxEpisodeLength: 2,
    });

    expect(dialogue.run()).toBe(-1);
    expect(dialogue.utterances).toHaveLength(1);
    expect(dialogue.failures).toEqual([
      { round: 0, player: "dog", error: "boom" },
      { round: 1, player: "dog", error: "boom" },
    ]);
  });

  it("stops at the safety bound", () => {
    const idle: Participant = { player: "dog", respond: () => null };
    const dialogue = new Dialogue(engine, [idle], { logger: silent, maxSafety: 3 });
    expect(dialogue.run()).toBe(0);
    expect(dialogue.counter).toBe(3);
  });

  it("needs a participant", () => {
    expect(() => new Dialogue(engine, [])).toThrow("a dialogue needs at least one participant");
  });
});
