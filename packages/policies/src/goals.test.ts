import { describe, it, expect } from "vitest";
import type { Statement, Utterance } from "@worldtalk/schemas";
import { attribute, compound, say, tries } from "@worldtalk/schemas";
import { bundledLayoutPath, loadWorld } from "@worldtalk/world";
import { allOf, anyOf, anyStep, constant, envFeedback, evaluateGoal, reachLocation, stepsSublist } from "./goals.js";

const open = tries("player", { kind: "open", actor: "player", item: "toys_container" });
const look = tries("player", { kind: "look", actor: "player", position: "in", target: "toys_container" });
const chatter = say("player", attribute("toys_container", "open"));

function by(speaker: string | null, statement: Statement): Utterance {
  return { speaker, statement, trusted: true };
}

async function view(utterances: Utterance[]) {
  return { world: await loadWorld(bundledLayoutPath("easy")), utterances };
}

describe("goals", () => {
  it("starts counting at the latest utterance", async () => {
    const v = await view([by("player2", say("player2", { kind: "empty" }))]);
    expect(stepsSublist(v, "player", [open])).toEqual({ kind: "steps-sublist", player: "player", steps: [open], start: 0 });
  });

  it("matches steps as an ordered subsequence", async () => {
    const v = await view([by("player", open), by("player", chatter), by("player", look)]);
    expect(evaluateGoal({ kind: "steps-sublist", player: "player", steps: [open, look], start: 0 }, v)).toBe(1);
    expect(evaluateGoal({ kind: "steps-sublist", player: "player", steps: [look, open], start: 0 }, v)).toBe(0);
    expect(evaluateGoal({ kind: "steps-sublist", player: "player2", steps: [open], start: 0 }, v)).toBe(0);
  });

  it("ignores utterances before the start", async () => {
    const v = await view([by("player", open), by("player", chatter)]);
    expect(evaluateGoal({ kind: "any-step", player: "player", steps: [open], start: 1 }, v)).toBe(0);
    expect(evaluateGoal({ kind: "any-step", player: "player", steps: [open, chatter], start: 1 }, v)).toBe(1);
  });

  it("detects the player reaching a place", async () => {
    const moved = compound([{ kind: "go", actor: "player", direction: "south", from: "barn" }, attribute("barn", "open", true)]);
    const v = await view([by(null, moved)]);
    expect(evaluateGoal(reachLocation(v, "player", "main_path"), v)).toBe(1);
    const w = { world: v.world, utterances: [by("player", open), by(null, moved)] };
    expect(evaluateGoal({ kind: "reach-location", player: "player", target: "main_path", start: 0 }, w)).toBe(1);
    expect(evaluateGoal({ kind: "reach-location", player: "player", target: "well", start: 0 }, w)).toBe(0);
    expect(evaluateGoal({ kind: "reach-location", player: "player2", target: "main_path", start: 0 }, w)).toBe(0);
  });

  it("looks for feedback among reduced environment statements", async () => {
    const moved = compound([{ kind: "go", actor: "player", direction: "south", from: "barn" }]);
    const v = await view([by("player", open), by(null, moved)]);
    expect(envFeedback(v, { kind: "go", actor: "player", direction: "south", from: "barn" })).toMatchObject({ start: 1 });
    const south: Statement = { kind: "go", actor: "player", direction: "south", from: "barn" };
    const north: Statement = { kind: "go", actor: "player", direction: "north", from: "barn" };
    expect(evaluateGoal({ kind: "env-feedback", statement: south, start: 0 }, v)).toBe(1);
    expect(evaluateGoal({ kind: "env-feedback", statement: north, start: 0 }, v)).toBe(0);
  });

  it("combines goals", async () => {
    const v = await view([by("player", open)]);
    const hit = anyStep({ world: v.world, utterances: [] }, "player", [open]);
    const miss = { kind: "any-step" as const, player: "player", steps: [look], start: 0 };
    expect(hit).toMatchObject({ start: -1 });
    expect(evaluateGoal(allOf([hit, constant(1)]), v)).toBe(1);
    expect(evaluateGoal(allOf([hit, miss]), v)).toBe(0);
    expect(evaluateGoal(allOf([hit], 2), v)).toBe(0);
    expect(evaluateGoal(anyOf([miss, hit]), v)).toBe(1);
    expect(evaluateGoal(anyOf([]), v)).toBe(0);
    expect(evaluateGoal(constant(-1), v)).toBe(-1);
  });
});
