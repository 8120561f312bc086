import { describe, it, expect, vi } from "vitest";
import type { Logger, Statement, Utterance } from "@worldtalk/schemas";
import { InvariantError, attribute, say, tries } from "@worldtalk/schemas";
import { bundledLayoutPath, loadWorld } from "@worldtalk/world";
import { EnvironmentPolicy } from "./environment.js";
import { UserPolicy } from "./user.js";

function by(speaker: string | null, statement: Statement): Utterance {
  return { speaker, statement, trusted: true };
}

function spyLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

describe("EnvironmentPolicy", () => {
  it("performs what a player tries", async () => {
    const world = await loadWorld(bundledLayoutPath("easy"));
    const env = new EnvironmentPolicy({ logger: spyLogger() });
    const [feedback] = env.respond(world, by("player", tries("player", { kind: "go", actor: "player", direction: "south" })));

    expect(feedback?.kind).toBe("compound");
    if (feedback?.kind !== "compound") return;
    expect(feedback.parts[0]).toEqual({ kind: "go", actor: "player", direction: "south", from: "barn" });
    expect(world.get("player").location?.holder.id).toBe("main_path");
  });

  it("stays silent on what is said", async () => {
    const world = await loadWorld(bundledLayoutPath("easy"));
    const env = new EnvironmentPolicy({ logger: spyLogger() });
    expect(env.respond(world, by("player", say("player", attribute("barn_door", "locked"))))).toEqual([]);
    expect(env.respond(world, by("player", { kind: "more-coming" }))).toEqual([]);
  });

  it("does not understand bare statements", async () => {
    const world = await loadWorld(bundledLayoutPath("easy"));
    const env = new EnvironmentPolicy({ logger: spyLogger() });
    expect(env.respond(world, by("player", attribute("barn_door", "locked")))).toEqual([
      { kind: "unrecognized", actor: "player" },
    ]);
  });

  it("throws on attempts naming unknown entities", async () => {
    const world = await loadWorld(bundledLayoutPath("easy"));
    const logger = spyLogger();
    const env = new EnvironmentPolicy({ logger });

    expect(() => env.respond(world, by("player", tries("player", { kind: "get", actor: "player", item: "ghost" })))).toThrow(
      InvariantError,
    );
    expect(logger.warn).not.toHaveBeenCalled();
  });
});

describe("UserPolicy", () => {
  it("states its request once", async () => {
    const world = await loadWorld(bundledLayoutPath("easy"));
    const user = new UserPolicy("player2", { kind: "go-direction", agent: "player", direction: "south" });
    const request = say("player2", {
      kind: "request",
      request: { kind: "go-direction", agent: "player", direction: "south" },
    });

    expect(user.respond({ world, utterances: [] })).toEqual({ steps: [request], goal: null });
    expect(user.respond({ world, utterances: [by("player2", request)] })).toBeNull();
  });
});
