import { describe, it, expect } from "vitest";
import { resolve } from "node:path";
import { bundledLayoutPath } from "@worldtalk/world";
import { envDefaults, parseKinds, parsePositiveInt, resolveWorldPath } from "./config.js";

describe("envDefaults", () => {
  it("falls back when nothing is set", () => {
    expect(envDefaults({})).toEqual({ seed: "0", world: "easy", journal: undefined, maxTurns: undefined });
  });

  it("reads WORLDTALK variables", () => {
    expect(
      envDefaults({ WORLDTALK_SEED: "9", WORLDTALK_WORLD: "farm.yaml", WORLDTALK_JOURNAL: "t.jsonl", WORLDTALK_MAX_TURNS: "4" }),
    ).toEqual({ seed: "9", world: "farm.yaml", journal: "t.jsonl", maxTurns: "4" });
  });

  it("treats empty variables as unset", () => {
    expect(envDefaults({ WORLDTALK_JOURNAL: "" }).journal).toBeUndefined();
  });
});

describe("parsePositiveInt", () => {
  it("parses positive integers", () => {
    expect(parsePositiveInt("12", "count")).toBe(12);
  });

  it("rejects zero and garbage", () => {
    expect(() => parsePositiveInt("0", "count")).toThrow('Invalid count: "0" (must be a positive integer)');
    expect(() => parsePositiveInt("many", "count")).toThrow('Invalid count: "many" (must be a positive integer)');
  });

  it("uses the fallback when given", () => {
    expect(parsePositiveInt("-3", "count", 5)).toBe(5);
  });
});

describe("resolveWorldPath", () => {
  it("maps a bare name to a bundled layout", () => {
    expect(resolveWorldPath("easy")).toBe(bundledLayoutPath("easy"));
  });

  it("resolves anything that looks like a file", () => {
    expect(resolveWorldPath("farm.yaml")).toBe(resolve("farm.yaml"));
    expect(resolveWorldPath("worlds/farm")).toBe(resolve("worlds/farm"));
  });
});

describe("parseKinds", () => {
  it("splits a comma-separated list", () => {
    expect(parseKinds("get, and,")).toEqual(["get", "and"]);
  });

  it("rejects an unknown kind", () => {
    expect(() => parseKinds("get,fly")).toThrow('Unknown request kind: "fly"');
  });
});
