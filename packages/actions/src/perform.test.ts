import { describe, it, expect } from "vitest";
import { InvariantError } from "@worldtalk/schemas";
import { bundledLayoutPath, loadWorld } from "@worldtalk/world";
import { perform } from "./perform.js";
import { succeeded } from "./common.js";

describe("perform", () => {
  it("dispatches an attempt to its action", async () => {
    const world = await loadWorld(bundledLayoutPath("easy"));
    const result = perform(world, { kind: "open", actor: "dog", item: "food_drawer" });
    expect(result).toEqual([{ kind: "open", actor: "dog", item: "food_drawer" }]);
    expect(succeeded(result)).toBe(true);
    expect(world.get("food_drawer").is("open")).toBe(true);
  });

  it("treats refusals as failure", async () => {
    const world = await loadWorld(bundledLayoutPath("easy"));
    expect(succeeded(perform(world, { kind: "get", actor: "dog", item: "kitchen_table" }))).toBe(false);
  });

  it("throws on unknown ids", async () => {
    const world = await loadWorld(bundledLayoutPath("easy"));
    expect(() => perform(world, { kind: "go", actor: "ghost", direction: "north" })).toThrow(InvariantError);
  });
});
