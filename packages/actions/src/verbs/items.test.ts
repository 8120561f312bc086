import { describe, it, expect } from "vitest";
import { attribute, cannot, located, property } from "@worldtalk/schemas";
import { World, buildEntity, buildPlace, buildPlayer, bundledLayoutPath, loadWorld } from "@worldtalk/world";
import { drop, get } from "./items.js";

async function playerOnPath() {
  const world = await loadWorld(bundledLayoutPath("easy"));
  const player = world.get("player");
  world.relocate(player, "in", world.get("main_path"));
  return { world, player };
}

describe("get", () => {
  it("takes a reachable item and refuses to take it twice", async () => {
    const { world, player } = await playerOnPath();
    const apple = world.get("small_apple");
    expect(get(world, apple, player)).toEqual([{ kind: "get", actor: "player", item: "small_apple" }]);
    expect(apple.location?.holder).toBe(player);
    expect(get(world, apple, player)).toEqual([
      cannot("player", { kind: "get", actor: "player", item: "small_apple" }, [located("small_apple", "in", "player")]),
    ]);
  });

  it("refuses static items and players", async () => {
    const world = await loadWorld(bundledLayoutPath("easy"));
    expect(get(world, world.get("kitchen_table"), world.get("dog"))).toEqual([
      cannot("dog", { kind: "get", actor: "dog", item: "kitchen_table" }, [attribute("kitchen_table", "static")]),
    ]);
    expect(get(world, world.get("bear"), world.get("player"))).toEqual([
      cannot("player", { kind: "get", actor: "player", item: "bear" }, [
        attribute("bear", "player"),
        { kind: "permission", permission: { rule: "get-players" }, negated: true },
      ]),
    ]);
  });

  it("reports the closed container an item is in", async () => {
    const world = await loadWorld(bundledLayoutPath("easy"));
    const player = world.get("player");
    world.relocate(player, "in", world.get("bedroom"));
    expect(get(world, world.get("small_ball"), player)).toEqual([
      cannot("player", { kind: "get", actor: "player", item: "small_ball" }, [attribute("small_container", "open", true)]),
    ]);
  });

  it("reports a wrong stated location", async () => {
    const world = await loadWorld(bundledLayoutPath("easy"));
    const player = world.get("player");
    world.relocate(player, "in", world.get("bedroom"));
    const toys = world.get("toys_container");
    expect(get(world, world.get("big_ball"), player, { position: "on", holder: toys })).toEqual([
      cannot("player", { kind: "get", actor: "player", item: "big_ball" }, [
        located("big_ball", "on", "toys_container", true),
      ]),
    ]);
  });
});

describe("drop", () => {
  it("drops a held item into the current place", async () => {
    const { world, player } = await playerOnPath();
    const apple = world.get("small_apple");
    get(world, apple, player);
    expect(drop(world, apple, player, "in", world.get("main_path"))).toEqual([
      { kind: "drop", actor: "player", item: "small_apple", to: { position: "in", holder: "main_path" } },
    ]);
    expect(apple.location?.holder.id).toBe("main_path");
  });

  it("refuses items not in the inventory", async () => {
    const { world, player } = await playerOnPath();
    expect(drop(world, world.get("big_apple"), player, "in", world.get("main_path"))).toEqual([
      cannot(
        "player",
        { kind: "drop", actor: "player", item: "big_apple", to: { position: "in", holder: "main_path" } },
        [located("big_apple", "in", "player", true)],
      ),
    ]);
  });

  it("refuses dropping an item into itself", async () => {
    const { world, player } = await playerOnPath();
    const apple = world.get("small_apple");
    get(world, apple, player);
    const attempt = { kind: "drop" as const, actor: "player", item: "small_apple", to: { position: "in" as const, holder: "small_apple" } };
    expect(drop(world, apple, player, "in", apple)).toEqual([
      cannot("player", attempt, [{ kind: "permission", permission: { rule: "drop-into-itself" }, negated: true }]),
      cannot("player", attempt, [attribute("small_apple", "container", true), attribute("small_apple", "place", true)]),
    ]);
  });

  it("needs a supporter for on", async () => {
    const { world, player } = await playerOnPath();
    const apple = world.get("small_apple");
    get(world, apple, player);
    expect(drop(world, apple, player, "on", world.get("big_apple"))).toEqual([
      cannot(
        "player",
        { kind: "drop", actor: "player", item: "small_apple", to: { position: "on", holder: "big_apple" } },
        [attribute("big_apple", "supporter", true)],
      ),
    ]);
  });

  it("refuses an item bigger than the container", () => {
    const world = new World();
    const room = buildPlace(world, "room", { type: "room" });
    const player = buildPlayer(world, "pat", { type: "person" }, { position: "in", holder: room });
    const crate = buildEntity(world, "crate", { type: "crate", size: "small" }, { position: "in", holder: room });
    crate.attributes.add("container").add("open");
    const melon = buildEntity(world, "melon", { type: "melon", size: "big" }, { position: "in", holder: player });
    world.reindex();
    expect(drop(world, melon, player, "in", crate)).toEqual([
      cannot("pat", { kind: "drop", actor: "pat", item: "melon", to: { position: "in", holder: "crate" } }, [
        property("melon", "size", "big"),
        property("crate", "size", "small"),
      ]),
    ]);
  });
});
