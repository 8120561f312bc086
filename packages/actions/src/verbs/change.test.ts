import { describe, it, expect } from "vitest";
import { attribute, cannot, located, property } from "@worldtalk/schemas";
import { World, buildPlace, buildPlayer, bundledLayoutPath, loadWorld } from "@worldtalk/world";
import { change } from "./change.js";
import { get } from "./items.js";

function twoPeople() {
  const world = new World();
  const room = buildPlace(world, "room", { type: "room" });
  const at = { position: "in" as const, holder: room };
  const gretel = buildPlayer(world, "gretel", { type: "person", size: "medium", name: "Gretel" }, at);
  const hans = buildPlayer(world, "hans", { type: "person", size: "medium", name: "Hans" }, at);
  world.reindex();
  return { world, gretel, hans };
}

describe("change", () => {
  it("rejects a rename that would make two players indistinguishable", () => {
    const { world, gretel } = twoPeople();
    expect(change(world, gretel, gretel, "name", "Hans")).toEqual([
      cannot("gretel", { kind: "change", actor: "gretel", item: "gretel", key: "name", value: "Hans" }, [
        { kind: "conflict", subject: "gretel", key: "name", value: "Hans", with: "hans" },
      ]),
    ]);
    expect(gretel.properties.get("name")).toBe("Gretel");
    expect(world.log.length).toBe(0);
  });

  it("renames to a spare player name", () => {
    const { world, gretel, hans } = twoPeople();
    world.addPlayerVocabulary("name", ["Jim"]);
    world.addVocabulary("name", ["Jim"]);
    expect(change(world, gretel, hans, "name", "Jim")).toEqual([
      { kind: "change", actor: "hans", item: "gretel", key: "name", value: "Jim" },
    ]);
    expect(gretel.properties.get("name")).toBe("Jim");
    expect(world.log.length).toBe(1);
  });

  it("only changes the changeable keys", async () => {
    const world = await loadWorld(bundledLayoutPath("easy"));
    expect(change(world, world.get("kitchen_table"), world.get("dog"), "material", "wood")).toEqual([
      cannot("dog", { kind: "change", actor: "dog", item: "kitchen_table", key: "material", value: "wood" }, [
        { kind: "permission", permission: { rule: "change-key", key: "material" }, negated: true },
      ]),
    ]);
  });

  it("needs the item in hand to change its colour", async () => {
    const world = await loadWorld(bundledLayoutPath("easy"));
    const dog = world.get("dog");
    const carrot = world.get("carrot");
    const attempt = { kind: "change" as const, actor: "dog", item: "carrot", key: "color", value: "blue" };
    expect(change(world, carrot, dog, "color", "blue")).toEqual([
      cannot("dog", attempt, [
        located("carrot", "in", "dog", true),
        { kind: "permission", permission: { rule: "change-held", key: "color" }, negated: false },
      ]),
    ]);
    get(world, carrot, dog);
    expect(change(world, carrot, dog, "color", "blue")).toEqual([attempt]);
    expect(carrot.properties.get("color")).toBe("blue");
  });

  it("rejects unknown values, names for non-players and unchanged values", async () => {
    const world = await loadWorld(bundledLayoutPath("easy"));
    const dog = world.get("dog");
    const carrot = world.get("carrot");
    get(world, carrot, dog);
    expect(change(world, carrot, dog, "color", "purple")).toEqual([
      cannot("dog", { kind: "change", actor: "dog", item: "carrot", key: "color", value: "purple" }, [
        { kind: "valid-value", key: "color", value: "purple", negated: true },
      ]),
    ]);
    expect(change(world, carrot, dog, "name", "Jim")).toEqual([
      cannot("dog", { kind: "change", actor: "dog", item: "carrot", key: "name", value: "Jim" }, [
        attribute("carrot", "player", true),
      ]),
    ]);
    expect(change(world, dog, dog, "name", "Hannah")).toEqual([
      cannot("dog", { kind: "change", actor: "dog", item: "dog", key: "name", value: "Hannah" }, [
        property("dog", "name", "Hannah"),
      ]),
    ]);
  });
});
