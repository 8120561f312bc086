import { describe, it, expect } from "vitest";
import { attribute, cannot, compound, contents } from "@worldtalk/schemas";
import { bundledLayoutPath, loadWorld } from "@worldtalk/world";
import { look } from "./look.js";

const easy = () => loadWorld(bundledLayoutPath("easy"));

describe("look", () => {
  it("reports whether a door is open", async () => {
    const world = await easy();
    expect(look(world, world.get("dog"), "at", world.get("main_door"))).toEqual([
      compound([
        { kind: "look", actor: "dog", position: "at", target: "main_door" },
        attribute("main_door", "open", true),
      ]),
    ]);
  });

  it("lists what is on a supporter", async () => {
    const world = await easy();
    expect(look(world, world.get("dog"), "on", world.get("kitchen_table"))).toEqual([
      compound([
        { kind: "look", actor: "dog", position: "on", target: "kitchen_table" },
        contents("kitchen_table", "on", ["carrot"]),
      ]),
    ]);
  });

  it("reports an empty hollow entity", async () => {
    const world = await easy();
    expect(look(world, world.get("dog"), "under", world.get("rug"))).toEqual([
      compound([
        { kind: "look", actor: "dog", position: "under", target: "rug" },
        contents("rug", "under", [], true),
      ]),
    ]);
  });

  it("cannot look into a closed container", async () => {
    const world = await easy();
    expect(look(world, world.get("dog"), "in", world.get("food_drawer"))).toEqual([
      cannot("dog", { kind: "look", actor: "dog", position: "in", target: "food_drawer" }, [
        attribute("food_drawer", "open", true),
      ]),
    ]);
  });

  it("cannot look into something that holds nothing", async () => {
    const world = await easy();
    expect(look(world, world.get("dog"), "in", world.get("carrot"))).toEqual([
      cannot("dog", { kind: "look", actor: "dog", position: "in", target: "carrot" }, [
        attribute("carrot", "container", true),
        attribute("carrot", "place", true),
        attribute("carrot", "player", true),
      ]),
    ]);
  });

  it("finds nothing special about a plain item", async () => {
    const world = await easy();
    expect(look(world, world.get("dog"), "at", world.get("carrot"))).toEqual([
      compound([
        { kind: "look", actor: "dog", position: "at", target: "carrot" },
        { kind: "nothing-special", subject: "carrot" },
      ]),
    ]);
  });

  it("defaults to the player's place and leaves the player out", async () => {
    const world = await easy();
    expect(look(world, world.get("inv"))).toEqual([
      compound([
        { kind: "look", actor: "inv", position: "in", target: "basement" },
        contents("basement", "in", [], true),
      ]),
    ]);
  });

  it("lists an empty inventory", async () => {
    const world = await easy();
    expect(look(world, world.get("dog"), "in", world.get("dog"))).toEqual([
      compound([{ kind: "look", actor: "dog", position: "in", target: "dog" }, contents("dog", "in", [], true)]),
    ]);
  });
});
