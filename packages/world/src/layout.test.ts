import { describe, it, expect } from "vitest";
import { LayoutError } from "@worldtalk/schemas";
import { buildWorld, bundledLayoutPath, loadWorld, parseLayout } from "./layout.js";

describe("bundled easy layout", () => {
  it("loads, validates and indexes", async () => {
    const world = await loadWorld(bundledLayoutPath("easy"));
    expect(world.name).toBe("easy");
    expect(world.places.map((p) => p.id)).toEqual([
      "barn",
      "main_path",
      "well",
      "living_room",
      "bedroom",
      "bathroom",
      "kitchen",
      "basement",
    ]);
    expect(world.players.map((p) => p.id)).toEqual(["player", "player2", "inv", "dog", "bear"]);
    expect(world.directions).toEqual(["north", "east", "west", "south"]);
  });

  it("wires nested containers, doors and paths", async () => {
    const world = await loadWorld(bundledLayoutPath("easy"));
    expect(world.get("small_ball").topLocation()?.id).toBe("bedroom");
    expect(world.get("kitchen").getProperty("west-obstacle")).toBe("main_door");
    expect(world.get("main_door").getProperty("door_to")).toBe("living_room");
    expect(world.path(world.get("barn"), world.get("kitchen"))).toEqual(["south", "north", "west"]);
  });

  it("adds the spare vocabulary", async () => {
    const world = await loadWorld(bundledLayoutPath("easy"));
    expect(world.isValidValue("color", "blue")).toBe(true);
    expect(world.playerValuesOf("name")).toEqual(["Gretel", "Hans", "Max", "Hannah", "Andy", "Jim"]);
    expect(world.playerValuesOf("nickname")).toContain("lovebug");
  });
});

describe("parseLayout", () => {
  it("rejects text that is not YAML", () => {
    expect(() => parseLayout("name: [")).toThrow(LayoutError);
  });

  it("rejects a layout failing the schema", () => {
    expect(() => parseLayout("name: empty\nentities: []\n")).toThrow(
      "layout failed schema validation: /entities: must NOT have fewer than 1 items",
    );
  });
});

describe("buildWorld", () => {
  it("reports references to unknown entities", () => {
    const layout = {
      name: "broken",
      entities: [
        { id: "hall", kind: "place" as const },
        { id: "ball", location: { position: "in" as const, holder: "nowhere" } },
      ],
    };
    let caught: unknown;
    try {
      buildWorld(layout);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(LayoutError);
    expect(caught).toMatchObject({
      issues: ['ball.location refers to unknown entity "nowhere"', 'entity "ball" has no location'],
    });
  });
});
