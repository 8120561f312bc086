import type { ActionStatement, LocationValue } from "@worldtalk/schemas";
import type { Placement, World } from "@worldtalk/world";
import type { ActionResult } from "./common.js";
import { change } from "./verbs/change.js";
import { go } from "./verbs/go.js";
import { drop, get } from "./verbs/items.js";
import { look } from "./verbs/look.js";
import { close, open } from "./verbs/openings.js";

export function toPlacement(world: World, value: LocationValue | undefined): Placement | undefined {
  return value ? { position: value.position, holder: world.get(value.holder) } : undefined;
}

/** Runs the action an attempt names against the world. Unknown ids throw InvariantError. */
export function perform(world: World, attempt: ActionStatement): ActionResult {
  const actor = world.get(attempt.actor);
  switch (attempt.kind) {
    case "go":
      return go(world, actor, attempt.direction, attempt.from ? world.get(attempt.from) : undefined);
    case "get":
      return get(world, world.get(attempt.item), actor, toPlacement(world, attempt.from));
    case "drop":
      return drop(world, world.get(attempt.item), actor, attempt.to.position, world.get(attempt.to.holder));
    case "open":
      return open(world, world.get(attempt.item), actor);
    case "close":
      return close(world, world.get(attempt.item), actor);
    case "change":
      return change(world, world.get(attempt.item), actor, attempt.key, attempt.value);
    case "look":
      return look(world, actor, attempt.position, world.get(attempt.target));
  }
}
