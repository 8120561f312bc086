import type { GoStatement, Statement } from "@worldtalk/schemas";
import { InvariantError, attribute, compound, property } from "@worldtalk/schemas";
import { type Entity, type World, obstacleKey, validateReachability } from "@worldtalk/world";
import { type ActionResult, refusals } from "../common.js";
import { look } from "./look.js";

function obstacleReasons(place: Entity, direction: string): Statement[][] {
  const door = place.obstacles.get(direction);
  if (!door || !door.isDoor() || door.is("open")) return [];
  const guarded = property(place.id, obstacleKey(direction), door.id);
  if (door.is("locked")) return [[guarded, attribute(door.id, "locked")]];
  if (!door.is("openable")) return [[guarded, attribute(door.id, "openable", true)]];
  return [[guarded, attribute(door.id, "open", true)]];
}

/**
 * Moves the player one step. On success the result is the move followed by
 * what the player sees in the new place.
 */
export function go(world: World, player: Entity, direction: string, from?: Entity): ActionResult {
  const current = player.location?.holder;
  if (!current) throw new InvariantError("MISSING_LOCATION", `player "${player.id}" has no location`);
  const attempt: GoStatement = { kind: "go", actor: player.id, direction };
  const reasons: Statement[][] = [
    ...validateReachability(player, player, from ?? current),
    ...obstacleReasons(current, direction),
  ];

  const destination = current.exits.get(direction);
  if (!world.directions.includes(direction)) {
    reasons.push([{ kind: "valid-value", key: "direction", value: direction, negated: true }]);
  } else if (!destination) {
    reasons.push([{ kind: "element-exists", subject: current.id, element: direction, negated: true }]);
  }

  if (reasons.length > 0 || !destination) return refusals(player, attempt, reasons);

  world.relocate(player, "in", destination);
  const moved: GoStatement = { ...attempt, from: current.id };
  const seen = look(world, player, "in", destination).flatMap((s) => (s.kind === "compound" ? s.parts : [s]));
  return [compound([moved, ...seen])];
}
