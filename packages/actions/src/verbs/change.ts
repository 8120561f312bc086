import type { ChangeStatement, Statement } from "@worldtalk/schemas";
import { attribute, located, property } from "@worldtalk/schemas";
import {
  CHANGEABLE_PROPERTIES,
  type Entity,
  PLAYER_NAME_KEYS,
  type World,
  describeEntity,
} from "@worldtalk/world";
import { type ActionResult, refusals } from "../common.js";

/** Keys that can only be changed on an item the player holds. */
const HELD_KEYS = ["size", "color"];

/**
 * Entities that could no longer be told apart if `item` took `value` for `key`.
 * The change is applied tentatively and always rolled back.
 */
function collisions(world: World, item: Entity, key: string, value: string): Entity[] {
  const checkpoint = world.save();
  world.setProperty(item, key, value);
  try {
    return world.objects.filter(
      (other) => other !== item && other.properties.get(key) === value && describeEntity(world, other, false) === null,
    );
  } finally {
    world.recover(checkpoint);
  }
}

/** Changes a descriptive property, refusing changes that would make two entities indistinguishable. */
export function change(world: World, item: Entity, player: Entity, key: string, value: string): ActionResult {
  const attempt: ChangeStatement = { kind: "change", actor: player.id, item: item.id, key, value };
  const reasons: Statement[][] = [];
  const changeable = CHANGEABLE_PROPERTIES.includes(key);

  if (!changeable) {
    reasons.push([{ kind: "permission", permission: { rule: "change-key", key }, negated: true }]);
  }
  if (PLAYER_NAME_KEYS.includes(key)) {
    if (!item.is("player")) {
      reasons.push([attribute(item.id, "player", true)]);
    } else if (!world.playerValuesOf(key).includes(value)) {
      reasons.push([{ kind: "valid-value", key: `player ${key}`, value, negated: true }]);
    }
  }
  if (changeable && !world.valuesOf(key).includes(value)) {
    reasons.push([{ kind: "valid-value", key, value, negated: true }]);
  }
  if (HELD_KEYS.includes(key) && item.location?.holder !== player) {
    reasons.push([
      located(item.id, "in", player.id, true),
      { kind: "permission", permission: { rule: "change-held", key }, negated: false },
    ]);
  }
  if (item.properties.get(key) === value) {
    reasons.push([property(item.id, key, value)]);
  }

  const conflicting = collisions(world, item, key, value);
  for (const other of conflicting) {
    reasons.push([{ kind: "conflict", subject: item.id, key, value, with: other.id }]);
  }
  if (reasons.length > 0) return refusals(player, attempt, reasons);

  world.setProperty(item, key, value);
  return [attempt];
}
