import type { Statement } from "@worldtalk/schemas";
import { attribute, located } from "@worldtalk/schemas";
import type { Entity } from "./entity.js";

/**
 * Reasons why `player` cannot reach `target` at `locationEntity`, one list
 * per blocking condition. Empty when the target is within reach.
 *
 * Locked containers on the way up are reported instead of merely closed ones.
 */
export function validateReachability(target: Entity, player: Entity, locationEntity: Entity): Statement[][] {
  const reasons: Statement[][] = [];
  const playerTop = player.topLocation();
  const locationTop = locationEntity.topLocation();

  if (!player.is("player")) {
    reasons.push([attribute(player.id, "player", true)]);
  }

  if (!target.isDoor() && locationTop && locationTop !== playerTop) {
    reasons.push([located(player.id, "in", locationTop.id, true)]);
  }

  const holder = target.location?.holder;
  if (
    target.isDoor() &&
    target.doorTo &&
    holder &&
    target.doorTo !== playerTop &&
    holder !== playerTop &&
    locationEntity === holder
  ) {
    reasons.push([located(player.id, "in", target.doorTo.id, true), located(player.id, "in", holder.id, true)]);
  }

  if (locationEntity.is("container") && holder !== locationTop) {
    const locked: Statement[][] = [];
    const notOpen: Statement[][] = [];
    for (const container of locationEntity.path()) {
      if (container.location?.holder === container) break;
      if (container.is("locked")) locked.push([attribute(container.id, "locked")]);
      else if (container.is("openable") && !container.is("open")) notOpen.push([attribute(container.id, "open", true)]);
    }
    reasons.push(...(locked.length > 0 ? locked : notOpen));
  }

  return reasons;
}
