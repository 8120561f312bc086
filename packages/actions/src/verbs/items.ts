import type { DropStatement, GetStatement, Preposition, Statement } from "@worldtalk/schemas";
import { attribute, located, property } from "@worldtalk/schemas";
import { type Entity, type Placement, type World, validateReachability } from "@worldtalk/world";
import { type ActionResult, refusals, wrongPlacement } from "../common.js";

// ─── Get ────────────────────────────────────────────────────────────

/** Takes an item into the player's inventory. Static items and players cannot be taken. */
export function get(world: World, item: Entity, player: Entity, at?: Placement): ActionResult {
  const attempt: GetStatement = { kind: "get", actor: player.id, item: item.id };
  const where = at ?? item.location;
  const reasons: Statement[][] = [
    ...validateReachability(item, player, where?.holder ?? item),
    ...wrongPlacement(item, at),
  ];
  if (item.is("static")) reasons.push([attribute(item.id, "static")]);
  if (item.is("player")) {
    reasons.push([attribute(item.id, "player"), { kind: "permission", permission: { rule: "get-players" }, negated: true }]);
  }
  if (item.location?.holder === player && item.location.position === "in") {
    reasons.push([located(item.id, "in", player.id)]);
  }
  if (reasons.length > 0) return refusals(player, attempt, reasons);

  world.relocate(item, "in", player);
  return [attempt];
}

// ─── Drop ───────────────────────────────────────────────────────────

function positionReasons(item: Entity, position: Preposition, target: Entity): Statement[][] {
  switch (position) {
    case "in":
      if (!target.is("container") && !target.is("place")) {
        return [[attribute(target.id, "container", true), attribute(target.id, "place", true)]];
      }
      if (target.is("container") && item.isBiggerThan(target)) {
        return [
          [
            property(item.id, "size", item.properties.get("size") ?? ""),
            property(target.id, "size", target.properties.get("size") ?? ""),
          ],
        ];
      }
      return [];
    case "on":
      return target.is("supporter") ? [] : [[attribute(target.id, "supporter", true)]];
    case "under":
      return target.is("hollow") ? [] : [[attribute(target.id, "hollow", true)]];
  }
}

/** Puts a held item in, on or under a target. */
export function drop(world: World, item: Entity, player: Entity, position: Preposition, target: Entity): ActionResult {
  const attempt: DropStatement = { kind: "drop", actor: player.id, item: item.id, to: { position, holder: target.id } };
  const reasons: Statement[][] = [...validateReachability(target, player, target)];
  if (item.location?.holder !== player || item.location.position !== "in") {
    reasons.push([located(item.id, "in", player.id, true)]);
  }
  if (item === target) {
    reasons.push([{ kind: "permission", permission: { rule: "drop-into-itself" }, negated: true }]);
  }
  const chain = target.path();
  const inside = chain.indexOf(item);
  if (inside > 0) {
    reasons.push(
      chain.slice(0, inside).flatMap((holder) => {
        const at = holder.location;
        return at ? [located(holder.id, at.position, at.holder.id)] : [];
      }),
    );
  }
  reasons.push(...positionReasons(item, position, target));
  if (reasons.length > 0) return refusals(player, attempt, reasons);

  world.relocate(item, position, target);
  return [attempt];
}
