import type { OpenStatement, Statement } from "@worldtalk/schemas";
import { attribute } from "@worldtalk/schemas";
import { type Entity, type Placement, type World, validateReachability } from "@worldtalk/world";
import { type ActionResult, refusals, wrongPlacement } from "../common.js";

function commonReasons(item: Entity, player: Entity, at: Placement | undefined): Statement[][] {
  const reasons: Statement[][] = [
    ...validateReachability(item, player, at?.holder ?? item.location?.holder ?? item),
    ...wrongPlacement(item, at),
  ];
  if (!item.is("openable")) reasons.push([attribute(item.id, "openable", true)]);
  if (item.is("locked")) reasons.push([attribute(item.id, "locked")]);
  return reasons;
}

export function open(world: World, item: Entity, player: Entity, at?: Placement): ActionResult {
  const attempt: OpenStatement = { kind: "open", actor: player.id, item: item.id };
  const reasons = commonReasons(item, player, at);
  if (item.is("open")) reasons.push([attribute(item.id, "open")]);
  if (reasons.length > 0) return refusals(player, attempt, reasons);
  world.setAttribute(item, "open", true);
  return [attempt];
}

export function close(world: World, item: Entity, player: Entity, at?: Placement): ActionResult {
  const attempt: OpenStatement = { kind: "close", actor: player.id, item: item.id };
  const reasons = commonReasons(item, player, at);
  if (!item.is("open")) reasons.push([attribute(item.id, "open", true)]);
  if (reasons.length > 0) return refusals(player, attempt, reasons);
  world.setAttribute(item, "open", false);
  return [attempt];
}
