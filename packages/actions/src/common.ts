import type { Attempt, CannotStatement, Statement } from "@worldtalk/schemas";
import { cannot, located } from "@worldtalk/schemas";
import type { Entity, Placement, World } from "@worldtalk/world";

/** An ordered list of alternatives: one success, or one refusal per blocking reason. */
export type ActionResult = Statement[];

export function refusals(actor: Entity, attempt: Attempt, reasons: readonly Statement[][]): CannotStatement[] {
  return reasons.map((r) => cannot(actor.id, attempt, r));
}

/** "X's location is not <at>" when the stated placement is wrong. */
export function wrongPlacement(item: Entity, at: Placement | undefined): Statement[][] {
  const current = item.location;
  if (!at || !current) return [];
  if (current.position === at.position && current.holder === at.holder) return [];
  return [[located(item.id, at.position, at.holder.id, true)]];
}

/** Whether an action result is a success rather than a list of refusals. */
export function succeeded(result: ActionResult): boolean {
  return result.length > 0 && result.every((s) => s.kind !== "cannot");
}

/**
 * The items at a position of a holder, as shown by looking: when there are
 * several, a random non-empty subset in random order.
 */
export function visibleItems(world: World, holder: Entity, position: string, exclude?: Entity): Entity[] {
  const items = holder.contents.filter((obj) => obj !== exclude && obj.location?.position === position);
  if (items.length <= 1) return items;
  const shuffled = world.random.shuffle(items);
  return shuffled.slice(0, world.random.int(1, shuffled.length));
}
