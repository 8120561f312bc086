import type { LookStatement, Preposition, Statement } from "@worldtalk/schemas";
import { attribute, cannot, compound, contents } from "@worldtalk/schemas";
import { type Entity, type Placement, type World, validateReachability } from "@worldtalk/world";
import { type ActionResult, refusals, visibleItems, wrongPlacement } from "../common.js";

interface LookResponse {
  blocked: boolean;
  statements: Statement[];
}

function contentsAt(world: World, holder: Entity, position: Preposition): Statement {
  const items = visibleItems(world, holder, position);
  return items.length > 0
    ? contents(holder.id, position, items.map((i) => i.id))
    : contents(holder.id, position, [], true);
}

/** What the player learns by looking in, on, under or at an entity. */
function respond(world: World, entity: Entity, player: Entity, position: Preposition | "at"): LookResponse {
  if (entity.is("place") && position === "in") {
    const items = visibleItems(world, entity, "in", player);
    const seen: Statement =
      items.length > 0
        ? { kind: "sees", actor: player.id, items: items.map((i) => i.id), location: { position: "in", holder: entity.id } }
        : contents(entity.id, "in", [], true);
    return { blocked: false, statements: [seen] };
  }

  const facts: Statement[] = [];
  if (entity.isDoor() && position === "at") facts.push(attribute(entity.id, "open", !entity.is("open")));
  if (position === "in" && entity.is("player")) facts.push(contentsAt(world, entity, "in"));
  if (position === "on" && entity.is("supporter")) facts.push(contentsAt(world, entity, "on"));
  if (position === "in" && entity.is("container")) {
    if (entity.is("locked")) return { blocked: true, statements: [attribute(entity.id, "locked")] };
    if (!entity.is("open")) return { blocked: true, statements: [attribute(entity.id, "open", true)] };
    facts.push(contentsAt(world, entity, "in"));
  }
  if (position === "under" && entity.is("hollow")) facts.push(contentsAt(world, entity, "under"));
  if (facts.length > 0) return { blocked: false, statements: facts };

  const missing: Record<Preposition | "at", string[]> = {
    in: ["container", "place", "player"],
    on: ["supporter"],
    under: ["hollow"],
    at: [],
  };
  const reasons = missing[position].filter((attr) => !entity.is(attr)).map((attr) => attribute(entity.id, attr, true));
  if (reasons.length > 0) return { blocked: true, statements: reasons };
  return { blocked: false, statements: [{ kind: "nothing-special", subject: entity.id }] };
}

/**
 * Looks at `target` (default: the player's place). Places list what the
 * player sees; holders list their contents; anything else has nothing special.
 */
export function look(
  world: World,
  player: Entity,
  position: Preposition | "at" = "in",
  target?: Entity,
  at?: Placement,
): ActionResult {
  const subject = target ?? player.location?.holder ?? player;
  const attempt: LookStatement = { kind: "look", actor: player.id, position, target: subject.id };
  const where = at?.holder ?? subject.location?.holder ?? subject;
  const alternatives: Statement[] = refusals(player, attempt, [
    ...validateReachability(subject, player, where),
    ...wrongPlacement(subject, at),
  ]);
  const response = respond(world, subject, player, position);
  if (response.blocked) {
    alternatives.push(cannot(player.id, attempt, response.statements));
  } else if (alternatives.length === 0) {
    return [compound([attempt, ...response.statements])];
  }
  return alternatives;
}
