import type { Attempt, CannotStatement, Statement } from "@worldtalk/schemas";
import { cannot, includesStatement, located, property, reduceStatement, say, statementsEqual } from "@worldtalk/schemas";
import type { KnowledgeBase } from "@worldtalk/knowledge";
import { type ActionResult, go, open } from "@worldtalk/actions";
import type { Entity, World } from "@worldtalk/world";
import { anyStep, type Goal } from "./goals.js";
import type { PolicyContext, PolicyOutcome } from "./context.js";

// ─── Speculation ────────────────────────────────────────────────────

/**
 * Runs `trial` against the live world and rolls every change back,
 * including draws from the world's PRNG.
 */
export function speculate<T>(world: World, trial: () => T): T {
  const checkpoint = world.save();
  const random = world.random.save();
  try {
    return trial();
  } finally {
    world.recover(checkpoint);
    world.random.restore(random);
  }
}

/** Walks the player along the path, unlocking and opening doors on the way. */
export function makeReachable(world: World, player: Entity, from: Entity | undefined, to: Entity | undefined): void {
  if (!from || !to) return;
  for (const direction of world.path(from, to) ?? []) {
    const here = player.location?.holder;
    const door = here?.obstacles.get(direction);
    if (door) {
      if (door.is("locked")) world.setAttribute(door, "locked", false);
      if (door.isDoor()) open(world, door, player);
    }
    go(world, player, direction);
  }
}

/** Unlocks and opens every holder of the item, outermost first. */
export function openAllContainers(world: World, player: Entity, item: Entity): void {
  for (const holder of item.path().slice(1).reverse()) {
    if (holder.is("locked")) world.setAttribute(holder, "locked", false);
    if (!holder.is("open")) open(world, holder, player);
  }
}

// ─── Refusals ───────────────────────────────────────────────────────

export interface SaySteps {
  /** Refusals whose every reason the agent already knows. */
  checked: Statement[];
  unchecked: Statement[];
}

/** "<player> says: <refusal>" for each refusal of an action result, split by what the agent knows. */
export function saySteps(knowledge: KnowledgeBase, player: string, result: ActionResult): SaySteps {
  const steps: SaySteps = { checked: [], unchecked: [] };
  for (const refusal of result) {
    if (refusal.kind !== "cannot") continue;
    const reasons = reduceStatement(refusal).slice(1);
    const step = say(player, refusal);
    if (knowledge.multiCheck(reasons) === true) steps.checked.push(step);
    else steps.unchecked.push(step);
  }
  return steps;
}

/** "<outer refusal>. <inner refusal and its reasons>" for a said refusal. */
export function prefixRefusal(outer: CannotStatement, step: Statement): Statement {
  if (step.kind !== "say") return step;
  return say(step.speaker, cannot(outer.actor, outer.attempt, [...outer.reasons, ...reduceStatement(step.content)]));
}

/** Prefixes the outer refusal onto the steps of an any-step goal. */
export function prefixGoal(outer: CannotStatement, goal: Goal | null): Goal | null {
  if (!goal || goal.kind !== "any-step") return goal;
  return { ...goal, steps: goal.steps.map((s) => prefixRefusal(outer, s)) };
}

/** Whether the step says a refusal of one of the verbs. */
export function isSaidRefusal(step: Statement | undefined, verbs: readonly Attempt["kind"][]): boolean {
  return step?.kind === "say" && step.content.kind === "cannot" && verbs.includes(step.content.attempt.kind);
}

/** Whether any of the steps says the statement, possibly among other things. */
export function saysNegative(steps: readonly Statement[], negative: Statement): boolean {
  return steps.some((s) => s.kind === "say" && includesStatement(reduceStatement(s.content), negative));
}

/** Whether the action result starts with the expected success. */
export function resultMatches(result: ActionResult, success: Statement): boolean {
  const first = result[0];
  if (!first) return false;
  const head = reduceStatement(first)[0];
  return head !== undefined && statementsEqual(head, success);
}

// ─── Revealed Locations & Paths ─────────────────────────────────────

/**
 * The first entity on the way up from `item` whose location the agent has
 * not been shown. Undefined when the whole chain up to the top place is known.
 */
export function unrevealedLocation(knowledge: KnowledgeBase, item: Entity): Entity | undefined {
  const visited = new Set<Entity>();
  let current = item;
  for (;;) {
    const at = current.location;
    if (!at) return undefined;
    if (knowledge.check(located(current.id, at.position, at.holder.id)) !== true) return current;
    if (at.holder === current || visited.has(at.holder)) return undefined;
    visited.add(current);
    current = at.holder;
  }
}

function withReason(refusal: CannotStatement, reason: Statement): CannotStatement {
  return cannot(refusal.actor, refusal.attempt, [...refusal.reasons, reason]);
}

/**
 * One step per item whose location is not revealed, saying the refusal and
 * why. Null when every location is known.
 */
export function preconditionSteps(
  ctx: PolicyContext,
  player: string,
  items: readonly Entity[],
  refusal: CannotStatement,
): PolicyOutcome | null {
  const steps: Statement[] = [];
  for (const item of items) {
    const hidden = unrevealedLocation(ctx.knowledge, item);
    if (!hidden) continue;
    const step = say(player, withReason(refusal, { kind: "not-revealed", what: "location", subject: hidden.id }));
    if (!includesStatement(steps, step)) steps.push(step);
  }
  return steps.length > 0 ? { steps, goal: anyStep(ctx, player, steps) } : null;
}

/** The first place on the path whose next exit the agent has not been shown. */
function unrevealedStep(knowledge: KnowledgeBase, from: Entity, directions: readonly string[]): Entity | undefined {
  let current = from;
  for (const direction of directions) {
    const next = current.exits.get(direction);
    if (!next) return current;
    if (knowledge.check(property(current.id, direction, next.id)) !== true) return current;
    current = next;
  }
  return undefined;
}

/**
 * Says why the agent cannot plan a route: a step of the path is not
 * revealed, or no path exists and every exit of every place is known.
 */
export function pathSteps(
  ctx: PolicyContext,
  player: string,
  from: Entity,
  to: Entity,
  refusal: CannotStatement,
): Statement[] | null {
  const directions = ctx.world.path(from, to);
  let reason: Statement | undefined;
  if (directions) {
    const hidden = unrevealedStep(ctx.knowledge, from, directions);
    if (hidden) reason = { kind: "not-revealed", what: "path", subject: hidden.id, target: to.id };
  } else {
    const allKnown = ctx.world.places.every((place) =>
      ctx.world.directions.every(
        (direction) =>
          ctx.knowledge.check({ kind: "element-exists", subject: place.id, element: direction, negated: false }) !==
          undefined,
      ),
    );
    reason = allKnown
      ? { kind: "no-path", from: from.id, to: to.id }
      : { kind: "not-revealed", what: "path", subject: from.id, target: to.id };
  }
  return reason ? [say(player, withReason(refusal, reason))] : null;
}
