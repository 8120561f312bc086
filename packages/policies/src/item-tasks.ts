import type {
  CannotStatement,
  ChangeStatement,
  DropStatement,
  GetStatement,
  LookStatement,
  OpenStatement,
  Preposition,
  Statement,
  TriesStatement,
} from "@worldtalk/schemas";
import { InvariantError, attribute, cannot, located, reduceStatement, tries } from "@worldtalk/schemas";
import { type ActionResult, change, close, drop, get, look, open } from "@worldtalk/actions";
import type { Entity, Placement } from "@worldtalk/world";
import type { PolicyContext, PolicyOutcome } from "./context.js";
import { allOf, anyStep, constant, stepsSublist } from "./goals.js";
import { goLocationTask } from "./movement.js";
import {
  isSaidRefusal,
  makeReachable,
  openAllContainers,
  preconditionSteps,
  prefixGoal,
  prefixRefusal,
  resultMatches,
  saySteps,
  speculate,
  unrevealedLocation,
} from "./reasoning.js";

/** Keys whose change needs the item in hand. */
const HELD_KEYS = ["color", "size"];

const OPENING_ATTRIBUTES = ["open", "openable", "locked"];

/** Everything the planner needs to know about one item action. */
export interface ActionPlan {
  item: Entity;
  /** "P can not <verb> X" */
  refusal: CannotStatement;
  /** The entity the player has to reach. */
  target: Entity;
  /** The placement the request named, if any. */
  at?: Placement;
  run: () => ActionResult;
  success: Statement;
  step: TriesStatement;
}

function placementOf(entity: Entity): Placement {
  const at = entity.location;
  if (!at) throw new InvariantError("MISSING_LOCATION", `entity "${entity.id}" has no location`);
  return at;
}

/** "P tries opening X" for each closed holder the agent knows it can open, outermost first. */
function openingSteps(ctx: PolicyContext, player: Entity, item: Entity): Statement[] {
  const { knowledge } = ctx;
  const candidates: Entity[] = [];
  let current = item.location?.holder;
  while (current) {
    if (!current.is("open")) {
      if (
        knowledge.check(attribute(current.id, "locked")) === true ||
        knowledge.check(attribute(current.id, "openable", true)) === true
      ) {
        return [];
      }
      candidates.unshift(current);
    }
    const next: Entity | undefined = current.location?.holder;
    if (!next || next === current) break;
    current = next;
  }
  return candidates
    .filter(
      (holder) =>
        knowledge.check(attribute(holder.id, "container")) !== false &&
        knowledge.check(attribute(holder.id, "openable")) === true &&
        knowledge.check(attribute(holder.id, "open", true)) === true,
    )
    .map((holder) => tries(player.id, { kind: "open", actor: player.id, item: holder.id }));
}

/**
 * Whether a known refusal is about a container the agent could only know of
 * through a location it has not been shown.
 */
function hiddenBehindContainer(ctx: PolicyContext, item: Entity, steps: readonly Statement[], known: readonly Entity[]): boolean {
  if (!item.location?.holder.is("container")) return false;
  const hidden = unrevealedLocation(ctx.knowledge, item);
  if (!hidden) return false;
  const chain = hidden.path().filter((e) => e.location?.holder !== e);
  return steps.some(
    (step) =>
      step.kind === "say" &&
      reduceStatement(step.content)
        .slice(1)
        .some(
          (r) =>
            r.kind === "attribute" &&
            OPENING_ATTRIBUTES.includes(r.attribute) &&
            !known.some((e) => e.id === r.subject) &&
            chain.some((e) => e.id === r.subject),
        ),
  );
}

/**
 * Plans an item action: say why it cannot be done when the agent knows,
 * otherwise walk there, open what is in the way, and try it.
 */
export function planAction(ctx: PolicyContext, player: Entity, plan: ActionPlan): PolicyOutcome {
  const { world, knowledge } = ctx;
  const { item, refusal, at } = plan;
  const known = at ? [player, item, at.holder] : [player, item];
  const precondition = preconditionSteps(ctx, player.id, known, refusal);
  const targetTop = plan.target.topLocation() ?? plan.target;
  const route: PolicyOutcome =
    knowledge.check(located(player.id, "in", targetTop.id)) === true
      ? { steps: [], goal: constant(1) }
      : goLocationTask(ctx, player, item, at, false);
  const source = player.location?.holder.topLocation();

  const opened = speculate(world, () => {
    makeReachable(world, player, source, targetTop);
    openAllContainers(world, player, item);
    return plan.run();
  });
  if (!resultMatches(opened, plan.success)) {
    const { checked, unchecked } = saySteps(knowledge, player.id, opened);
    if (checked.length > 0) return { steps: checked, goal: anyStep(ctx, player.id, [...unchecked, ...checked]) };
  }

  const reached = speculate(world, () => {
    makeReachable(world, player, source, targetTop);
    return plan.run();
  });
  const routeRefused: PolicyOutcome | null = isSaidRefusal(route.steps[0], ["go", "go-to"])
    ? { steps: route.steps.map((s) => prefixRefusal(refusal, s)), goal: prefixGoal(refusal, route.goal) }
    : null;
  const substeps: Statement[] = [];

  if (!resultMatches(reached, plan.success)) {
    if (!precondition) substeps.push(...openingSteps(ctx, player, item));
    if (substeps.length === 0) {
      const { checked, unchecked } = saySteps(knowledge, player.id, reached);
      const anyRefusal = anyStep(ctx, player.id, [...unchecked, ...checked]);
      if (checked.length > 0) {
        return precondition && hiddenBehindContainer(ctx, item, checked, known)
          ? precondition
          : { steps: checked, goal: anyRefusal };
      }
      if (precondition) return precondition;
      if (routeRefused) return routeRefused;
      return { steps: route.steps.length > 0 ? route.steps : [plan.step], goal: anyRefusal };
    }
  }

  if (precondition) return precondition;
  if (routeRefused) return routeRefused;
  substeps.push(plan.step);
  return {
    steps: route.steps.length > 0 ? route.steps : [substeps[0]],
    goal: allOf([route.goal ?? constant(1), stepsSublist(ctx, player.id, substeps)]),
  };
}

// ─── Item Actions ───────────────────────────────────────────────────

export function getTask(ctx: PolicyContext, player: Entity, item: Entity, at?: Placement): PolicyOutcome {
  const where = at ?? placementOf(item);
  const attempt: GetStatement = { kind: "get", actor: player.id, item: item.id };
  return planAction(ctx, player, {
    item,
    at,
    target: where.holder,
    refusal: cannot(player.id, attempt),
    success: attempt,
    step: tries(player.id, { ...attempt, from: { position: where.position, holder: where.holder.id } }),
    run: () => get(ctx.world, item, player, where),
  });
}

export function dropTask(ctx: PolicyContext, player: Entity, item: Entity, at?: Placement): PolicyOutcome {
  const where = at ?? placementOf(player);
  const attempt: DropStatement = {
    kind: "drop",
    actor: player.id,
    item: item.id,
    to: { position: where.position, holder: where.holder.id },
  };
  return planAction(ctx, player, {
    item,
    at,
    target: where.holder,
    refusal: cannot(player.id, attempt),
    success: attempt,
    step: tries(player.id, attempt),
    run: () => drop(ctx.world, item, player, where.position, where.holder),
  });
}

export function lookTask(
  ctx: PolicyContext,
  player: Entity,
  item: Entity,
  position: Preposition | "at",
  at?: Placement,
): PolicyOutcome {
  const where = at ?? placementOf(item);
  const attempt: LookStatement = { kind: "look", actor: player.id, position, target: item.id };
  return planAction(ctx, player, {
    item,
    at,
    target: where.holder,
    refusal: cannot(player.id, attempt),
    success: attempt,
    step: tries(player.id, attempt),
    run: () => look(ctx.world, player, position, item, where),
  });
}

export function openCloseTask(
  ctx: PolicyContext,
  player: Entity,
  item: Entity,
  verb: "open" | "close",
  at?: Placement,
): PolicyOutcome {
  const where = at ?? placementOf(item);
  const attempt: OpenStatement = { kind: verb, actor: player.id, item: item.id };
  const action = verb === "open" ? open : close;
  return planAction(ctx, player, {
    item,
    at,
    target: where.holder,
    refusal: cannot(player.id, attempt),
    success: attempt,
    step: tries(player.id, attempt),
    run: () => action(ctx.world, item, player, where),
  });
}

// ─── Change ─────────────────────────────────────────────────────────

/**
 * Changes a property, fetching the item first when the agent knows the
 * key can only be changed on a held item.
 */
export function changeTask(ctx: PolicyContext, player: Entity, item: Entity, key: string, value: string): PolicyOutcome {
  const { world, knowledge } = ctx;
  const attempt: ChangeStatement = { kind: "change", actor: player.id, item: item.id, key, value };
  const refusal = cannot(player.id, attempt);
  const held = HELD_KEYS.includes(key);

  let fetch: PolicyOutcome = { steps: [], goal: constant(1) };
  let fetchRefused = false;
  if (
    held &&
    knowledge.check({ kind: "permission", permission: { rule: "change-held", key }, negated: false }) === true &&
    knowledge.check(located(item.id, "in", player.id)) !== true
  ) {
    fetch = getTask(ctx, player, item);
    if (isSaidRefusal(fetch.steps[0], ["get"])) {
      fetchRefused = true;
      fetch = { steps: fetch.steps.map((s) => prefixRefusal(refusal, s)), goal: prefixGoal(refusal, fetch.goal) };
    }
  }

  const result = speculate(world, () => {
    if (held) {
      makeReachable(world, player, player.location?.holder.topLocation(), item.topLocation());
      openAllContainers(world, player, item);
      get(world, item, player, item.location);
    }
    return change(world, item, player, key, value);
  });
  if (!resultMatches(result, attempt)) {
    const { checked, unchecked } = saySteps(knowledge, player.id, result);
    if (checked.length > 0) return { steps: checked, goal: anyStep(ctx, player.id, [...checked, ...unchecked]) };
  }
  if (fetchRefused) return fetch;

  const triesChange = tries(player.id, attempt);
  return {
    steps: fetch.steps.length > 0 ? fetch.steps : [triesChange],
    goal: allOf([fetch.goal ?? constant(1), anyStep(ctx, player.id, [triesChange])]),
  };
}
