import type { GoStatement, Request, Statement } from "@worldtalk/schemas";
import { InvariantError, attribute, cannotGoTo, isRefusal, located, property, say, tries } from "@worldtalk/schemas";
import { type ActionResult, go } from "@worldtalk/actions";
import { type Entity, type Placement, obstacleKey } from "@worldtalk/world";
import type { PolicyContext, PolicyOutcome } from "./context.js";
import { anyStep, envFeedback, type Goal, reachLocation } from "./goals.js";
import { pathSteps, preconditionSteps, prefixRefusal, saySteps, speculate } from "./reasoning.js";

/** Where a go-direction request started, kept across the turns of one request. */
export interface MovementMemo {
  request: Request | undefined;
  initial: string | undefined;
}

export function emptyMovementMemo(): MovementMemo {
  return { request: undefined, initial: undefined };
}

function holderOf(player: Entity): Entity {
  const holder = player.location?.holder;
  if (!holder) throw new InvariantError("MISSING_LOCATION", `player "${player.id}" has no location`);
  return holder;
}

// ─── Go Direction ───────────────────────────────────────────────────

/**
 * One step north, south, ... from where the request found the player.
 * Without a request the player's current place is the starting point.
 */
export function goDirectionTask(
  ctx: PolicyContext,
  player: Entity,
  direction: string,
  memo?: MovementMemo,
  request?: Request,
): PolicyOutcome {
  const { world, knowledge } = ctx;
  let initial = holderOf(player);
  if (memo && request) {
    if (memo.request !== request || memo.initial === undefined) {
      memo.request = request;
      memo.initial = initial.id;
    }
    initial = world.get(memo.initial);
  }

  const triesGo = tries(player.id, { kind: "go", actor: player.id, direction });
  if (initial.exits.get(direction) === player.location?.holder) {
    const steps = [say(player.id, { kind: "moved", actor: player.id, direction, from: initial.id })];
    return { steps, goal: anyStep(ctx, player.id, steps) };
  }

  const result = speculate(world, () => go(world, player, direction, initial));
  const moved: GoStatement = { kind: "go", actor: player.id, direction, from: initial.id };
  const head = result[0];
  const success = head?.kind === "compound" && head.parts[0]?.kind === "go";
  let steps: Statement[] | undefined;
  let goal: Goal | null = null;

  if (!success) {
    const door = initial.obstacles.get(direction);
    const playerThere = located(player.id, "in", initial.id);
    if (
      door &&
      knowledge.multiCheck([
        playerThere,
        property(initial.id, obstacleKey(direction), door.id),
        attribute(door.id, "open", true),
        property(door.id, "type", "door"),
      ]) === true &&
      knowledge.check(attribute(door.id, "locked")) !== true
    ) {
      steps = [tries(player.id, { kind: "open", actor: player.id, item: door.id })];
    } else {
      const { checked, unchecked } = saySteps(knowledge, player.id, result);
      const anyRefusal = anyStep(ctx, player.id, [...checked, ...unchecked]);
      const locationKnown = knowledge.check(playerThere) === true;
      const justified = checked.filter(
        (step) => locationKnown || !(step.kind === "say" && mentionsLocation(step.content, player.id)),
      );
      steps = justified.length > 0 ? checked : [triesGo];
      goal = anyRefusal;
    }
  }

  return { steps: steps ?? [triesGo], goal: goal ?? envFeedback(ctx, moved) };
}

function mentionsLocation(statement: Statement, player: string): boolean {
  return (
    statement.kind === "cannot" &&
    statement.reasons.some((r) => r.kind === "property" && r.subject === player && r.key === "location")
  );
}

// ─── Go Location ────────────────────────────────────────────────────

/** Opens and unlocks doors as needed, collecting the refusals met on the way. */
function walkPath(ctx: PolicyContext, player: Entity, directions: readonly string[]): ActionResult {
  const { world, knowledge } = ctx;
  const refusals: ActionResult = [];
  let last: ActionResult = [];
  for (const direction of directions) {
    const here = holderOf(player);
    const door = here.obstacles.get(direction);
    if (door?.isDoor() && door.is("locked")) {
      refusals.push(...go(world, player, direction));
      world.setAttribute(door, "locked", false);
    }
    if (door?.isDoor() && !door.is("open")) {
      const guarded = knowledge.check(property(here.id, obstacleKey(direction), door.id)) === true;
      if (guarded && knowledge.check(property(door.id, "type", "door")) !== true) {
        refusals.push(...go(world, player, direction));
      }
      world.setAttribute(door, "open", true);
    }
    last = go(world, player, direction);
    if (last[0] && isRefusal(last[0], "go")) {
      refusals.push(...last);
      break;
    }
  }
  return refusals;
}

/** Getting the player to the top location of the item, or of the stated placement. */
export function goLocationTask(
  ctx: PolicyContext,
  player: Entity,
  item: Entity,
  at?: Placement,
  preconditions = true,
): PolicyOutcome {
  const { world, knowledge } = ctx;
  const refusal = cannotGoTo(player.id, item.id);
  const precondition = preconditions
    ? preconditionSteps(ctx, player.id, at ? [player, item, at.holder] : [player, item], refusal)
    : null;
  const target = (at ? at.holder : item).topLocation();
  const source = holderOf(player);
  if (!target) throw new InvariantError("MISSING_LOCATION", `entity "${item.id}" has no location`);
  const directions = world.path(source, target);

  if (directions && directions.length === 0) {
    const there = located(player.id, "in", target.id);
    const steps =
      precondition && knowledge.check(there) !== true
        ? precondition.steps
        : [say(player.id, { ...refusal, reasons: [there] })];
    return { steps, goal: anyStep(ctx, player.id, steps) };
  }

  const unknownPath = pathSteps(ctx, player.id, source, target, refusal);
  let checked: Statement[] = [];
  let unchecked: Statement[] = [];
  if (directions && directions.length > 0) {
    const met = speculate(world, () => walkPath(ctx, player, directions));
    ({ checked, unchecked } = saySteps(knowledge, player.id, met));
  }

  const blocked = precondition?.steps ?? unknownPath;
  if (blocked) return { steps: blocked, goal: anyStep(ctx, player.id, blocked) };

  if (checked.length > 0) {
    const steps = checked.map((s) => prefixRefusal(refusal, s));
    return { steps, goal: anyStep(ctx, player.id, [...steps, ...unchecked]) };
  }
  const first = directions?.[0];
  if (first === undefined) throw new Error(`no path from "${source.id}" to "${target.id}"`);
  const { steps } = goDirectionTask(ctx, player, first);
  const goal = unchecked.length === 0 ? reachLocation(ctx, player.id, target.id) : anyStep(ctx, player.id, unchecked);
  return { steps, goal };
}
