import type { AndRequest, PrimitiveRequest } from "@worldtalk/schemas";
import type { PolicyBookLike, PolicyContext, PolicyOutcome } from "./context.js";
import { allOf, constant, evaluateGoal, type Goal } from "./goals.js";

/** One player's progress through the parts of a compound request addressed to it. */
export interface AndProgress {
  request: AndRequest | undefined;
  /** How many parts are addressed to this player. */
  count: number;
  /** Index of this player's last part. */
  stopAt: number;
  /** The addressee of each part, in request order. */
  order: string[];
  goals: Map<number, Goal>;
  /** The part this player is working on. */
  current: number | undefined;
}

export function emptyProgress(): AndProgress {
  return { request: undefined, count: 0, stopAt: -1, order: [], goals: new Map(), current: undefined };
}

export function copyProgress(progress: AndProgress): AndProgress {
  return { ...progress, order: [...progress.order], goals: new Map(progress.goals) };
}

function bind(progress: AndProgress, request: AndRequest, player: string): void {
  if (progress.request === request) return;
  Object.assign(progress, emptyProgress(), { request });
  request.parts.forEach((part, index) => {
    progress.order.push(part.agent);
    if (part.agent === player) {
      progress.count++;
      progress.stopAt = index;
    }
  });
}

/** Success of every part this player was given; 0 until each of them has a goal. */
export function andGoal(progress: AndProgress): Goal | null {
  if (progress.request === undefined || progress.count === 0) return null;
  if (progress.goals.size === 0) return constant(0);
  return allOf([...progress.goals.values()], progress.count);
}

/**
 * Outside its own turn a player only reports whether it is still busy: a
 * placeholder while its current part is unfinished or its next part follows
 * directly, nothing otherwise.
 */
function busy(ctx: PolicyContext, progress: AndProgress, player: string): PolicyOutcome {
  const goal = andGoal(progress);
  const current = progress.current;
  if (current === undefined) return { steps: [], goal };
  const done = evaluateGoal(progress.goals.get(current) ?? constant(0), ctx) === 1;
  if (done && progress.order[current + 1] !== player) return { steps: [], goal };
  return { steps: [{ kind: "more-coming" }], goal };
}

/** How a book runs its own single-request policies on one part. */
export type PartRunner = (ctx: PolicyContext, part: PrimitiveRequest) => PolicyOutcome | null;

/**
 * Works through the parts of a compound request in order. A player waits
 * while an earlier part belongs to a player who is still busy, and acts on
 * its own parts until each of their goals holds.
 */
export function andStep(
  ctx: PolicyContext,
  player: string,
  progress: AndProgress,
  request: AndRequest,
  runPart: PartRunner,
): PolicyOutcome {
  bind(progress, request, player);
  const goal = andGoal(progress);
  if (progress.count === 0 || (goal && evaluateGoal(goal, ctx) === 1)) return { steps: [], goal };
  if (ctx.speaker !== player) return busy(ctx, progress, player);

  // Each earlier player is asked once per pass.
  const visited = new Set<string>([player]);
  for (let index = 0; index <= progress.stopAt; index++) {
    const part = request.parts[index];
    if (part.agent !== player) {
      if (visited.has(part.agent)) continue;
      visited.add(part.agent);
      const other: PolicyBookLike | undefined = ctx.bookOf(part.agent);
      const waiting = other?.respondToAnd(ctx, request);
      if (waiting && waiting.steps.length > 0) return { steps: [], goal: andGoal(progress) };
      continue;
    }
    const outcome = runPart(ctx, part);
    if (!outcome || outcome.steps.length === 0) return { steps: [], goal: andGoal(progress) };
    if (!outcome.goal) continue;
    if (!progress.goals.has(index)) {
      progress.goals.set(index, outcome.goal);
      progress.current = index;
    }
    const registered = progress.goals.get(index);
    if (registered && evaluateGoal(registered, ctx) !== 1) {
      progress.goals.set(index, outcome.goal);
      return { steps: outcome.steps, goal: andGoal(progress) };
    }
  }
  return { steps: [], goal: andGoal(progress) };
}

/** Steps of a busy player from outside its turn. */
export function andStatus(ctx: PolicyContext, player: string, progress: AndProgress, request: AndRequest): PolicyOutcome {
  bind(progress, request, player);
  const goal = andGoal(progress);
  if (progress.count === 0 || (goal && evaluateGoal(goal, ctx) === 1)) return { steps: [], goal };
  return busy(ctx, progress, player);
}
