import type { GoalValue, Statement, Utterance } from "@worldtalk/schemas";
import { reduceUtterances, statementKey } from "@worldtalk/schemas";
import type { World } from "@worldtalk/world";

/** The part of a dialogue a goal is evaluated against. */
export interface DialogueView {
  readonly world: World;
  readonly utterances: readonly Utterance[];
}

// ─── Goal Descriptors ───────────────────────────────────────────────

/**
 * Success conditions bound to a dialogue history. `start` is the absolute
 * index in the history from which utterances count.
 */
export type Goal =
  | { kind: "constant"; value: GoalValue }
  /** The player's utterances contain the steps as an ordered subsequence. */
  | { kind: "steps-sublist"; player: string; steps: Statement[]; start: number }
  /** Any one of the steps appears among the player's utterances. */
  | { kind: "any-step"; player: string; steps: Statement[]; start: number }
  /** The environment reports the player moving into the target place. */
  | { kind: "reach-location"; player: string; target: string; start: number }
  /** The statement appears in the environment's feedback. */
  | { kind: "env-feedback"; statement: Statement; start: number }
  /** Every goal succeeds; with `expected`, there must also be exactly that many. */
  | { kind: "and"; goals: Goal[]; expected?: number }
  | { kind: "or"; goals: Goal[] };

export type GoalKind = Goal["kind"];

/** Index of the latest utterance, where newly built goals start counting. */
export function startOf(view: DialogueView): number {
  return view.utterances.length - 1;
}

export function constant(value: GoalValue): Goal {
  return { kind: "constant", value };
}

export function stepsSublist(view: DialogueView, player: string, steps: Statement[]): Goal {
  return { kind: "steps-sublist", player, steps, start: startOf(view) };
}

export function anyStep(view: DialogueView, player: string, steps: Statement[]): Goal {
  return { kind: "any-step", player, steps, start: startOf(view) };
}

export function reachLocation(view: DialogueView, player: string, target: string): Goal {
  return { kind: "reach-location", player, target, start: startOf(view) };
}

export function envFeedback(view: DialogueView, statement: Statement): Goal {
  return { kind: "env-feedback", statement, start: startOf(view) };
}

export function allOf(goals: Goal[], expected?: number): Goal {
  return expected === undefined ? { kind: "and", goals } : { kind: "and", goals, expected };
}

export function anyOf(goals: Goal[]): Goal {
  return { kind: "or", goals };
}

// ─── Evaluation ─────────────────────────────────────────────────────

function said(view: DialogueView, speaker: string | null, start: number): Utterance[] {
  return view.utterances.slice(Math.max(start, 0)).filter((u) => u.speaker === speaker);
}

function isSubsequence(needles: readonly string[], haystack: readonly string[]): boolean {
  let i = 0;
  for (const key of haystack) {
    if (i < needles.length && needles[i] === key) i++;
  }
  return i === needles.length;
}

function reached(view: DialogueView, player: string, target: string, start: number): boolean {
  return reduceUtterances(said(view, null, start)).some((s) => {
    if (s.kind !== "go" || s.actor !== player || s.from === undefined) return false;
    return view.world.find(s.from)?.exits.get(s.direction)?.id === target;
  });
}

/** 1 when the goal holds on the current history, 0 otherwise; constants return their value. */
export function evaluateGoal(goal: Goal, view: DialogueView): GoalValue {
  switch (goal.kind) {
    case "constant":
      return goal.value;
    case "steps-sublist": {
      const spoken = said(view, goal.player, goal.start).map((u) => statementKey(u.statement));
      return isSubsequence(goal.steps.map(statementKey), spoken) ? 1 : 0;
    }
    case "any-step": {
      const spoken = new Set(said(view, goal.player, goal.start).map((u) => statementKey(u.statement)));
      return goal.steps.some((s) => spoken.has(statementKey(s))) ? 1 : 0;
    }
    case "reach-location":
      return reached(view, goal.player, goal.target, goal.start) ? 1 : 0;
    case "env-feedback": {
      const key = statementKey(goal.statement);
      return reduceUtterances(said(view, null, goal.start)).some((s) => statementKey(s) === key) ? 1 : 0;
    }
    case "and":
      if (goal.expected !== undefined && goal.goals.length !== goal.expected) return 0;
      return goal.goals.every((g) => evaluateGoal(g, view) === 1) ? 1 : 0;
    case "or":
      return goal.goals.some((g) => evaluateGoal(g, view) === 1) ? 1 : 0;
  }
}
