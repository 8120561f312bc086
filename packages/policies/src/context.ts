import type { AndRequest, Request, SeededRandom, Statement } from "@worldtalk/schemas";
import type { KnowledgeBase } from "@worldtalk/knowledge";
import type { Entity } from "@worldtalk/world";
import type { DialogueView, Goal } from "./goals.js";

/** What an agent policy sees of the running dialogue. */
export interface PolicyContext extends DialogueView {
  readonly knowledge: KnowledgeBase;
  /** The dialogue's own PRNG; tie-breaks draw from it. */
  readonly random: SeededRandom;
  /** Whose turn it is. */
  readonly speaker: string | undefined;
  bookOf(player: string): PolicyBookLike | undefined;
}

/** Steps are alternatives for the next utterance; the dialogue picks one. */
export interface PolicyOutcome {
  steps: Statement[];
  goal: Goal | null;
}

/** What one player's policy may ask of another player's. */
export interface PolicyBookLike {
  readonly player: string;
  /** The player's progress on a compound request, from outside its turn. */
  respondToAnd(ctx: PolicyContext, request: AndRequest): PolicyOutcome | null;
}

/** One agent's task on one concrete entity. */
export type EntityTask = (item: Entity) => PolicyOutcome;

/** The latest request a trusted speaker put to the dialogue. */
export function requestOf(ctx: DialogueView): Request | undefined {
  for (let i = ctx.utterances.length - 1; i >= 0; i--) {
    const { statement, trusted } = ctx.utterances[i];
    if (trusted && statement.kind === "say" && statement.content.kind === "request") return statement.content.request;
  }
  return undefined;
}
