import { v4 as uuid } from "uuid";
import type { GoalValue, Logger, RandomState, Request, Utterance } from "@worldtalk/schemas";
import { SeededRandom, createLogger } from "@worldtalk/schemas";
import type { KnowledgeBase } from "@worldtalk/knowledge";
import type { World } from "@worldtalk/world";
import {
  type Goal,
  type PolicyBookLike,
  type PolicyContext,
  type PolicyOutcome,
  allOf,
  constant,
  evaluateGoal,
  requestOf,
} from "@worldtalk/policies";
import type { DialogueEngine } from "./engine.js";

/** Hard cap on rounds, for rule-based policies that never settle. */
export const MAX_SAFETY_TURNS = 1120;

/** Anything that can take a turn: the user, an agent's policy book, a scripted stand-in. */
export interface Participant {
  readonly player: string;
  respond(ctx: PolicyContext): PolicyOutcome | null;
}

export interface PolicyFailure {
  round: number;
  player: string;
  error: string;
}

export interface DialogueOptions {
  id?: string;
  seed?: number | string;
  /** Rounds after which a dialogue is over whatever its goal says. */
  maxEpisodeLength?: number;
  maxSafety?: number;
  logger?: Logger;
}

export interface DialogueSnapshot {
  utterances: Utterance[];
  speaker: string | undefined;
  counter: number;
  nextPolicy: number;
  goal: Goal | null;
  over: boolean;
  reward: GoalValue;
  random: RandomState;
  failures: PolicyFailure[];
}

/**
 * One episode between a user and one or more agents. Participants speak
 * round-robin; every utterance goes through the engine, which commits it to
 * the shared context and collects the environment's feedback. The PRNG is
 * seeded per dialogue, so a replay from the same state says the same things.
 */
export class Dialogue implements PolicyContext {
  readonly id: string;
  readonly seed: number | string;
  readonly engine: DialogueEngine;
  readonly participants: readonly Participant[];
  readonly maxEpisodeLength: number | undefined;
  readonly maxSafety: number;
  utterances: Utterance[] = [];
  speaker: string | undefined;
  /** Completed rounds. */
  counter = 0;
  nextPolicy = 0;
  goal: Goal | null = null;
  over = false;
  reward: GoalValue = 0;
  failures: PolicyFailure[] = [];
  random: SeededRandom;
  private logger: Logger;

  constructor(engine: DialogueEngine, participants: readonly Participant[], options: DialogueOptions = {}) {
    if (participants.length === 0) throw new Error("a dialogue needs at least one participant");
    this.id = options.id ?? uuid();
    this.seed = options.seed ?? 0;
    this.engine = engine;
    this.participants = participants;
    this.maxEpisodeLength = options.maxEpisodeLength;
    this.maxSafety = options.maxSafety ?? MAX_SAFETY_TURNS;
    this.random = new SeededRandom(this.seed);
    this.logger = options.logger ?? createLogger("dialogue");
  }

  get world(): World {
    return this.engine.world;
  }

  get knowledge(): KnowledgeBase {
    return this.engine.knowledge;
  }

  /** The request the user put to this dialogue, once it has been said. */
  get request(): Request | undefined {
    return requestOf(this);
  }

  bookOf(player: string): PolicyBookLike | undefined {
    return this.engine.bookOf(player);
  }

  // ─── Turns ────────────────────────────────────────────────────────

  /** One participant's turn. Returns the utterances it committed, feedback included. */
  step(): Utterance[] {
    const participant = this.participants[this.nextPolicy % this.participants.length];
    this.speaker = participant.player;
    const outcome = this.consult(participant);
    if (outcome?.goal) this.goal = outcome.goal;
    const statement = outcome && outcome.steps.length > 0 ? this.random.choice(outcome.steps) : undefined;

    this.nextPolicy++;
    if (this.nextPolicy % this.participants.length === 0) {
      this.nextPolicy = 0;
      this.counter++;
    }

    const added = statement
      ? this.engine.executeUtterances([{ speaker: participant.player, statement, trusted: true }], this.random)
      : [];
    this.utterances.push(...added);
    this.evaluateGoal();
    return added;
  }

  /**
   * Steps until the dialogue is over or the safety bound is hit. A fake run
   * puts the dialogue and the engine back where they were and only reports
   * the outcome.
   */
  run(fake = false): GoalValue {
    const snapshot = fake ? { dialogue: this.save(), engine: this.engine.save() } : undefined;
    try {
      while (true) {
        this.step();
        if (this.isOver() || this.counter >= this.maxSafety) break;
      }
      return this.evaluateGoal();
    } finally {
      if (snapshot) {
        this.engine.recover(snapshot.engine);
        this.recover(snapshot.dialogue);
      }
    }
  }

  /** Over once the goal is settled (or the episode is long enough) and the round is complete. */
  isOver(): boolean {
    const exhausted = this.maxEpisodeLength !== undefined && this.counter >= this.maxEpisodeLength;
    this.over = (exhausted || this.reward === 1 || this.reward === -1) && this.nextPolicy === 0 && this.counter > 0;
    return this.over;
  }

  /** Scores the active goal; a finished dialogue that did not succeed scores -1. */
  evaluateGoal(): GoalValue {
    const goal = this.activeGoal();
    let result: GoalValue = goal ? evaluateGoal(goal, this) : 0;
    if (this.isOver() && result !== 1) result = -1;
    this.reward = result;
    return result;
  }

  /**
   * For a compound request every addressed agent's share counts, including
   * agents that have not spoken yet; otherwise the latest goal a policy set.
   */
  activeGoal(): Goal | null {
    const request = this.request;
    if (request?.kind !== "and") return this.goal;
    const agents = [...new Set(request.parts.map((part) => part.agent))];
    return allOf(agents.map((agent) => this.engine.bookOf(agent)?.andGoal() ?? constant(0)));
  }

  // ─── State ────────────────────────────────────────────────────────

  save(): DialogueSnapshot {
    return {
      utterances: [...this.utterances],
      speaker: this.speaker,
      counter: this.counter,
      nextPolicy: this.nextPolicy,
      goal: this.goal,
      over: this.over,
      reward: this.reward,
      random: this.random.save(),
      failures: [...this.failures],
    };
  }

  recover(snapshot: DialogueSnapshot): void {
    this.utterances = [...snapshot.utterances];
    this.speaker = snapshot.speaker;
    this.counter = snapshot.counter;
    this.nextPolicy = snapshot.nextPolicy;
    this.goal = snapshot.goal;
    this.over = snapshot.over;
    this.reward = snapshot.reward;
    this.random.restore(snapshot.random);
    this.failures = [...snapshot.failures];
  }

  private consult(participant: Participant): PolicyOutcome | null {
    try {
      return participant.respond(this);
    } catch (err) {
      const failure: PolicyFailure = {
        round: this.counter,
        player: participant.player,
        error: err instanceof Error ? err.message : String(err),
      };
      this.failures.push(failure);
      this.logger.error("policy failed", { dialogue_id: this.id, ...failure });
      return null;
    }
  }
}
