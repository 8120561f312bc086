import { v4 as uuid } from "uuid";
import type {
  GoalValue,
  Logger,
  RandomState,
  Request,
  Statement,
  TranscriptEventType,
  Utterance,
} from "@worldtalk/schemas";
import { InvariantError, SeededRandom, createLogger } from "@worldtalk/schemas";
import { ContextLog, KnowledgeBase, type KnowledgeCheckpoint } from "@worldtalk/knowledge";
import {
  type AgentVariant,
  type BookSnapshot,
  DEFAULT_VARIANTS,
  EnvironmentPolicy,
  PolicyBook,
  UserPolicy,
} from "@worldtalk/policies";
import type { Checkpoint, World } from "@worldtalk/world";
import { Dialogue, type DialogueOptions } from "./dialogue.js";
import { renderUtterance } from "./render.js";
import type { RequestSampler } from "./sampler.js";

export interface EngineOptions {
  /** Seeds the per-dialogue seeds. */
  seed?: number | string;
  variants?: readonly AgentVariant[];
  maxEpisodeLength?: number;
  maxSafety?: number;
  logger?: Logger;
}

export interface EngineSnapshot {
  world: Checkpoint;
  worldRandom: RandomState;
  random: RandomState;
  knowledge: KnowledgeCheckpoint;
  context: number;
  books: Map<string, BookSnapshot>;
}

export interface ExecuteOptions {
  /** Commit the utterances without asking the environment. */
  skipEnvironment?: boolean;
}

/** Where batch transcripts go; the hash-chained journal is one. */
export interface TranscriptSink {
  emit(dialogueId: string, type: TranscriptEventType, payload: Record<string, unknown>): Promise<unknown>;
}

export interface BatchOptions {
  sampler: RequestSampler;
  journal?: TranscriptSink;
  /** Flush the shared context whenever it holds at least this many utterances. */
  flushAfter?: number;
}

export interface BatchFailure {
  dialogueId: string;
  request: Request;
  reward: GoalValue;
  transcript: string[];
}

export interface BatchReport {
  batchId: string;
  total: number;
  succeeded: number;
  failures: BatchFailure[];
}

/** Statements that only hold a turn and never reach the history. */
function isSilent(statement: Statement): boolean {
  return statement.kind === "more-coming" || statement.kind === "empty";
}

function agentsOf(request: Request): string[] {
  return request.kind === "and" ? [...new Set(request.parts.map((part) => part.agent))] : [request.agent];
}

/**
 * State shared by every dialogue over one world: the context log, the
 * knowledge base reading it, one policy book per player and the environment.
 * Dialogues run one after another and keep building on what earlier ones
 * revealed.
 */
export class DialogueEngine {
  readonly world: World;
  readonly context = new ContextLog();
  readonly knowledge: KnowledgeBase;
  readonly environment: EnvironmentPolicy;
  readonly random: SeededRandom;
  private books = new Map<string, PolicyBook>();
  private options: EngineOptions;
  private logger: Logger;

  constructor(world: World, options: EngineOptions = {}) {
    this.world = world;
    this.options = options;
    this.logger = options.logger ?? createLogger("engine");
    this.random = new SeededRandom(options.seed ?? 0);
    this.knowledge = new KnowledgeBase(world, this.context, { logger: this.logger });
    this.environment = new EnvironmentPolicy({ logger: this.logger });
    for (const player of world.players) {
      this.books.set(player.id, new PolicyBook(player.id, options.variants ?? DEFAULT_VARIANTS));
    }
  }

  bookOf(player: string): PolicyBook | undefined {
    return this.books.get(player);
  }

  /** A dialogue in which `user` puts `request` to the agents it names. */
  createDialogue(user: string, request: Request, options: DialogueOptions = {}): Dialogue {
    if (!this.books.has(user)) throw new InvariantError("UNKNOWN_ENTITY", `unknown player "${user}"`);
    const agents = agentsOf(request).map((id) => {
      const book = this.books.get(id);
      if (!book) throw new InvariantError("UNKNOWN_ENTITY", `unknown player "${id}"`);
      book.reset();
      return book;
    });
    return new Dialogue(this, [new UserPolicy(user, request), ...agents], {
      seed: this.random.int(0, 999_999_999),
      maxEpisodeLength: this.options.maxEpisodeLength,
      maxSafety: this.options.maxSafety,
      logger: this.logger,
      ...options,
    });
  }

  /**
   * Commits utterances to the context, updates the knowledge base and adds
   * one environment response per utterance, picked with `random`.
   */
  executeUtterances(utterances: readonly Utterance[], random: SeededRandom, options: ExecuteOptions = {}): Utterance[] {
    const committed: Utterance[] = [];
    for (const utterance of utterances) {
      if (isSilent(utterance.statement)) continue;
      this.context.add(utterance);
      committed.push(utterance);
      this.knowledge.contextUpdate();
      if (options.skipEnvironment) continue;

      const feedback = this.environment.respond(this.world, utterance);
      if (feedback.length === 0) continue;
      const response: Utterance = { speaker: null, statement: random.choice(feedback), trusted: true };
      this.context.add(response);
      committed.push(response);
      this.knowledge.contextUpdate();
    }
    return committed;
  }

  // ─── State ────────────────────────────────────────────────────────

  save(): EngineSnapshot {
    const books = new Map<string, BookSnapshot>();
    for (const [player, book] of this.books) books.set(player, book.save());
    return {
      world: this.world.save(),
      worldRandom: this.world.random.save(),
      random: this.random.save(),
      knowledge: this.knowledge.save(),
      context: this.context.end,
      books,
    };
  }

  recover(snapshot: EngineSnapshot): void {
    this.world.recover(snapshot.world);
    this.world.random.restore(snapshot.worldRandom);
    this.random.restore(snapshot.random);
    this.context.truncate(snapshot.context);
    this.knowledge.recover(snapshot.knowledge);
    for (const [player, state] of snapshot.books) this.books.get(player)?.restore(state);
  }

  /**
   * Drops the stored context and forgets every pending undo. What the
   * knowledge base has folded in stays, so its answers do not change.
   */
  flush(): void {
    this.knowledge.contextUpdate();
    this.context.flush();
    this.world.log.clear();
    this.knowledge.log.clear();
  }

  // ─── Batches ──────────────────────────────────────────────────────

  /** Runs `count` sampled dialogues in turn and reports those that did not succeed. */
  async runBatch(count: number, options: BatchOptions): Promise<BatchReport> {
    const { sampler, journal, flushAfter } = options;
    const report: BatchReport = { batchId: uuid(), total: 0, succeeded: 0, failures: [] };

    for (let i = 0; i < count; i++) {
      const { user, request } = sampler.sample();
      const dialogue = this.createDialogue(user, request);
      await journal?.emit(dialogue.id, "dialogue.started", { user, request, seed: dialogue.seed });
      const reward = dialogue.run();
      report.total++;

      if (journal) {
        for (const [index, utterance] of dialogue.utterances.entries()) {
          await journal.emit(dialogue.id, "utterance.added", {
            index,
            speaker: utterance.speaker,
            statement: utterance.statement,
            trusted: utterance.trusted,
            text: renderUtterance(this.world, utterance),
          });
        }
        for (const failure of dialogue.failures) {
          await journal.emit(dialogue.id, "policy.failed", { ...failure });
        }
        await journal.emit(dialogue.id, "dialogue.finished", {
          reward,
          rounds: dialogue.counter,
          utterances: dialogue.utterances.length,
        });
      }

      if (reward === 1) {
        report.succeeded++;
      } else {
        const transcript = dialogue.utterances.map((u) => renderUtterance(this.world, u));
        report.failures.push({ dialogueId: dialogue.id, request, reward, transcript });
        this.logger.error("dialogue did not succeed", { dialogue_id: dialogue.id, reward, transcript });
      }

      if (flushAfter !== undefined && this.context.length >= flushAfter) this.flush();
    }

    await journal?.emit(report.batchId, "batch.summary", {
      total: report.total,
      succeeded: report.succeeded,
      failed: report.failures.length,
    });
    return report;
  }
}
