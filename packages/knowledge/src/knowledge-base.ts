import type { Logger, Statement, Trinary, Utterance } from "@worldtalk/schemas";
import { createLogger, reduceStatement } from "@worldtalk/schemas";
import { type Checkpoint, TransactionLog, type World } from "@worldtalk/world";
import { CHECKERS, type Checker } from "./checkers.js";
import type { ContextLog } from "./context-log.js";
import { UPDATERS, type KnowledgeState, type Updater } from "./updaters.js";

export interface KnowledgeBaseOptions {
  logger?: Logger;
  updaters?: readonly Updater[];
  checkers?: readonly Checker[];
}

export interface KnowledgeCheckpoint {
  log: Checkpoint;
  offset: number;
}

/** The plain facts an utterance carries, including what a speaker says. */
function observedFacts(statement: Statement): Statement[] {
  return reduceStatement(statement).flatMap((s) => (s.kind === "say" ? observedFacts(s.content) : [s]));
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * What the dialogue participants have been told, kept apart from ground
 * truth. It catches up with the shared context before every check.
 */
export class KnowledgeBase implements KnowledgeState {
  readonly world: World;
  readonly context: ContextLog;
  readonly log = new TransactionLog();
  readonly facts = new Set<string>();
  private offset = 0;
  private logger: Logger;
  private updaters: readonly Updater[];
  private checkers: readonly Checker[];

  constructor(world: World, context: ContextLog, options: KnowledgeBaseOptions = {}) {
    this.world = world;
    this.context = context;
    this.logger = options.logger ?? createLogger("knowledge");
    this.updaters = options.updaters ?? UPDATERS;
    this.checkers = options.checkers ?? CHECKERS;
  }

  /** Absolute context offset up to which utterances have been folded in. */
  get processed(): number {
    return this.offset;
  }

  update(utterance: Utterance): void {
    if (!utterance.trusted) return;
    for (const statement of observedFacts(utterance.statement)) {
      for (const updater of this.updaters) {
        try {
          updater.update(this, statement);
        } catch (err) {
          this.logger.warn(`updater ${updater.name} failed`, { kind: statement.kind, error: errorMessage(err) });
        }
      }
    }
  }

  /** Fold in every utterance added since the last call. */
  contextUpdate(): void {
    for (const utterance of this.context.since(this.offset)) this.update(utterance);
    this.offset = this.context.end;
  }

  check(statement: Statement): Trinary {
    this.contextUpdate();
    return this.evaluate(statement);
  }

  /** True when every statement is known true, false when any is known false. */
  multiCheck(statements: readonly Statement[]): Trinary {
    this.contextUpdate();
    const results = statements.map((s) => this.evaluate(s));
    if (results.every((r) => r === true)) return true;
    return results.includes(false) ? false : undefined;
  }

  save(): KnowledgeCheckpoint {
    return { log: this.log.save(), offset: this.offset };
  }

  recover(checkpoint: KnowledgeCheckpoint): void {
    this.log.recover(checkpoint.log);
    this.offset = checkpoint.offset;
  }

  private evaluate(statement: Statement): Trinary {
    for (const checker of this.checkers) {
      let result: Trinary;
      try {
        result = checker.check(this, statement);
      } catch (err) {
        this.logger.warn(`checker ${checker.name} failed`, { kind: statement.kind, error: errorMessage(err) });
        continue;
      }
      if (result !== undefined) return result;
    }
    return undefined;
  }
}
