import type { Logger, Statement, Utterance } from "@worldtalk/schemas";
import { InvariantError, createLogger } from "@worldtalk/schemas";
import { perform } from "@worldtalk/actions";
import type { World } from "@worldtalk/world";

export interface EnvironmentOptions {
  logger?: Logger;
}

/**
 * Executes what players try and reports the outcome. Said statements get no
 * feedback; anything else is not understood. Invariant violations from the
 * action layer propagate.
 */
export class EnvironmentPolicy {
  private logger: Logger;

  constructor(options: EnvironmentOptions = {}) {
    this.logger = options.logger ?? createLogger("environment");
  }

  /** Alternative responses to one utterance; empty when there is nothing to report. */
  respond(world: World, utterance: Utterance): Statement[] {
    const { statement } = utterance;
    switch (statement.kind) {
      case "tries":
        try {
          return perform(world, statement.attempt);
        } catch (err) {
          if (err instanceof InvariantError) throw err;
          this.logger.warn("action failed", {
            kind: statement.attempt.kind,
            error: err instanceof Error ? err.message : String(err),
          });
          return [];
        }
      case "say":
      case "more-coming":
      case "empty":
        return [];
      default:
        return [{ kind: "unrecognized", actor: utterance.speaker ?? "environment" }];
    }
  }
}
