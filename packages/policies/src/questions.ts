import type { AbstractItem, IsAttributeRequest, IsPropertyRequest, Statement, ValidValueStatement } from "@worldtalk/schemas";
import { attribute, property, say, valuesEqual } from "@worldtalk/schemas";
import { validity } from "@worldtalk/knowledge";
import type { Entity } from "@worldtalk/world";
import type { PolicyContext, PolicyOutcome } from "./context.js";
import { anyStep } from "./goals.js";

// ─── Concrete Questions ─────────────────────────────────────────────

/**
 * "Is the ball red?" The agent answers from what it has been shown; when it
 * has not been shown the property it says so, and any true answer counts.
 */
export function isPropertyTask(ctx: PolicyContext, player: Entity, item: Entity, key: string, value: string): PolicyOutcome {
  const { world, knowledge } = ctx;
  const notAKey: ValidValueStatement = { kind: "valid-value", key, value, negated: true };
  if (knowledge.check(notAKey) === true) {
    const steps = [say(player.id, notAKey)];
    return { steps, goal: anyStep(ctx, player.id, steps) };
  }

  const known = knowledge.check(property(item.id, key, value));
  if (known === undefined) {
    const question: IsPropertyRequest = { kind: "is-property", agent: player.id, item: item.id, key, value };
    const dontKnow = say(player.id, { kind: "dont-know", question });
    const accepted: Statement[] = [dontKnow];
    if (validity(world, key, value) === false) accepted.push(say(player.id, notAKey));
    const actual = item.getProperty(key);
    if (actual !== undefined) accepted.push(say(player.id, property(item.id, key, value, !valuesEqual(actual, value))));
    return { steps: [dontKnow], goal: anyStep(ctx, player.id, accepted) };
  }

  const steps = [say(player.id, property(item.id, key, value, !known))];
  return { steps, goal: anyStep(ctx, player.id, steps) };
}

/** "Is the door locked?" */
export function isAttributeTask(ctx: PolicyContext, player: Entity, item: Entity, attr: string): PolicyOutcome {
  const known = ctx.knowledge.check(attribute(item.id, attr));
  if (known === undefined) {
    const question: IsAttributeRequest = { kind: "is-attribute", agent: player.id, item: item.id, attribute: attr };
    const dontKnow = say(player.id, { kind: "dont-know", question });
    const accepted = [dontKnow, say(player.id, attribute(item.id, attr, !item.is(attr)))];
    return { steps: [dontKnow], goal: anyStep(ctx, player.id, accepted) };
  }
  const steps = [say(player.id, attribute(item.id, attr, !known))];
  return { steps, goal: anyStep(ctx, player.id, steps) };
}

// ─── Abstract Questions ─────────────────────────────────────────────

/**
 * Narrows an abstract answer: the known positive answers, or "there is no
 * such item" when every candidate is known not to match.
 */
export function summarizeAnswers(
  ctx: PolicyContext,
  player: Entity,
  item: AbstractItem,
  outcome: PolicyOutcome,
  noMatch: { key: string; value: string } | { attribute: string },
): PolicyOutcome {
  if (outcome.goal?.kind !== "or") return outcome;
  const positive: Statement[] = [];
  let negative = 0;
  for (const goal of outcome.goal.goals) {
    if (goal.kind !== "any-step" || goal.steps.length !== 1) continue;
    const step = goal.steps[0];
    if (step?.kind !== "say") continue;
    const content = step.content;
    if (content.kind !== "property" && content.kind !== "attribute") continue;
    if (content.negated) negative++;
    else positive.push(step);
  }
  if (negative > 0 && negative === outcome.goal.goals.length) {
    const steps = [say(player.id, { kind: "no-match", item, ...noMatch })];
    return { steps, goal: anyStep(ctx, player.id, steps) };
  }
  if (positive.length > 0) return { steps: positive, goal: anyStep(ctx, player.id, positive) };
  return outcome;
}
