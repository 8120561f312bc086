import type { AbstractItem, PrimitiveRequest, Statement } from "@worldtalk/schemas";
import { attribute, property, say } from "@worldtalk/schemas";
import type { KnowledgeBase } from "@worldtalk/knowledge";
import type { Entity } from "@worldtalk/world";
import type { EntityTask, PolicyContext, PolicyOutcome } from "./context.js";
import { anyOf, constant, stepsSublist } from "./goals.js";
import { saysNegative } from "./reasoning.js";

/** Which entity an agent settled on for an abstract request. */
export interface TaskMemo {
  request: PrimitiveRequest | undefined;
  item: string | undefined;
}

export function emptyTaskMemo(): TaskMemo {
  return { request: undefined, item: undefined };
}

/** Whether the agent has been shown every element the abstract item names on this entity. */
function observable(knowledge: KnowledgeBase, entity: Entity, abstract: AbstractItem): boolean {
  for (const key of Object.keys(abstract.properties)) {
    const value = entity.properties.get(key);
    if (value !== undefined && knowledge.check(property(entity.id, key, value)) !== true) return false;
  }
  for (const attr of abstract.attributes) {
    if (attr !== "abstract" && entity.is(attr) && knowledge.check(attribute(entity.id, attr)) !== true) return false;
  }
  return true;
}

/**
 * Runs the task for every observable entity matching "a red ball". When
 * all of them fail for the stated reason the agent says the generic
 * negative; otherwise it keeps working on one candidate, the one it picked
 * earlier for this request while that one is still a candidate.
 */
export function resolveAbstract(
  ctx: PolicyContext,
  player: Entity,
  abstract: AbstractItem,
  request: PrimitiveRequest,
  memo: TaskMemo,
  negative: Statement,
  negativeFor: (item: Entity) => Statement,
  task: EntityTask,
): PolicyOutcome {
  if (memo.request !== request) {
    memo.request = request;
    memo.item = undefined;
  }
  const candidates = ctx.world.query(abstract).filter((e) => observable(ctx.knowledge, e, abstract));
  const found: { item: Entity; outcome: PolicyOutcome }[] = [];
  let negativeGoals = 0;
  for (const candidate of candidates) {
    const outcome = task(candidate);
    const refusal = negativeFor(candidate);
    if (saysNegative(outcome.steps, refusal)) {
      negativeGoals++;
      continue;
    }
    if (outcome.goal?.kind === "any-step" && saysNegative(outcome.goal.steps, refusal)) negativeGoals++;
    found.push({ item: candidate, outcome });
  }

  const sayNegative = say(player.id, negative);
  if (found.length === 0) {
    const steps = [sayNegative];
    return { steps, goal: stepsSublist(ctx, player.id, steps) };
  }
  const goal =
    negativeGoals === candidates.length
      ? stepsSublist(ctx, player.id, [sayNegative])
      : anyOf(found.map((f) => f.outcome.goal ?? constant(1)));
  let chosen = found.find((f) => f.item.id === memo.item);
  if (!chosen) {
    chosen = ctx.random.choice(found);
    memo.item = chosen.item.id;
  }
  return { steps: chosen.outcome.steps, goal };
}
