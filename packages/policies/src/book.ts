import type {
  AbstractAttempt,
  AndRequest,
  IsAttributeRequest,
  IsPropertyRequest,
  ItemRef,
  PrimitiveRequest,
  Statement,
} from "@worldtalk/schemas";
import { cannot, cannotGoTo } from "@worldtalk/schemas";
import { toPlacement } from "@worldtalk/actions";
import type { Entity } from "@worldtalk/world";
import { type TaskMemo, emptyTaskMemo, resolveAbstract } from "./abstract-items.js";
import { type AndProgress, andGoal, andStatus, andStep, copyProgress, emptyProgress } from "./and-policy.js";
import { type EntityTask, type PolicyBookLike, type PolicyContext, type PolicyOutcome, requestOf } from "./context.js";
import type { Goal } from "./goals.js";
import { changeTask, dropTask, getTask, lookTask, openCloseTask } from "./item-tasks.js";
import { type MovementMemo, emptyMovementMemo, goDirectionTask, goLocationTask } from "./movement.js";
import { isAttributeTask, isPropertyTask, summarizeAnswers } from "./questions.js";

export type AgentVariant =
  | "and"
  | "go-direction"
  | "is-property"
  | "is-attribute"
  | "go-location"
  | "get"
  | "drop"
  | "look"
  | "open-close"
  | "change";

export const DEFAULT_VARIANTS: readonly AgentVariant[] = [
  "and",
  "go-direction",
  "is-property",
  "is-attribute",
  "go-location",
  "get",
  "drop",
  "look",
  "open-close",
  "change",
];

type NegativeVerb = AbstractAttempt["verb"] | "go-to";

export interface BookSnapshot {
  memos: Map<AgentVariant, TaskMemo>;
  movement: MovementMemo;
  progress: AndProgress;
}

function variantOf(request: PrimitiveRequest): AgentVariant {
  return request.kind === "open" || request.kind === "close" ? "open-close" : request.kind;
}

/**
 * One agent's policies, tried in book order; the first variant that
 * handles the request wins. Per-request memos live here so a dialogue can
 * save and restore them around a speculative run.
 */
export class PolicyBook implements PolicyBookLike {
  readonly player: string;
  readonly variants: readonly AgentVariant[];
  private memos = new Map<AgentVariant, TaskMemo>();
  private movement: MovementMemo = emptyMovementMemo();
  private progress: AndProgress = emptyProgress();

  constructor(player: string, variants: readonly AgentVariant[] = DEFAULT_VARIANTS) {
    this.player = player;
    this.variants = variants;
  }

  /** The next steps toward the latest request put to this player. */
  respond(ctx: PolicyContext): PolicyOutcome | null {
    const request = requestOf(ctx);
    if (!request) return null;
    if (request.kind === "and") {
      if (!this.variants.includes("and")) return null;
      return andStep(ctx, this.player, this.progress, request, (c, part) => this.act(c, part));
    }
    return request.agent === this.player ? this.act(ctx, request) : null;
  }

  respondToAnd(ctx: PolicyContext, request: AndRequest): PolicyOutcome | null {
    return this.variants.includes("and") ? andStatus(ctx, this.player, this.progress, request) : null;
  }

  /** Success of this player's parts of the compound request it last worked on. */
  andGoal(): Goal | null {
    return andGoal(this.progress);
  }

  /** Runs the single-request policy for a primitive request addressed to this player. */
  act(ctx: PolicyContext, request: PrimitiveRequest): PolicyOutcome | null {
    const variant = variantOf(request);
    if (request.agent !== this.player || !this.variants.includes(variant)) return null;
    const player = ctx.world.get(this.player);
    const memo = this.memo(variant);
    const { world } = ctx;

    const run = (item: ItemRef, verb: NegativeVerb, task: EntityTask, negativeFor: (e: Entity) => Statement) => {
      if (typeof item === "string") return task(world.get(item));
      const negative =
        verb === "go-to" ? cannotGoTo(player.id, item) : cannot(player.id, { kind: "abstract", verb, item });
      return resolveAbstract(ctx, player, item, request, memo, negative, negativeFor, task);
    };

    switch (request.kind) {
      case "go-direction":
        return goDirectionTask(ctx, player, request.direction, this.movement, request);
      case "go-location":
        return run(request.item, "go-to", (e) => goLocationTask(ctx, player, e), (e) => cannotGoTo(player.id, e.id));
      case "get": {
        const at = toPlacement(world, request.location);
        return run(
          request.item,
          "get",
          (e) => getTask(ctx, player, e, at),
          (e) => cannot(player.id, { kind: "get", actor: player.id, item: e.id }),
        );
      }
      case "drop": {
        const to = request.location;
        const at = toPlacement(world, to);
        return run(
          request.item,
          "drop",
          (e) => dropTask(ctx, player, e, at),
          (e) => cannot(player.id, { kind: "drop", actor: player.id, item: e.id, to }),
        );
      }
      case "look": {
        const at = toPlacement(world, request.location);
        const { position } = request;
        return run(
          request.item,
          "look",
          (e) => lookTask(ctx, player, e, position, at),
          (e) => cannot(player.id, { kind: "look", actor: player.id, position, target: e.id }),
        );
      }
      case "open":
      case "close": {
        const at = toPlacement(world, request.location);
        const verb = request.kind;
        return run(
          request.item,
          verb,
          (e) => openCloseTask(ctx, player, e, verb, at),
          (e) => cannot(player.id, { kind: verb, actor: player.id, item: e.id }),
        );
      }
      case "change": {
        const { key, value } = request;
        return run(
          request.item,
          "change",
          (e) => changeTask(ctx, player, e, key, value),
          (e) => cannot(player.id, { kind: "change", actor: player.id, item: e.id, key, value }),
        );
      }
      case "is-property": {
        const question: IsPropertyRequest = request;
        const { item, key, value } = question;
        const task: EntityTask = (e) => isPropertyTask(ctx, player, e, key, value);
        if (typeof item === "string") return task(world.get(item));
        const outcome = resolveAbstract(
          ctx,
          player,
          item,
          request,
          memo,
          { kind: "dont-know", question },
          (e) => ({ kind: "dont-know", question: { ...question, item: e.id } }),
          task,
        );
        return summarizeAnswers(ctx, player, item, outcome, { key, value });
      }
      case "is-attribute": {
        const question: IsAttributeRequest = request;
        const { item, attribute } = question;
        const task: EntityTask = (e) => isAttributeTask(ctx, player, e, attribute);
        if (typeof item === "string") return task(world.get(item));
        const outcome = resolveAbstract(
          ctx,
          player,
          item,
          request,
          memo,
          { kind: "dont-know", question },
          (e) => ({ kind: "dont-know", question: { ...question, item: e.id } }),
          task,
        );
        return summarizeAnswers(ctx, player, item, outcome, { attribute });
      }
    }
  }

  save(): BookSnapshot {
    const memos = new Map<AgentVariant, TaskMemo>();
    for (const [variant, memo] of this.memos) memos.set(variant, { ...memo });
    return { memos, movement: { ...this.movement }, progress: copyProgress(this.progress) };
  }

  restore(snapshot: BookSnapshot): void {
    this.memos = new Map();
    for (const [variant, memo] of snapshot.memos) this.memos.set(variant, { ...memo });
    this.movement = { ...snapshot.movement };
    this.progress = copyProgress(snapshot.progress);
  }

  /** Forgets every per-request memo. */
  reset(): void {
    this.memos.clear();
    this.movement = emptyMovementMemo();
    this.progress = emptyProgress();
  }

  private memo(variant: AgentVariant): TaskMemo {
    let memo = this.memos.get(variant);
    if (!memo) {
      memo = emptyTaskMemo();
      this.memos.set(variant, memo);
    }
    return memo;
  }
}
