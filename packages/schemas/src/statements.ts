import type {
  ActionStatement,
  Attempt,
  AttributeStatement,
  CannotStatement,
  CompoundStatement,
  ContentsStatement,
  ItemRef,
  LocationValue,
  Preposition,
  PropertyStatement,
  PropertyValue,
  SayStatement,
  Statement,
  TriesStatement,
  Utterance,
} from "./types.js";

// ─── Canonical Form ─────────────────────────────────────────────────

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonicalize);
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const v: unknown = Reflect.get(value, key);
      if (v !== undefined) out[key] = canonicalize(v);
    }
    return out;
  }
  return value;
}

/** Stable string key of a statement; equal statements share a key regardless of field order. */
export function statementKey(statement: Statement): string {
  return JSON.stringify(canonicalize(statement));
}

export function statementsEqual(a: Statement, b: Statement): boolean {
  return statementKey(a) === statementKey(b);
}

export function valuesEqual(a: PropertyValue | undefined, b: PropertyValue | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  if (typeof a === "string" || typeof b === "string") return a === b;
  return a.position === b.position && a.holder === b.holder;
}

export function includesStatement(list: readonly Statement[], statement: Statement): boolean {
  const key = statementKey(statement);
  return list.some((s) => statementKey(s) === key);
}

// ─── Builders ───────────────────────────────────────────────────────

export function property(subject: string, key: string, value: PropertyValue, negated = false): PropertyStatement {
  return { kind: "property", subject, key, value, negated };
}

export function attribute(subject: string, attr: string, negated = false): AttributeStatement {
  return { kind: "attribute", subject, attribute: attr, negated };
}

export function located(subject: string, position: Preposition, holder: string, negated = false): PropertyStatement {
  return property(subject, "location", { position, holder }, negated);
}

export function contents(holder: string, position: Preposition, items: string[], negated = false): ContentsStatement {
  return { kind: "contents", holder, position, items: [...items].sort(), negated };
}

export function cannot(actor: string, attempt: Attempt, reasons: Statement[] = []): CannotStatement {
  return { kind: "cannot", actor, attempt, reasons };
}

export function compound(parts: Statement[]): CompoundStatement {
  return { kind: "compound", parts };
}

export function say(speaker: string, content: Statement): SayStatement {
  return { kind: "say", speaker, content };
}

export function tries(actor: string, attempt: ActionStatement): TriesStatement {
  return { kind: "tries", actor, attempt };
}

export function at(position: Preposition, holder: string): LocationValue {
  return { position, holder };
}

/** "P can not go to X" for a concrete or abstract target. */
export function cannotGoTo(actor: string, target: ItemRef): CannotStatement {
  return cannot(actor, { kind: "go-to", target });
}

// ─── Structure ──────────────────────────────────────────────────────

/**
 * Flatten a statement into the plain facts it carries.
 * A compound yields its parts; a refusal yields the bare refusal followed by its reasons.
 */
export function reduceStatement(statement: Statement): Statement[] {
  switch (statement.kind) {
    case "compound":
      return statement.parts.flatMap(reduceStatement);
    case "cannot":
      return [
        { kind: "cannot", actor: statement.actor, attempt: statement.attempt, reasons: [] },
        ...statement.reasons.flatMap(reduceStatement),
      ];
    default:
      return [statement];
  }
}

export function reduceUtterances(utterances: readonly Utterance[]): Statement[] {
  return utterances.flatMap((u) => reduceStatement(u.statement));
}

/** The opposite statement for shapes that carry a negation flag, null otherwise. */
export function negate(statement: Statement): Statement | null {
  switch (statement.kind) {
    case "property":
    case "attribute":
    case "contents":
    case "permission":
    case "valid-value":
    case "element-exists":
      return { ...statement, negated: !statement.negated };
    default:
      return null;
  }
}

/** True when the statement is a refusal of the given verb, e.g. "P can not go ...". */
export function isRefusal(statement: Statement, verb: Attempt["kind"]): statement is CannotStatement {
  return statement.kind === "cannot" && statement.attempt.kind === verb;
}

/** Whether any of the steps is "<player> says: <content>" with the exact content. */
export function saysContent(steps: readonly Statement[], content: Statement): boolean {
  const key = statementKey(content);
  return steps.some((step) => step.kind === "say" && statementKey(step.content) === key);
}
