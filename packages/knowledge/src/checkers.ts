import type { ConflictStatement, ContentsStatement, PropertyValue, Statement, Trinary, ValidValueStatement } from "@worldtalk/schemas";
import { negate, statementKey, valuesEqual } from "@worldtalk/schemas";
import { type Entity, describeEntity } from "@worldtalk/world";
import type { KnowledgeState } from "./updaters.js";
import { addPropSeen } from "./visibility.js";

export interface Checker {
  name: string;
  check(state: KnowledgeState, statement: Statement): Trinary;
}

function flip(result: Trinary, negated: boolean): Trinary {
  return result === undefined || !negated ? result : !result;
}

/** What the participants were shown about "X's key is value", before negation. */
export function seenProperty(entity: Entity, key: string, value: PropertyValue): Trinary {
  const { propSeen, propSeenNeg } = entity.visibility;
  const seen = propSeen.get(key);
  if (seen !== undefined) return valuesEqual(seen, value);
  if (propSeenNeg.get(key)?.some((v) => valuesEqual(v, value))) return false;
  return undefined;
}

export function seenAttribute(entity: Entity, attr: string): Trinary {
  if (entity.visibility.attrSeen.has(attr)) return true;
  if (entity.visibility.attrSeenNeg.has(attr)) return false;
  return undefined;
}

/** Whether the statement itself, or its opposite, was accepted as a plain fact. */
export function factCheck(state: KnowledgeState, statement: Statement): Trinary {
  let result: Trinary;
  if (state.facts.has(statementKey(statement))) result = true;
  const opposite = negate(statement);
  if (opposite && state.facts.has(statementKey(opposite))) result = false;
  return result;
}

function contentsCheck(state: KnowledgeState, statement: ContentsStatement): Trinary {
  if (!state.world.find(statement.holder)) return undefined;
  const location = { position: statement.position, holder: statement.holder };
  const everything = statement.negated && statement.items.length === 0;
  const results: Trinary[] = [];
  for (const id of everything ? state.world.objects.map((o) => o.id) : statement.items) {
    const obj = state.world.find(id);
    if (!obj) return undefined;
    results.push(flip(seenProperty(obj, "location", location), statement.negated));
  }
  if (results.length > 0 && results.every((r) => r === true)) return true;
  return results.includes(false) ? false : undefined;
}

/**
 * "Changing X's key to value conflicts with Y" is known once the participants
 * could no longer tell Y apart from X with the new value in place.
 */
function conflictCheck(state: KnowledgeState, statement: ConflictStatement): Trinary {
  const entity = state.world.find(statement.subject);
  const other = state.world.find(statement.with);
  if (!entity || !other) return undefined;
  const worldMark = state.world.save();
  const knowledgeMark = state.log.save();
  state.world.setProperty(entity, statement.key, statement.value);
  addPropSeen(state.log, entity, statement.key, statement.value);
  try {
    return describeEntity(state.world, other, false) === null ? true : undefined;
  } finally {
    state.log.recover(knowledgeMark);
    state.world.recover(worldMark);
  }
}

function validValueCheck(state: KnowledgeState, statement: ValidValueStatement): Trinary {
  const keys = new Set<string>();
  for (const obj of state.world.objects) {
    for (const [key, seen] of obj.visibility.propSeen) {
      if (seen === statement.value) keys.add(key);
    }
  }
  if (keys.size > 0) return keys.has(statement.key) !== statement.negated;
  return factCheck(state, statement);
}

/** Tried in order; the first answer that is not unknown wins. */
export const CHECKERS: readonly Checker[] = [
  {
    name: "property",
    check: (state, s) => {
      if (s.kind === "property") {
        const entity = state.world.find(s.subject);
        return entity ? flip(seenProperty(entity, s.key, s.value), s.negated) : undefined;
      }
      if (s.kind === "attribute") {
        const entity = state.world.find(s.subject);
        return entity ? flip(seenAttribute(entity, s.attribute), s.negated) : undefined;
      }
      return undefined;
    },
  },
  {
    name: "contents",
    check: (state, s) => (s.kind === "contents" ? contentsCheck(state, s) : undefined),
  },
  {
    name: "element-exists",
    check: (state, s) => {
      if (s.kind !== "element-exists") return undefined;
      const entity = state.world.find(s.subject);
      if (!entity) return undefined;
      const { elemExists, elemNotExists } = entity.visibility;
      let result: Trinary;
      if (elemExists.has(s.element) || entity.visibility.hasSeen(s.element)) result = true;
      else if (elemNotExists.has(s.element)) result = false;
      return flip(result, s.negated);
    },
  },
  {
    name: "conflict",
    check: (state, s) => (s.kind === "conflict" ? conflictCheck(state, s) : undefined),
  },
  {
    name: "valid-value",
    check: (state, s) => (s.kind === "valid-value" ? validValueCheck(state, s) : undefined),
  },
  { name: "facts", check: factCheck },
];
