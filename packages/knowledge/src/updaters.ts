import type {
  AttributeStatement,
  ContentsStatement,
  LocationValue,
  PermissionStatement,
  PropertyStatement,
  PropertyValue,
  Statement,
  ValidValueStatement,
} from "@worldtalk/schemas";
import { LOCATION_POSITIONS, negate, statementKey, valuesEqual } from "@worldtalk/schemas";
import { CHANGEABLE_PROPERTIES, type Entity, type TransactionLog, type World } from "@worldtalk/world";
import {
  addAttrSeen,
  addPropSeen,
  addPropSeenNeg,
  markElement,
  removeAttrSeen,
  removePropSeen,
  removePropSeenNeg,
} from "./visibility.js";

/** The parts of a knowledge base its updaters and checkers work on. */
export interface KnowledgeState {
  readonly world: World;
  readonly log: TransactionLog;
  /** Keys of statements accepted as plain facts. */
  readonly facts: Set<string>;
}

export interface Updater {
  name: string;
  update(state: KnowledgeState, statement: Statement): void;
}

// ─── Shared Folding ─────────────────────────────────────────────────

/** Record a statement in the fact store, retracting its opposite. */
export function recordFact(state: KnowledgeState, statement: Statement): void {
  const key = statementKey(statement);
  const { facts, log } = state;
  if (!facts.has(key)) {
    facts.add(key);
    log.push(() => {
      facts.delete(key);
    });
  }
  const opposite = negate(statement);
  if (!opposite) return;
  const oppositeKey = statementKey(opposite);
  if (facts.has(oppositeKey)) {
    facts.delete(oppositeKey);
    log.push(() => {
      facts.add(oppositeKey);
    });
  }
}

/** Fold "X's key is (not) value" in, but only where the world agrees. */
export function observeProperty(
  state: KnowledgeState,
  entity: Entity | undefined,
  key: string,
  value: PropertyValue,
  negated: boolean,
): void {
  if (!entity) return;
  const actual = entity.getProperty(key);
  if (actual === undefined) return;
  if (valuesEqual(actual, value) === negated) return;
  if (!negated) {
    addPropSeen(state.log, entity, key, value);
    removePropSeenNeg(state.log, entity, key, value);
    return;
  }
  addPropSeenNeg(state.log, entity, key, value);
  const seen = entity.visibility.propSeen.get(key);
  if (seen !== undefined && valuesEqual(seen, value)) removePropSeen(state.log, entity, key);
}

export function observeAttribute(state: KnowledgeState, entity: Entity | undefined, attr: string, negated: boolean): void {
  if (!entity || entity.is(attr) === negated) return;
  addAttrSeen(state.log, entity, attr, negated);
  removeAttrSeen(state.log, entity, attr, !negated);
}

function observeLocation(state: KnowledgeState, id: string, location: LocationValue, negated = false): void {
  observeProperty(state, state.world.find(id), "location", location, negated);
}

// ─── Updaters ───────────────────────────────────────────────────────

function propertyUpdate(state: KnowledgeState, statement: PropertyStatement | AttributeStatement): void {
  const entity = state.world.find(statement.subject);
  if (statement.kind === "attribute") {
    observeAttribute(state, entity, statement.attribute, statement.negated);
    if (entity && statement.attribute === "locked" && !statement.negated && entity.is("locked")) {
      observeAttribute(state, entity, "open", true);
    }
    return;
  }
  observeProperty(state, entity, statement.key, statement.value, statement.negated);
  if (
    entity &&
    statement.key === "type" &&
    !statement.negated &&
    entity.type === statement.value &&
    entity.is("place")
  ) {
    const location = entity.locationValue();
    if (location) observeProperty(state, entity, "location", location, false);
  }
}

function contentsUpdate(state: KnowledgeState, statement: ContentsStatement): void {
  const location = { position: statement.position, holder: statement.holder };
  if (statement.negated && statement.items.length === 0) {
    for (const obj of state.world.objects) observeProperty(state, obj, "location", location, true);
    return;
  }
  for (const id of statement.items) observeLocation(state, id, location, statement.negated);
  if (statement.negated) return;
  for (const obj of state.world.objects) {
    if (!statement.items.includes(obj.id)) observeProperty(state, obj, "location", location, true);
  }
}

/** Whether a value is valid for a key; "player <key>" keys check the player name pools. */
export function validity(world: World, key: string, value: string): boolean | undefined {
  if (key.startsWith("player ")) {
    const pool = world.playerValuesOf(key.slice("player ".length));
    return pool.length > 0 ? pool.includes(value) : undefined;
  }
  return world.isValidValue(key, value);
}

function validValueUpdate(state: KnowledgeState, statement: ValidValueStatement): void {
  const valid = validity(state.world, statement.key, statement.value);
  if (valid === undefined) return;
  if (valid !== statement.negated) recordFact(state, statement);
}

/** Permission rules that hold in every world, as the actions report them. */
function isPublishedRule(statement: PermissionStatement): boolean {
  const { permission, negated } = statement;
  switch (permission.rule) {
    case "get-players":
    case "drop-into-itself":
      return negated;
    case "change-held":
      return !negated && (permission.key === "color" || permission.key === "size");
    case "change-key":
      return negated && !CHANGEABLE_PROPERTIES.includes(permission.key);
  }
}

/** The fixed order in which a statement is offered to each updater. */
export const UPDATERS: readonly Updater[] = [
  {
    name: "property",
    update: (state, s) => {
      if (s.kind === "property" || s.kind === "attribute") propertyUpdate(state, s);
    },
  },
  {
    name: "contents",
    update: (state, s) => {
      if (s.kind === "contents") contentsUpdate(state, s);
    },
  },
  {
    name: "look",
    update: (state, s) => {
      if (s.kind !== "look" || s.position === "at") return;
      const location = { position: s.position, holder: s.target };
      observeLocation(state, s.actor, location);
      observeLocation(state, s.target, location);
    },
  },
  {
    name: "sees",
    update: (state, s) => {
      if (s.kind !== "sees" || !LOCATION_POSITIONS.includes(s.location.position)) return;
      for (const id of [...s.items, s.actor]) observeLocation(state, id, s.location);
    },
  },
  {
    name: "go",
    update: (state, s) => {
      if (s.kind !== "go" || s.from === undefined) return;
      const from = state.world.find(s.from);
      const exit = from?.exits.get(s.direction);
      if (from && exit) observeProperty(state, from, s.direction, exit.id, false);
    },
  },
  {
    name: "get",
    update: (state, s) => {
      if (s.kind === "get") observeLocation(state, s.item, { position: "in", holder: s.actor });
    },
  },
  {
    name: "drop",
    update: (state, s) => {
      if (s.kind !== "drop") return;
      observeLocation(state, s.actor, s.to);
      observeLocation(state, s.item, s.to);
    },
  },
  {
    name: "open",
    update: (state, s) => {
      if (s.kind !== "open" && s.kind !== "close") return;
      const item = state.world.find(s.item);
      observeAttribute(state, item, "open", s.kind === "close");
      observeAttribute(state, item, "openable", false);
    },
  },
  {
    name: "change",
    update: (state, s) => {
      if (s.kind === "change") observeProperty(state, state.world.find(s.item), s.key, s.value, false);
    },
  },
  {
    name: "element-exists",
    update: (state, s) => {
      if (s.kind !== "element-exists") return;
      const entity = state.world.find(s.subject);
      if (!entity || entity.hasElement(s.element) === s.negated) return;
      markElement(state.log, entity, s.element, !s.negated);
    },
  },
  {
    name: "permission",
    update: (state, s) => {
      if (s.kind === "permission" && isPublishedRule(s)) recordFact(state, s);
    },
  },
  {
    name: "valid-value",
    update: (state, s) => {
      if (s.kind === "valid-value") validValueUpdate(state, s);
    },
  },
];
