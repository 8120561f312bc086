import type { AbstractItem, Preposition, PropertyValue } from "@worldtalk/schemas";
import { InvariantError, LOCATION_POSITIONS, SeededRandom } from "@worldtalk/schemas";
import { Entity, OBSTACLE_SUFFIX } from "./entity.js";
import { type Checkpoint, TransactionLog } from "./transaction-log.js";
import { PathTable } from "./paths.js";

// ─── Constants ──────────────────────────────────────────────────────

export const CHANGEABLE_PROPERTIES: readonly string[] = ["color", "size", "nickname", "surname", "name"];

export const PLAYER_NAME_KEYS: readonly string[] = ["name", "nickname", "surname"];

/** Element lists tried, in order, when looking for a unique description. */
export const DESCRIPTION_CANDIDATES: readonly (readonly string[])[] = [
  ["material", "size", "color", "type"],
  ["name", "nickname", "surname"],
];

const COMPASS = ["north", "east", "west", "south"];

/** Compound directions first ("northeast"), then the four compass points. */
export const KNOWN_DIRECTIONS: readonly string[] = [
  ...COMPASS.flatMap((a) => COMPASS.filter((b) => b !== a).map((b) => a + b)),
  ...COMPASS,
];

export interface WorldOptions {
  name?: string;
  seed?: number | string;
}

interface WorldIndex {
  propertyKeys: string[];
  valuesByKey: Map<string, string[]>;
  attributes: string[];
  byAttribute: Map<string, Entity[]>;
  directions: string[];
  playerValues: Map<string, string[]>;
}

function pushUnique<T>(list: T[], value: T): void {
  if (!list.includes(value)) list.push(value);
}

function emptyIndex(): WorldIndex {
  return {
    propertyKeys: [],
    valuesByKey: new Map(),
    attributes: [],
    byAttribute: new Map(),
    directions: [],
    playerValues: new Map(),
  };
}

// ─── World ──────────────────────────────────────────────────────────

/**
 * The entity graph plus the transaction log every mutation is recorded in.
 * Derived indices are rebuilt by `reindex()` after entities or vocabulary change.
 */
export class World {
  readonly name: string;
  readonly log = new TransactionLog();
  readonly random: SeededRandom;
  private entities = new Map<string, Entity>();
  private order: Entity[] = [];
  private extraValues = new Map<string, string[]>();
  private extraPlayerValues = new Map<string, string[]>();
  private index: WorldIndex = emptyIndex();
  private pathTable = new PathTable();

  constructor(options: WorldOptions = {}) {
    this.name = options.name ?? "world";
    this.random = new SeededRandom(options.seed ?? 0);
  }

  // ─── Entities ─────────────────────────────────────────────────────

  add(entity: Entity): Entity {
    if (this.entities.has(entity.id)) {
      throw new InvariantError("UNKNOWN_ENTITY", `entity "${entity.id}" is already part of the world`);
    }
    this.entities.set(entity.id, entity);
    this.order.push(entity);
    return entity;
  }

  get(id: string): Entity {
    const entity = this.entities.get(id);
    if (!entity) throw new InvariantError("UNKNOWN_ENTITY", `unknown entity "${id}"`);
    return entity;
  }

  find(id: string): Entity | undefined {
    return this.entities.get(id);
  }

  /** All entities in insertion order. */
  get objects(): readonly Entity[] {
    return this.order;
  }

  get places(): readonly Entity[] {
    return this.entitiesWith("place");
  }

  get players(): readonly Entity[] {
    return this.entitiesWith("player");
  }

  get directions(): readonly string[] {
    return this.index.directions;
  }

  get propertyKeys(): readonly string[] {
    return this.index.propertyKeys;
  }

  get attributes(): readonly string[] {
    return this.index.attributes;
  }

  entitiesWith(attribute: string): readonly Entity[] {
    return this.index.byAttribute.get(attribute) ?? [];
  }

  /** Entities matching every property and attribute of an abstract item. */
  query(item: AbstractItem): Entity[] {
    return this.order.filter(
      (obj) =>
        Object.entries(item.properties).every(([key, value]) => value === "empty" || obj.properties.get(key) === value) &&
        item.attributes.every((attr) => attr === "abstract" || obj.is(attr)),
    );
  }

  // ─── Vocabulary ───────────────────────────────────────────────────

  /** Values a property may take: those held by entities plus any added vocabulary. */
  valuesOf(key: string): readonly string[] {
    return this.index.valuesByKey.get(key) ?? [];
  }

  /** Name, nickname or surname values reserved for players. */
  playerValuesOf(key: string): readonly string[] {
    return this.index.playerValues.get(key) ?? [];
  }

  addVocabulary(key: string, values: readonly string[]): void {
    const list = this.extraValues.get(key) ?? [];
    for (const value of values) pushUnique(list, value);
    this.extraValues.set(key, list);
    this.reindex();
  }

  addPlayerVocabulary(key: string, values: readonly string[]): void {
    const list = this.extraPlayerValues.get(key) ?? [];
    for (const value of values) pushUnique(list, value);
    this.extraPlayerValues.set(key, list);
    this.reindex();
  }

  /**
   * Whether a value is valid for a key: true or false where the world knows
   * the key, undefined where it has no vocabulary for it.
   */
  isValidValue(key: string, value: PropertyValue): boolean | undefined {
    if (key === "location") {
      return typeof value === "object" && LOCATION_POSITIONS.includes(value.position) && this.entities.has(value.holder);
    }
    if (key === "direction") return typeof value === "string" && this.index.directions.includes(value);
    if (this.index.directions.includes(key) || key === "door_to") {
      return typeof value === "string" && (this.find(value)?.is("place") ?? false);
    }
    if (key.endsWith(OBSTACLE_SUFFIX) && this.index.directions.includes(key.slice(0, -OBSTACLE_SUFFIX.length))) {
      return typeof value === "string" && this.entities.has(value);
    }
    const values = this.index.valuesByKey.get(key);
    if (values === undefined) return undefined;
    return typeof value === "string" && values.includes(value) ? true : false;
  }

  // ─── Index & Paths ────────────────────────────────────────────────

  reindex(): void {
    const index = emptyIndex();
    for (const obj of this.order) {
      for (const [key, value] of obj.properties) {
        pushUnique(index.propertyKeys, key);
        const values = index.valuesByKey.get(key) ?? [];
        pushUnique(values, value);
        index.valuesByKey.set(key, values);
      }
      if (obj.location) pushUnique(index.propertyKeys, "location");
      for (const attr of obj.attributes) {
        pushUnique(index.attributes, attr);
        const holders = index.byAttribute.get(attr) ?? [];
        holders.push(obj);
        index.byAttribute.set(attr, holders);
      }
    }
    for (const direction of KNOWN_DIRECTIONS) {
      if (this.order.some((obj) => obj.exits.has(direction))) index.directions.push(direction);
    }
    for (const [key, extra] of this.extraValues) {
      const values = index.valuesByKey.get(key) ?? [];
      for (const value of extra) pushUnique(values, value);
      index.valuesByKey.set(key, values);
    }
    for (const key of PLAYER_NAME_KEYS) {
      const values: string[] = [];
      for (const player of index.byAttribute.get("player") ?? []) {
        const value = player.properties.get(key);
        if (value !== undefined) pushUnique(values, value);
      }
      for (const value of this.extraPlayerValues.get(key) ?? []) pushUnique(values, value);
      index.playerValues.set(key, values);
    }
    this.index = index;
    this.pathTable = this.computePaths();
  }

  private computePaths(): PathTable {
    const graph = new Map<string, Map<string, string>>();
    for (const place of this.places) {
      const edges = new Map<string, string>();
      for (const direction of this.index.directions) {
        const exit = place.exits.get(direction);
        if (exit) edges.set(direction, exit.id);
      }
      graph.set(place.id, edges);
    }
    return PathTable.compute(
      graph,
      this.places.map((p) => p.id),
    );
  }

  /** Directions leading from one place to another, or undefined when there is no path. */
  path(from: Entity, to: Entity): string[] | undefined {
    return this.pathTable.get(from.id, to.id);
  }

  // ─── Transactions ─────────────────────────────────────────────────

  save(): Checkpoint {
    return this.log.save();
  }

  recover(checkpoint: Checkpoint): void {
    this.log.recover(checkpoint);
  }

  /** Initial placement while building a world; not recorded. */
  place(entity: Entity, position: Preposition, holder: Entity): void {
    entity.setLocation({ position, holder });
    if (holder !== entity) holder.contents.push(entity);
  }

  /** Moves an entity and records one undo that restores both holders' contents. */
  relocate(entity: Entity, position: Preposition, holder: Entity): void {
    const previous = entity.location;
    if (!previous) throw new InvariantError("MISSING_LOCATION", `entity "${entity.id}" has no location`);
    const oldContents = [...previous.holder.contents];
    const newContents = [...holder.contents];
    const index = previous.holder.contents.indexOf(entity);
    if (index >= 0) previous.holder.contents.splice(index, 1);
    holder.contents.push(entity);
    entity.setLocation({ position, holder });
    this.log.push(() => {
      entity.setLocation(previous);
      holder.contents.splice(0, holder.contents.length, ...newContents);
      previous.holder.contents.splice(0, previous.holder.contents.length, ...oldContents);
    }, [entity]);
  }

  setAttribute(entity: Entity, attribute: string, present: boolean): void {
    const had = entity.attributes.has(attribute);
    if (present) entity.attributes.add(attribute);
    else entity.attributes.delete(attribute);
    this.log.push(() => {
      if (had) entity.attributes.add(attribute);
      else entity.attributes.delete(attribute);
    }, [entity]);
  }

  setProperty(entity: Entity, key: string, value: string | undefined): void {
    const old = entity.properties.get(key);
    if (value === undefined) entity.properties.delete(key);
    else entity.properties.set(key, value);
    this.log.push(() => {
      if (old === undefined) entity.properties.delete(key);
      else entity.properties.set(key, old);
    }, [entity]);
  }
}
