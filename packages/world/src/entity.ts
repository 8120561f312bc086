import type { LocationValue, Preposition, PropertyValue } from "@worldtalk/schemas";

export type UndoRecord = () => void;

export interface Placement {
  position: Preposition;
  holder: Entity;
}

/** What the dialogue participants have been shown about one entity. */
export class Visibility {
  readonly propSeen = new Map<string, PropertyValue>();
  readonly propSeenNeg = new Map<string, PropertyValue[]>();
  readonly attrSeen = new Set<string>();
  readonly attrSeenNeg = new Set<string>();
  readonly elemExists = new Set<string>();
  readonly elemNotExists = new Set<string>();

  /** Whether an element (property key or attribute) is part of what was shown. */
  hasSeen(element: string): boolean {
    return this.propSeen.has(element) || this.attrSeen.has(element);
  }
}

export const SIZE_ORDER: Readonly<Record<string, number>> = {
  "very small": -1,
  small: 0,
  medium: 1,
  big: 2,
  "very big": 3,
};

export const OBSTACLE_SUFFIX = "-obstacle";

export function obstacleKey(direction: string): string {
  return `${direction}${OBSTACLE_SUFFIX}`;
}

export class Entity {
  readonly id: string;
  readonly properties = new Map<string, string>();
  readonly attributes = new Set<string>();
  readonly exits = new Map<string, Entity>();
  readonly obstacles = new Map<string, Entity>();
  readonly contents: Entity[] = [];
  readonly visibility = new Visibility();
  /** Rollbacks recorded against this entity that are still in its world's log. */
  readonly undoStack: UndoRecord[] = [];
  doorTo: Entity | undefined;
  private placement: Placement | undefined;
  private phrases = new Map<string, string>();

  constructor(id: string) {
    this.id = id;
  }

  get location(): Placement | undefined {
    return this.placement;
  }

  /** Low-level placement setter. Callers keep `contents` in step and record the undo. */
  setLocation(placement: Placement | undefined): void {
    this.placement = placement;
  }

  get type(): string | undefined {
    return this.properties.get("type");
  }

  isDoor(): boolean {
    return this.type === "door";
  }

  is(attribute: string): boolean {
    return this.attributes.has(attribute);
  }

  /** Statement value of any keyed element: descriptive properties, location, exits, obstacles and door_to. */
  getProperty(key: string): PropertyValue | undefined {
    if (key === "location") {
      return this.placement ? { position: this.placement.position, holder: this.placement.holder.id } : undefined;
    }
    if (key === "door_to") return this.doorTo?.id;
    const exit = this.exits.get(key);
    if (exit) return exit.id;
    if (key.endsWith(OBSTACLE_SUFFIX)) {
      return this.obstacles.get(key.slice(0, -OBSTACLE_SUFFIX.length))?.id;
    }
    return this.properties.get(key);
  }

  hasElement(element: string): boolean {
    return this.attributes.has(element) || this.getProperty(element) !== undefined;
  }

  locationValue(): LocationValue | undefined {
    const value = this.getProperty("location");
    return typeof value === "object" ? value : undefined;
  }

  /** The outermost holder, following locations until they loop back on themselves. */
  topLocation(): Entity | undefined {
    let current = this.placement?.holder;
    const visited = new Set<Entity>();
    while (current && !visited.has(current)) {
      visited.add(current);
      const next = current.placement?.holder;
      if (!next || next === current) return current;
      current = next;
    }
    return current;
  }

  /** This entity followed by each holder up to the top location. */
  path(): Entity[] {
    const chain: Entity[] = [this];
    let current: Entity = this;
    while (current.placement && current.placement.holder !== current && !chain.includes(current.placement.holder)) {
      current = current.placement.holder;
      chain.push(current);
    }
    return chain;
  }

  /** Compares by size; undefined when either side has no size. */
  isBiggerThan(other: Entity): boolean | undefined {
    const mine = SIZE_ORDER[this.properties.get("size") ?? ""];
    const theirs = SIZE_ORDER[other.properties.get("size") ?? ""];
    if (mine === undefined || theirs === undefined) return undefined;
    return mine > theirs;
  }

  /** Memoised rendering of the entity through a given element list. */
  phrase(elements: readonly string[], render: (entity: Entity, elements: readonly string[]) => string): string {
    const key = elements.map((el) => `${el}=${JSON.stringify(this.getProperty(el) ?? this.is(el))}`).join("|");
    let cached = this.phrases.get(key);
    if (cached === undefined) {
      cached = render(this, elements);
      this.phrases.set(key, cached);
    }
    return cached;
  }
}
