import type { AbstractItem, GetRequest, ItemRef, LocationValue, LookRequest, OpenCloseRequest, PrimitiveRequest, Request } from "@worldtalk/schemas";
import { LOCATION_POSITIONS, SeededRandom } from "@worldtalk/schemas";
import { CHANGEABLE_PROPERTIES, type Entity, type World, describeEntity } from "@worldtalk/world";

export type RequestKind = Request["kind"];
export type PrimitiveKind = PrimitiveRequest["kind"];

export const PRIMITIVE_KINDS: readonly PrimitiveKind[] = [
  "go-direction",
  "go-location",
  "get",
  "drop",
  "look",
  "open",
  "close",
  "change",
  "is-property",
  "is-attribute",
];

export const REQUEST_KINDS: readonly RequestKind[] = [...PRIMITIVE_KINDS, "and"];

/** Keys a question can be about; the rest are structure. */
const HIDDEN_KEYS = ["door_to", "location"];

export interface SamplerOptions {
  seed?: number | string;
  kinds?: readonly RequestKind[];
  /** Share of item roles filled with "a <description>" instead of a concrete entity. */
  abstractRate?: number;
  /** Number of parts of a compound request. */
  andParts?: number;
}

export interface SampledRequest {
  user: string;
  request: Request;
}

/** "a red ball" built from an entity's description. */
export function abstractOf(world: World, entity: Entity): AbstractItem {
  const properties: Record<string, string> = {};
  const attributes: string[] = [];
  for (const element of describeEntity(world, entity)?.elements ?? ["type"]) {
    const value = entity.properties.get(element);
    if (value !== undefined) properties[element] = value;
    else if (entity.is(element)) attributes.push(element);
  }
  return { abstract: true, properties, attributes };
}

/**
 * Draws well-formed random requests: a user among the players and agents
 * among the others, items among the world's non-place entities, and
 * property values that are sometimes valid for the key and sometimes not.
 */
export class RequestSampler {
  private world: World;
  private random: SeededRandom;
  private kinds: readonly RequestKind[];
  private abstractRate: number;
  private andParts: number;

  constructor(world: World, options: SamplerOptions = {}) {
    this.world = world;
    this.random = new SeededRandom(options.seed ?? 0);
    this.kinds = options.kinds ?? REQUEST_KINDS;
    this.abstractRate = options.abstractRate ?? 0.5;
    this.andParts = options.andParts ?? 2;
    if (world.players.length < 2) throw new Error("sampling requests needs at least two players");
  }

  sample(): SampledRequest {
    const user = this.random.choice(this.world.players);
    const agents = this.world.players.filter((p) => p !== user);
    const kind = this.random.choice(this.kinds);
    if (kind !== "and") return { user: user.id, request: this.primitive(kind, this.random.choice(agents)) };

    const parts: PrimitiveRequest[] = [];
    for (let i = 0; i < this.andParts; i++) {
      parts.push(this.primitive(this.random.choice(PRIMITIVE_KINDS), this.random.choice(agents)));
    }
    return { user: user.id, request: { kind: "and", parts } };
  }

  primitive(kind: PrimitiveKind, agent: Entity): PrimitiveRequest {
    const target = this.random.choice(this.items());
    const item = this.itemRef(target);
    switch (kind) {
      case "go-direction":
        return { kind, agent: agent.id, direction: this.random.choice(this.world.directions) };
      case "go-location":
        return { kind, agent: agent.id, item };
      case "get":
        return this.withLocation<GetRequest>({ kind, agent: agent.id, item }, target);
      case "drop": {
        const holder = this.random.choice(this.world.objects);
        return { kind, agent: agent.id, item, location: { position: this.random.choice(LOCATION_POSITIONS), holder: holder.id } };
      }
      case "look":
        return this.withLocation<LookRequest>(
          { kind, agent: agent.id, item, position: this.random.choice([...LOCATION_POSITIONS, "at" as const]) },
          target,
        );
      case "open":
      case "close":
        return this.withLocation<OpenCloseRequest>({ kind, agent: agent.id, item }, target);
      case "change": {
        const key = this.random.choice(CHANGEABLE_PROPERTIES);
        return { kind, agent: agent.id, item, key, value: this.propertyValue(key, target) };
      }
      case "is-property": {
        const keys = this.world.propertyKeys.filter((k) => !HIDDEN_KEYS.includes(k));
        const key = this.random.choice(keys);
        return { kind, agent: agent.id, item, key, value: this.propertyValue(key, target) };
      }
      case "is-attribute":
        return { kind, agent: agent.id, item, attribute: this.random.choice(this.world.attributes) };
    }
  }

  private items(): Entity[] {
    return this.world.objects.filter((e) => !e.is("place"));
  }

  private itemRef(entity: Entity): ItemRef {
    return this.random.next() < this.abstractRate ? abstractOf(this.world, entity) : entity.id;
  }

  /** Half of the time no location; otherwise the item's own holder or a decoy. */
  private withLocation<T extends { location?: LocationValue }>(request: T, item: Entity): T {
    if (this.random.next() < 0.5) return request;
    const own = item.location;
    const decoys = this.random.shuffle(this.world.objects).slice(0, 3);
    const holder = this.random.choice(own ? [...decoys, own.holder] : decoys);
    const position = own && holder === own.holder ? own.position : this.random.choice(LOCATION_POSITIONS);
    return { ...request, location: { position, holder: holder.id } };
  }

  /** One valid value for the key, the item's own, and a few belonging to other keys. */
  private propertyValue(key: string, item: Entity): string {
    const values = new Set<string>();
    const valid = this.world.valuesOf(key);
    if (valid.length > 0) values.add(this.random.choice(valid));
    const own = item.properties.get(key);
    if (own !== undefined) values.add(own);
    const others = this.world.propertyKeys
      .filter((k) => k !== key && !HIDDEN_KEYS.includes(k))
      .flatMap((k) => this.world.valuesOf(k));
    for (let i = 0; i < 3 && others.length > 0; i++) values.add(this.random.choice(others));
    return this.random.choice([...values]);
  }
}
