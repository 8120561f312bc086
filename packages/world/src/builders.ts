import type { Preposition } from "@worldtalk/schemas";
import { Entity } from "./entity.js";
import type { World } from "./world.js";

export interface EntityTraits {
  size?: string;
  type?: string;
  color?: string;
  material?: string;
  name?: string;
  surname?: string;
  nickname?: string;
}

export interface At {
  position: Preposition;
  holder: Entity;
}

export function buildEntity(world: World, id: string, traits: EntityTraits = {}, at?: At): Entity {
  const entity = world.add(new Entity(id));
  for (const [key, value] of Object.entries(traits)) {
    if (typeof value === "string") entity.properties.set(key, value);
  }
  if (at) world.place(entity, at.position, at.holder);
  return entity;
}

function withAttributes(entity: Entity, ...attributes: string[]): Entity {
  for (const attr of attributes) entity.attributes.add(attr);
  return entity;
}

export function buildPlayer(world: World, id: string, traits: EntityTraits, at?: At): Entity {
  return withAttributes(buildEntity(world, id, traits, at), "player");
}

/** A place is static and is located in itself. */
export function buildPlace(world: World, id: string, traits: EntityTraits = {}): Entity {
  const place = withAttributes(buildEntity(world, id, traits), "static", "place");
  world.place(place, "in", place);
  return place;
}

export function buildDoor(world: World, id: string, traits: EntityTraits, at?: At, doorTo?: Entity): Entity {
  const door = withAttributes(buildEntity(world, id, { ...traits, type: "door" }, at), "openable", "static");
  door.doorTo = doorTo;
  return door;
}

export function buildTable(world: World, id: string, traits: EntityTraits, at?: At): Entity {
  return withAttributes(buildEntity(world, id, { ...traits, type: "table" }, at), "hollow", "supporter", "static");
}

export function buildBed(world: World, id: string, traits: EntityTraits, at?: At): Entity {
  return withAttributes(buildEntity(world, id, { ...traits, type: "bed" }, at), "static", "supporter", "hollow");
}

export function buildWindow(world: World, id: string, traits: EntityTraits, at?: At): Entity {
  return withAttributes(buildEntity(world, id, { ...traits, type: "window" }, at), "static", "openable");
}

export function buildBook(world: World, id: string, traits: EntityTraits, at?: At): Entity {
  return withAttributes(buildEntity(world, id, { ...traits, type: "book" }, at), "openable");
}

/** Connects two places one way; pass the door to guard the exit. */
export function connect(from: Entity, direction: string, to: Entity, door?: Entity): void {
  from.exits.set(direction, to);
  if (door) from.obstacles.set(direction, door);
}
