import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import yaml from "js-yaml";
import type { LayoutEntity, WorldLayout } from "@worldtalk/schemas";
import { LayoutError, isWorldLayout, validateWorldLayoutData } from "@worldtalk/schemas";
import type { Entity } from "./entity.js";
import {
  type EntityTraits,
  buildBed,
  buildBook,
  buildDoor,
  buildEntity,
  buildPlace,
  buildPlayer,
  buildTable,
  buildWindow,
} from "./builders.js";
import { World, type WorldOptions } from "./world.js";

export const BUNDLED_LAYOUTS_DIR = fileURLToPath(new URL("../layouts/", import.meta.url));

type Kind = NonNullable<LayoutEntity["kind"]>;

const KIND_BUILDERS: Record<Kind, (world: World, id: string, traits: EntityTraits) => Entity> = {
  entity: (world, id, traits) => buildEntity(world, id, traits),
  player: (world, id, traits) => buildPlayer(world, id, traits),
  place: (world, id, traits) => buildPlace(world, id, traits),
  door: (world, id, traits) => buildDoor(world, id, traits),
  table: (world, id, traits) => buildTable(world, id, traits),
  bed: (world, id, traits) => buildBed(world, id, traits),
  window: (world, id, traits) => buildWindow(world, id, traits),
  book: (world, id, traits) => buildBook(world, id, traits),
};

/** Parses and validates YAML layout text. Throws LayoutError with the schema messages. */
export function parseLayout(text: string): WorldLayout {
  let data: unknown;
  try {
    data = yaml.load(text);
  } catch (err) {
    throw new LayoutError("layout is not valid YAML", [err instanceof Error ? err.message : String(err)]);
  }
  if (!isWorldLayout(data)) {
    throw new LayoutError("layout failed schema validation", validateWorldLayoutData(data).errors);
  }
  return data;
}

export async function loadLayoutFile(path: string): Promise<WorldLayout> {
  return parseLayout(await readFile(path, "utf-8"));
}

export function bundledLayoutPath(name: string): string {
  return `${BUNDLED_LAYOUTS_DIR}${name}.yaml`;
}

/**
 * Builds a world from a validated layout. Entities are created first, then
 * placed, so holders may be declared after what they hold.
 */
export function buildWorld(layout: WorldLayout, options: WorldOptions = {}): World {
  const world = new World({ name: layout.name, ...options });
  const issues: string[] = [];

  for (const entry of layout.entities) {
    if (world.find(entry.id)) {
      issues.push(`duplicate entity "${entry.id}"`);
      continue;
    }
    const entity = KIND_BUILDERS[entry.kind ?? "entity"](world, entry.id, entry.properties ?? {});
    for (const attr of entry.attributes ?? []) entity.attributes.add(attr);
  }

  const resolve = (id: string, from: string): Entity | undefined => {
    const target = world.find(id);
    if (!target) issues.push(`${from} refers to unknown entity "${id}"`);
    return target;
  };

  for (const entry of layout.entities) {
    const entity = world.find(entry.id);
    if (!entity) continue;
    if (entry.location && !entity.location) {
      const holder = resolve(entry.location.holder, `${entry.id}.location`);
      if (holder) world.place(entity, entry.location.position, holder);
    }
    for (const [direction, id] of Object.entries(entry.exits ?? {})) {
      const to = resolve(id, `${entry.id}.exits.${direction}`);
      if (to) entity.exits.set(direction, to);
    }
    for (const [direction, id] of Object.entries(entry.obstacles ?? {})) {
      const door = resolve(id, `${entry.id}.obstacles.${direction}`);
      if (door) entity.obstacles.set(direction, door);
    }
    if (entry.door_to) entity.doorTo = resolve(entry.door_to, `${entry.id}.door_to`);
    if (!entity.location) issues.push(`entity "${entry.id}" has no location`);
  }

  if (issues.length > 0) throw new LayoutError(`layout "${layout.name}" is inconsistent`, issues);

  for (const [key, values] of Object.entries(layout.vocabulary ?? {})) world.addVocabulary(key, values);
  for (const [key, values] of Object.entries(layout.player_vocabulary ?? {})) world.addPlayerVocabulary(key, values);
  world.reindex();
  return world;
}

export async function loadWorld(path: string, options: WorldOptions = {}): Promise<World> {
  return buildWorld(await loadLayoutFile(path), options);
}
