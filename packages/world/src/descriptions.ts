import { valuesEqual } from "@worldtalk/schemas";
import type { Entity } from "./entity.js";
import { DESCRIPTION_CANDIDATES, PLAYER_NAME_KEYS, type World } from "./world.js";

export type SeenClass = "seen" | "not-seen" | "partial";

export interface Description {
  /** Elements in the order they narrow the entity down. */
  elements: string[];
  seen: SeenClass;
}

/** Elements that never tell two entities apart. */
const NON_DISTINGUISHING = new Set(["open", "locked"]);

/** The entities sharing `element` with `entity`: same value for a key, or the same attribute. */
export function similarObjects(objects: readonly Entity[], entity: Entity, element: string): Entity[] {
  const value = entity.getProperty(element);
  return objects.filter((other) =>
    value !== undefined ? valuesEqual(other.getProperty(element), value) : other.is(element),
  );
}

function classify(entity: Entity, elements: readonly string[]): SeenClass {
  const seen = elements.filter((el) => entity.visibility.hasSeen(el)).length;
  if (seen === elements.length) return "seen";
  return seen === 0 ? "not-seen" : "partial";
}

/**
 * Narrows the world down to `entity` using the candidate elements, the ones
 * already seen first. Null when the candidates never single it out.
 */
export function uniqueDescription(world: World, entity: Entity, candidates: readonly string[]): Description | null {
  const ordered = [
    ...candidates.filter((el) => entity.visibility.hasSeen(el)),
    ...candidates.filter((el) => !entity.visibility.hasSeen(el)),
  ];
  const elements: string[] = [];
  let similar: readonly Entity[] = world.objects;
  for (const element of ordered) {
    if (!entity.hasElement(element)) continue;
    elements.push(element);
    if (NON_DISTINGUISHING.has(element)) continue;
    similar = similarObjects(similar, entity, element);
    if (similar.length === 1 && similar[0] === entity) {
      return { elements, seen: classify(entity, elements) };
    }
  }
  return null;
}

export function uniqueDescriptions(world: World, entity: Entity): Description[] {
  const found: Description[] = [];
  for (const candidates of DESCRIPTION_CANDIDATES) {
    const description = uniqueDescription(world, entity, candidates);
    if (description) found.push(description);
  }
  return found;
}

/**
 * Picks a description: fully seen first, then (when relaxed) partially seen,
 * then unseen. Null when the entity cannot be told apart from the others.
 */
export function describeEntity(world: World, entity: Entity, relaxed = true): Description | null {
  const found = uniqueDescriptions(world, entity);
  return (
    found.find((d) => d.seen === "seen") ??
    (relaxed ? found.find((d) => d.seen === "partial") : undefined) ??
    found.find((d) => d.seen === "not-seen") ??
    null
  );
}

function renderElements(entity: Entity, elements: readonly string[]): string {
  if (elements.some((el) => PLAYER_NAME_KEYS.includes(el))) {
    return PLAYER_NAME_KEYS.filter((key) => elements.includes(key))
      .map((key) => entity.properties.get(key) ?? "")
      .join(" ");
  }
  const words = elements.filter((el) => el !== "type").map((el) => entity.properties.get(el) ?? el);
  return ["the", ...words, entity.type ?? "entity"].join(" ");
}

/** English noun phrase for an entity, e.g. "the red ball" or "Hans". */
export function nounPhrase(world: World, entity: Entity): string {
  const description = describeEntity(world, entity);
  if (!description) return `the ${entity.id.replace(/_/g, " ")}`;
  return entity.phrase(description.elements, renderElements);
}
