import type {
  AbstractItem,
  Attempt,
  ItemRef,
  LocationValue,
  PermissionRule,
  PropertyValue,
  Request,
  Statement,
  Utterance,
} from "@worldtalk/schemas";
import { OBSTACLE_SUFFIX, type World, nounPhrase } from "@worldtalk/world";

// English for transcripts and the CLI. Output is never parsed back.

function not(negated: boolean): string {
  return negated ? " not" : "";
}

function entityName(world: World, id: string): string {
  const entity = world.find(id);
  return entity ? nounPhrase(world, entity) : id;
}

/** "red apple" for an abstract item, without the article. */
function abstractNoun(item: AbstractItem): string {
  const { type, ...rest } = item.properties;
  const words = [...item.attributes.filter((a) => a !== "abstract"), ...Object.values(rest)];
  return [...words, type ?? "item"].join(" ");
}

function itemName(world: World, item: ItemRef): string {
  return typeof item === "string" ? entityName(world, item) : `a ${abstractNoun(item)}`;
}

function locationText(world: World, location: LocationValue): string {
  return `${location.position} ${entityName(world, location.holder)}`;
}

function valueText(world: World, value: PropertyValue): string {
  if (typeof value !== "string") return locationText(world, value);
  return world.find(value) ? entityName(world, value) : value;
}

function list(words: readonly string[]): string {
  if (words.length <= 1) return words[0] ?? "nothing";
  return `${words.slice(0, -1).join(", ")} and ${words[words.length - 1]}`;
}

function permissionText(rule: PermissionRule, negated: boolean): string {
  const can = negated ? "can not" : "can";
  switch (rule.rule) {
    case "get-players":
      return `players ${can} be picked up`;
    case "change-key":
      return `the ${rule.key} ${can} be changed`;
    case "change-held":
      return `the ${rule.key} ${can} be changed only while holding the item`;
    case "drop-into-itself":
      return `an item ${can} be put into itself`;
  }
}

/** The attempt as it follows "can not" or "tries to". */
function attemptText(world: World, attempt: Attempt): string {
  switch (attempt.kind) {
    case "go":
      return `go ${attempt.direction}`;
    case "get":
      return attempt.from
        ? `get ${entityName(world, attempt.item)} from ${locationText(world, attempt.from)}`
        : `get ${entityName(world, attempt.item)}`;
    case "drop":
      return `put ${entityName(world, attempt.item)} ${locationText(world, attempt.to)}`;
    case "open":
    case "close":
      return `${attempt.kind} ${entityName(world, attempt.item)}`;
    case "change":
      return `change the ${attempt.key} of ${entityName(world, attempt.item)} to ${attempt.value}`;
    case "look":
      return `look ${attempt.position} ${entityName(world, attempt.target)}`;
    case "go-to":
      return `go to ${itemName(world, attempt.target)}`;
    case "abstract":
      return `${attempt.verb} ${itemName(world, attempt.item)}`;
  }
}

function propertyText(world: World, subject: string, key: string, value: PropertyValue, negated: boolean): string {
  const name = entityName(world, subject);
  if (key === "location") return `${name} is${not(negated)} ${valueText(world, value)}`;
  if (key.endsWith(OBSTACLE_SUFFIX)) {
    const direction = key.slice(0, -OBSTACLE_SUFFIX.length);
    return `the way ${direction} from ${name} is${not(negated)} blocked by ${valueText(world, value)}`;
  }
  return `the ${key} of ${name} is${not(negated)} ${valueText(world, value)}`;
}

export function renderRequest(world: World, request: Request): string {
  if (request.kind === "and") return `first ${request.parts.map((part) => renderRequest(world, part)).join(" and then ")}`;
  const agent = entityName(world, request.agent);
  const at = "location" in request && request.location ? ` ${locationText(world, request.location)}` : "";
  switch (request.kind) {
    case "go-direction":
      return `${agent}, go ${request.direction}`;
    case "go-location":
      return `${agent}, go to ${itemName(world, request.item)}`;
    case "get":
      return request.location
        ? `${agent}, get ${itemName(world, request.item)} from ${locationText(world, request.location)}`
        : `${agent}, get ${itemName(world, request.item)}`;
    case "drop":
      return `${agent}, put ${itemName(world, request.item)} ${locationText(world, request.location)}`;
    case "look":
      return `${agent}, look ${request.position} ${itemName(world, request.item)}${at}`;
    case "open":
    case "close":
      return `${agent}, ${request.kind} ${itemName(world, request.item)}${at}`;
    case "change":
      return `${agent}, change the ${request.key} of ${itemName(world, request.item)} to ${request.value}`;
    case "is-property":
      return `${agent}, is the ${request.key} of ${itemName(world, request.item)} ${request.value}?`;
    case "is-attribute":
      return `${agent}, is ${itemName(world, request.item)} ${request.attribute}?`;
  }
}

export function renderStatement(world: World, statement: Statement): string {
  const s = statement;
  switch (s.kind) {
    case "property":
      return propertyText(world, s.subject, s.key, s.value, s.negated);
    case "attribute":
      return `${entityName(world, s.subject)} is${not(s.negated)} ${s.attribute}`;
    case "contents": {
      const holder = entityName(world, s.holder);
      if (s.negated && s.items.length === 0) return `${holder} has no items ${s.position} it`;
      const items = list(s.items.map((id) => entityName(world, id)));
      return `${holder} has${not(s.negated)} ${items} ${s.position} it`;
    }
    case "go": {
      const actor = entityName(world, s.actor);
      return s.from ? `${actor} goes ${s.direction} from ${entityName(world, s.from)}` : `${actor} goes ${s.direction}`;
    }
    case "get":
    case "drop":
    case "open":
    case "close":
    case "change":
    case "look":
      return `${entityName(world, s.actor)} ${thirdPerson(attemptText(world, s))}`;
    case "sees":
      return `${entityName(world, s.actor)} sees ${list(s.items.map((id) => entityName(world, id)))} ${locationText(world, s.location)}`;
    case "permission":
      return permissionText(s.permission, s.negated);
    case "valid-value":
      return `${s.value} is${not(s.negated)} a valid ${s.key}`;
    case "element-exists":
      return `${entityName(world, s.subject)} has ${s.negated ? "no" : "a"} ${s.element}`;
    case "not-revealed":
      return s.what === "location" || s.target === undefined
        ? `the location of ${entityName(world, s.subject)} is not revealed`
        : `the path from ${entityName(world, s.subject)} to ${entityName(world, s.target)} is not revealed`;
    case "no-path":
      return `there is no path from ${entityName(world, s.from)} to ${entityName(world, s.to)}`;
    case "conflict":
      return `changing the ${s.key} of ${entityName(world, s.subject)} to ${s.value} conflicts with ${entityName(world, s.with)}`;
    case "moved":
      return `${entityName(world, s.actor)} went ${s.direction} from ${entityName(world, s.from)}`;
    case "nothing-special":
      return `there is nothing special about ${entityName(world, s.subject)}`;
    case "cannot": {
      const head = `${entityName(world, s.actor)} can not ${attemptText(world, s.attempt)}`;
      return s.reasons.length > 0 ? `${head} because ${s.reasons.map((r) => renderStatement(world, r)).join(" and ")}` : head;
    }
    case "compound":
      return s.parts.map((part) => renderStatement(world, part)).join(" and ");
    case "say":
      return `${entityName(world, s.speaker)} says: ${renderStatement(world, s.content)}`;
    case "tries":
      return `${entityName(world, s.actor)} tries to ${attemptText(world, s.attempt)}`;
    case "request":
      return renderRequest(world, s.request);
    case "dont-know": {
      const q = s.question;
      if (!q) return "I don't know";
      return q.kind === "is-property"
        ? `I don't know whether the ${q.key} of ${itemName(world, q.item)} is ${q.value}`
        : `I don't know whether ${itemName(world, q.item)} is ${q.attribute}`;
    }
    case "no-match": {
      const noun = `there is no ${abstractNoun(s.item)}`;
      if (s.attribute !== undefined) return `${noun} that is ${s.attribute}`;
      return s.key !== undefined && s.value !== undefined ? `${noun} with ${s.key} ${s.value}` : noun;
    }
    case "unrecognized":
      return `${entityName(world, s.actor)} issued an unrecognizable command`;
    case "more-coming":
      return "...";
    case "empty":
      return "";
  }
}

/** "get the ball" becomes "gets the ball". */
function thirdPerson(phrase: string): string {
  const space = phrase.indexOf(" ");
  const verb = space < 0 ? phrase : phrase.slice(0, space);
  return `${verb}s${space < 0 ? "" : phrase.slice(space)}`;
}

export function renderUtterance(world: World, utterance: Utterance): string {
  return renderStatement(world, utterance.statement);
}
