import type { PropertyValue } from "@worldtalk/schemas";
import { valuesEqual } from "@worldtalk/schemas";
import type { Entity, TransactionLog } from "@worldtalk/world";

// Every change to an entity's visibility state goes through these helpers so
// that it lands in the knowledge base's own log and can be rolled back.

export function addPropSeen(log: TransactionLog, entity: Entity, key: string, value: PropertyValue): void {
  const seen = entity.visibility.propSeen;
  const old = seen.get(key);
  if (old !== undefined && valuesEqual(old, value)) return;
  seen.set(key, value);
  log.push(() => {
    if (old === undefined) seen.delete(key);
    else seen.set(key, old);
  });
}

export function removePropSeen(log: TransactionLog, entity: Entity, key: string): void {
  const seen = entity.visibility.propSeen;
  const old = seen.get(key);
  if (old === undefined) return;
  seen.delete(key);
  log.push(() => seen.set(key, old));
}

export function addPropSeenNeg(log: TransactionLog, entity: Entity, key: string, value: PropertyValue): void {
  const negatives = entity.visibility.propSeenNeg;
  let values = negatives.get(key);
  if (values === undefined) {
    const created: PropertyValue[] = [];
    values = created;
    negatives.set(key, created);
    log.push(() => negatives.delete(key));
  }
  if (values.some((v) => valuesEqual(v, value))) return;
  const list = values;
  list.push(value);
  log.push(() => {
    list.pop();
  });
}

export function removePropSeenNeg(log: TransactionLog, entity: Entity, key: string, value: PropertyValue): void {
  const list = entity.visibility.propSeenNeg.get(key);
  if (list === undefined) return;
  const index = list.findIndex((v) => valuesEqual(v, value));
  if (index < 0) return;
  const [removed] = list.splice(index, 1);
  log.push(() => {
    list.splice(index, 0, removed);
  });
}

function attributeSet(entity: Entity, negated: boolean): Set<string> {
  return negated ? entity.visibility.attrSeenNeg : entity.visibility.attrSeen;
}

export function addAttrSeen(log: TransactionLog, entity: Entity, attribute: string, negated: boolean): void {
  const set = attributeSet(entity, negated);
  if (set.has(attribute)) return;
  set.add(attribute);
  log.push(() => {
    set.delete(attribute);
  });
}

export function removeAttrSeen(log: TransactionLog, entity: Entity, attribute: string, negated: boolean): void {
  const set = attributeSet(entity, negated);
  if (!set.has(attribute)) return;
  set.delete(attribute);
  log.push(() => {
    set.add(attribute);
  });
}

export function markElement(log: TransactionLog, entity: Entity, element: string, exists: boolean): void {
  const { elemExists, elemNotExists } = entity.visibility;
  const add = exists ? elemExists : elemNotExists;
  const drop = exists ? elemNotExists : elemExists;
  if (!add.has(element)) {
    add.add(element);
    log.push(() => {
      add.delete(element);
    });
  }
  if (drop.has(element)) {
    drop.delete(element);
    log.push(() => {
      drop.add(element);
    });
  }
}
