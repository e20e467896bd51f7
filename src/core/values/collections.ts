// src/core/values/collections.ts
// 1-based List/String indexing and Map access

import type { ListVal, MapVal, Val } from "./values";
import { list, num, str } from "./values";
import { graphemeLength, graphemes } from "./text";
import { isSafeWhole } from "./numeric";
import { langError, typeMismatch } from "../errors/errors";

/**
 * Convert an index value to a JS integer. Accepts whole Numbers and
 * whole FastNumbers; anything else is a TypeMismatch.
 */
export function toIndex(v: Val): number {
  if (v.tag === "Number" && v.d.isInteger()) {
    if (!isSafeWhole(v.d)) throw typeMismatch(`index ${v.d.toFixed()} is outside the safe integer range`);
    return v.d.toNumber();
  }
  if (v.tag === "FastNumber" && Number.isInteger(v.n)) {
    if (!Number.isSafeInteger(v.n)) throw typeMismatch(`index ${v.n} is outside the safe integer range`);
    return v.n;
  }
  throw typeMismatch(`index must be a whole number, got ${v.tag}`);
}

function checkRange(index: number, length: number): void {
  if (index < 1 || index > length) {
    throw langError("IndexOutOfRange", { index, length });
  }
}

/** `List[i]` with i in 1..Length. */
export function listGet(l: ListVal, index: Val): Val {
  const i = toIndex(index);
  checkRange(i, l.items.length);
  return l.items[i - 1];
}

export function listSet(l: ListVal, index: Val, value: Val): void {
  const i = toIndex(index);
  checkRange(i, l.items.length);
  l.items[i - 1] = value;
}

export function listAppend(l: ListVal, value: Val): void {
  l.items.push(value);
}

export function listRemoveAt(l: ListVal, index: Val): Val {
  const i = toIndex(index);
  checkRange(i, l.items.length);
  const [removed] = l.items.splice(i - 1, 1);
  return removed;
}

/** `Map["key"]`; a missing key is IndexOutOfRange, never a default. */
export function mapGet(m: MapVal, key: Val): Val {
  if (key.tag !== "String") throw typeMismatch(`map key must be a String, got ${key.tag}`);
  const found = m.entries.get(key.s);
  if (found === undefined) {
    throw langError("IndexOutOfRange", { index: JSON.stringify(key.s), length: m.entries.size });
  }
  return found;
}

export function mapPut(m: MapVal, key: Val, value: Val): void {
  if (key.tag !== "String") throw typeMismatch(`map key must be a String, got ${key.tag}`);
  m.entries.set(key.s, value);
}

/**
 * `obj[index]` for Lists, Strings (grapheme clusters) and Maps.
 */
export function indexValue(obj: Val, index: Val): Val {
  switch (obj.tag) {
    case "List":
      return listGet(obj, index);
    case "Map":
      return mapGet(obj, index);
    case "String": {
      const i = toIndex(index);
      const chars = graphemes(obj.s);
      checkRange(i, chars.length);
      return str(chars[i - 1]);
    }
    default:
      throw typeMismatch(`cannot index into ${obj.tag}`);
  }
}

/** Length in the unit the value is indexed by. */
export function lengthOf(v: Val): number {
  switch (v.tag) {
    case "List":
      return v.items.length;
    case "Map":
      return v.entries.size;
    case "String":
      return graphemeLength(v.s);
    default:
      throw typeMismatch(`${v.tag} has no length`);
  }
}

/**
 * Items visited by `For each`: a copy taken before the loop starts, so
 * mutation inside the body never changes the iteration. Maps yield keys,
 * strings yield grapheme clusters.
 */
export function iterationSnapshot(v: Val): ListVal {
  switch (v.tag) {
    case "List":
      return list([...v.items]);
    case "Map":
      return list([...v.entries.keys()].map(str));
    case "String":
      return list(graphemes(v.s).map(str));
    default:
      throw typeMismatch(`cannot iterate over ${v.tag}`);
  }
}

/** 1-based counter value used by loop variables. */
export function counter(i: number): Val {
  return num(i);
}
