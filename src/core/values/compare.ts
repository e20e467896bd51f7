// src/core/values/compare.ts
// Truthiness, equality and ordering

import type { Val } from "./values";
import { promote } from "./numeric";
import { typeMismatch } from "../errors/errors";

export function isTruthy(v: Val): boolean {
  switch (v.tag) {
    case "Boolean":
      return v.b;
    case "Number":
      return !v.d.isZero();
    case "FastNumber":
      return v.n !== 0;
    case "String":
      return v.s.length > 0;
    case "List":
      return v.items.length > 0;
    case "Map":
      return v.entries.size > 0;
    case "Option":
      return v.some;
    case "WeakRef":
      return v.ref.deref() !== undefined;
    default:
      return true;
  }
}

/**
 * Structural equality. Numbers compare by value across Number/FastNumber
 * (promoted to FastNumber when mixed); instances, tasks and channels by
 * identity.
 */
export function valuesEqual(a: Val, b: Val): boolean {
  if (a === b) return true;

  if ((a.tag === "Number" || a.tag === "FastNumber") && (b.tag === "Number" || b.tag === "FastNumber")) {
    if (a.tag === "Number" && b.tag === "Number") return a.d.eq(b.d);
    return promote(a) === promote(b);
  }

  switch (a.tag) {
    case "String":
      return b.tag === "String" && a.s === b.s;
    case "Boolean":
      return b.tag === "Boolean" && a.b === b.b;
    case "List":
      return (
        b.tag === "List" &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => valuesEqual(item, b.items[i]))
      );
    case "Map": {
      if (b.tag !== "Map" || a.entries.size !== b.entries.size) return false;
      for (const [k, item] of a.entries) {
        const other = b.entries.get(k);
        if (other === undefined || !valuesEqual(item, other)) return false;
      }
      return true;
    }
    case "Option":
      if (b.tag !== "Option" || a.some !== b.some) return false;
      return a.some && b.some ? valuesEqual(a.value, b.value) : true;
    case "Error":
      return b.tag === "Error" && a.kind === b.kind && a.message === b.message;
    case "WeakRef":
      return b.tag === "WeakRef" && a.ref.deref() !== undefined && a.ref.deref() === b.ref.deref();
    case "Task":
      return b.tag === "Task" && a.task === b.task;
    case "Channel":
      return b.tag === "Channel" && a.channel === b.channel;
    default:
      return false;
  }
}

/**
 * Ordering for numbers and strings: negative, zero or positive.
 * Any other pairing fails with TypeMismatch.
 */
export function compareValues(a: Val, b: Val): number {
  if ((a.tag === "Number" || a.tag === "FastNumber") && (b.tag === "Number" || b.tag === "FastNumber")) {
    if (a.tag === "Number" && b.tag === "Number") return a.d.cmp(b.d);
    const x = promote(a);
    const y = promote(b);
    return x < y ? -1 : x > y ? 1 : 0;
  }
  if (a.tag === "String" && b.tag === "String") {
    return a.s < b.s ? -1 : a.s > b.s ? 1 : 0;
  }
  throw typeMismatch(`cannot order ${a.tag} and ${b.tag}`);
}
