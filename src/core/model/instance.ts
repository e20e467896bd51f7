// src/core/model/instance.ts
// Instance creation and raw field access

import type { Instance, Val } from "../values/values";
import type { ConceptDef, FieldDecl } from "./concept";
import { coerceToField, zeroValue } from "./concept";
import { langError } from "../errors/errors";

let nextInstanceId = 1;

/** Copy containers so no two instances share a List or Map. */
function freshCopy(v: Val): Val {
  switch (v.tag) {
    case "List":
      return { tag: "List", items: v.items.map(freshCopy) };
    case "Map":
      return { tag: "Map", entries: new Map([...v.entries].map(([k, item]) => [k, freshCopy(item)])) };
    default:
      return v;
  }
}

function initialValue(decl: FieldDecl): Val {
  if (decl.initial !== undefined) return freshCopy(decl.initial);
  if (decl.type === "Any") {
    throw langError("TypeMismatch", { detail: `field ${decl.name} of type Any has no initial value` });
  }
  return zeroValue(decl.type);
}

/**
 * Create an instance with every declared field set to its initial value
 * (or the zero value of its type).
 */
export function makeInstance(concept: ConceptDef): Instance {
  const fields = new Map<string, Val>();
  for (const decl of concept.fields) {
    fields.set(decl.name, initialValue(decl));
  }
  return { tag: "Instance", id: nextInstanceId++, concept, fields };
}

export function fieldDecl(instance: Instance, name: string): FieldDecl {
  const decl = instance.concept.fieldIndex.get(name);
  if (decl === undefined) {
    throw langError("UnknownField", { concept: instance.concept.name, field: name });
  }
  return decl;
}

export function hasField(instance: Instance, name: string): boolean {
  return instance.concept.fieldIndex.has(name);
}

export function readField(instance: Instance, name: string): Val {
  fieldDecl(instance, name);
  const v = instance.fields.get(name);
  if (v === undefined) {
    throw langError("UnknownField", { concept: instance.concept.name, field: name });
  }
  return v;
}

/**
 * Type-checked store with no dependency bookkeeping. Returns the value
 * actually stored (after Number → FastNumber conversion) and the old one.
 */
export function writeRawField(instance: Instance, name: string, value: Val): { old: Val; stored: Val } {
  const decl = fieldDecl(instance, name);
  const stored = coerceToField(decl, value);
  const old = readField(instance, name);
  instance.fields.set(name, stored);
  return { old, stored };
}
