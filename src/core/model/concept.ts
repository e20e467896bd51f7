// src/core/model/concept.ts
// Concept definitions: declared fields, methods and observers, frozen at load

import type { Stmt } from "../ast";
import type { Val } from "../values/values";
import { fast, list, map, num, str, VFalse, VNone } from "../values/values";
import { typeMismatch } from "../errors/errors";

export type FieldType = "Number" | "FastNumber" | "String" | "Boolean" | "List" | "Map" | "Option" | "Any";

export type FieldDecl = {
  readonly name: string;
  readonly type: FieldType;
  /** Evaluated once at load; containers are copied per instance. */
  readonly initial?: Val;
};

export type MethodDef = {
  readonly concept: string;
  readonly name: string;
  readonly params: readonly string[];
  readonly body: readonly Stmt[];
  /** Name of the situation that contributed this body; absent for base methods. */
  readonly situation?: string;
};

export type ObserverDecl = {
  readonly trigger: string;
  readonly body: readonly Stmt[];
};

export type ConceptDef = {
  readonly name: string;
  readonly fields: readonly FieldDecl[];
  readonly fieldIndex: ReadonlyMap<string, FieldDecl>;
  readonly methods: ReadonlyMap<string, MethodDef>;
  readonly observers: readonly ObserverDecl[];
};

// ─────────────────────────────────────────────────────────────────
// Definition
// ─────────────────────────────────────────────────────────────────

export type ConceptSpec = {
  name: string;
  fields: FieldDecl[];
  methods: Array<Omit<MethodDef, "concept">>;
  observers: ObserverDecl[];
};

/**
 * Validate and freeze a concept. Duplicate names, `Any` fields without
 * an initial value, ill-typed initial values and observers on undeclared
 * fields are rejected with TypeMismatch.
 */
export function defineConcept(spec: ConceptSpec): ConceptDef {
  const fieldIndex = new Map<string, FieldDecl>();
  for (const f of spec.fields) {
    if (fieldIndex.has(f.name)) {
      throw typeMismatch(`field ${spec.name}.${f.name} is declared twice`);
    }
    if (f.type === "Any" && f.initial === undefined) {
      throw typeMismatch(`field ${spec.name}.${f.name} of type Any needs an initial value`);
    }
    const initial = f.initial === undefined ? undefined : coerceToField(f, f.initial);
    fieldIndex.set(f.name, Object.freeze({ name: f.name, type: f.type, initial }));
  }

  const methods = new Map<string, MethodDef>();
  for (const m of spec.methods) {
    if (methods.has(m.name)) {
      throw typeMismatch(`method ${spec.name}.${m.name} is declared twice`);
    }
    methods.set(m.name, Object.freeze({ ...m, concept: spec.name }));
  }

  for (const o of spec.observers) {
    if (!fieldIndex.has(o.trigger)) {
      throw typeMismatch(`observer on ${spec.name}.${o.trigger}: no such field`);
    }
  }

  return Object.freeze({
    name: spec.name,
    fields: Object.freeze([...fieldIndex.values()]),
    fieldIndex,
    methods,
    observers: Object.freeze(spec.observers.map((o) => Object.freeze({ ...o }))),
  });
}

// ─────────────────────────────────────────────────────────────────
// Field typing
// ─────────────────────────────────────────────────────────────────

/** Zero value for a declared type; `Any` has none. */
export function zeroValue(type: Exclude<FieldType, "Any">): Val {
  switch (type) {
    case "Number":
      return num(0);
    case "FastNumber":
      return fast(0);
    case "String":
      return str("");
    case "Boolean":
      return VFalse;
    case "List":
      return list();
    case "Map":
      return map();
    case "Option":
      return VNone;
  }
}

/**
 * Check a value against a field's declared type. A Number stored into a
 * FastNumber field is converted; everything else must match exactly.
 */
export function coerceToField(decl: FieldDecl, v: Val): Val {
  if (decl.type === "Any" || decl.type === v.tag) return v;
  if (decl.type === "FastNumber" && v.tag === "Number") return fast(v.d.toNumber());
  throw typeMismatch(`field ${decl.name} is ${decl.type}, got ${v.tag}`);
}
