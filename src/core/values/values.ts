// src/core/values/values.ts
// Tagged value representation shared by the interpreter, the IR VM and generated code

import type { Decimal } from "decimal.js";
import type { ConceptDef } from "../model/concept";
import type { ChannelState, TaskRecord } from "../concurrency/types";
import { Dec } from "./numeric";

// ─────────────────────────────────────────────────────────────────
// Value union
// ─────────────────────────────────────────────────────────────────

/** Exact decimal number. */
export type NumberVal = { tag: "Number"; d: Decimal };

/** IEEE double; mixed arithmetic with Number promotes to this. */
export type FastNumberVal = { tag: "FastNumber"; n: number };

/** Grapheme-aware string; lengths and indices count grapheme clusters. */
export type StringVal = { tag: "String"; s: string };

export type BooleanVal = { tag: "Boolean"; b: boolean };

/** Ordered list, logical indices 1..Length. Mutated only through collection ops. */
export type ListVal = { tag: "List"; items: Val[] };

/** Insertion-ordered map with string keys. */
export type MapVal = { tag: "Map"; entries: Map<string, Val> };

export type OptionVal = { tag: "Option"; some: true; value: Val } | { tag: "Option"; some: false };

export type WeakTarget = Instance | ListVal | MapVal;

/** Non-owning reference; only observable through a liveness check. */
export type WeakRefVal = { tag: "WeakRef"; ref: WeakRef<WeakTarget>; targetKind: WeakTarget["tag"] };

export type TaskVal = { tag: "Task"; task: TaskRecord };

export type ErrorVal = {
  tag: "Error";
  kind: string;
  code: string;
  category: string;
  message: string;
};

/**
 * Instance: identity + field storage + back-reference to its Concept.
 * Field map keys are exactly the concept's declared field names.
 */
export type Instance = {
  tag: "Instance";
  id: number;
  concept: ConceptDef;
  fields: Map<string, Val>;
};

export type NativeFn = (args: Val[]) => Val;

/** Opaque stdlib function; callable through the tier manager, never compiled. */
export type NativeVal = { tag: "Native"; name: string; fn: NativeFn };

export type ChannelVal = { tag: "Channel"; channel: ChannelState };

export type Val =
  | NumberVal
  | FastNumberVal
  | StringVal
  | BooleanVal
  | ListVal
  | MapVal
  | OptionVal
  | WeakRefVal
  | TaskVal
  | ErrorVal
  | Instance
  | NativeVal
  | ChannelVal;

export type ValTag = Val["tag"];

// ─────────────────────────────────────────────────────────────────
// Constructors
// ─────────────────────────────────────────────────────────────────

export const VTrue: BooleanVal = Object.freeze({ tag: "Boolean", b: true });
export const VFalse: BooleanVal = Object.freeze({ tag: "Boolean", b: false });
export const VNone: OptionVal = Object.freeze({ tag: "Option", some: false });

export function num(value: string | number | Decimal): NumberVal {
  return { tag: "Number", d: new Dec(value) };
}

export function fast(n: number): FastNumberVal {
  return { tag: "FastNumber", n };
}

export function str(s: string): StringVal {
  return { tag: "String", s };
}

export function bool(b: boolean): BooleanVal {
  return b ? VTrue : VFalse;
}

export function list(items: Val[] = []): ListVal {
  return { tag: "List", items };
}

export function map(entries: Iterable<[string, Val]> = []): MapVal {
  return { tag: "Map", entries: new Map(entries) };
}

export function some(value: Val): OptionVal {
  return { tag: "Option", some: true, value };
}

export function isInstance(v: Val): v is Instance {
  return v.tag === "Instance";
}

/**
 * Shape of a value for profiling: its tag, refined by concept name for
 * instances so a site that sees two concepts is polymorphic.
 */
export function shapeOf(v: Val): string {
  return v.tag === "Instance" ? `Instance<${v.concept.name}>` : v.tag;
}
