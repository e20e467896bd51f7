// src/core/tier/helpers.ts
// Runtime support shared by the IR VM and generated code

import type { Val } from "../values/values";
import type { BinaryOp, UnaryOp } from "../values/ops";
import type { Eff } from "../concurrency/types";
import type { ExecContext } from "../eval/context";
import type { Engine } from "../eval/engine";
import type { SiteId } from "../ast";
import { VFalse, VTrue, bool, isInstance, list, map, num } from "../values/values";
import { isTruthy } from "../values/compare";
import { indexValue, iterationSnapshot, lengthOf, toIndex } from "../values/collections";
import { binary, unary } from "../values/ops";
import { langError, typeMismatch } from "../errors/errors";

/**
 * Operations compiled code cannot inline. Every one of them matches what
 * the interpreter does for the same construct, error messages included.
 */
export interface TierHelpers {
  readonly T: Val;
  readonly F: Val;
  global(name: string): Val;
  setGlobal(name: string, value: Val): void;
  readField(ctx: ExecContext, obj: Val, field: string): Val;
  /** Store guard: no binding depends on the field and no other context holds the instance. */
  canStore(ctx: ExecContext, obj: Val, field: string): boolean;
  writeField(ctx: ExecContext, obj: Val, field: string, value: Val): void;
  binary(op: BinaryOp, a: Val, b: Val): Val;
  unary(op: UnaryOp, a: Val): Val;
  truth(v: Val): Val;
  truthy(v: Val): boolean;
  index(obj: Val, index: Val): Val;
  count(v: Val): Val;
  snapshot(v: Val): Val;
  length(v: Val): Val;
  makeList(items: Val[]): Val;
  makeMap(keys: readonly string[], items: Val[]): Val;
  divisionByZero(): never;
  invoke(ctx: ExecContext, site: SiteId, recv: Val, method: string, args: Val[]): Eff<Val>;
  invokeFn(ctx: ExecContext, site: SiteId, callee: Val, name: string, args: Val[]): Eff<Val>;
}

export function createHelpers(engine: Engine): TierHelpers {
  return {
    T: VTrue,
    F: VFalse,

    global(name) {
      const v = engine.globals.get(name);
      if (v === undefined) throw langError("UnknownVariable", { name });
      return v;
    },

    setGlobal(name, value) {
      if (!engine.globals.has(name)) throw langError("UnknownVariable", { name });
      engine.globals.set(name, value);
    },

    readField(ctx, obj, field) {
      if (!isInstance(obj)) throw typeMismatch(`${obj.tag} has no field ${field}`);
      return engine.interpreter.readTracked(ctx, obj, field);
    },

    canStore(ctx, obj, field) {
      return (
        isInstance(obj) &&
        !engine.graph.hasDependents(obj.id, field) &&
        !engine.graph.heldByOther(ctx, obj.id)
      );
    },

    writeField(ctx, obj, field, value) {
      if (!isInstance(obj)) throw typeMismatch(`cannot set ${field} on ${obj.tag}`);
      engine.graph.writeField(ctx, obj, field, value);
    },

    binary,
    unary,
    truth: (v) => bool(isTruthy(v)),
    truthy: isTruthy,
    index: indexValue,
    count: (v) => num(toIndex(v)),
    snapshot: iterationSnapshot,
    length: (v) => num(lengthOf(v)),
    makeList: (items) => list(items),
    makeMap: (keys, items) => map(keys.map((k, i): [string, Val] => [k, items[i]])),

    divisionByZero() {
      throw langError("DivisionByZero");
    },

    *invoke(ctx, site, recv, method, args) {
      if (!isInstance(recv)) throw typeMismatch(`cannot call ${method} on ${recv.tag}`);
      return yield* engine.tiers.invoke(ctx, site, { tag: "method", receiver: recv, method }, args);
    },

    *invokeFn(ctx, site, callee, name, args) {
      if (callee.tag !== "Native") throw typeMismatch(`${name} is not a function`);
      return yield* engine.tiers.invoke(ctx, site, { tag: "native", native: callee }, args);
    },
  };
}
