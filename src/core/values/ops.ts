// src/core/values/ops.ts
// Operator semantics. The interpreter, the IR VM and generated code all
// call these, so both tiers compute identical results.

import type { Val } from "./values";
import { bool, fast, list, str, VFalse, VTrue } from "./values";
import { promote } from "./numeric";
import { display } from "./display";
import { compareValues, isTruthy, valuesEqual } from "./compare";
import { langError, typeMismatch } from "../errors/errors";

export type ArithOp = "+" | "-" | "*" | "/" | "%";
export type CompareOp = "=" | "!=" | "<" | ">" | "<=" | ">=";
export type BinaryOp = ArithOp | CompareOp;
export type UnaryOp = "not" | "-";

export const ARITH_OPS: readonly ArithOp[] = ["+", "-", "*", "/", "%"];

export function isArithOp(op: BinaryOp): op is ArithOp {
  return ARITH_OPS.some((o) => o === op);
}

type Numeric = Extract<Val, { tag: "Number" | "FastNumber" }>;

function isNumeric(v: Val): v is Numeric {
  return v.tag === "Number" || v.tag === "FastNumber";
}

// ─────────────────────────────────────────────────────────────────
// Arithmetic
// ─────────────────────────────────────────────────────────────────

function arithNumeric(op: ArithOp, a: Numeric, b: Numeric): Val {
  if (a.tag === "Number" && b.tag === "Number") {
    switch (op) {
      case "+":
        return { tag: "Number", d: a.d.plus(b.d) };
      case "-":
        return { tag: "Number", d: a.d.minus(b.d) };
      case "*":
        return { tag: "Number", d: a.d.times(b.d) };
      case "/":
        if (b.d.isZero()) throw langError("DivisionByZero");
        return { tag: "Number", d: a.d.div(b.d) };
      case "%":
        if (b.d.isZero()) throw langError("DivisionByZero");
        return { tag: "Number", d: a.d.mod(b.d) };
    }
  }

  const x = promote(a);
  const y = promote(b);
  switch (op) {
    case "+":
      return fast(x + y);
    case "-":
      return fast(x - y);
    case "*":
      return fast(x * y);
    case "/":
      if (y === 0) throw langError("DivisionByZero");
      return fast(x / y);
    case "%":
      if (y === 0) throw langError("DivisionByZero");
      return fast(x % y);
  }
}

export function arith(op: ArithOp, a: Val, b: Val): Val {
  if (isNumeric(a) && isNumeric(b)) {
    return arithNumeric(op, a, b);
  }
  if (op === "+") {
    if (a.tag === "String" || b.tag === "String") {
      return str(display(a) + display(b));
    }
    if (a.tag === "List" && b.tag === "List") {
      return list([...a.items, ...b.items]);
    }
  }
  throw typeMismatch(`cannot apply ${op} to ${a.tag} and ${b.tag}`);
}

// ─────────────────────────────────────────────────────────────────
// Comparison
// ─────────────────────────────────────────────────────────────────

export function compare(op: CompareOp, a: Val, b: Val): Val {
  switch (op) {
    case "=":
      return bool(valuesEqual(a, b));
    case "!=":
      return bool(!valuesEqual(a, b));
    case "<":
      return bool(compareValues(a, b) < 0);
    case ">":
      return bool(compareValues(a, b) > 0);
    case "<=":
      return bool(compareValues(a, b) <= 0);
    case ">=":
      return bool(compareValues(a, b) >= 0);
  }
}

export function binary(op: BinaryOp, a: Val, b: Val): Val {
  return isArithOp(op) ? arith(op, a, b) : compare(op, a, b);
}

export function unary(op: UnaryOp, v: Val): Val {
  if (op === "not") {
    return isTruthy(v) ? VFalse : VTrue;
  }
  if (v.tag === "Number") return { tag: "Number", d: v.d.negated() };
  if (v.tag === "FastNumber") return fast(-v.n);
  throw typeMismatch(`cannot negate ${v.tag}`);
}
