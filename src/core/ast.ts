// src/core/ast.ts
// Program AST consumed by the evaluator. Parsing is out of scope: programs
// are assembled with the builders at the bottom of this file.

import type { BinaryOp, UnaryOp } from "./values/ops";
import type { FieldType } from "./model/concept";

/** Stable identifier of a source call expression, used as the profiling key. */
export type SiteId = string;

export type Expr =
  | { tag: "Num"; text: string }
  | { tag: "Fast"; n: number }
  | { tag: "Str"; s: string }
  | { tag: "Bool"; b: boolean }
  | { tag: "ListLit"; items: Expr[] }
  | { tag: "MapLit"; entries: Array<[string, Expr]> }
  | { tag: "Ident"; name: string }
  | { tag: "This" }
  | { tag: "Binary"; op: BinaryOp; left: Expr; right: Expr }
  | { tag: "Logical"; op: "and" | "or"; left: Expr; right: Expr }
  | { tag: "Unary"; op: UnaryOp; operand: Expr }
  | { tag: "Index"; object: Expr; index: Expr }
  | { tag: "Member"; object: Expr; member: string }
  | { tag: "MethodCall"; object: Expr; method: string; args: Expr[]; site: SiteId }
  | { tag: "FnCall"; name: string; args: Expr[]; site: SiteId }
  | { tag: "Background"; body: Stmt[] }
  | { tag: "Await"; task: Expr }
  | { tag: "Receive"; channel: Expr }
  | { tag: "Proceed"; args: Expr[] | null };

export type MatchCase = { value: Expr; body: Stmt[] };

export type Stmt =
  | { tag: "Assign"; name: string; value: Expr }
  | { tag: "Create"; concept: string; name: string; init: Array<[string, Expr]> }
  | { tag: "SetVar"; name: string; value: Expr }
  | { tag: "SetMember"; object: Expr; member: string; value: Expr }
  | { tag: "Print"; value: Expr }
  | { tag: "SwitchOn"; situation: string }
  | { tag: "SwitchOff"; situation: string }
  | { tag: "If"; cond: Expr; then: Stmt[]; else: Stmt[] | null }
  | { tag: "Match"; subject: Expr; cases: MatchCase[]; otherwise: Stmt[] | null }
  | { tag: "Try"; body: Stmt[]; catchVar: string | null; handler: Stmt[] | null; always: Stmt[] | null }
  | { tag: "RepeatTimes"; count: Expr; variable: string | null; body: Stmt[] }
  | { tag: "RepeatWhile"; cond: Expr; body: Stmt[] }
  | { tag: "ForEach"; variable: string; iterable: Expr; body: Stmt[] }
  | { tag: "Return"; value: Expr | null }
  | { tag: "Break" }
  | { tag: "Continue" }
  | { tag: "ExprStmt"; expr: Expr };

// ─────────────────────────────────────────────────────────────────
// Declarations
// ─────────────────────────────────────────────────────────────────

export type FieldNode = { name: string; type: FieldType; initial?: Expr };
export type MethodNode = { name: string; params: string[]; body: Stmt[] };
export type ObserverNode = { trigger: string; body: Stmt[] };

export type ConceptNode = {
  name: string;
  fields: FieldNode[];
  methods: MethodNode[];
  observers: ObserverNode[];
};

export type AdjustmentNode = { concept: string; methods: MethodNode[] };

export type SituationNode = { name: string; adjustments: AdjustmentNode[] };

export type Program = {
  concepts: ConceptNode[];
  situations: SituationNode[];
  story: Stmt[];
};

// ─────────────────────────────────────────────────────────────────
// Builders
// ─────────────────────────────────────────────────────────────────

let nextSite = 0;

/** Fresh call-site id; pass an explicit id when a test needs to name it. */
export function freshSite(prefix = "site"): SiteId {
  return `${prefix}-${nextSite++}`;
}

export const n = (value: number | string): Expr => ({ tag: "Num", text: String(value) });
export const fastLit = (value: number): Expr => ({ tag: "Fast", n: value });
export const s = (value: string): Expr => ({ tag: "Str", s: value });
export const b = (value: boolean): Expr => ({ tag: "Bool", b: value });
export const id = (name: string): Expr => ({ tag: "Ident", name });
export const self: Expr = { tag: "This" };
export const listOf = (...items: Expr[]): Expr => ({ tag: "ListLit", items });
export const mapOf = (entries: Record<string, Expr>): Expr => ({ tag: "MapLit", entries: Object.entries(entries) });

export const bin = (op: BinaryOp, left: Expr, right: Expr): Expr => ({ tag: "Binary", op, left, right });
export const and = (left: Expr, right: Expr): Expr => ({ tag: "Logical", op: "and", left, right });
export const or = (left: Expr, right: Expr): Expr => ({ tag: "Logical", op: "or", left, right });
export const not = (operand: Expr): Expr => ({ tag: "Unary", op: "not", operand });
export const neg = (operand: Expr): Expr => ({ tag: "Unary", op: "-", operand });
export const index = (object: Expr, idx: Expr): Expr => ({ tag: "Index", object, index: idx });
export const member = (object: Expr, name: string): Expr => ({ tag: "Member", object, member: name });
export const field = (name: string): Expr => member(self, name);

export function call(object: Expr, method: string, args: Expr[] = [], site: SiteId = freshSite()): Expr {
  return { tag: "MethodCall", object, method, args, site };
}

export function fn(name: string, args: Expr[] = [], site: SiteId = freshSite("fn")): Expr {
  return { tag: "FnCall", name, args, site };
}

export const background = (...body: Stmt[]): Expr => ({ tag: "Background", body });
export const awaitTask = (task: Expr): Expr => ({ tag: "Await", task });
export const receive = (channel: Expr): Expr => ({ tag: "Receive", channel });
export const proceed = (args: Expr[] | null = null): Expr => ({ tag: "Proceed", args });

export const assign = (name: string, value: Expr): Stmt => ({ tag: "Assign", name, value });
export const setVar = (name: string, value: Expr): Stmt => ({ tag: "SetVar", name, value });
export const setMember = (object: Expr, name: string, value: Expr): Stmt => ({
  tag: "SetMember",
  object,
  member: name,
  value,
});
export const setField = (name: string, value: Expr): Stmt => setMember(self, name, value);
export const create = (concept: string, name: string, init: Record<string, Expr> = {}): Stmt => ({
  tag: "Create",
  concept,
  name,
  init: Object.entries(init),
});
export const print = (value: Expr): Stmt => ({ tag: "Print", value });
export const switchOn = (situation: string): Stmt => ({ tag: "SwitchOn", situation });
export const switchOff = (situation: string): Stmt => ({ tag: "SwitchOff", situation });
export const ifThen = (cond: Expr, then: Stmt[], otherwise: Stmt[] | null = null): Stmt => ({
  tag: "If",
  cond,
  then,
  else: otherwise,
});
export const match = (subject: Expr, cases: MatchCase[], otherwise: Stmt[] | null = null): Stmt => ({
  tag: "Match",
  subject,
  cases,
  otherwise,
});
export const tryCatch = (
  body: Stmt[],
  catchVar: string | null,
  handler: Stmt[] | null,
  always: Stmt[] | null = null,
): Stmt => ({ tag: "Try", body, catchVar, handler, always });
export const repeat = (count: Expr, body: Stmt[], variable: string | null = null): Stmt => ({
  tag: "RepeatTimes",
  count,
  variable,
  body,
});
export const repeatWhile = (cond: Expr, body: Stmt[]): Stmt => ({ tag: "RepeatWhile", cond, body });
export const forEach = (variable: string, iterable: Expr, body: Stmt[]): Stmt => ({
  tag: "ForEach",
  variable,
  iterable,
  body,
});
export const ret = (value: Expr | null = null): Stmt => ({ tag: "Return", value });
export const brk: Stmt = { tag: "Break" };
export const cont: Stmt = { tag: "Continue" };
export const exprStmt = (expr: Expr): Stmt => ({ tag: "ExprStmt", expr });

export const method = (name: string, params: string[], body: Stmt[]): MethodNode => ({ name, params, body });
export const when = (trigger: string, body: Stmt[]): ObserverNode => ({ trigger, body });

export function concept(
  name: string,
  parts: { fields?: FieldNode[]; methods?: MethodNode[]; observers?: ObserverNode[] },
): ConceptNode {
  return { name, fields: parts.fields ?? [], methods: parts.methods ?? [], observers: parts.observers ?? [] };
}

export function situation(name: string, adjustments: Record<string, MethodNode[]>): SituationNode {
  return {
    name,
    adjustments: Object.entries(adjustments).map(([conceptName, methods]) => ({ concept: conceptName, methods })),
  };
}

export function program(parts: Partial<Program>): Program {
  return { concepts: parts.concepts ?? [], situations: parts.situations ?? [], story: parts.story ?? [] };
}
