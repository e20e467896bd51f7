// src/core/tier/backend.ts
// Code generation backend: IR → JavaScript generator function source,
// loaded with the Function constructor.

import type { Instance, Val } from "../values/values";
import type { Eff } from "../concurrency/types";
import type { ExecContext } from "../eval/context";
import type { IRFunction, IRInstr } from "./ir";
import type { TierHelpers } from "./helpers";
import type { Registers } from "./vm";
import { EngineFault } from "../errors/errors";

export type CompiledCode = (ctx: ExecContext, self: Instance, args: readonly Val[]) => Eff<Val>;

/** Continues a trapped entry in the IR VM from `pc`. */
export type TrapHandler = (ctx: ExecContext, pc: number, regs: Registers) => Eff<Val>;

export type BackendRuntime = {
  helpers: TierHelpers;
  trap: TrapHandler;
};

export type CompileOutcome = { ok: true; entry: CompiledCode; source: string } | { ok: false; reason: string };

export interface CodegenBackend {
  readonly name: string;
  compile(ir: IRFunction, runtime: BackendRuntime): CompileOutcome;
}

// ─────────────────────────────────────────────────────────────────
// Source generation
// ─────────────────────────────────────────────────────────────────

const q = (s: string) => JSON.stringify(s);
const r = (n: number) => `r${n}`;

function trapAt(pc: number, regCount: number): string {
  const regs = Array.from({ length: regCount }, (_, i) => r(i)).join(", ");
  return `return yield* trap(ctx, ${pc}, [${regs}]);`;
}

function fastBinary(instr: Extract<IRInstr, { op: "BINARY" }>): string {
  const a = r(instr.a);
  const b = r(instr.b);
  const d = r(instr.dst);
  switch (instr.operator) {
    case "+":
    case "-":
    case "*":
      return `${d} = { tag: "FastNumber", n: ${a}.n ${instr.operator} ${b}.n };`;
    case "/":
    case "%":
      return `if (${b}.n === 0) h.divisionByZero(); ${d} = { tag: "FastNumber", n: ${a}.n ${instr.operator} ${b}.n };`;
    case "=":
      return `${d} = (${a} === ${b} || ${a}.n === ${b}.n) ? h.T : h.F;`;
    case "!=":
      return `${d} = (${a} === ${b} || ${a}.n === ${b}.n) ? h.F : h.T;`;
    default:
      // Same three-way comparison as the generic path, so NaN orders the same.
      return `{ const c = ${a}.n < ${b}.n ? -1 : ${a}.n > ${b}.n ? 1 : 0; ${d} = c ${instr.operator} 0 ? h.T : h.F; }`;
  }
}

function emitInstr(instr: IRInstr, pc: number, regCount: number): string {
  const trap = trapAt(pc, regCount);
  switch (instr.op) {
    case "CONST":
      return `${r(instr.dst)} = K[${instr.k}];`;
    case "MOVE":
      return `${r(instr.dst)} = ${r(instr.src)};`;
    case "READ_VAR":
      return `${r(instr.dst)} = ${r(instr.slot)} !== undefined ? ${r(instr.slot)} : h.global(${q(instr.name)});`;
    case "WRITE_VAR":
      return `if (${r(instr.slot)} !== undefined) ${r(instr.slot)} = ${r(instr.src)}; else h.setGlobal(${q(instr.name)}, ${r(instr.src)});`;
    case "LOAD_GLOBAL":
      return `${r(instr.dst)} = h.global(${q(instr.name)});`;
    case "STORE_GLOBAL":
      return `h.setGlobal(${q(instr.name)}, ${r(instr.src)});`;
    case "LOAD_FIELD": {
      const load = `${r(instr.dst)} = h.readField(ctx, ${r(instr.obj)}, ${q(instr.field)});`;
      if (instr.expect === "Unknown") return load;
      const o = r(instr.obj);
      return `if (${o}.tag !== "Instance" || (${o}.fields.get(${q(instr.field)}) || {}).tag !== ${q(instr.expect)}) ${trap} ${load}`;
    }
    case "STORE_FIELD": {
      const o = r(instr.obj);
      return `if (!h.canStore(ctx, ${o}, ${q(instr.field)})) ${trap} h.writeField(ctx, ${o}, ${q(instr.field)}, ${r(instr.src)});`;
    }
    case "BINARY":
      if (instr.fast) {
        return `if (${r(instr.a)}.tag !== "FastNumber" || ${r(instr.b)}.tag !== "FastNumber") ${trap} ${fastBinary(instr)}`;
      }
      return `${r(instr.dst)} = h.binary(${q(instr.operator)}, ${r(instr.a)}, ${r(instr.b)});`;
    case "UNARY":
      return `${r(instr.dst)} = h.unary(${q(instr.operator)}, ${r(instr.a)});`;
    case "TRUTH":
      return `${r(instr.dst)} = h.truth(${r(instr.src)});`;
    case "JUMP":
      return `pc = ${instr.target}; continue;`;
    case "JUMP_IF_FALSE":
      return `if (!h.truthy(${r(instr.cond)})) { pc = ${instr.target}; continue; }`;
    case "JUMP_IF_TRUE":
      return `if (h.truthy(${r(instr.cond)})) { pc = ${instr.target}; continue; }`;
    case "CALL":
      return `${r(instr.dst)} = yield* h.invoke(ctx, ${q(instr.site)}, ${r(instr.recv)}, ${q(instr.method)}, [${instr.args.map(r).join(", ")}]);`;
    case "CALL_FN":
      return `${r(instr.dst)} = yield* h.invokeFn(ctx, ${q(instr.site)}, ${r(instr.callee)}, ${q(instr.name)}, [${instr.args.map(r).join(", ")}]);`;
    case "MAKE_LIST":
      return `${r(instr.dst)} = h.makeList([${instr.items.map(r).join(", ")}]);`;
    case "MAKE_MAP":
      return `${r(instr.dst)} = h.makeMap(${JSON.stringify(instr.keys)}, [${instr.items.map(r).join(", ")}]);`;
    case "INDEX":
      return `${r(instr.dst)} = h.index(${r(instr.obj)}, ${r(instr.index)});`;
    case "COUNT":
      return `${r(instr.dst)} = h.count(${r(instr.src)});`;
    case "SNAPSHOT":
      return `${r(instr.dst)} = h.snapshot(${r(instr.src)});`;
    case "LENGTH":
      return `${r(instr.dst)} = h.length(${r(instr.src)});`;
    case "RETURN":
      return `return ${r(instr.src)};`;
  }
}

/**
 * Source of a module body that assigns `exports.entry`: a generator
 * function over `(ctx, self, args)` with one `case` per IR instruction.
 * Straight-line code falls through; jumps set `pc` and re-enter the switch.
 */
export function generateSource(ir: IRFunction): string {
  const params = Array.from({ length: ir.params }, (_, i) => `${r(i + 1)} = args[${i}]`);
  const rest = Array.from({ length: ir.regCount - ir.params - 1 }, (_, i) => r(i + ir.params + 1));
  const decls = [`${r(0)} = self`, ...params, ...rest].join(", ");

  const lines = [
    `"use strict";`,
    `// ${q(`${ir.concept}.${ir.method}`)}`,
    `exports.entry = function* (ctx, self, args) {`,
    `  let ${decls};`,
    `  let pc = 0;`,
    `  for (;;) {`,
    `    switch (pc) {`,
  ];
  ir.code.forEach((instr, pc) => {
    lines.push(`      case ${pc}:`);
    lines.push(`        ${emitInstr(instr, pc, ir.regCount)}`);
  });
  lines.push(`      default:`, `        throw badPc(pc);`, `    }`, `  }`, `};`);
  return lines.join("\n");
}

// ─────────────────────────────────────────────────────────────────
// Loading
// ─────────────────────────────────────────────────────────────────

type ModuleExports = { entry?: unknown };

function isCompiledCode(v: unknown): v is CompiledCode {
  return typeof v === "function";
}

/** The default backend: JavaScript source evaluated with `new Function`. */
export class JsBackend implements CodegenBackend {
  readonly name = "js";

  compile(ir: IRFunction, runtime: BackendRuntime): CompileOutcome {
    const source = generateSource(ir);
    const exports: ModuleExports = {};
    const badPc = (pc: number) => new EngineFault("ir-pc", `${ir.concept}.${ir.method}: no instruction at ${pc}`);

    try {
      const load = new Function("h", "K", "trap", "badPc", "exports", source);
      load(runtime.helpers, ir.constants, runtime.trap, badPc, exports);
    } catch (e) {
      return { ok: false, reason: `backend: ${e instanceof Error ? e.message : String(e)}` };
    }

    const entry = exports.entry;
    if (!isCompiledCode(entry)) {
      return { ok: false, reason: "backend: generated module has no entry" };
    }
    return { ok: true, entry, source };
  }
}
