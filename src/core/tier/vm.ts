// src/core/tier/vm.ts
// IR interpreter. Runs an IRFunction from any pc with a given register file;
// generated code hands over to it when a guard fails.

import type { Val } from "../values/values";
import type { Eff } from "../concurrency/types";
import type { ExecContext } from "../eval/context";
import type { IRFunction } from "./ir";
import type { TierHelpers } from "./helpers";
import { EngineFault } from "../errors/errors";

export type Registers = Array<Val | undefined>;

function reg(regs: Registers, r: number, fn: IRFunction, pc: number): Val {
  const v = regs[r];
  if (v === undefined) {
    throw new EngineFault("ir-register", `${fn.concept}.${fn.method}@${pc} read unassigned r${r}`);
  }
  return v;
}

/**
 * Execute `fn` starting at `pc`. Guards are not checked here: this tier
 * always takes the general path, so it can resume any trapped instruction.
 */
export function* runIR(h: TierHelpers, ctx: ExecContext, fn: IRFunction, start: number, regs: Registers): Eff<Val> {
  let pc = start;
  const get = (r: number) => reg(regs, r, fn, pc);

  for (;;) {
    const instr = fn.code[pc];
    if (!instr) {
      throw new EngineFault("ir-pc", `${fn.concept}.${fn.method} ran off the end at ${pc}`);
    }

    switch (instr.op) {
      case "CONST":
        regs[instr.dst] = fn.constants[instr.k];
        break;
      case "MOVE":
        regs[instr.dst] = get(instr.src);
        break;
      case "READ_VAR":
        regs[instr.dst] = regs[instr.slot] ?? h.global(instr.name);
        break;
      case "WRITE_VAR":
        if (regs[instr.slot] !== undefined) regs[instr.slot] = get(instr.src);
        else h.setGlobal(instr.name, get(instr.src));
        break;
      case "LOAD_GLOBAL":
        regs[instr.dst] = h.global(instr.name);
        break;
      case "STORE_GLOBAL":
        h.setGlobal(instr.name, get(instr.src));
        break;
      case "LOAD_FIELD":
        regs[instr.dst] = h.readField(ctx, get(instr.obj), instr.field);
        break;
      case "STORE_FIELD":
        h.writeField(ctx, get(instr.obj), instr.field, get(instr.src));
        break;
      case "BINARY":
        regs[instr.dst] = h.binary(instr.operator, get(instr.a), get(instr.b));
        break;
      case "UNARY":
        regs[instr.dst] = h.unary(instr.operator, get(instr.a));
        break;
      case "TRUTH":
        regs[instr.dst] = h.truth(get(instr.src));
        break;
      case "JUMP":
        pc = instr.target;
        continue;
      case "JUMP_IF_FALSE":
        if (!h.truthy(get(instr.cond))) {
          pc = instr.target;
          continue;
        }
        break;
      case "JUMP_IF_TRUE":
        if (h.truthy(get(instr.cond))) {
          pc = instr.target;
          continue;
        }
        break;
      case "CALL":
        regs[instr.dst] = yield* h.invoke(ctx, instr.site, get(instr.recv), instr.method, instr.args.map(get));
        break;
      case "CALL_FN":
        regs[instr.dst] = yield* h.invokeFn(ctx, instr.site, get(instr.callee), instr.name, instr.args.map(get));
        break;
      case "MAKE_LIST":
        regs[instr.dst] = h.makeList(instr.items.map(get));
        break;
      case "MAKE_MAP":
        regs[instr.dst] = h.makeMap(instr.keys, instr.items.map(get));
        break;
      case "INDEX":
        regs[instr.dst] = h.index(get(instr.obj), get(instr.index));
        break;
      case "COUNT":
        regs[instr.dst] = h.count(get(instr.src));
        break;
      case "SNAPSHOT":
        regs[instr.dst] = h.snapshot(get(instr.src));
        break;
      case "LENGTH":
        regs[instr.dst] = h.length(get(instr.src));
        break;
      case "RETURN":
        return get(instr.src);
    }
    pc++;
  }
}
