// src/core/tier/ir.ts
// Register IR for promoted methods. The IR VM and the code generator both
// execute it; guard-bearing instructions are the only places a trap may occur.

import type { Val, ValTag } from "../values/values";
import type { BinaryOp, UnaryOp } from "../values/ops";
import type { SiteId } from "../ast";

export type Reg = number;

/** A value tag, or "Unknown" when nothing is known statically. */
export type Kind = ValTag | "Unknown";

export type IRInstr =
  | { op: "CONST"; dst: Reg; k: number }                                  // regs[dst] = constants[k]
  | { op: "MOVE"; dst: Reg; src: Reg }                                    // regs[dst] = regs[src]
  | { op: "READ_VAR"; dst: Reg; slot: Reg; name: string }                 // local slot, or global `name` before first assignment
  | { op: "WRITE_VAR"; slot: Reg; src: Reg; name: string }                // `Set`: local slot once assigned, else global
  | { op: "LOAD_GLOBAL"; dst: Reg; name: string }
  | { op: "STORE_GLOBAL"; name: string; src: Reg }                        // existing global only
  | { op: "LOAD_FIELD"; dst: Reg; obj: Reg; field: string; expect: Kind } // guard: loaded kind (when not Unknown)
  | { op: "STORE_FIELD"; obj: Reg; field: string; src: Reg }              // guard: no dependents, no foreign holder
  | { op: "BINARY"; dst: Reg; operator: BinaryOp; a: Reg; b: Reg; fast: boolean } // guard when fast: both FastNumber
  | { op: "UNARY"; dst: Reg; operator: UnaryOp; a: Reg }
  | { op: "TRUTH"; dst: Reg; src: Reg }                                   // regs[dst] = Boolean(isTruthy(src))
  | { op: "JUMP"; target: number }
  | { op: "JUMP_IF_FALSE"; cond: Reg; target: number }
  | { op: "JUMP_IF_TRUE"; cond: Reg; target: number }
  | { op: "CALL"; dst: Reg; site: SiteId; recv: Reg; method: string; args: Reg[] }
  | { op: "CALL_FN"; dst: Reg; site: SiteId; callee: Reg; name: string; args: Reg[] }
  | { op: "MAKE_LIST"; dst: Reg; items: Reg[] }
  | { op: "MAKE_MAP"; dst: Reg; keys: string[]; items: Reg[] }
  | { op: "INDEX"; dst: Reg; obj: Reg; index: Reg }
  | { op: "COUNT"; dst: Reg; src: Reg }                                   // whole-number repeat count as a Number
  | { op: "SNAPSHOT"; dst: Reg; src: Reg }                                // For-each items, copied
  | { op: "LENGTH"; dst: Reg; src: Reg }                                  // snapshot length as a Number
  | { op: "RETURN"; src: Reg };

/**
 * A lowered base method. Register 0 holds `This`, registers 1..params hold
 * the arguments; every other register starts unassigned.
 */
export type IRFunction = {
  readonly concept: string;
  readonly method: string;
  readonly params: number;
  readonly regCount: number;
  readonly constants: readonly Val[];
  readonly code: readonly IRInstr[];
  /** Fields of `This` the method may write; the entry guard checks them. */
  readonly writtenFields: readonly string[];
};

/** Instructions whose guard may fail and hand control to the IR VM. */
export function isGuardPoint(instr: IRInstr): boolean {
  switch (instr.op) {
    case "LOAD_FIELD":
      return instr.expect !== "Unknown";
    case "STORE_FIELD":
      return true;
    case "BINARY":
      return instr.fast;
    default:
      return false;
  }
}

/** Readable listing, one instruction per line. */
export function formatIR(fn: IRFunction): string {
  const lines = [`${fn.concept}.${fn.method} params=${fn.params} regs=${fn.regCount}`];
  fn.code.forEach((instr, pc) => {
    const { op, ...operands } = instr;
    const parts = Object.entries(operands).map(([k, v]) => `${k}=${Array.isArray(v) ? `[${v.join(",")}]` : String(v)}`);
    lines.push(`${String(pc).padStart(4)}  ${op} ${parts.join(" ")}`.trimEnd());
  });
  return lines.join("\n");
}
