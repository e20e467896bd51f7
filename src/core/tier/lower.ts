// src/core/tier/lower.ts
// Lowering of a base method body to register IR, specialised to one call signature

import type { Expr, Stmt } from "../ast";
import type { Val } from "../values/values";
import type { ConceptDef, MethodDef } from "../model/concept";
import type { BinaryOp } from "../values/ops";
import type { IRFunction, IRInstr, Kind, Reg } from "./ir";
import { VFalse, bool, fast, num, str } from "../values/values";
import { isArithOp } from "../values/ops";

/**
 * What the compiler may assume: argument kinds (checked by the entry
 * guard) and the kinds the receiver's `Any` fields held at promotion time
 * (checked by load guards).
 */
export type Speculation = {
  readonly argKinds: readonly Kind[];
  readonly anyFieldKinds: ReadonlyMap<string, Kind>;
};

export type LowerResult = { ok: true; fn: IRFunction } | { ok: false; reason: string };

class Unsupported extends Error {}

type Loop = { breaks: number[]; continues: number[] };

// ─────────────────────────────────────────────────────────────────
// Assigned names
// ─────────────────────────────────────────────────────────────────

function collectAssigned(body: readonly Stmt[], out: Set<string>): void {
  for (const stmt of body) {
    switch (stmt.tag) {
      case "Assign":
        out.add(stmt.name);
        break;
      case "If":
        collectAssigned(stmt.then, out);
        if (stmt.else) collectAssigned(stmt.else, out);
        break;
      case "Match":
        for (const c of stmt.cases) collectAssigned(c.body, out);
        if (stmt.otherwise) collectAssigned(stmt.otherwise, out);
        break;
      case "RepeatTimes":
        if (stmt.variable !== null) out.add(stmt.variable);
        collectAssigned(stmt.body, out);
        break;
      case "RepeatWhile":
        collectAssigned(stmt.body, out);
        break;
      case "ForEach":
        out.add(stmt.variable);
        collectAssigned(stmt.body, out);
        break;
      default:
        break;
    }
  }
}

function joinKind(a: Kind | undefined, b: Kind): Kind {
  return a === undefined || a === b ? b : "Unknown";
}

// ─────────────────────────────────────────────────────────────────
// Lowerer
// ─────────────────────────────────────────────────────────────────

class Lowerer {
  private readonly code: IRInstr[] = [];
  private readonly constants: Val[] = [];
  private readonly regKinds: Kind[] = [];
  private readonly locals = new Map<string, Reg>();
  private readonly localKinds = new Map<string, Kind>();
  private readonly written = new Set<string>();
  private readonly loops: Loop[] = [];
  private nextReg = 0;

  constructor(
    private readonly concept: ConceptDef,
    private readonly method: MethodDef,
    private readonly spec: Speculation,
  ) {}

  lower(): IRFunction {
    this.alloc("Instance"); // r0 = This

    this.method.params.forEach((p, i) => {
      const kind = this.spec.argKinds[i] ?? "Unknown";
      this.locals.set(p, this.alloc(kind));
      this.localKinds.set(p, kind);
    });

    const assigned = new Set<string>();
    collectAssigned(this.method.body, assigned);
    for (const name of assigned) {
      if (this.locals.has(name)) continue;
      if (this.concept.fieldIndex.has(name)) {
        throw new Unsupported(`local ${name} shadows a field`);
      }
      this.locals.set(name, this.alloc("Unknown"));
    }
    this.inferLocalKinds();
    for (const [name, reg] of this.locals) {
      this.regKinds[reg] = this.localKinds.get(name) ?? "Unknown";
    }

    this.block(this.method.body);
    this.emit({ op: "RETURN", src: this.constant(VFalse, "Boolean") });

    return {
      concept: this.concept.name,
      method: this.method.name,
      params: this.method.params.length,
      regCount: this.nextReg,
      constants: this.constants,
      code: this.code,
      writtenFields: [...this.written],
    };
  }

  // ── kinds ──────────────────────────────────────────────────────

  /** Flow-insensitive: a local's kind is the join of everything assigned to it. */
  private inferLocalKinds(): void {
    const params = new Set(this.method.params);
    for (let round = 0; round < 4; round++) {
      const next = new Map<string, Kind>();
      const visit = (body: readonly Stmt[]): void => {
        for (const stmt of body) {
          switch (stmt.tag) {
            case "Assign":
              next.set(stmt.name, joinKind(next.get(stmt.name), this.staticKind(stmt.value)));
              break;
            case "SetVar":
              if (this.locals.has(stmt.name)) {
                next.set(stmt.name, joinKind(next.get(stmt.name), this.staticKind(stmt.value)));
              }
              break;
            case "If":
              visit(stmt.then);
              if (stmt.else) visit(stmt.else);
              break;
            case "Match":
              for (const c of stmt.cases) visit(c.body);
              if (stmt.otherwise) visit(stmt.otherwise);
              break;
            case "RepeatTimes":
              if (stmt.variable !== null) next.set(stmt.variable, joinKind(next.get(stmt.variable), "Number"));
              visit(stmt.body);
              break;
            case "RepeatWhile":
              visit(stmt.body);
              break;
            case "ForEach":
              next.set(stmt.variable, "Unknown");
              visit(stmt.body);
              break;
            default:
              break;
          }
        }
      };
      visit(this.method.body);

      let changed = false;
      for (const [name, kind] of next) {
        const merged = params.has(name) ? joinKind(this.localKinds.get(name), kind) : kind;
        if (this.localKinds.get(name) !== merged) {
          this.localKinds.set(name, merged);
          changed = true;
        }
      }
      if (!changed) return;
    }
  }

  private fieldKind(name: string): Kind {
    const decl = this.concept.fieldIndex.get(name);
    if (!decl) return "Unknown";
    return decl.type === "Any" ? (this.spec.anyFieldKinds.get(name) ?? "Unknown") : decl.type;
  }

  private staticKind(e: Expr): Kind {
    switch (e.tag) {
      case "Num":
        return "Number";
      case "Fast":
        return "FastNumber";
      case "Str":
        return "String";
      case "Bool":
      case "Logical":
        return "Boolean";
      case "ListLit":
        return "List";
      case "MapLit":
        return "Map";
      case "This":
        return "Instance";
      case "Ident":
        if (this.locals.has(e.name)) return this.localKinds.get(e.name) ?? "Unknown";
        return this.fieldKind(e.name);
      case "Member":
        return e.object.tag === "This" ? this.fieldKind(e.member) : "Unknown";
      case "Unary":
        if (e.op === "not") return "Boolean";
        return this.staticKind(e.operand);
      case "Binary":
        return binaryKind(e.op, this.staticKind(e.left), this.staticKind(e.right));
      default:
        return "Unknown";
    }
  }

  // ── emission helpers ───────────────────────────────────────────

  private alloc(kind: Kind): Reg {
    const reg = this.nextReg++;
    this.regKinds[reg] = kind;
    return reg;
  }

  private emit(instr: IRInstr): number {
    this.code.push(instr);
    return this.code.length - 1;
  }

  private here(): number {
    return this.code.length;
  }

  private patch(at: number, target: number): void {
    const instr = this.code[at];
    if (instr.op === "JUMP" || instr.op === "JUMP_IF_FALSE" || instr.op === "JUMP_IF_TRUE") {
      this.code[at] = { ...instr, target };
    }
  }

  private constant(v: Val, kind: Kind): Reg {
    const dst = this.alloc(kind);
    this.constants.push(v);
    this.emit({ op: "CONST", dst, k: this.constants.length - 1 });
    return dst;
  }

  // ── statements ─────────────────────────────────────────────────

  private block(body: readonly Stmt[]): void {
    for (const stmt of body) this.stmt(stmt);
  }

  private stmt(stmt: Stmt): void {
    switch (stmt.tag) {
      case "Assign": {
        const src = this.expr(stmt.value);
        this.emit({ op: "MOVE", dst: this.localReg(stmt.name), src });
        return;
      }

      case "SetVar": {
        const src = this.expr(stmt.value);
        const slot = this.locals.get(stmt.name);
        if (slot !== undefined) {
          this.emit({ op: "WRITE_VAR", slot, src, name: stmt.name });
        } else if (this.concept.fieldIndex.has(stmt.name)) {
          this.written.add(stmt.name);
          this.emit({ op: "STORE_FIELD", obj: 0, field: stmt.name, src });
        } else {
          this.emit({ op: "STORE_GLOBAL", name: stmt.name, src });
        }
        return;
      }

      case "SetMember": {
        const obj = this.expr(stmt.object);
        const src = this.expr(stmt.value);
        if (stmt.object.tag === "This") this.written.add(stmt.member);
        this.emit({ op: "STORE_FIELD", obj, field: stmt.member, src });
        return;
      }

      case "If": {
        const cond = this.expr(stmt.cond);
        const toElse = this.emit({ op: "JUMP_IF_FALSE", cond, target: -1 });
        this.block(stmt.then);
        if (stmt.else) {
          const toEnd = this.emit({ op: "JUMP", target: -1 });
          this.patch(toElse, this.here());
          this.block(stmt.else);
          this.patch(toEnd, this.here());
        } else {
          this.patch(toElse, this.here());
        }
        return;
      }

      case "Match": {
        const subject = this.expr(stmt.subject);
        const ends: number[] = [];
        for (const c of stmt.cases) {
          const value = this.expr(c.value);
          const same = this.alloc("Boolean");
          this.emit({ op: "BINARY", dst: same, operator: "=", a: subject, b: value, fast: false });
          const next = this.emit({ op: "JUMP_IF_FALSE", cond: same, target: -1 });
          this.block(c.body);
          ends.push(this.emit({ op: "JUMP", target: -1 }));
          this.patch(next, this.here());
        }
        if (stmt.otherwise) this.block(stmt.otherwise);
        for (const at of ends) this.patch(at, this.here());
        return;
      }

      case "RepeatTimes": {
        const times = this.alloc("Number");
        this.emit({ op: "COUNT", dst: times, src: this.expr(stmt.count) });
        const varSlot = stmt.variable === null ? null : this.localReg(stmt.variable);
        this.countedLoop(times, (i) => {
          if (varSlot !== null) this.emit({ op: "MOVE", dst: varSlot, src: i });
          this.block(stmt.body);
        });
        return;
      }

      case "ForEach": {
        const items = this.alloc("List");
        this.emit({ op: "SNAPSHOT", dst: items, src: this.expr(stmt.iterable) });
        const length = this.alloc("Number");
        this.emit({ op: "LENGTH", dst: length, src: items });
        const varSlot = this.localReg(stmt.variable);
        this.countedLoop(length, (i) => {
          this.emit({ op: "INDEX", dst: varSlot, obj: items, index: i });
          this.block(stmt.body);
        });
        return;
      }

      case "RepeatWhile": {
        const top = this.here();
        const cond = this.expr(stmt.cond);
        const exit = this.emit({ op: "JUMP_IF_FALSE", cond, target: -1 });
        const loop = this.enterLoop();
        this.block(stmt.body);
        this.emit({ op: "JUMP", target: top });
        this.leaveLoop(loop, top, this.here());
        this.patch(exit, this.here());
        return;
      }

      case "Return": {
        const src = stmt.value ? this.expr(stmt.value) : this.constant(VFalse, "Boolean");
        this.emit({ op: "RETURN", src });
        return;
      }

      case "Break":
      case "Continue": {
        const loop = this.loops[this.loops.length - 1];
        if (!loop) {
          // Outside any loop the method simply ends.
          this.emit({ op: "RETURN", src: this.constant(VFalse, "Boolean") });
          return;
        }
        const at = this.emit({ op: "JUMP", target: -1 });
        (stmt.tag === "Break" ? loop.breaks : loop.continues).push(at);
        return;
      }

      case "ExprStmt":
        this.expr(stmt.expr);
        return;

      case "Create":
      case "Print":
      case "SwitchOn":
      case "SwitchOff":
      case "Try":
        throw new Unsupported(stmt.tag);
    }
  }

  /** i = 1; while i <= limit: body(i); i = i + 1 */
  private countedLoop(limit: Reg, body: (i: Reg) => void): void {
    const i = this.constant(num(1), "Number");
    const one = this.constant(num(1), "Number");
    const top = this.here();
    const inRange = this.alloc("Boolean");
    this.emit({ op: "BINARY", dst: inRange, operator: "<=", a: i, b: limit, fast: false });
    const exit = this.emit({ op: "JUMP_IF_FALSE", cond: inRange, target: -1 });
    const loop = this.enterLoop();
    body(i);
    const step = this.here();
    this.emit({ op: "BINARY", dst: i, operator: "+", a: i, b: one, fast: false });
    this.emit({ op: "JUMP", target: top });
    this.leaveLoop(loop, step, this.here());
    this.patch(exit, this.here());
  }

  private enterLoop(): Loop {
    const loop: Loop = { breaks: [], continues: [] };
    this.loops.push(loop);
    return loop;
  }

  private leaveLoop(loop: Loop, continueAt: number, breakAt: number): void {
    this.loops.pop();
    for (const at of loop.continues) this.patch(at, continueAt);
    for (const at of loop.breaks) this.patch(at, breakAt);
  }

  private localReg(name: string): Reg {
    const reg = this.locals.get(name);
    if (reg === undefined) throw new Unsupported(`unallocated local ${name}`);
    return reg;
  }

  // ── expressions ────────────────────────────────────────────────

  private expr(e: Expr): Reg {
    switch (e.tag) {
      case "Num":
        return this.constant(num(e.text), "Number");
      case "Fast":
        return this.constant(fast(e.n), "FastNumber");
      case "Str":
        return this.constant(str(e.s), "String");
      case "Bool":
        return this.constant(bool(e.b), "Boolean");

      case "ListLit": {
        const items = e.items.map((item) => this.expr(item));
        const dst = this.alloc("List");
        this.emit({ op: "MAKE_LIST", dst, items });
        return dst;
      }

      case "MapLit": {
        const items = e.entries.map(([, item]) => this.expr(item));
        const dst = this.alloc("Map");
        this.emit({ op: "MAKE_MAP", dst, keys: e.entries.map(([k]) => k), items });
        return dst;
      }

      case "This":
        return 0;

      case "Ident": {
        const slot = this.locals.get(e.name);
        if (slot !== undefined) {
          const dst = this.alloc(this.localKinds.get(e.name) ?? "Unknown");
          this.emit({ op: "READ_VAR", dst, slot, name: e.name });
          return dst;
        }
        if (this.concept.fieldIndex.has(e.name)) return this.loadField(0, e.name, true);
        const dst = this.alloc("Unknown");
        this.emit({ op: "LOAD_GLOBAL", dst, name: e.name });
        return dst;
      }

      case "Member": {
        const obj = this.expr(e.object);
        return this.loadField(obj, e.member, e.object.tag === "This");
      }

      case "Binary": {
        const a = this.expr(e.left);
        const b = this.expr(e.right);
        const ka = this.regKinds[a];
        const kb = this.regKinds[b];
        const dst = this.alloc(binaryKind(e.op, ka, kb));
        this.emit({
          op: "BINARY",
          dst,
          operator: e.op,
          a,
          b,
          fast: ka === "FastNumber" && kb === "FastNumber",
        });
        return dst;
      }

      case "Logical": {
        const dst = this.alloc("Boolean");
        this.emit({ op: "TRUTH", dst, src: this.expr(e.left) });
        const skip = this.emit(
          e.op === "and" ? { op: "JUMP_IF_FALSE", cond: dst, target: -1 } : { op: "JUMP_IF_TRUE", cond: dst, target: -1 },
        );
        this.emit({ op: "TRUTH", dst, src: this.expr(e.right) });
        this.patch(skip, this.here());
        return dst;
      }

      case "Unary": {
        const a = this.expr(e.operand);
        const dst = this.alloc(e.op === "not" ? "Boolean" : this.regKinds[a]);
        this.emit({ op: "UNARY", dst, operator: e.op, a });
        return dst;
      }

      case "Index": {
        const obj = this.expr(e.object);
        const index = this.expr(e.index);
        const dst = this.alloc("Unknown");
        this.emit({ op: "INDEX", dst, obj, index });
        return dst;
      }

      case "MethodCall": {
        const recv = this.expr(e.object);
        const args = e.args.map((a) => this.expr(a));
        const dst = this.alloc("Unknown");
        this.emit({ op: "CALL", dst, site: e.site, recv, method: e.method, args });
        return dst;
      }

      case "FnCall": {
        if (this.locals.has(e.name) || this.concept.fieldIndex.has(e.name)) {
          throw new Unsupported(`call through variable ${e.name}`);
        }
        const callee = this.alloc("Unknown");
        this.emit({ op: "LOAD_GLOBAL", dst: callee, name: e.name });
        const args = e.args.map((a) => this.expr(a));
        const dst = this.alloc("Unknown");
        this.emit({ op: "CALL_FN", dst, site: e.site, callee, name: e.name, args });
        return dst;
      }

      case "Background":
      case "Await":
      case "Receive":
      case "Proceed":
        throw new Unsupported(e.tag);
    }
  }

  /** Fields of `This` have a known kind; `Any` fields are speculated and guarded. */
  private loadField(obj: Reg, field: string, onSelf: boolean): Reg {
    const decl = onSelf ? this.concept.fieldIndex.get(field) : undefined;
    const kind = onSelf ? this.fieldKind(field) : "Unknown";
    const expect: Kind = decl?.type === "Any" ? kind : "Unknown";
    const dst = this.alloc(kind);
    this.emit({ op: "LOAD_FIELD", dst, obj, field, expect });
    return dst;
  }
}

function binaryKind(op: BinaryOp, a: Kind, b: Kind): Kind {
  if (!isArithOp(op)) return "Boolean";
  const numeric = (k: Kind) => k === "Number" || k === "FastNumber";
  if (a === "Number" && b === "Number") return "Number";
  if (numeric(a) && numeric(b)) return "FastNumber";
  if (op === "+" && (a === "String" || b === "String")) return "String";
  if (op === "+" && a === "List" && b === "List") return "List";
  return "Unknown";
}

/**
 * Lower `method` (a base method of `concept`) under `spec`. Constructs the
 * IR cannot express (situation switches, suspension, Proceed, Try, Create,
 * Print, locals shadowing fields) make lowering fail; failures are values.
 */
export function lowerMethod(concept: ConceptDef, method: MethodDef, spec: Speculation): LowerResult {
  try {
    return { ok: true, fn: new Lowerer(concept, method, spec).lower() };
  } catch (e) {
    if (e instanceof Unsupported) return { ok: false, reason: `unsupported: ${e.message}` };
    throw e;
  }
}
