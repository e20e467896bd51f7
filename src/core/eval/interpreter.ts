// src/core/eval/interpreter.ts
// Tree-walking evaluator. Every step that can suspend is a generator that
// yields to the scheduler; everything else runs straight through.

import type { Expr, Stmt } from "../ast";
import type { Instance, Val } from "../values/values";
import type { ConceptDef, ObserverDecl } from "../model/concept";
import type { DispatchChain } from "../dispatch/resolver";
import type { Eff } from "../concurrency/types";
import type { Engine } from "./engine";
import type { ExecContext } from "./context";
import { VFalse, fast, list, map, num, str, bool } from "../values/values";
import { display } from "../values/display";
import { isTruthy, valuesEqual } from "../values/compare";
import { indexValue, iterationSnapshot, counter, toIndex } from "../values/collections";
import { binary, unary } from "../values/ops";
import { hasField, makeInstance, readField, writeRawField } from "../model/instance";
import { pollChannel } from "../concurrency/channel";
import { EngineFault, isLangError, langError, typeMismatch } from "../errors/errors";
import { errorValue } from "../errors/convert";
import { createContext, recordRead } from "./context";

export type Completion =
  | { tag: "normal" }
  | { tag: "return"; value: Val }
  | { tag: "break" }
  | { tag: "continue" };

const NORMAL: Completion = { tag: "normal" };

/**
 * One activation: a story run, a method link, an observer run or a
 * background task body. Methods have a single scope; blocks do not nest.
 */
export type Frame = {
  readonly locals: Map<string, Val>;
  readonly self: Instance | null;
  /** Dispatch chain and position, for `Proceed`. */
  readonly chain: DispatchChain | null;
  readonly position: number;
  readonly args: readonly Val[];
  /** Story frames keep their variables in the program globals. */
  readonly story: boolean;
};

function methodFrame(self: Instance | null, locals = new Map<string, Val>()): Frame {
  return { locals, self, chain: null, position: 0, args: [], story: false };
}

export class Interpreter {
  constructor(private readonly engine: Engine) {}

  // ─────────────────────────────────────────────────────────────────
  // Entry points
  // ─────────────────────────────────────────────────────────────────

  *runStory(ctx: ExecContext, body: readonly Stmt[]): Eff<Val> {
    const frame: Frame = { locals: this.engine.globals, self: null, chain: null, position: 0, args: [], story: true };
    const done = yield* this.execBlock(ctx, frame, body);
    return done.tag === "return" ? done.value : VFalse;
  }

  /** Evaluate a standalone expression, such as a field initializer. */
  *evaluate(ctx: ExecContext, e: Expr): Eff<Val> {
    return yield* this.eval(ctx, methodFrame(null), e);
  }

  /**
   * Interpreted call: resolve the dispatch chain for the receiver under the
   * context's active situations and run its first link.
   */
  *callMethod(ctx: ExecContext, receiver: Instance, method: string, args: readonly Val[]): Eff<Val> {
    const chain = this.engine.resolver.resolve(ctx.situations, receiver.concept, method);
    return yield* this.runLink(ctx, chain, 0, receiver, args);
  }

  /**
   * Run an observer body to completion. Observer bodies never suspend:
   * Await and Receive refuse inside them before yielding.
   */
  runObserver(ctx: ExecContext, owner: Instance, observer: ObserverDecl): void {
    const gen = this.execBlock(ctx, methodFrame(owner), observer.body);
    const step = gen.next();
    if (!step.done) {
      throw new EngineFault("observer-suspended", `observer on ${owner.concept.name}.${observer.trigger} yielded`);
    }
  }

  /**
   * New instance with `init` stored before any observer is attached, so
   * construction itself does not trigger observers.
   */
  construct(concept: ConceptDef, init: ReadonlyArray<readonly [string, Val]>): Instance {
    const instance = makeInstance(concept);
    for (const [name, value] of init) {
      writeRawField(instance, name, value);
    }
    this.engine.graph.attach(instance);
    return instance;
  }

  private *runLink(
    ctx: ExecContext,
    chain: DispatchChain,
    position: number,
    self: Instance,
    args: readonly Val[],
  ): Eff<Val> {
    const def = chain.links[position];
    if (def.params.length !== args.length) {
      throw typeMismatch(
        `${chain.concept.name}.${chain.method} takes ${def.params.length} argument(s), got ${args.length}`,
      );
    }
    const locals = new Map<string, Val>();
    def.params.forEach((p, i) => locals.set(p, args[i]));

    const frame: Frame = { locals, self, chain, position, args, story: false };
    const done = yield* this.execBlock(ctx, frame, def.body);
    return done.tag === "return" ? done.value : VFalse;
  }

  private *runTask(ctx: ExecContext, frame: Frame, body: readonly Stmt[]): Eff<Val> {
    const done = yield* this.execBlock(ctx, frame, body);
    return done.tag === "return" ? done.value : VFalse;
  }

  // ─────────────────────────────────────────────────────────────────
  // Names
  // ─────────────────────────────────────────────────────────────────

  /** Locals, then fields of `This`, then program globals. */
  private lookup(ctx: ExecContext, frame: Frame, name: string): Val {
    const local = frame.locals.get(name);
    if (local !== undefined) return local;
    if (frame.self && hasField(frame.self, name)) {
      return this.readTracked(ctx, frame.self, name);
    }
    const global = this.engine.globals.get(name);
    if (global !== undefined) return global;
    throw langError("UnknownVariable", { name });
  }

  /** `Set name to v`: an existing local, a field of `This`, or a global. */
  private assignExisting(ctx: ExecContext, frame: Frame, name: string, value: Val): void {
    if (frame.locals.has(name)) {
      frame.locals.set(name, value);
    } else if (frame.self && hasField(frame.self, name)) {
      this.engine.graph.writeField(ctx, frame.self, name, value);
    } else if (this.engine.globals.has(name)) {
      this.engine.globals.set(name, value);
    } else {
      throw langError("UnknownVariable", { name });
    }
  }

  readTracked(ctx: ExecContext, instance: Instance, field: string): Val {
    const v = readField(instance, field);
    recordRead(ctx, instance, field);
    return v;
  }

  // ─────────────────────────────────────────────────────────────────
  // Statements
  // ─────────────────────────────────────────────────────────────────

  *execBlock(ctx: ExecContext, frame: Frame, body: readonly Stmt[]): Eff<Completion> {
    for (const stmt of body) {
      const done = yield* this.exec(ctx, frame, stmt);
      if (done.tag !== "normal") return done;
    }
    return NORMAL;
  }

  private *exec(ctx: ExecContext, frame: Frame, stmt: Stmt): Eff<Completion> {
    switch (stmt.tag) {
      case "Assign":
        frame.locals.set(stmt.name, yield* this.eval(ctx, frame, stmt.value));
        return NORMAL;

      case "Create": {
        const concept = this.engine.concepts.get(stmt.concept);
        if (!concept) throw langError("UnknownConcept", { concept: stmt.concept });
        const init: Array<[string, Val]> = [];
        for (const [name, expr] of stmt.init) {
          init.push([name, yield* this.eval(ctx, frame, expr)]);
        }
        frame.locals.set(stmt.name, this.construct(concept, init));
        return NORMAL;
      }

      case "SetVar":
        this.assignExisting(ctx, frame, stmt.name, yield* this.eval(ctx, frame, stmt.value));
        return NORMAL;

      case "SetMember": {
        const target = yield* this.eval(ctx, frame, stmt.object);
        const value = yield* this.eval(ctx, frame, stmt.value);
        if (target.tag !== "Instance") throw typeMismatch(`cannot set ${stmt.member} on ${target.tag}`);
        this.engine.graph.writeField(ctx, target, stmt.member, value);
        return NORMAL;
      }

      case "Print":
        this.engine.print(display(yield* this.eval(ctx, frame, stmt.value)));
        return NORMAL;

      case "SwitchOn":
        this.engine.resolver.switchOn(ctx.situations, stmt.situation);
        return NORMAL;

      case "SwitchOff":
        this.engine.resolver.switchOff(ctx.situations, stmt.situation);
        return NORMAL;

      case "If": {
        const cond = yield* this.eval(ctx, frame, stmt.cond);
        if (isTruthy(cond)) return yield* this.execBlock(ctx, frame, stmt.then);
        return stmt.else ? yield* this.execBlock(ctx, frame, stmt.else) : NORMAL;
      }

      case "Match": {
        const subject = yield* this.eval(ctx, frame, stmt.subject);
        for (const c of stmt.cases) {
          if (valuesEqual(subject, yield* this.eval(ctx, frame, c.value))) {
            return yield* this.execBlock(ctx, frame, c.body);
          }
        }
        return stmt.otherwise ? yield* this.execBlock(ctx, frame, stmt.otherwise) : NORMAL;
      }

      case "Try":
        return yield* this.execTry(ctx, frame, stmt);

      case "RepeatTimes": {
        const times = toIndex(yield* this.eval(ctx, frame, stmt.count));
        for (let i = 1; i <= times; i++) {
          if (stmt.variable !== null) frame.locals.set(stmt.variable, counter(i));
          const done = yield* this.execBlock(ctx, frame, stmt.body);
          if (done.tag === "break") break;
          if (done.tag === "return") return done;
        }
        return NORMAL;
      }

      case "RepeatWhile":
        while (isTruthy(yield* this.eval(ctx, frame, stmt.cond))) {
          const done = yield* this.execBlock(ctx, frame, stmt.body);
          if (done.tag === "break") break;
          if (done.tag === "return") return done;
        }
        return NORMAL;

      case "ForEach": {
        const items = iterationSnapshot(yield* this.eval(ctx, frame, stmt.iterable));
        for (const item of items.items) {
          frame.locals.set(stmt.variable, item);
          const done = yield* this.execBlock(ctx, frame, stmt.body);
          if (done.tag === "break") break;
          if (done.tag === "return") return done;
        }
        return NORMAL;
      }

      case "Return":
        return { tag: "return", value: stmt.value ? yield* this.eval(ctx, frame, stmt.value) : VFalse };

      case "Break":
        return { tag: "break" };

      case "Continue":
        return { tag: "continue" };

      case "ExprStmt":
        yield* this.eval(ctx, frame, stmt.expr);
        return NORMAL;
    }
  }

  /** Catch binds language errors only; engine faults pass through. `Always` runs on every exit. */
  private *execTry(ctx: ExecContext, frame: Frame, stmt: Extract<Stmt, { tag: "Try" }>): Eff<Completion> {
    try {
      try {
        return yield* this.execBlock(ctx, frame, stmt.body);
      } catch (e) {
        if (!isLangError(e) || stmt.handler === null) throw e;
        if (stmt.catchVar !== null) frame.locals.set(stmt.catchVar, errorValue(e));
        return yield* this.execBlock(ctx, frame, stmt.handler);
      }
    } finally {
      if (stmt.always) yield* this.execBlock(ctx, frame, stmt.always);
    }
  }

  // ─────────────────────────────────────────────────────────────────
  // Expressions
  // ─────────────────────────────────────────────────────────────────

  *eval(ctx: ExecContext, frame: Frame, e: Expr): Eff<Val> {
    switch (e.tag) {
      case "Num":
        return num(e.text);
      case "Fast":
        return fast(e.n);
      case "Str":
        return str(e.s);
      case "Bool":
        return bool(e.b);

      case "ListLit": {
        const items: Val[] = [];
        for (const item of e.items) items.push(yield* this.eval(ctx, frame, item));
        return list(items);
      }

      case "MapLit": {
        const entries: Array<[string, Val]> = [];
        for (const [k, item] of e.entries) entries.push([k, yield* this.eval(ctx, frame, item)]);
        return map(entries);
      }

      case "Ident":
        return this.lookup(ctx, frame, e.name);

      case "This":
        if (!frame.self) throw langError("UnknownVariable", { name: "This" });
        return frame.self;

      case "Binary": {
        const left = yield* this.eval(ctx, frame, e.left);
        const right = yield* this.eval(ctx, frame, e.right);
        return binary(e.op, left, right);
      }

      case "Logical": {
        const left = isTruthy(yield* this.eval(ctx, frame, e.left));
        if (e.op === "and" ? !left : left) return bool(left);
        return bool(isTruthy(yield* this.eval(ctx, frame, e.right)));
      }

      case "Unary":
        return unary(e.op, yield* this.eval(ctx, frame, e.operand));

      case "Index": {
        const target = yield* this.eval(ctx, frame, e.object);
        return indexValue(target, yield* this.eval(ctx, frame, e.index));
      }

      case "Member": {
        const target = yield* this.eval(ctx, frame, e.object);
        if (target.tag !== "Instance") throw typeMismatch(`${target.tag} has no field ${e.member}`);
        return this.readTracked(ctx, target, e.member);
      }

      case "MethodCall": {
        const receiver = yield* this.eval(ctx, frame, e.object);
        const args = yield* this.evalArgs(ctx, frame, e.args);
        if (receiver.tag !== "Instance") throw typeMismatch(`cannot call ${e.method} on ${receiver.tag}`);
        return yield* this.engine.tiers.invoke(ctx, e.site, { tag: "method", receiver, method: e.method }, args);
      }

      case "FnCall": {
        const callee = this.lookup(ctx, frame, e.name);
        const args = yield* this.evalArgs(ctx, frame, e.args);
        if (callee.tag !== "Native") throw typeMismatch(`${e.name} is not a function`);
        return yield* this.engine.tiers.invoke(ctx, e.site, { tag: "native", native: callee }, args);
      }

      case "Background": {
        const taskCtx = createContext(ctx.situations.copy());
        const taskFrame = methodFrame(frame.self, frame.story ? new Map() : new Map(frame.locals));
        const task = this.engine.scheduler.spawnTask(() => this.runTask(taskCtx, taskFrame, e.body));
        return { tag: "Task", task };
      }

      case "Await": {
        const handle = yield* this.eval(ctx, frame, e.task);
        if (handle.tag !== "Task") throw typeMismatch(`cannot await ${handle.tag}`);
        const { task } = handle;
        if (task.status === "done" || task.status === "failed") return task.result ?? VFalse;
        if (ctx.observerDepth > 0) {
          throw langError("SuspensionNotAllowed", { operation: "Await", where: "an observer" });
        }
        return yield { tag: "await", task };
      }

      case "Receive": {
        const source = yield* this.eval(ctx, frame, e.channel);
        if (source.tag !== "Channel") throw typeMismatch(`cannot receive from ${source.tag}`);
        const attempt = pollChannel(source.channel);
        if (attempt.tag === "message") return attempt.value;
        if (attempt.tag === "closed") throw langError("ChannelClosed");
        if (ctx.observerDepth > 0) {
          throw langError("SuspensionNotAllowed", { operation: "Receive", where: "an observer" });
        }
        return yield { tag: "recv", channel: source.channel };
      }

      case "Proceed": {
        const { chain, self } = frame;
        if (!chain || !self) throw typeMismatch("Proceed is only valid inside a method");
        if (frame.position >= chain.links.length - 1) {
          throw langError("ProceedAtBase", { concept: chain.concept.name, method: chain.method });
        }
        const args = e.args ? yield* this.evalArgs(ctx, frame, e.args) : frame.args;
        return yield* this.runLink(ctx, chain, frame.position + 1, self, args);
      }
    }
  }

  private *evalArgs(ctx: ExecContext, frame: Frame, exprs: readonly Expr[]): Eff<Val[]> {
    const out: Val[] = [];
    for (const arg of exprs) out.push(yield* this.eval(ctx, frame, arg));
    return out;
  }
}
