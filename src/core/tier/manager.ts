// src/core/tier/manager.ts
// Execution tier manager: the single call path. Chooses between a site's
// compiled entry and the interpreter, profiles, promotes and deoptimizes.

import type { Instance, NativeVal, Val } from "../values/values";
import type { SiteId } from "../ast";
import type { TierConfig } from "../config/config";
import type { Logger } from "../log/logger";
import type { Eff } from "../concurrency/types";
import type { ExecContext } from "../eval/context";
import type { Engine } from "../eval/engine";
import type { CodegenBackend, TrapHandler } from "./backend";
import type { Kind } from "./ir";
import type { CompiledEntry, SiteProfile, SiteStats } from "./profiler";
import type { TierHelpers } from "./helpers";
import { JsBackend } from "./backend";
import { createHelpers } from "./helpers";
import { isGuardPoint } from "./ir";
import { lowerMethod } from "./lower";
import { runIR } from "./vm";
import { hotSites, isMegamorphic, newProfile, recordShape, signatureOf, siteStats } from "./profiler";
import { EngineFault } from "../errors/errors";

export type CallTarget = { tag: "method"; receiver: Instance; method: string } | { tag: "native"; native: NativeVal };

export class TierManager {
  private readonly sites = new Map<SiteId, SiteProfile>();
  private readonly helpers: TierHelpers;

  constructor(
    private readonly engine: Engine,
    private readonly config: TierConfig,
    private readonly log: Logger,
    private readonly backend: CodegenBackend = new JsBackend(),
  ) {
    this.helpers = createHelpers(engine);
  }

  // ─────────────────────────────────────────────────────────────────
  // Call path
  // ─────────────────────────────────────────────────────────────────

  /**
   * Invoke `target` at `site`. Natives always run directly. Methods take
   * the site's compiled entry when its guard holds, otherwise the
   * interpreter, which also counts toward promotion.
   */
  *invoke(ctx: ExecContext, site: SiteId, target: CallTarget, args: readonly Val[]): Eff<Val> {
    if (target.tag === "native") {
      const profile = this.profile(site, `native ${target.native.name}`, true);
      profile.calls++;
      profile.interpretedCalls++;
      return target.native.fn([...args]);
    }

    const { receiver, method } = target;
    const profile = this.profile(site, `${receiver.concept.name}.${method}`, false);
    profile.calls++;
    const signature = signatureOf(receiver, args);

    const entry = profile.compiled;
    if (entry && this.config.enabled) {
      if (this.entryGuard(ctx, entry, receiver, signature)) {
        profile.compiledCalls++;
        return yield* entry.code(ctx, receiver, args);
      }
      profile.guardFailures++;
      if (profile.guardFailures >= this.config.deoptAfterGuardFailures) {
        this.deoptimize(profile, "entry guard failed repeatedly");
      }
    }

    profile.interpretedCalls++;
    profile.warmth++;
    recordShape(profile, signature);
    const result = yield* this.engine.interpreter.callMethod(ctx, receiver, method, args);

    if (this.config.enabled && !profile.compiled && profile.warmth >= this.config.promotionThreshold) {
      this.promote(ctx, profile, receiver, method, args, signature);
    }
    return result;
  }

  /**
   * The compiled entry applies when the call has the signature it was
   * compiled for, no active situation adjusts the method, and no binding
   * observes a field the method writes.
   */
  private entryGuard(ctx: ExecContext, entry: CompiledEntry, receiver: Instance, signature: string): boolean {
    if (signature !== entry.signature) return false;
    if (this.engine.resolver.isAdjusted(ctx.situations, receiver.concept.name, entry.method)) return false;
    return entry.ir.writtenFields.every((f) => !this.engine.graph.conceptFieldObserved(entry.concept, f));
  }

  // ─────────────────────────────────────────────────────────────────
  // Promotion
  // ─────────────────────────────────────────────────────────────────

  private promote(
    ctx: ExecContext,
    profile: SiteProfile,
    receiver: Instance,
    method: string,
    args: readonly Val[],
    signature: string,
  ): void {
    if (profile.failed.has(signature)) return;
    if (isMegamorphic(profile, this.config.maxShapesPerSite)) return;
    const concept = receiver.concept;
    if (this.engine.resolver.isAdjusted(ctx.situations, concept.name, method)) return;

    const base = concept.methods.get(method);
    if (!base) return;

    const anyFieldKinds = new Map<string, Kind>();
    for (const decl of concept.fields) {
      const current = receiver.fields.get(decl.name);
      if (decl.type === "Any" && current) anyFieldKinds.set(decl.name, current.tag);
    }

    const lowered = lowerMethod(concept, base, { argKinds: args.map((a) => a.tag), anyFieldKinds });
    if (!lowered.ok) {
      this.fail(profile, signature, lowered.reason);
      return;
    }
    const ir = lowered.fn;
    if (ir.writtenFields.some((f) => this.engine.graph.conceptFieldObserved(concept.name, f))) {
      // Not stable yet: a binding watches a written field. Try again later.
      profile.warmth = 0;
      return;
    }

    const trap: TrapHandler = (trapCtx, pc, regs) => this.resumeTrapped(profile, ir, trapCtx, pc, regs);
    const outcome = this.backend.compile(ir, { helpers: this.helpers, trap });
    if (!outcome.ok) {
      this.fail(profile, signature, outcome.reason);
      return;
    }

    profile.compiled = { signature, concept: concept.name, method, ir, code: outcome.entry };
    profile.promotions++;
    profile.guardFailures = 0;
    this.log.debug("promoted", { site: profile.site, signature, backend: this.backend.name, instructions: ir.code.length });
  }

  private fail(profile: SiteProfile, signature: string, reason: string): void {
    profile.failed.set(signature, reason);
    this.log.debug("compile failed", { site: profile.site, signature, reason });
  }

  private deoptimize(profile: SiteProfile, reason: string): void {
    this.log.debug("deoptimized", { site: profile.site, signature: profile.compiled?.signature, reason });
    profile.compiled = null;
    profile.deopts++;
    profile.guardFailures = 0;
    profile.warmth = 0;
  }

  /**
   * Continue a trapped compiled entry in the IR VM. Only guard-bearing
   * instructions may trap; anything else means a side effect may already
   * have happened.
   */
  private *resumeTrapped(
    profile: SiteProfile,
    ir: CompiledEntry["ir"],
    ctx: ExecContext,
    pc: number,
    regs: Array<Val | undefined>,
  ): Eff<Val> {
    const instr = ir.code[pc];
    if (!instr || !isGuardPoint(instr)) {
      const fault = new EngineFault("trap-after-commit", `${ir.concept}.${ir.method} trapped at ${pc}`);
      this.log.fault(fault.message, { site: profile.site });
      throw fault;
    }
    profile.traps++;
    this.log.debug("trap", { site: profile.site, pc, op: instr.op });
    return yield* runIR(this.helpers, ctx, ir, pc, regs);
  }

  // ─────────────────────────────────────────────────────────────────
  // Profiles
  // ─────────────────────────────────────────────────────────────────

  private profile(site: SiteId, target: string, native: boolean): SiteProfile {
    let profile = this.sites.get(site);
    if (!profile) {
      profile = newProfile(site, target, native);
      this.sites.set(site, profile);
    }
    profile.target = target;
    return profile;
  }

  stats(site: SiteId): SiteStats | undefined {
    const profile = this.sites.get(site);
    return profile ? siteStats(profile, this.config.maxShapesPerSite) : undefined;
  }

  hotSites(limit?: number): SiteStats[] {
    return hotSites(this.sites.values(), this.config.maxShapesPerSite, limit);
  }

  /** Generated source of a site's compiled entry, for inspection. */
  compiledIR(site: SiteId): CompiledEntry["ir"] | undefined {
    return this.sites.get(site)?.compiled?.ir;
  }
}
