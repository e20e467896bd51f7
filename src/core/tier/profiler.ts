// src/core/tier/profiler.ts
// Per-call-site profile: counters, observed signatures and the compiled entry

import type { Instance, Val } from "../values/values";
import type { SiteId } from "../ast";
import type { IRFunction } from "./ir";
import type { CompiledCode } from "./backend";
import { shapeOf } from "../values/values";

export type CompiledEntry = {
  readonly signature: string;
  readonly concept: string;
  readonly method: string;
  readonly ir: IRFunction;
  readonly code: CompiledCode;
};

export type SiteProfile = {
  readonly site: SiteId;
  /** `Concept.method`, or `native Name` for stdlib calls. */
  target: string;
  native: boolean;
  calls: number;
  /** Interpreted calls since the last promotion or deoptimization. */
  warmth: number;
  interpretedCalls: number;
  compiledCalls: number;
  /** Observed signature → count. */
  readonly shapes: Map<string, number>;
  compiled: CompiledEntry | null;
  /** Signature → reason; never retried. */
  readonly failed: Map<string, string>;
  guardFailures: number;
  traps: number;
  promotions: number;
  deopts: number;
};

export type SiteState = "cold" | "compiled" | "megamorphic" | "native";

export type SiteStats = {
  site: SiteId;
  target: string;
  state: SiteState;
  calls: number;
  interpretedCalls: number;
  compiledCalls: number;
  traps: number;
  guardFailures: number;
  promotions: number;
  deopts: number;
  signatures: string[];
  failedSignatures: string[];
};

export function newProfile(site: SiteId, target: string, native: boolean): SiteProfile {
  return {
    site,
    target,
    native,
    calls: 0,
    warmth: 0,
    interpretedCalls: 0,
    compiledCalls: 0,
    shapes: new Map(),
    compiled: null,
    failed: new Map(),
    guardFailures: 0,
    traps: 0,
    promotions: 0,
    deopts: 0,
  };
}

/** Receiver concept plus the value kind of every argument. */
export function signatureOf(receiver: Instance, args: readonly Val[]): string {
  return `${receiver.concept.name}(${args.map(shapeOf).join(", ")})`;
}

export function recordShape(profile: SiteProfile, signature: string): void {
  profile.shapes.set(signature, (profile.shapes.get(signature) ?? 0) + 1);
}

export function isMegamorphic(profile: SiteProfile, maxShapes: number): boolean {
  return profile.shapes.size > maxShapes;
}

export function siteStats(profile: SiteProfile, maxShapes: number): SiteStats {
  const state: SiteState = profile.native
    ? "native"
    : profile.compiled
      ? "compiled"
      : isMegamorphic(profile, maxShapes)
        ? "megamorphic"
        : "cold";
  return {
    site: profile.site,
    target: profile.target,
    state,
    calls: profile.calls,
    interpretedCalls: profile.interpretedCalls,
    compiledCalls: profile.compiledCalls,
    traps: profile.traps,
    guardFailures: profile.guardFailures,
    promotions: profile.promotions,
    deopts: profile.deopts,
    signatures: [...profile.shapes.keys()],
    failedSignatures: [...profile.failed.keys()],
  };
}

/** Busiest sites first. */
export function hotSites(profiles: Iterable<SiteProfile>, maxShapes: number, limit = 10): SiteStats[] {
  return [...profiles]
    .sort((a, b) => b.calls - a.calls || a.site.localeCompare(b.site))
    .slice(0, limit)
    .map((p) => siteStats(p, maxShapes));
}

/** Plain-text report of the hottest sites. */
export function formatHotSites(stats: readonly SiteStats[]): string {
  const lines = ["site                 target                     calls   compiled  state"];
  for (const s of stats) {
    lines.push(
      `${s.site.padEnd(20)} ${s.target.padEnd(26)} ${String(s.calls).padStart(6)} ${String(s.compiledCalls).padStart(10)}  ${s.state}`,
    );
  }
  return lines.join("\n");
}
