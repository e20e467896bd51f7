// src/core/reactive/graph.ts
// Dependency graph of observer bindings and the FIFO propagation pass

import type { Instance, Val } from "../values/values";
import type { ObserverDecl } from "../model/concept";
import type { ReactiveConfig } from "../config/config";
import type { Logger } from "../log/logger";
import type { ExecContext, ReadRecorder } from "../eval/context";
import { writeRawField } from "../model/instance";
import { valuesEqual } from "../values/compare";
import { EngineFault, langError } from "../errors/errors";
import { InstanceLocks } from "./locks";

export type BindingHandle = number;

type Edge = { instanceId: number; concept: string; field: string };

type Binding = {
  readonly handle: BindingHandle;
  readonly owner: WeakRef<Instance>;
  readonly ownerId: number;
  readonly observer: ObserverDecl;
  edges: Edge[];
  pending: boolean;
  runs: number;
};

type Pass = {
  readonly context: number;
  readonly queue: Binding[];
  invocations: number;
};

/** Runs an observer body to completion with `This` bound to `owner`. */
export type ObserverRunner = (ctx: ExecContext, owner: Instance, observer: ObserverDecl) => void;

export type GraphStats = {
  bindings: number;
  edges: number;
  pending: number;
  lockedInstances: number;
};

export class ReactiveGraph {
  /** Binding arena addressed by handle. */
  private readonly arena = new Map<BindingHandle, Binding>();
  /** instance id → field → dependent bindings */
  private readonly index = new Map<number, Map<string, Set<BindingHandle>>>();
  /** `Concept.field` → number of edges onto that field of any instance */
  private readonly conceptCounts = new Map<string, number>();
  private readonly owned = new Map<number, BindingHandle[]>();
  private readonly locks = new InstanceLocks();
  private readonly finalizer = new FinalizationRegistry<number>((id) => this.forgetInstance(id));
  private readonly watched = new Set<number>();
  private nextHandle = 1;
  private pass: Pass | null = null;

  constructor(
    private readonly config: ReactiveConfig,
    private readonly log: Logger,
    private readonly runner: ObserverRunner,
  ) {}

  // ─────────────────────────────────────────────────────────────────
  // Bindings
  // ─────────────────────────────────────────────────────────────────

  /**
   * Create one binding per observer of the instance's concept. Until its
   * first run a binding depends only on its trigger field.
   */
  attach(instance: Instance): void {
    const observers = instance.concept.observers;
    if (observers.length === 0) return;

    const handles: BindingHandle[] = [];
    for (const observer of observers) {
      const binding: Binding = {
        handle: this.nextHandle++,
        owner: new WeakRef(instance),
        ownerId: instance.id,
        observer,
        edges: [],
        pending: false,
        runs: 0,
      };
      this.arena.set(binding.handle, binding);
      this.setEdges(binding, [{ instanceId: instance.id, concept: instance.concept.name, field: observer.trigger }]);
      handles.push(binding.handle);
    }
    this.owned.set(instance.id, handles);
    this.watch(instance);
  }

  /** Prune the graph when `instance` is reclaimed. */
  private watch(instance: Instance): void {
    if (this.watched.has(instance.id)) return;
    this.watched.add(instance.id);
    this.finalizer.register(instance, instance.id);
  }

  /**
   * Drop every binding owned by the instance and every edge onto it.
   * Called when the instance is reclaimed.
   */
  forgetInstance(instanceId: number): void {
    const byField = this.index.get(instanceId);
    const dependents = new Set<BindingHandle>();
    for (const handles of byField?.values() ?? []) {
      for (const handle of handles) dependents.add(handle);
    }
    for (const handle of dependents) {
      const binding = this.arena.get(handle);
      if (binding) {
        this.setEdges(
          binding,
          binding.edges.filter((e) => e.instanceId !== instanceId),
        );
      }
    }
    this.index.delete(instanceId);

    for (const handle of this.owned.get(instanceId) ?? []) {
      const binding = this.arena.get(handle);
      if (binding) this.removeBinding(binding);
    }
    this.owned.delete(instanceId);
    this.watched.delete(instanceId);
  }

  private removeBinding(binding: Binding): void {
    this.setEdges(binding, []);
    binding.pending = false;
    this.arena.delete(binding.handle);
  }

  private setEdges(binding: Binding, edges: Edge[]): void {
    for (const e of binding.edges) {
      const handles = this.index.get(e.instanceId)?.get(e.field);
      handles?.delete(binding.handle);
      if (handles && handles.size === 0) this.index.get(e.instanceId)?.delete(e.field);
      const key = `${e.concept}.${e.field}`;
      const count = (this.conceptCounts.get(key) ?? 1) - 1;
      if (count <= 0) this.conceptCounts.delete(key);
      else this.conceptCounts.set(key, count);
    }

    binding.edges = edges;

    for (const e of edges) {
      let byField = this.index.get(e.instanceId);
      if (!byField) {
        byField = new Map();
        this.index.set(e.instanceId, byField);
      }
      let handles = byField.get(e.field);
      if (!handles) {
        handles = new Set();
        byField.set(e.field, handles);
      }
      handles.add(binding.handle);
      const key = `${e.concept}.${e.field}`;
      this.conceptCounts.set(key, (this.conceptCounts.get(key) ?? 0) + 1);
    }
  }

  // ─────────────────────────────────────────────────────────────────
  // Queries
  // ─────────────────────────────────────────────────────────────────

  hasDependents(instanceId: number, field: string): boolean {
    return (this.index.get(instanceId)?.get(field)?.size ?? 0) > 0;
  }

  /** True when any binding depends on `field` of any instance of `concept`. */
  conceptFieldObserved(concept: string, field: string): boolean {
    return (this.conceptCounts.get(`${concept}.${field}`) ?? 0) > 0;
  }

  /** Current edges of the bindings owned by an instance. */
  dependencies(ownerId: number): Array<{ instanceId: number; field: string }> {
    const out: Array<{ instanceId: number; field: string }> = [];
    for (const handle of this.owned.get(ownerId) ?? []) {
      for (const e of this.arena.get(handle)?.edges ?? []) {
        out.push({ instanceId: e.instanceId, field: e.field });
      }
    }
    return out;
  }

  /** Observer runs so far for the bindings owned by an instance. */
  runCount(ownerId: number, trigger: string): number {
    for (const handle of this.owned.get(ownerId) ?? []) {
      const binding = this.arena.get(handle);
      if (binding?.observer.trigger === trigger) return binding.runs;
    }
    return 0;
  }

  heldByOther(ctx: ExecContext, instanceId: number): boolean {
    return this.locks.heldByOther(ctx.id, instanceId);
  }

  stats(): GraphStats {
    let edges = 0;
    for (const b of this.arena.values()) edges += b.edges.length;
    return {
      bindings: this.arena.size,
      edges,
      pending: this.pass?.queue.length ?? 0,
      lockedInstances: this.locks.held,
    };
  }

  // ─────────────────────────────────────────────────────────────────
  // Writes and propagation
  // ─────────────────────────────────────────────────────────────────

  /**
   * Store `value`, and when it differs from the old value schedule every
   * binding that depends on the field. A write made while a pass is running
   * (from an observer) joins that pass; otherwise this write starts one and
   * returns after the cascade has settled.
   */
  writeField(ctx: ExecContext, instance: Instance, field: string, value: Val): void {
    const outer = this.pass === null;
    if (this.pass && this.pass.context !== ctx.id) {
      throw new EngineFault("pass-owner", `context ${ctx.id} wrote during a pass of context ${this.pass.context}`);
    }
    const pass = this.pass ?? { context: ctx.id, queue: [], invocations: 0 };
    this.pass = pass;

    try {
      this.locks.acquire(ctx.id, instance.id);
      const { old, stored } = writeRawField(instance, field, value);
      if (!valuesEqual(old, stored)) {
        this.schedule(pass, instance.id, field);
      }
      if (outer) this.drain(ctx, pass);
    } catch (error) {
      if (outer) this.abort(pass);
      throw error;
    } finally {
      if (outer) {
        this.pass = null;
        this.locks.releaseAll(ctx.id);
      }
    }
  }

  private schedule(pass: Pass, instanceId: number, field: string): void {
    const handles = this.index.get(instanceId)?.get(field);
    if (!handles) return;
    for (const handle of handles) {
      const binding = this.arena.get(handle);
      if (!binding) {
        throw new EngineFault("dangling-edge", `edge ${instanceId}.${field} points at missing binding ${handle}`);
      }
      if (!binding.pending) {
        binding.pending = true;
        pass.queue.push(binding);
      }
    }
  }

  private drain(ctx: ExecContext, pass: Pass): void {
    for (let binding = pass.queue.shift(); binding; binding = pass.queue.shift()) {
      binding.pending = false;
      const owner = binding.owner.deref();
      if (!owner) {
        this.forgetInstance(binding.ownerId);
        continue;
      }

      if (++pass.invocations > this.config.maxObserverInvocations) {
        this.log.warn("observer cascade aborted", { limit: this.config.maxObserverInvocations });
        throw langError("RecursionGuardExceeded", { limit: this.config.maxObserverInvocations });
      }
      this.run(ctx, binding, owner);
    }
  }

  /** Run one binding and re-derive its edges from the reads it made. */
  private run(ctx: ExecContext, binding: Binding, owner: Instance): void {
    const recorder: ReadRecorder = new Map();
    ctx.recorders.push(recorder);
    ctx.observerDepth++;
    binding.runs++;
    try {
      this.runner(ctx, owner, binding.observer);
    } finally {
      ctx.observerDepth--;
      ctx.recorders.pop();
      if (this.arena.has(binding.handle)) {
        const edges: Edge[] = [{ instanceId: owner.id, concept: owner.concept.name, field: binding.observer.trigger }];
        for (const read of recorder.values()) {
          if (read.instance === owner && read.field === binding.observer.trigger) continue;
          this.watch(read.instance);
          edges.push({ instanceId: read.instance.id, concept: read.instance.concept.name, field: read.field });
        }
        this.setEdges(binding, edges);
      }
    }
  }

  private abort(pass: Pass): void {
    for (const binding of pass.queue) binding.pending = false;
    pass.queue.length = 0;
  }
}
