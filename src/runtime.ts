// src/runtime.ts
// Runtime - the engine facade: load a program, run its story, poke at instances
//
// Usage:
//   import { Runtime, program, concept, method, ret, bin, field, n } from "plotline";
//
//   const rt = new Runtime();
//   rt.load(program({ concepts: [concept("Counter", { ... })], story: [...] }));
//   rt.run();
//   console.log(rt.output);

import type { Expr, Program, SiteId, Stmt } from "./core/ast";
import type { ErrorVal, Instance, Val } from "./core/values/values";
import type { ConceptDef, FieldDecl } from "./core/model/concept";
import type { SituationDef } from "./core/model/situation";
import type { EngineConfig, PartialEngineConfig } from "./core/config/config";
import type { Logger } from "./core/log/logger";
import type { Engine } from "./core/eval/engine";
import type { ExecContext } from "./core/eval/context";
import type { GraphStats } from "./core/reactive/graph";
import type { CodegenBackend } from "./core/tier/backend";
import type { SiteStats } from "./core/tier/profiler";

import { assertValidConfig, loadConfig } from "./core/config/config";
import { createLogger } from "./core/log/logger";
import { defineConcept } from "./core/model/concept";
import { defineSituation } from "./core/model/situation";
import { readField } from "./core/model/instance";
import { DispatchResolver } from "./core/dispatch/resolver";
import { ReactiveGraph } from "./core/reactive/graph";
import { Scheduler } from "./core/concurrency/scheduler";
import { TierManager } from "./core/tier/manager";
import { formatHotSites } from "./core/tier/profiler";
import { Interpreter } from "./core/eval/interpreter";
import { createContext } from "./core/eval/context";
import { coreNatives } from "./core/natives/core";
import { isEngineFault, isLangError, langError, typeMismatch } from "./core/errors/errors";
import { errorValue } from "./core/errors/convert";

/**
 * Options for Runtime
 */
export type RuntimeOptions = {
  /** Overrides merged over the environment, config file and defaults */
  config?: PartialEngineConfig;

  /** JSON config file to read instead of `plotline.config.json` */
  configFile?: string;

  /** Environment for `PLOTLINE_*` settings (default: process.env) */
  env?: NodeJS.ProcessEnv;

  /** Logger to use instead of the console logger at `config.log.level` */
  logger?: Logger;

  /** Called with every line `Print` produces, in addition to `output` */
  onPrint?: (line: string) => void;

  /** Code generation backend for promoted call sites (default: JavaScript source) */
  backend?: CodegenBackend;
};

/**
 * Result of a guarded run
 */
export type RunResult = {
  /** Whether the story finished without a language error */
  ok: boolean;

  /** The story's return value (if ok) */
  value?: Val;

  /** The error, as the ErrorObject a Catch would bind (if not ok) */
  error?: ErrorVal;
};

/**
 * Runtime - one loaded program and the engine that runs it.
 *
 * The root context (story, `call`, `switchOn`) keeps its own situation
 * stack; background tasks copy it when they are spawned.
 */
export class Runtime implements Engine {
  readonly config: EngineConfig;
  readonly log: Logger;
  readonly concepts = new Map<string, ConceptDef>();
  readonly globals: Map<string, Val> = coreNatives();
  readonly resolver: DispatchResolver;
  readonly graph: ReactiveGraph;
  readonly scheduler: Scheduler;
  readonly tiers: TierManager;
  readonly interpreter: Interpreter;

  /** Every line printed so far */
  readonly output: string[] = [];

  private readonly situations = new Map<string, SituationDef>();
  private readonly root: ExecContext = createContext();
  private readonly onPrint?: (line: string) => void;
  private story: readonly Stmt[] = [];
  private loaded = false;

  constructor(options: RuntimeOptions = {}) {
    this.config = loadConfig({ configFile: options.configFile, env: options.env, overrides: options.config });
    this.log = options.logger ?? createLogger("plotline", this.config.log.level);
    for (const warning of assertValidConfig(this.config)) {
      this.log.warn("config", { warning });
    }
    this.onPrint = options.onPrint;

    this.resolver = new DispatchResolver(this.situations);
    this.interpreter = new Interpreter(this);
    this.graph = new ReactiveGraph(this.config.reactive, this.log.child("reactive"), (ctx, owner, observer) =>
      this.interpreter.runObserver(ctx, owner, observer),
    );
    this.scheduler = new Scheduler(this.config.concurrency, this.log.child("scheduler"));
    this.tiers = new TierManager(this, this.config.tier, this.log.child("tier"), options.backend);
  }

  print(text: string): void {
    this.output.push(text);
    this.onPrint?.(text);
  }

  // ─────────────────────────────────────────────────────────────────
  // Loading
  // ─────────────────────────────────────────────────────────────────

  /**
   * Register the program's concepts and situations and keep its story.
   * Field initializers are evaluated here, once.
   */
  load(prog: Program): void {
    if (this.loaded) {
      throw new Error("Runtime already has a program loaded");
    }

    for (const node of prog.concepts) {
      if (this.concepts.has(node.name)) {
        throw typeMismatch(`concept ${node.name} is defined twice`);
      }
      const fields: FieldDecl[] = node.fields.map((f) =>
        f.initial ? { name: f.name, type: f.type, initial: this.constant(f.initial) } : { name: f.name, type: f.type },
      );
      this.concepts.set(
        node.name,
        defineConcept({
          name: node.name,
          fields,
          methods: node.methods.map((m) => ({ name: m.name, params: m.params, body: m.body })),
          observers: node.observers,
        }),
      );
    }

    for (const node of prog.situations) {
      if (this.situations.has(node.name)) {
        throw typeMismatch(`situation ${node.name} is defined twice`);
      }
      const adjustments = node.adjustments.flatMap((adj) => {
        if (!this.concepts.has(adj.concept)) throw langError("UnknownConcept", { concept: adj.concept });
        return adj.methods.map((m) => ({ concept: adj.concept, name: m.name, params: m.params, body: m.body }));
      });
      this.situations.set(node.name, defineSituation(node.name, adjustments));
    }

    this.story = prog.story;
    this.loaded = true;
    this.log.debug("loaded", { concepts: this.concepts.size, situations: this.situations.size });
  }

  private constant(e: Expr): Val {
    return this.scheduler.run("initializer", this.interpreter.evaluate(this.root, e));
  }

  // ─────────────────────────────────────────────────────────────────
  // Running
  // ─────────────────────────────────────────────────────────────────

  /** Run the story to completion. Language errors propagate as LangError. */
  run(): Val {
    return this.scheduler.run("story", this.interpreter.runStory(this.root, this.story));
  }

  /** Run the story; a language error is returned instead of thrown. Engine faults are logged and rethrown. */
  execute(): RunResult {
    try {
      return { ok: true, value: this.run() };
    } catch (e) {
      if (isEngineFault(e)) this.log.fault(e.message);
      if (!isLangError(e)) throw e;
      return { ok: false, error: errorValue(e) };
    }
  }

  construct(conceptName: string, init: Record<string, Val> = {}): Instance {
    const concept = this.concepts.get(conceptName);
    if (!concept) throw langError("UnknownConcept", { concept: conceptName });
    return this.interpreter.construct(concept, Object.entries(init));
  }

  /**
   * Call a method from the host. Goes through the tier manager like any
   * program call; `site` defaults to one site per concept and method.
   */
  call(receiver: Instance, method: string, args: Val[] = [], site?: SiteId): Val {
    const at = site ?? `host:${receiver.concept.name}.${method}`;
    return this.scheduler.run(
      "call",
      this.tiers.invoke(this.root, at, { tag: "method", receiver, method }, args),
    );
  }

  readField(instance: Instance, fieldName: string): Val {
    return readField(instance, fieldName);
  }

  /** Write a field from the host; dependent observers run before this returns. */
  writeField(instance: Instance, fieldName: string, value: Val): void {
    this.graph.writeField(this.root, instance, fieldName, value);
  }

  switchOn(situation: string): void {
    this.resolver.switchOn(this.root.situations, situation);
  }

  switchOff(situation: string): void {
    this.resolver.switchOff(this.root.situations, situation);
  }

  /** Situations active in the root context, most recent first */
  activeSituations(): string[] {
    return [...this.root.situations.active()];
  }

  // ─────────────────────────────────────────────────────────────────
  // Introspection
  // ─────────────────────────────────────────────────────────────────

  siteStats(site: SiteId): SiteStats | undefined {
    return this.tiers.stats(site);
  }

  hotSites(limit?: number): SiteStats[] {
    return this.tiers.hotSites(limit);
  }

  /** Plain-text hot site table */
  profileReport(limit?: number): string {
    return formatHotSites(this.hotSites(limit));
  }

  /** Times the observer on `trigger` of `instance` has run */
  observerRuns(instance: Instance, trigger: string): number {
    return this.graph.runCount(instance.id, trigger);
  }

  graphStats(): GraphStats {
    return this.graph.stats();
  }
}
