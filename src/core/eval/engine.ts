// src/core/eval/engine.ts
// The services the interpreter and the tier manager share

import type { Val } from "../values/values";
import type { ConceptDef } from "../model/concept";
import type { EngineConfig } from "../config/config";
import type { Logger } from "../log/logger";
import type { DispatchResolver } from "../dispatch/resolver";
import type { ReactiveGraph } from "../reactive/graph";
import type { Scheduler } from "../concurrency/scheduler";
import type { TierManager } from "../tier/manager";
import type { Interpreter } from "./interpreter";

export interface Engine {
  readonly config: EngineConfig;
  readonly log: Logger;
  readonly concepts: ReadonlyMap<string, ConceptDef>;
  /** Program globals: story-level variables and the native functions. */
  readonly globals: Map<string, Val>;
  readonly resolver: DispatchResolver;
  readonly graph: ReactiveGraph;
  readonly scheduler: Scheduler;
  readonly tiers: TierManager;
  readonly interpreter: Interpreter;
  /** Sink for `Print`. */
  print(text: string): void;
}
