// src/core/eval/context.ts
// Execution context: one per root run or background task

import type { Instance } from "../values/values";
import { SituationStack } from "../dispatch/situations";

export type FieldRead = { instance: Instance; field: string };

/** Field reads of one observer run, keyed `${instanceId}:${field}`. */
export type ReadRecorder = Map<string, FieldRead>;

export type ExecContext = {
  readonly id: number;
  readonly situations: SituationStack;
  /** Recorders of observer runs in progress, innermost last. */
  readonly recorders: ReadRecorder[];
  /** Non-zero while an observer body runs; suspension is refused there. */
  observerDepth: number;
};

let nextContextId = 1;

export function createContext(situations: SituationStack = new SituationStack()): ExecContext {
  return { id: nextContextId++, situations, recorders: [], observerDepth: 0 };
}

/** Note a field read for the innermost running observer, if any. */
export function recordRead(ctx: ExecContext, instance: Instance, field: string): void {
  const recorder = ctx.recorders[ctx.recorders.length - 1];
  if (recorder) recorder.set(`${instance.id}:${field}`, { instance, field });
}
