// src/core/concurrency/types.ts
// Fiber, task and channel types for the cooperative scheduler

import type { Val } from "../values/values";

// ─────────────────────────────────────────────────────────────────
// Suspension protocol
// ─────────────────────────────────────────────────────────────────

/**
 * What a fiber yields when it cannot continue: waiting on a task result
 * or on a channel message. Only Await and blocking Receive suspend.
 */
export type Suspension = { tag: "await"; task: TaskRecord } | { tag: "recv"; channel: ChannelState };

/** How a blocked fiber is resumed: with a value, or by throwing into it. */
export type Resumption = { tag: "value"; value: Val } | { tag: "error"; error: unknown };

/** Returns false when the fiber was already resumed another way. */
export type Wake = (resumption: Resumption) => boolean;

/**
 * Every evaluator step that may suspend is a generator of this type.
 * It yields suspensions and is resumed with the awaited or received value.
 */
export type Eff<T> = Generator<Suspension, T, Val>;

// ─────────────────────────────────────────────────────────────────
// Tasks
// ─────────────────────────────────────────────────────────────────

export type TaskStatus = "queued" | "running" | "done" | "failed";

/**
 * Background task record. The handle value shares this record; dropping
 * the handle does not cancel the task.
 */
export type TaskRecord = {
  id: number;
  status: TaskStatus;
  /** Final value; an ErrorObject when the task failed with a language error. */
  result?: Val;
  waiters: Wake[];
};

// ─────────────────────────────────────────────────────────────────
// Channels
// ─────────────────────────────────────────────────────────────────

export type ChannelState = {
  id: number;
  /** Null for unbounded channels. */
  capacity: number | null;
  buffer: Val[];
  closed: boolean;
  receivers: Wake[];
};

// ─────────────────────────────────────────────────────────────────
// Fibers
// ─────────────────────────────────────────────────────────────────

export type FiberStatus = "ready" | "blocked" | "done";

export type FiberState = {
  id: number;
  name: string;
  gen: Eff<Val>;
  status: FiberStatus;
  /** Delivered on the next step. */
  pending: Resumption;
  blockedOn?: Suspension;
  /** Task completed by this fiber; absent for root fibers. */
  task?: TaskRecord;
  result?: Val;
  failure?: unknown;
};
