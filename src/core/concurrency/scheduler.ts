// src/core/concurrency/scheduler.ts
// Cooperative fiber scheduler with a bounded worker pool for background tasks

import type { Val } from "../values/values";
import type { ConcurrencyConfig } from "../config/config";
import type { Logger } from "../log/logger";
import type { Eff, FiberState, Resumption, Suspension, TaskRecord, Wake } from "./types";
import { VFalse } from "../values/values";
import { pollChannel } from "./channel";
import { EngineFault, isLangError, langError } from "../errors/errors";
import { errorValue } from "../errors/convert";

type QueuedTask = { task: TaskRecord; start: () => Eff<Val> };

let nextTaskId = 1;
let nextFiberId = 1;

/**
 * Runs fibers until every one of them has finished. Fibers only switch at
 * suspension points (Await, blocking Receive), so everything between two
 * suspensions, including a field write and its observer cascade, runs
 * without interleaving.
 */
export class Scheduler {
  private readonly fibers: FiberState[] = [];
  private readonly ready: FiberState[] = [];
  private readonly queued: QueuedTask[] = [];
  /** Invalidates wake callbacks of a fiber that was resumed another way. */
  private readonly wakeTokens = new Map<number, number>();
  private runningTasks = 0;
  private steps = 0;
  private active = false;

  constructor(
    private readonly config: ConcurrencyConfig,
    private readonly log: Logger,
  ) {}

  // ─────────────────────────────────────────────────────────────────
  // Tasks
  // ─────────────────────────────────────────────────────────────────

  /**
   * Register a background task. It starts when a worker slot is free;
   * until then it waits in FIFO order. The handle is returned at once.
   */
  spawnTask(start: () => Eff<Val>): TaskRecord {
    const task: TaskRecord = { id: nextTaskId++, status: "queued", waiters: [] };
    this.queued.push({ task, start });
    this.startQueued();
    return task;
  }

  private startQueued(): void {
    while (this.runningTasks < this.config.maxWorkers) {
      const next = this.queued.shift();
      if (!next) return;
      this.runningTasks++;
      next.task.status = "running";
      const fiber = this.addFiber(`task-${next.task.id}`, next.start());
      fiber.task = next.task;
      this.log.debug("task started", { task: next.task.id, running: this.runningTasks });
    }
  }

  // ─────────────────────────────────────────────────────────────────
  // Running
  // ─────────────────────────────────────────────────────────────────

  /**
   * Run `gen` as the root fiber, together with every task it spawns, until
   * all fibers are done. Returns the root's result or rethrows its failure.
   */
  run(name: string, gen: Eff<Val>): Val {
    if (this.active) {
      throw new EngineFault("scheduler-reentry", `run(${name}) while the scheduler is already running`);
    }
    this.active = true;
    this.steps = 0;
    try {
      const root = this.addFiber(name, gen);
      this.loop(root);
      if (root.failure !== undefined) throw root.failure;
      return root.result ?? VFalse;
    } finally {
      this.active = false;
      this.fibers.length = 0;
      this.ready.length = 0;
      this.queued.length = 0;
      this.runningTasks = 0;
    }
  }

  private loop(root: FiberState): void {
    for (;;) {
      const fiber = this.ready.shift();
      if (fiber) {
        if (++this.steps > this.config.maxSchedulerSteps) {
          throw new EngineFault("scheduler-budget", `more than ${this.config.maxSchedulerSteps} fiber steps`);
        }
        this.step(fiber);
        continue;
      }

      const blocked = this.fibers.filter((f) => f.status === "blocked");
      if (blocked.length === 0) return;

      // Nothing can make progress: fail the root if it is waiting, else the oldest.
      const victim = root.status === "blocked" ? root : blocked[0];
      this.log.warn("deadlock", { fiber: victim.name, blocked: blocked.length });
      this.resume(victim, { tag: "error", error: langError("Deadlock") });
    }
  }

  private addFiber(name: string, gen: Eff<Val>): FiberState {
    const fiber: FiberState = {
      id: nextFiberId++,
      name,
      gen,
      status: "ready",
      pending: { tag: "value", value: VFalse },
    };
    this.fibers.push(fiber);
    this.ready.push(fiber);
    return fiber;
  }

  private step(fiber: FiberState): void {
    const input = fiber.pending;
    fiber.pending = { tag: "value", value: VFalse };

    let next: IteratorResult<Suspension, Val>;
    try {
      next = input.tag === "value" ? fiber.gen.next(input.value) : fiber.gen.throw(input.error);
    } catch (error) {
      this.finish(fiber, { tag: "error", error });
      return;
    }

    if (next.done) {
      this.finish(fiber, { tag: "value", value: next.value });
    } else {
      this.block(fiber, next.value);
    }
  }

  private block(fiber: FiberState, suspension: Suspension): void {
    fiber.blockedOn = suspension;

    if (suspension.tag === "await") {
      const { task } = suspension;
      if (task.status === "done" || task.status === "failed") {
        this.resume(fiber, { tag: "value", value: task.result ?? VFalse });
      } else {
        fiber.status = "blocked";
        task.waiters.push(this.wakeFor(fiber));
      }
      return;
    }

    const attempt = pollChannel(suspension.channel);
    if (attempt.tag === "message") {
      this.resume(fiber, { tag: "value", value: attempt.value });
    } else if (attempt.tag === "closed") {
      this.resume(fiber, { tag: "error", error: langError("ChannelClosed") });
    } else {
      fiber.status = "blocked";
      suspension.channel.receivers.push(this.wakeFor(fiber));
    }
  }

  private wakeFor(fiber: FiberState): Wake {
    const token = (this.wakeTokens.get(fiber.id) ?? 0) + 1;
    this.wakeTokens.set(fiber.id, token);
    return (resumption) => {
      if (this.wakeTokens.get(fiber.id) !== token || fiber.status !== "blocked") return false;
      this.resume(fiber, resumption);
      return true;
    };
  }

  private resume(fiber: FiberState, resumption: Resumption): void {
    this.wakeTokens.set(fiber.id, (this.wakeTokens.get(fiber.id) ?? 0) + 1);
    fiber.status = "ready";
    fiber.blockedOn = undefined;
    fiber.pending = resumption;
    this.ready.push(fiber);
  }

  private finish(fiber: FiberState, outcome: Resumption): void {
    fiber.status = "done";
    this.wakeTokens.delete(fiber.id);
    const at = this.fibers.indexOf(fiber);
    if (at >= 0) this.fibers.splice(at, 1);

    if (outcome.tag === "value") {
      fiber.result = outcome.value;
    } else {
      fiber.failure = outcome.error;
    }

    const task = fiber.task;
    if (!task) return;

    if (outcome.tag === "error") {
      // Engine faults are not task results.
      if (!isLangError(outcome.error)) throw outcome.error;
      task.status = "failed";
      task.result = errorValue(outcome.error);
    } else {
      task.status = "done";
      task.result = outcome.value;
    }
    const result = task.result;
    this.log.debug("task finished", { task: task.id, status: task.status });

    const waiters = task.waiters.splice(0);
    for (const wake of waiters) wake({ tag: "value", value: result });

    this.runningTasks--;
    this.startQueued();
  }
}
