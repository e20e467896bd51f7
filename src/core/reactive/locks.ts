// src/core/reactive/locks.ts
// Per-instance exclusive sections held by a propagation pass

import { EngineFault } from "../errors/errors";

/**
 * A pass holds every instance it writes until it completes. Holds are
 * reentrant for the owning context; another context asking for a held
 * instance means two passes interleaved, which the scheduler never allows.
 */
export class InstanceLocks {
  /** instance id → holding context id */
  private readonly holds = new Map<number, number>();

  acquire(context: number, instanceId: number): void {
    const holder = this.holds.get(instanceId);
    if (holder === undefined) {
      this.holds.set(instanceId, context);
    } else if (holder !== context) {
      throw new EngineFault("instance-lock", `context ${context} wrote instance ${instanceId} while context ${holder} holds it`);
    }
  }

  /** True when a context other than `context` holds the instance. */
  heldByOther(context: number, instanceId: number): boolean {
    const holder = this.holds.get(instanceId);
    return holder !== undefined && holder !== context;
  }

  releaseAll(context: number): void {
    for (const [id, holder] of this.holds) {
      if (holder === context) this.holds.delete(id);
    }
  }

  get held(): number {
    return this.holds.size;
  }
}
