// src/core/dispatch/situations.ts
// Per-context stack of switched-on situations, most recent first

import { langError } from "../errors/errors";

export class SituationStack {
  private readonly names: string[];

  constructor(initial: readonly string[] = []) {
    this.names = [...initial];
  }

  has(name: string): boolean {
    return this.names.includes(name);
  }

  /** Most recently switched on first. */
  active(): readonly string[] {
    return this.names;
  }

  get size(): number {
    return this.names.length;
  }

  push(name: string): void {
    if (this.has(name)) throw langError("AlreadyActive", { situation: name });
    this.names.unshift(name);
  }

  remove(name: string): void {
    const at = this.names.indexOf(name);
    if (at < 0) throw langError("NotActive", { situation: name });
    this.names.splice(at, 1);
  }

  /** Snapshot handed to a background task; later switches stay local. */
  copy(): SituationStack {
    return new SituationStack(this.names);
  }
}
