// src/core/dispatch/resolver.ts
// Context dispatch: which bodies run for (concept, method) under the active situations

import type { ConceptDef, MethodDef } from "../model/concept";
import type { SituationDef } from "../model/situation";
import type { SituationStack } from "./situations";
import { adjustmentKey } from "../model/situation";
import { langError } from "../errors/errors";

/**
 * Ordered bodies for one call: newest adjustment first, base method last.
 * `Proceed` from link i continues at link i + 1.
 */
export type DispatchChain = {
  readonly concept: ConceptDef;
  readonly method: string;
  readonly links: readonly MethodDef[];
};

export class DispatchResolver {
  constructor(private readonly situations: ReadonlyMap<string, SituationDef>) {}

  isDefined(name: string): boolean {
    return this.situations.has(name);
  }

  /**
   * Build the chain for `concept.method`. Fails with UnknownMethod when the
   * concept has no base method of that name, even if a situation adjusts it.
   * Never mutates the stack.
   */
  resolve(stack: SituationStack, concept: ConceptDef, method: string): DispatchChain {
    const base = concept.methods.get(method);
    if (!base) {
      throw langError("UnknownMethod", { concept: concept.name, method });
    }

    const key = adjustmentKey(concept.name, method);
    const links: MethodDef[] = [];
    for (const name of stack.active()) {
      const adj = this.situations.get(name)?.adjustments.get(key);
      if (adj) links.push(adj);
    }
    links.push(base);

    return { concept, method, links };
  }

  /** True when some active situation adjusts `concept.method`. */
  isAdjusted(stack: SituationStack, concept: string, method: string): boolean {
    const key = adjustmentKey(concept, method);
    return stack.active().some((name) => this.situations.get(name)?.adjustments.has(key) ?? false);
  }

  switchOn(stack: SituationStack, name: string): void {
    if (!this.isDefined(name)) throw langError("UnknownSituation", { situation: name });
    stack.push(name);
  }

  switchOff(stack: SituationStack, name: string): void {
    if (!this.isDefined(name)) throw langError("UnknownSituation", { situation: name });
    stack.remove(name);
  }
}
