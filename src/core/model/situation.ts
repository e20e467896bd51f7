// src/core/model/situation.ts
// Situation definitions: named sets of method adjustments

import type { MethodDef } from "./concept";
import { typeMismatch } from "../errors/errors";

export type SituationDef = {
  readonly name: string;
  /** Keyed by `Concept.method`. */
  readonly adjustments: ReadonlyMap<string, MethodDef>;
};

export function adjustmentKey(concept: string, method: string): string {
  return `${concept}.${method}`;
}

export function defineSituation(name: string, adjustments: Array<Omit<MethodDef, "situation">>): SituationDef {
  const table = new Map<string, MethodDef>();
  for (const adj of adjustments) {
    const key = adjustmentKey(adj.concept, adj.name);
    if (table.has(key)) {
      throw typeMismatch(`situation ${name} adjusts ${key} twice`);
    }
    table.set(key, Object.freeze({ ...adj, situation: name }));
  }
  return Object.freeze({ name, adjustments: table });
}

