// src/core/values/display.ts
// Display text for values (Print, string concatenation, Text)

import type { Val } from "./values";
import { formatDecimal, formatFast } from "./numeric";

export function display(v: Val): string {
  switch (v.tag) {
    case "Number":
      return formatDecimal(v.d);
    case "FastNumber":
      return formatFast(v.n);
    case "String":
      return v.s;
    case "Boolean":
      return v.b ? "True" : "False";
    case "List":
      return `[${v.items.map(displayNested).join(", ")}]`;
    case "Map": {
      const parts: string[] = [];
      for (const [k, item] of v.entries) {
        parts.push(`${k}: ${displayNested(item)}`);
      }
      return `{${parts.join(", ")}}`;
    }
    case "Option":
      return v.some ? `Some(${displayNested(v.value)})` : "None";
    case "WeakRef":
      return v.ref.deref() === undefined ? "WeakRef(collected)" : `WeakRef(${v.targetKind})`;
    case "Task":
      return `Task#${v.task.id}`;
    case "Error":
      return `Error(${v.kind}: ${v.message})`;
    case "Instance":
      return `<${v.concept.name}#${v.id}>`;
    case "Native":
      return `<native ${v.name}>`;
    case "Channel":
      return `Channel#${v.channel.id}`;
  }
}

/** Strings inside containers are quoted so `["a"]` and `[a]` differ. */
function displayNested(v: Val): string {
  return v.tag === "String" ? JSON.stringify(v.s) : display(v);
}
