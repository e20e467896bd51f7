// src/core/errors/codes.ts
// Error kinds raised by the engine, with codes and message templates

export type ErrorCategory = "Lookup" | "Logic" | "Validation" | "Concurrency";

export type ErrorKind =
  | "UnknownField"
  | "IndexOutOfRange"
  | "UnknownSituation"
  | "UnknownMethod"
  | "AlreadyActive"
  | "NotActive"
  | "ProceedAtBase"
  | "RecursionGuardExceeded"
  | "ChannelClosed"
  | "UnwrapOnNone"
  | "DivisionByZero"
  | "TypeMismatch"
  | "UnknownVariable"
  | "UnknownConcept"
  | "SuspensionNotAllowed"
  | "Deadlock"
  | "WeakRefInvalid";

interface ErrorKindDef {
  code: string;
  category: ErrorCategory;
  template: string;
}

export const ERROR_KINDS: Record<ErrorKind, ErrorKindDef> = {
  UnknownField: { code: "E0101", category: "Lookup", template: "Concept {concept} has no field {field}" },
  UnknownMethod: { code: "E0102", category: "Lookup", template: "Concept {concept} has no method {method}" },
  UnknownSituation: { code: "E0103", category: "Lookup", template: "Situation {situation} is not defined" },
  UnknownVariable: { code: "E0104", category: "Lookup", template: "Undefined variable: {name}" },
  UnknownConcept: { code: "E0105", category: "Lookup", template: "Concept {concept} is not defined" },
  IndexOutOfRange: { code: "E0106", category: "Lookup", template: "Index {index} is out of range (length {length})" },

  AlreadyActive: { code: "E0201", category: "Logic", template: "Situation {situation} is already switched on" },
  NotActive: { code: "E0202", category: "Logic", template: "Situation {situation} is not switched on" },
  ProceedAtBase: { code: "E0203", category: "Logic", template: "Proceed called from the base method {concept}.{method}" },
  RecursionGuardExceeded: { code: "E0204", category: "Logic", template: "Observer cascade exceeded {limit} invocations" },
  UnwrapOnNone: { code: "E0205", category: "Logic", template: "Cannot unwrap None" },
  DivisionByZero: { code: "E0206", category: "Logic", template: "Division by zero" },

  TypeMismatch: { code: "E0301", category: "Validation", template: "Type mismatch: {detail}" },
  WeakRefInvalid: { code: "E0302", category: "Validation", template: "Cannot create a weak reference to {kind}" },

  ChannelClosed: { code: "E0401", category: "Concurrency", template: "Channel is closed" },
  SuspensionNotAllowed: { code: "E0402", category: "Concurrency", template: "{operation} cannot suspend inside {where}" },
  Deadlock: { code: "E0403", category: "Concurrency", template: "All execution contexts are blocked" },
};

/**
 * Render the template for a kind, substituting `{param}` placeholders.
 */
export function formatErrorMessage(kind: ErrorKind, params?: Record<string, string | number>): string {
  let message = ERROR_KINDS[kind].template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }
  return message;
}
