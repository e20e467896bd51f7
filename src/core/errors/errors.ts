// src/core/errors/errors.ts
// Language errors (catchable by Try/Catch) and engine faults (never catchable)

import { ERROR_KINDS, formatErrorMessage, type ErrorCategory, type ErrorKind } from "./codes";

/**
 * A recoverable error of the language. Every failure a program can observe
 * is one of these; `Try`/`Catch` binds it as an ErrorObject value.
 */
export class LangError extends Error {
  readonly kind: ErrorKind;
  readonly code: string;
  readonly category: ErrorCategory;
  readonly data?: Record<string, string | number>;

  constructor(kind: ErrorKind, message: string, data?: Record<string, string | number>) {
    super(message);
    this.name = "LangError";
    this.kind = kind;
    this.code = ERROR_KINDS[kind].code;
    this.category = ERROR_KINDS[kind].category;
    this.data = data;
  }
}

/**
 * An engine invariant violation: a guard failing after a committed side
 * effect, a dangling dependency edge, a scheduler inconsistency.
 * These are bugs in the engine, not in the running program.
 */
export class EngineFault extends Error {
  readonly invariant: string;

  constructor(invariant: string, message: string) {
    super(`[engine fault: ${invariant}] ${message}`);
    this.name = "EngineFault";
    this.invariant = invariant;
  }
}

export function langError(kind: ErrorKind, params?: Record<string, string | number>): LangError {
  return new LangError(kind, formatErrorMessage(kind, params), params);
}

export function isLangError(e: unknown): e is LangError {
  return e instanceof LangError;
}

export function isEngineFault(e: unknown): e is EngineFault {
  return e instanceof EngineFault;
}

export function typeMismatch(detail: string): LangError {
  return langError("TypeMismatch", { detail });
}
