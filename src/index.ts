// src/index.ts
// Plotline - Public API
//
// Programs are built as ASTs with the builders and run by a Runtime.

// ═══════════════════════════════════════════════════════════════════════════════
// RUNTIME
// ═══════════════════════════════════════════════════════════════════════════════

export { Runtime, type RuntimeOptions, type RunResult } from "./runtime";

// ═══════════════════════════════════════════════════════════════════════════════
// PROGRAMS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/ast";

// ═══════════════════════════════════════════════════════════════════════════════
// VALUES & MODEL
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/values";
export * from "./core/model";

// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE COMPONENTS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/dispatch";
export * from "./core/reactive";
export * from "./core/concurrency";
export * from "./core/tier";
export { coreNatives, NATIVE_NAMES } from "./core/natives";
export { Interpreter, type Completion, type Frame } from "./core/eval/interpreter";
export { createContext, type ExecContext } from "./core/eval/context";
export type { Engine } from "./core/eval/engine";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS, CONFIG, LOGGING
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/errors";
export * from "./core/config";
export { createLogger, type Logger, type LogSink } from "./core/log/logger";
