// src/core/concurrency/index.ts
// Background tasks, channels and the cooperative scheduler

export * from "./types";
export * from "./channel";
export * from "./scheduler";
