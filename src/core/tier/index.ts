// src/core/tier/index.ts

export * from "./ir";
export * from "./lower";
export * from "./helpers";
export * from "./vm";
export * from "./backend";
export * from "./profiler";
export * from "./manager";
