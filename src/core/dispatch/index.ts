// src/core/dispatch/index.ts

export * from "./situations";
export * from "./resolver";
