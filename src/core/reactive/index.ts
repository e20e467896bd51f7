// src/core/reactive/index.ts

export * from "./locks";
export * from "./graph";
