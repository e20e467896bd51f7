// src/core/natives/index.ts

export * from "./core";
