// src/core/errors/index.ts

export * from "./codes";
export * from "./errors";
export * from "./convert";
