// src/core/model/index.ts

export * from "./concept";
export * from "./instance";
export * from "./situation";
