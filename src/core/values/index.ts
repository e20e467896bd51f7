// src/core/values/index.ts

export * from "./values";
export * from "./numeric";
export * from "./text";
export * from "./display";
export * from "./compare";
export * from "./collections";
export * from "./ops";
