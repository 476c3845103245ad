// src/index.ts
// Public entry point

export * from "./reflect";
export * from "./bindings";
export * from "./config";
export * from "./server";
