// src/core/dispatch/index.ts
// Dynamic dispatch with fallback resolution, handler generation and delegation

export * from "./types";
export * from "./errors";
export * from "./context";
export * from "./table";
export * from "./reserved";
export * from "./ledger";
export * from "./resolvers";
export * from "./coordinator";
export * from "./capability";
export * from "./delegation";
export * from "./domain";
export * from "./proxy";
