// Shared public API - cross-stage utilities

export * from "./debug.js";
export * from "./errors.js";
export * from "./identifiers.js";
