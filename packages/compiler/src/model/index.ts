// Model public API - input metamodel and compiled output shapes (imports nothing outside model/ and shared/)

// Metamodel - the protocol description handed in by the loader
export * from "./metamodel.js";

// Type expressions - structured compiled types, walking and formatting
export * from "./type-expr.js";

// Definitions - records, aliases and enumerations of the types artifact
export * from "./definitions.js";

// Dispatchers - per-role members and dispatch tables
export * from "./dispatcher.js";
