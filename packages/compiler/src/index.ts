/**
 * @rpcforge/compiler
 *
 * Compile a bidirectional RPC protocol metamodel into an ordered types
 * artifact plus one dispatcher artifact per role (Initiator, Responder).
 *
 * @example
 * ```typescript
 * import { generate } from "@rpcforge/compiler";
 *
 * const result = generate(metamodel, { inlineRecords: "structural" });
 *
 * result.types.definitions;          // records, aliases, enums in dependency order
 * result.responder.dispatchTable;    // wire method → handler name
 * result.initiator.imports;          // names the Initiator uses from the types
 * result.deviations;                 // cycles the orderer could not break
 * ```
 */

// Pipeline - the whole compilation in one call
export { generate } from "./pipeline/index.js";
export type { GenerationResult, TypesArtifact } from "./pipeline/index.js";

// Options
export {
  DEFAULT_FORWARD_REFERENCES,
  DEFAULT_GENERATE_OPTIONS,
  INLINE_RECORD_MODES,
  normalizeGenerateOptions,
} from "./options.js";
export type { GenerateOptions, InlineRecordMode, ResolvedGenerateOptions } from "./options.js";

// Model - metamodel input, type expressions, definitions, dispatchers
export * from "./model/index.js";

// Stages - usable on their own
export * from "./types/index.js";
export * from "./definitions/index.js";
export * from "./messages/index.js";
export * from "./order/index.js";
export * from "./imports/index.js";
export * from "./synthesis/index.js";

// Shared - errors, identifiers, debug channels
export * from "./shared/index.js";
