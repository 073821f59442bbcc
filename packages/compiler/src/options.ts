/**
 * Compiler Package - Generation Options
 *
 * Defaults and normalization for the knobs the pipeline accepts.
 */

/**
 * How inline anonymous records compile.
 *
 * - `literal-text`: a string literal type echoing the record's field list text
 * - `structural`: an inline object type with compiled fields
 */
export const INLINE_RECORD_MODES = ["literal-text", "structural"] as const;

export type InlineRecordMode = (typeof INLINE_RECORD_MODES)[number];

export interface GenerateOptions {
  inlineRecords?: InlineRecordMode;
  /**
   * Alias names that are referenced before their own definition completes
   * (mutually recursive aliases). References to them inside alias bindings
   * become forward references.
   */
  forwardReferences?: readonly string[];
  /** Prepend the base scalar aliases (`URI`, `DocumentUri`, `RegExp`). */
  baseAliases?: boolean;
}

export interface ResolvedGenerateOptions {
  inlineRecords: InlineRecordMode;
  forwardReferences: ReadonlySet<string>;
  baseAliases: boolean;
}

export const DEFAULT_FORWARD_REFERENCES: readonly string[] = ["LSPObject", "LSPArray"];

export const DEFAULT_GENERATE_OPTIONS: ResolvedGenerateOptions = {
  inlineRecords: "literal-text",
  forwardReferences: new Set(DEFAULT_FORWARD_REFERENCES),
  baseAliases: true,
};

export function normalizeGenerateOptions(options: GenerateOptions | undefined): ResolvedGenerateOptions {
  if (!options) return DEFAULT_GENERATE_OPTIONS;
  return {
    inlineRecords: options.inlineRecords ?? DEFAULT_GENERATE_OPTIONS.inlineRecords,
    forwardReferences: options.forwardReferences
      ? new Set(options.forwardReferences)
      : DEFAULT_GENERATE_OPTIONS.forwardReferences,
    baseAliases: options.baseAliases ?? DEFAULT_GENERATE_OPTIONS.baseAliases,
  };
}
