/* =============================================================================
 * GENERATION ERRORS
 * ============================================================================= */

/** Error codes */
export const GenerationErrorCode = {
  /** A mixin or reference names no known structure. */
  UNRESOLVED_TYPE_REFERENCE: "UNRESOLVED_TYPE_REFERENCE",
  /** Default synthesis met a type shape it cannot produce a value for. */
  UNSUPPORTED_TYPE_DEFAULT: "UNSUPPORTED_TYPE_DEFAULT",
  /** A wire method was registered twice in one role's table. */
  DUPLICATE_DISPATCH_ENTRY: "DUPLICATE_DISPATCH_ENTRY",
  /** A dispatch table builder was used after `build()`. */
  DISPATCH_TABLE_SEALED: "DISPATCH_TABLE_SEALED",
} as const;

export type GenerationErrorCodeType = (typeof GenerationErrorCode)[keyof typeof GenerationErrorCode];

/**
 * Error during generation. Generation is deterministic, so every one of
 * these reproduces on the same input.
 */
export class GenerationError extends Error {
  constructor(
    message: string,
    public readonly code: GenerationErrorCodeType,
    /** Name of the definition or message being compiled, when known. */
    public readonly subject?: string,
  ) {
    super(message);
    this.name = "GenerationError";
  }
}

export function isGenerationError(error: unknown, code?: GenerationErrorCodeType): error is GenerationError {
  return error instanceof GenerationError && (code === undefined || error.code === code);
}
