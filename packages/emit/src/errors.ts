/**
 * Emit Package - Errors
 */

/**
 * Error during emission.
 */
export class EmitError extends Error {
  constructor(
    message: string,
    public readonly code: EmitErrorCodeType,
    public readonly file?: string,
    public readonly line?: number,
    public readonly column?: number,
  ) {
    super(message);
    this.name = "EmitError";
  }
}

/** Error codes */
export const EmitErrorCode = {
  SYNTAX_ERROR: "EMIT_SYNTAX_ERROR",
  RESERVED_MEMBER_NAME: "EMIT_RESERVED_MEMBER_NAME",
} as const;

export type EmitErrorCodeType = (typeof EmitErrorCode)[keyof typeof EmitErrorCode];
