/**
 * Runtime Package - Errors
 */

/** Error codes */
export const RuntimeErrorCode = {
  LOOKUP_FAILURE: "RPC_LOOKUP_FAILURE",
} as const;

export type RuntimeErrorCodeType = (typeof RuntimeErrorCode)[keyof typeof RuntimeErrorCode];

/**
 * Raised by a generated dispatcher when an incoming method string has no
 * entry in the table consulted.
 */
export class LookupFailure extends Error {
  readonly code: RuntimeErrorCodeType = RuntimeErrorCode.LOOKUP_FAILURE;

  constructor(
    public readonly method: string,
    /** Class name of the dispatcher that received the method, e.g. "Responder". */
    public readonly role: string,
    public readonly table: "dispatch" | "result" = "dispatch",
  ) {
    super(`${role} has no ${table === "dispatch" ? "handler" : "result handler"} for method "${method}"`);
    this.name = "LookupFailure";
  }
}

export function isLookupFailure(error: unknown): error is LookupFailure {
  return error instanceof LookupFailure;
}
