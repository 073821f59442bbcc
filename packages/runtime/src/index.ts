/**
 * @rpcforge/runtime
 *
 * What generated dispatchers import at run time: the `Endpoint` base class,
 * the `Transport` boundary it sends through, and `LookupFailure`.
 *
 * @example
 * ```typescript
 * import { Responder } from "./generated/responder.js";
 *
 * class Server extends Responder {
 *   handle_hover(context, params) { return { contents: "…" }; }
 * }
 *
 * new Server(transport).handle("textDocument/hover", params);
 * ```
 */

export { Endpoint } from "./endpoint.js";
export type { HandlerContext, HandlerTable, Transport } from "./endpoint.js";

export { LookupFailure, RuntimeErrorCode, isLookupFailure } from "./errors.js";
export type { RuntimeErrorCodeType } from "./errors.js";
