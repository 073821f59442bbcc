/**
 * Runtime Package - Endpoint
 *
 * Base class of every generated dispatcher. Senders forward to the transport;
 * incoming payloads enter through `handle` and `handleResult`, which the
 * generated subclass implements as a switch over its tables.
 */

/**
 * Wire boundary. Delivery, framing and serialization live behind it.
 */
export interface Transport {
  request(method: string, params?: unknown): void;
  notify(method: string, params?: unknown): void;
}

/** Opaque per-call data handed to every handler stub. */
export type HandlerContext = Record<string, unknown>;

/** Frozen method → handler name mapping, as emitted on generated classes. */
export type HandlerTable = Readonly<Record<string, string>>;

export abstract class Endpoint {
  constructor(protected readonly transport: Transport) {}

  /** Send a request; the response arrives later through `handleResult`. */
  protected request(method: string, params?: unknown): void {
    if (params === undefined) {
      this.transport.request(method);
    } else {
      this.transport.request(method, params);
    }
  }

  protected notify(method: string, params?: unknown): void {
    if (params === undefined) {
      this.transport.notify(method);
    } else {
      this.transport.notify(method, params);
    }
  }

  /**
   * Route an incoming request or notification to its handler.
   *
   * @returns The handler's result (the response of a request).
   * @throws LookupFailure when `method` is not in the dispatch table.
   */
  abstract handle(method: string, payload: unknown, context?: HandlerContext): unknown;

  /**
   * Route the result of a request this endpoint sent.
   *
   * @throws LookupFailure when `method` is not in the result table.
   */
  abstract handleResult(method: string, result: unknown, context?: HandlerContext): void;
}
