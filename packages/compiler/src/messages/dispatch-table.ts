/**
 * Compiler Package - Dispatch Table Builder
 *
 * Accumulates wire method → handler entries while messages are compiled and
 * hands out an immutable table once, when compilation of the role is done.
 */

import type { DispatchEntry, DispatchTable } from "../model/dispatcher.js";
import { GenerationError, GenerationErrorCode } from "../shared/errors.js";

export class DispatchTableBuilder {
  readonly #entries = new Map<string, string>();
  #sealed = false;

  constructor(
    /** Label used in error messages, e.g. "Responder dispatch table". */
    private readonly label: string,
  ) {}

  /**
   * Register a handler for a wire method.
   *
   * @throws GenerationError `DUPLICATE_DISPATCH_ENTRY` when the method is
   * already registered in this table.
   */
  add(method: string, handler: string): this {
    if (this.#sealed) {
      throw new GenerationError(
        `${this.label} is already built; cannot add "${method}"`,
        GenerationErrorCode.DISPATCH_TABLE_SEALED,
        method,
      );
    }
    const existing = this.#entries.get(method);
    if (existing !== undefined) {
      throw new GenerationError(
        `${this.label} already maps "${method}" to ${existing}; cannot also map it to ${handler}`,
        GenerationErrorCode.DUPLICATE_DISPATCH_ENTRY,
        method,
      );
    }
    this.#entries.set(method, handler);
    return this;
  }

  /** Freeze the table. The builder rejects further entries afterwards. */
  build(): DispatchTable {
    this.#sealed = true;
    return createDispatchTable([...this.#entries].map(([method, handler]) => ({ method, handler })));
  }
}

/** Create a frozen table from entries, keeping their order. */
export function createDispatchTable(entries: readonly DispatchEntry[]): DispatchTable {
  const frozenEntries = Object.freeze(entries.map(entry => Object.freeze({ ...entry })));
  const lookup = new Map(frozenEntries.map(entry => [entry.method, entry.handler] as const));
  return Object.freeze({
    entries: frozenEntries,
    size: lookup.size,
    get: (method: string) => lookup.get(method),
    has: (method: string) => lookup.has(method),
  });
}
