/**
 * Compiler Package - Definitions
 *
 * The compiler's named output units. Built once by the definition builder and
 * never mutated afterwards; the orderer only rearranges the list.
 */

import type { EnumerationBackingKind } from "./metamodel.js";
import type { TypeExpr } from "./type-expr.js";

/** Documentation carried from the metamodel into generated doc comments. */
export interface Documentation {
  readonly text?: string;
  readonly since?: string;
  readonly proposed?: boolean;
  readonly deprecated?: string;
}

export interface FieldDefinition {
  readonly name: string;
  readonly type: TypeExpr;
  /**
   * Optional-field marker: the field may be absent. Distinct from the type
   * admitting `null`.
   */
  readonly optional: boolean;
  readonly docs: Documentation;
}

/** Record-like definition (emitted as an interface). */
export interface RecordDefinition {
  readonly kind: "record";
  readonly name: string;
  /** Compiled `extends`, in declared order. */
  readonly parents: readonly TypeExpr[];
  /** Own fields followed by mixed-in fields. */
  readonly fields: readonly FieldDefinition[];
  readonly docs: Documentation;
}

/** Alias-like definition (emitted as a type alias). */
export interface AliasDefinition {
  readonly kind: "alias";
  readonly name: string;
  readonly type: TypeExpr;
  readonly docs: Documentation;
}

export interface EnumEntryDefinition {
  readonly name: string;
  /** Copied from the metamodel exactly, never re-encoded. */
  readonly value: string | number;
  readonly docs: Documentation;
}

/** Enumeration-like definition (emitted as an enum). */
export interface EnumDefinition {
  readonly kind: "enum";
  readonly name: string;
  readonly backing: EnumerationBackingKind;
  readonly entries: readonly EnumEntryDefinition[];
  readonly supportsCustomValues: boolean;
  readonly docs: Documentation;
}

export type Definition = RecordDefinition | AliasDefinition | EnumDefinition;
