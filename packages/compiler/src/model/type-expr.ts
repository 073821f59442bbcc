/**
 * Compiler Package - Target Type Expressions
 *
 * Structured form of a compiled type. Consumers walk it for referenced names
 * (ordering, imports) and the emitter prints it; nothing downstream re-parses
 * rendered text.
 */

import { formatPropertyName } from "../shared/identifiers.js";
import type { FieldDefinition } from "./definitions.js";

/* =============================================================================
 * EXPRESSION NODES
 * ============================================================================= */

/** Canonical target primitives. The numeric ones all print as `number`. */
export type PrimitiveName = "string" | "integer" | "uinteger" | "float" | "boolean" | "null";

export interface PrimitiveTypeExpr {
  readonly kind: "primitive";
  readonly name: PrimitiveName;
}

/** Reference to a definition, or an opaque base name such as `URI`. */
export interface NamedTypeExpr {
  readonly kind: "named";
  readonly name: string;
}

export interface ArrayTypeExpr {
  readonly kind: "array";
  readonly element: TypeExpr;
}

export interface MapTypeExpr {
  readonly kind: "map";
  readonly key: TypeExpr;
  readonly value: TypeExpr;
}

/** Shared by metamodel `or` and `and`: there is no intersection construct. */
export interface UnionTypeExpr {
  readonly kind: "union";
  readonly items: readonly TypeExpr[];
}

export interface TupleTypeExpr {
  readonly kind: "tuple";
  readonly items: readonly TypeExpr[];
}

export interface LiteralTypeExpr {
  readonly kind: "literal";
  readonly value: string | number | boolean;
}

/** Inline structural record (structural inline-record mode only). */
export interface RecordTypeExpr {
  readonly kind: "record";
  readonly fields: readonly FieldDefinition[];
}

/**
 * Reference that may appear before the referenced definition is complete.
 * Not an ordering edge.
 */
export interface ForwardTypeExpr {
  readonly kind: "forward";
  readonly name: string;
}

export type TypeExpr =
  | PrimitiveTypeExpr
  | NamedTypeExpr
  | ArrayTypeExpr
  | MapTypeExpr
  | UnionTypeExpr
  | TupleTypeExpr
  | LiteralTypeExpr
  | RecordTypeExpr
  | ForwardTypeExpr;

/* =============================================================================
 * CONSTRUCTORS
 * ============================================================================= */

export const primitive = (name: PrimitiveName): PrimitiveTypeExpr => ({ kind: "primitive", name });
export const named = (name: string): NamedTypeExpr => ({ kind: "named", name });
export const arrayOf = (element: TypeExpr): ArrayTypeExpr => ({ kind: "array", element });
export const mapOf = (key: TypeExpr, value: TypeExpr): MapTypeExpr => ({ kind: "map", key, value });
export const unionOf = (items: readonly TypeExpr[]): UnionTypeExpr => ({ kind: "union", items });
export const tupleOf = (items: readonly TypeExpr[]): TupleTypeExpr => ({ kind: "tuple", items });
export const literal = (value: string | number | boolean): LiteralTypeExpr => ({ kind: "literal", value });
export const recordOf = (fields: readonly FieldDefinition[]): RecordTypeExpr => ({ kind: "record", fields });
export const forward = (name: string): ForwardTypeExpr => ({ kind: "forward", name });

/* =============================================================================
 * WALKING
 * ============================================================================= */

export interface ReferencedNamesOptions {
  /** Include names behind `forward` nodes (default true). */
  includeForward?: boolean;
}

/**
 * Every name an expression mentions, left to right, first-seen order.
 *
 * @example
 * referencedNames(unionOf([named("A"), arrayOf(named("B")), named("A")])) → ["A", "B"]
 */
export function referencedNames(expr: TypeExpr, options: ReferencedNamesOptions = {}): string[] {
  const includeForward = options.includeForward ?? true;
  const seen = new Set<string>();
  const names: string[] = [];
  const add = (name: string): void => {
    if (seen.has(name)) return;
    seen.add(name);
    names.push(name);
  };

  const visit = (node: TypeExpr): void => {
    switch (node.kind) {
      case "primitive":
      case "literal":
        return;
      case "named":
        add(node.name);
        return;
      case "forward":
        if (includeForward) add(node.name);
        return;
      case "array":
        visit(node.element);
        return;
      case "map":
        visit(node.key);
        visit(node.value);
        return;
      case "union":
      case "tuple":
        for (const item of node.items) visit(item);
        return;
      case "record":
        for (const field of node.fields) visit(field.type);
        return;
    }
  };

  visit(expr);
  return names;
}

/**
 * Rebuild an expression, replacing every `named` node the callback maps to a
 * different node. Used to mark forward references.
 */
export function mapNamed(expr: TypeExpr, fn: (node: NamedTypeExpr) => TypeExpr): TypeExpr {
  switch (expr.kind) {
    case "named":
      return fn(expr);
    case "primitive":
    case "literal":
    case "forward":
      return expr;
    case "array":
      return arrayOf(mapNamed(expr.element, fn));
    case "map":
      return mapOf(mapNamed(expr.key, fn), mapNamed(expr.value, fn));
    case "union":
      return unionOf(expr.items.map(item => mapNamed(item, fn)));
    case "tuple":
      return tupleOf(expr.items.map(item => mapNamed(item, fn)));
    case "record":
      return recordOf(expr.fields.map(field => ({ ...field, type: mapNamed(field.type, fn) })));
  }
}

/* =============================================================================
 * FORMATTING
 * ============================================================================= */

const PRIMITIVE_TEXT: Record<PrimitiveName, string> = {
  string: "string",
  integer: "number",
  uinteger: "number",
  float: "number",
  boolean: "boolean",
  null: "null",
};

/**
 * Render the TypeScript text of an expression.
 *
 * @example
 * formatTypeExpr(arrayOf(unionOf([named("A"), primitive("null")]))) → "(A | null)[]"
 */
export function formatTypeExpr(expr: TypeExpr): string {
  switch (expr.kind) {
    case "primitive":
      return PRIMITIVE_TEXT[expr.name];
    case "named":
    case "forward":
      return expr.name;
    case "array": {
      const element = formatTypeExpr(expr.element);
      return needsParens(expr.element) ? `(${element})[]` : `${element}[]`;
    }
    case "map":
      return `{ [key: ${formatTypeExpr(expr.key)}]: ${formatTypeExpr(expr.value)} }`;
    case "union":
      if (expr.items.length === 0) return "never";
      return expr.items.map(formatTypeExpr).join(" | ");
    case "tuple":
      return `[${expr.items.map(formatTypeExpr).join(", ")}]`;
    case "literal":
      return typeof expr.value === "string" ? JSON.stringify(expr.value) : String(expr.value);
    case "record":
      return formatFieldList(expr.fields);
  }
}

/** Inline object type text of a field list: `{ a: T; b?: U }`. */
export function formatFieldList(fields: readonly FieldDefinition[]): string {
  if (fields.length === 0) return "{}";
  const members = fields.map(
    field => `${formatPropertyName(field.name)}${field.optional ? "?" : ""}: ${formatTypeExpr(field.type)}`,
  );
  return `{ ${members.join("; ")} }`;
}

function needsParens(expr: TypeExpr): boolean {
  return expr.kind === "union" && expr.items.length > 1;
}
