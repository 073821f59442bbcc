/**
 * Compiler Package - Type Expression Compiler
 *
 * Turns metamodel type AST nodes into target type expressions. Pure and total
 * over the closed `Type` union; dispatch is by `kind` only. References are
 * copied verbatim: whether they resolve is for consumers to find out.
 */

import type { BaseType, KnownBaseTypeName, MessageParams, Property, Type } from "../model/metamodel.js";
import type { FieldDefinition } from "../model/definitions.js";
import {
  arrayOf,
  formatFieldList,
  literal,
  mapOf,
  named,
  primitive,
  recordOf,
  tupleOf,
  unionOf,
  type PrimitiveName,
  type TypeExpr,
} from "../model/type-expr.js";
import type { InlineRecordMode } from "../options.js";
import { toDocumentation } from "./documentation.js";

export interface CompileTypeOptions {
  inlineRecords?: InlineRecordMode;
}

/** Primitive each known base name compiles to; `null` keeps the name as an opaque reference. */
const BASE_TYPES: Readonly<Record<KnownBaseTypeName, PrimitiveName | null>> = {
  string: "string",
  integer: "integer",
  uinteger: "uinteger",
  decimal: "float",
  boolean: "boolean",
  null: "null",
  URI: null,
  DocumentUri: null,
  RegExp: null,
};

function isKnownBaseTypeName(name: string): name is KnownBaseTypeName {
  return Object.hasOwn(BASE_TYPES, name);
}

/**
 * Compile a metamodel type to a target type expression.
 *
 * @example
 * compileType({ kind: "array", element: { kind: "reference", name: "Range" } })
 *   → { kind: "array", element: { kind: "named", name: "Range" } }
 */
export function compileType(type: Type, options: CompileTypeOptions = {}): TypeExpr {
  switch (type.kind) {
    case "base":
      return compileBase(type);
    case "reference":
      return named(type.name);
    case "array":
      return arrayOf(compileType(type.element, options));
    case "map":
      // Key kinds are restricted by the metamodel; not re-verified here.
      return mapOf(compileType(type.key, options), compileType(type.value, options));
    case "and":
    case "or":
      // No intersection construct in the target model: "and" compiles like "or".
      return unionOf(type.items.map(item => compileType(item, options)));
    case "tuple":
      return tupleOf(type.items.map(item => compileType(item, options)));
    case "literal": {
      const fields = type.value.properties.map(property => compileProperty(property, options));
      if (options.inlineRecords === "structural") {
        return recordOf(fields);
      }
      return literal(formatFieldList(fields));
    }
    case "stringLiteral":
    case "integerLiteral":
    case "booleanLiteral":
      return literal(type.value);
  }
}

function compileBase(type: BaseType): TypeExpr {
  const primitiveName = isKnownBaseTypeName(type.name) ? BASE_TYPES[type.name] : null;
  return primitiveName ? primitive(primitiveName) : named(type.name);
}

/** Compile a property to a field, keeping optionality as a field-level marker. */
export function compileProperty(property: Property, options: CompileTypeOptions = {}): FieldDefinition {
  return {
    name: property.name,
    type: compileType(property.type, options),
    optional: property.optional === true,
    docs: toDocumentation(property),
  };
}

/**
 * Compile message params. A list of types is positional and becomes a tuple;
 * absent params compile to `null`.
 */
export function compileParams(params: MessageParams | undefined, options: CompileTypeOptions = {}): TypeExpr | null {
  if (params === undefined) return null;
  if (isTypeList(params)) {
    return tupleOf(params.map(item => compileType(item, options)));
  }
  return compileType(params, options);
}

function isTypeList(params: MessageParams): params is readonly Type[] {
  return Array.isArray(params);
}
