/**
 * Compiler Package - Default Value Synthesis
 *
 * Builds a default JSON value for a record definition: empty strings, zeros,
 * `false`, empty arrays and maps, the first branch of a union, the first
 * entry of an enumeration. Nested records expand only when `recursive` is
 * set; otherwise they are marked with a `MissingValue`.
 */

import type { Definition, EnumDefinition, FieldDefinition, RecordDefinition } from "../model/definitions.js";
import type { PrimitiveName, TypeExpr } from "../model/type-expr.js";
import { GenerationError, GenerationErrorCode } from "../shared/errors.js";

/* =============================================================================
 * PUBLIC API
 * ============================================================================= */

export type DefaultValue =
  | string
  | number
  | boolean
  | null
  | MissingValue
  | DefaultValue[]
  | { [key: string]: DefaultValue };

export type DefaultObject = { [key: string]: DefaultValue };

/** Placeholder for a nested record that was not expanded. */
export class MissingValue {
  constructor(readonly typeName: string) {}
}

export interface SynthesizeDefaultOptions {
  /** Skip optional fields. */
  onlyRequired?: boolean;
  /** Expand nested records instead of marking them with `MissingValue`. */
  recursive?: boolean;
}

/**
 * Default value of the record named `typeName`: inherited fields first, then
 * the record's own.
 *
 * @example
 * synthesizeDefault(definitions, "Position") → { line: 0, character: 0 }
 *
 * @throws GenerationError `UNSUPPORTED_TYPE_DEFAULT` for unresolved names,
 * tuples, inline records without `recursive`, and recursive cycles.
 */
export function synthesizeDefault(
  definitions: readonly Definition[],
  typeName: string,
  options: SynthesizeDefaultOptions = {},
): DefaultObject {
  const synthesizer = new DefaultSynthesizer(definitions, options);
  const definition = synthesizer.lookup(typeName);
  if (definition.kind !== "record") {
    throw unsupported(`"${typeName}" is not a record definition`, typeName);
  }
  return synthesizer.recordDefault(definition);
}

/* =============================================================================
 * SYNTHESIZER
 * ============================================================================= */

const PRIMITIVE_DEFAULTS: Record<PrimitiveName, string | number | boolean | null> = {
  string: "",
  integer: 0,
  uinteger: 0,
  float: 0,
  boolean: false,
  null: null,
};

class DefaultSynthesizer {
  readonly #index = new Map<string, Definition>();
  readonly #inProgress = new Set<string>();
  readonly #onlyRequired: boolean;
  readonly #recursive: boolean;

  constructor(definitions: readonly Definition[], options: SynthesizeDefaultOptions) {
    for (const definition of definitions) {
      if (!this.#index.has(definition.name)) this.#index.set(definition.name, definition);
    }
    this.#onlyRequired = options.onlyRequired ?? false;
    this.#recursive = options.recursive ?? false;
  }

  lookup(name: string): Definition {
    const definition = this.#index.get(name);
    if (!definition) {
      throw unsupported(`Cannot produce a default for unresolved type "${name}"`, name);
    }
    return definition;
  }

  recordDefault(record: RecordDefinition): DefaultObject {
    return this.#guard(record.name, () => this.#fieldsDefault(this.#collectFields(record, new Set())));
  }

  typeDefault(expr: TypeExpr): DefaultValue {
    switch (expr.kind) {
      case "primitive":
        return PRIMITIVE_DEFAULTS[expr.name];
      case "array":
        return [];
      case "map":
        return {};
      case "literal":
        return expr.value;
      case "union": {
        const [first] = expr.items;
        if (!first) throw unsupported("Cannot produce a default for an empty union");
        return this.typeDefault(first);
      }
      case "tuple":
        throw unsupported("Cannot produce a default for a tuple type");
      case "record":
        if (!this.#recursive) {
          throw unsupported("Cannot produce a default for an inline record without recursive expansion");
        }
        return this.#fieldsDefault(expr.fields);
      case "named":
      case "forward":
        return this.#namedDefault(expr.name);
    }
  }

  #namedDefault(name: string): DefaultValue {
    const definition = this.lookup(name);
    switch (definition.kind) {
      case "enum":
        return firstEntryValue(definition);
      case "alias":
        return this.#guard(name, () => this.typeDefault(definition.type));
      case "record":
        return this.#recursive ? this.recordDefault(definition) : new MissingValue(name);
    }
  }

  #fieldsDefault(fields: readonly FieldDefinition[]): DefaultObject {
    const data: DefaultObject = {};
    for (const field of fields) {
      if (this.#onlyRequired && field.optional) continue;
      data[field.name] = field.name === "valueSet" ? this.#valueSetDefault(field.type) : this.typeDefault(field.type);
    }
    return data;
  }

  /** `valueSet` fields list every value of the enumeration they hold. */
  #valueSetDefault(expr: TypeExpr): DefaultValue {
    if (expr.kind === "array" && expr.element.kind === "named") {
      const definition = this.lookup(expr.element.name);
      if (definition.kind === "enum") {
        return definition.entries.map(entry => entry.value);
      }
    }
    throw unsupported("A 'valueSet' field must be an array of an enumeration");
  }

  /** Parent fields (depth-first, declared order) followed by own fields. */
  #collectFields(record: RecordDefinition, visited: Set<string>): FieldDefinition[] {
    visited.add(record.name);
    const fields: FieldDefinition[] = [];
    for (const parent of record.parents) {
      if (parent.kind !== "named") {
        throw unsupported(`Parent of "${record.name}" is not a named record`, record.name);
      }
      if (visited.has(parent.name)) continue;
      const definition = this.lookup(parent.name);
      if (definition.kind !== "record") {
        throw unsupported(`Parent "${parent.name}" of "${record.name}" is not a record`, record.name);
      }
      fields.push(...this.#collectFields(definition, visited));
    }
    fields.push(...record.fields);
    return fields;
  }

  #guard<T>(name: string, produce: () => T): T {
    if (this.#inProgress.has(name)) {
      throw unsupported(`Cannot produce a default for recursive type "${name}"`, name);
    }
    this.#inProgress.add(name);
    try {
      return produce();
    } finally {
      this.#inProgress.delete(name);
    }
  }
}

function firstEntryValue(definition: EnumDefinition): string | number {
  const [first] = definition.entries;
  if (!first) throw unsupported(`Enumeration "${definition.name}" has no entries`, definition.name);
  return first.value;
}

function unsupported(message: string, subject?: string): GenerationError {
  return new GenerationError(message, GenerationErrorCode.UNSUPPORTED_TYPE_DEFAULT, subject);
}
