/**
 * Compiler Package - Definition Builder
 *
 * Turns the metamodel's enumerations, structures and type aliases into named
 * definitions, in that order and in declaration order within each group.
 *
 * Structures: `extends` becomes the parent list (a subtype relation);
 * `mixins` copies the referenced structure's own properties after the
 * structure's own, one level deep (a mixin's mixins are not followed).
 */

import type { Enumeration, Metamodel, Structure, Type, TypeAlias } from "../model/metamodel.js";
import type {
  AliasDefinition,
  Definition,
  EnumDefinition,
  FieldDefinition,
  RecordDefinition,
} from "../model/definitions.js";
import { forward, mapNamed, primitive } from "../model/type-expr.js";
import { debug } from "../shared/debug.js";
import { GenerationError, GenerationErrorCode } from "../shared/errors.js";
import { compileProperty, compileType, type CompileTypeOptions } from "../types/compile-type.js";
import { toDocumentation } from "../types/documentation.js";
import { normalizeGenerateOptions, type GenerateOptions, type ResolvedGenerateOptions } from "../options.js";

/* =============================================================================
 * BASE SCALAR ALIASES
 * ============================================================================= */

/** Opaque base names the compiler passes through, defined as aliases of `string`. */
export const BASE_SCALAR_ALIASES: readonly AliasDefinition[] = [
  { kind: "alias", name: "URI", type: primitive("string"), docs: {} },
  { kind: "alias", name: "DocumentUri", type: primitive("string"), docs: {} },
  { kind: "alias", name: "RegExp", type: primitive("string"), docs: {} },
];

/* =============================================================================
 * PUBLIC API
 * ============================================================================= */

/**
 * Build definitions for every enumeration, structure and type alias.
 *
 * @throws GenerationError `UNRESOLVED_TYPE_REFERENCE` when a mixin does not
 * name a known structure.
 */
export function buildDefinitions(model: Metamodel, options?: GenerateOptions): Definition[] {
  const resolved = normalizeGenerateOptions(options);
  const structures = indexStructures(model.structures);
  const definitions: Definition[] = [];

  for (const enumeration of model.enumerations) {
    definitions.push(buildEnumeration(enumeration));
  }
  for (const structure of model.structures) {
    definitions.push(buildStructure(structure, structures, resolved));
  }
  for (const alias of model.typeAliases) {
    definitions.push(buildAlias(alias, resolved));
  }

  debug.definitions("built", {
    enumerations: model.enumerations.length,
    structures: model.structures.length,
    aliases: model.typeAliases.length,
  });
  return definitions;
}

export function buildEnumeration(enumeration: Enumeration): EnumDefinition {
  return {
    kind: "enum",
    name: enumeration.name,
    backing: enumeration.type.name,
    entries: enumeration.values.map(entry => ({
      name: entry.name,
      value: entry.value,
      docs: toDocumentation(entry),
    })),
    supportsCustomValues: enumeration.supportsCustomValues === true,
    docs: toDocumentation(enumeration),
  };
}

export function buildStructure(
  structure: Structure,
  structures: ReadonlyMap<string, Structure>,
  options: CompileTypeOptions = {},
): RecordDefinition {
  const parents = (structure.extends ?? []).map(parent => compileType(parent, options));

  const fields: FieldDefinition[] = structure.properties.map(property => compileProperty(property, options));
  for (const mixin of structure.mixins ?? []) {
    const source = resolveMixin(mixin, structure.name, structures);
    debug.definitions("mixin", { structure: structure.name, mixin: source.name, fields: source.properties.length });
    for (const property of source.properties) {
      fields.push(compileProperty(property, options));
    }
  }

  return {
    kind: "record",
    name: structure.name,
    parents,
    fields,
    docs: toDocumentation(structure),
  };
}

export function buildAlias(alias: TypeAlias, options: ResolvedGenerateOptions = normalizeGenerateOptions(undefined)): AliasDefinition {
  const compiled = compileType(alias.type, options);
  const type = options.forwardReferences.size === 0
    ? compiled
    : mapNamed(compiled, node => (options.forwardReferences.has(node.name) ? forward(node.name) : node));

  return {
    kind: "alias",
    name: alias.name,
    type,
    docs: toDocumentation(alias),
  };
}

/* =============================================================================
 * HELPERS
 * ============================================================================= */

export function indexStructures(structures: readonly Structure[]): Map<string, Structure> {
  const map = new Map<string, Structure>();
  for (const structure of structures) {
    if (!map.has(structure.name)) map.set(structure.name, structure);
  }
  return map;
}

function resolveMixin(mixin: Type, owner: string, structures: ReadonlyMap<string, Structure>): Structure {
  if (mixin.kind !== "reference") {
    throw new GenerationError(
      `Mixin of "${owner}" must be a reference to a structure, got a "${mixin.kind}" type`,
      GenerationErrorCode.UNRESOLVED_TYPE_REFERENCE,
      owner,
    );
  }
  const source = structures.get(mixin.name);
  if (!source) {
    throw new GenerationError(
      `Mixin "${mixin.name}" of "${owner}" does not name a known structure`,
      GenerationErrorCode.UNRESOLVED_TYPE_REFERENCE,
      owner,
    );
  }
  return source;
}
