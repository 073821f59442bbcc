/**
 * Emit Package - Types Module
 *
 * Renders the ordered definitions as a TypeScript module of interfaces,
 * type aliases and enums.
 */

import {
  debug,
  formatTypeExpr,
  type AliasDefinition,
  type Definition,
  type EnumDefinition,
  type FieldDefinition,
  type RecordDefinition,
  type TypesArtifact,
} from "@rpcforge/compiler";
import { indent, memberName, quote, withDocs } from "./format.js";
import { normalizeEmitOptions, type EmitOptions } from "./options.js";

export interface TypesModuleOptions extends Pick<EmitOptions, "indent"> {
  /** Protocol version named in the header. */
  version?: string;
}

/**
 * Render the whole types module: header, then every definition in the order
 * given.
 */
export function emitTypesModule(types: TypesArtifact, options: TypesModuleOptions = {}): string {
  const indentStr = normalizeEmitOptions(options).indent;
  const blocks = [
    generatedHeader(options.version === undefined ? "Protocol types." : `Protocol types for version ${options.version}.`),
    ...types.definitions.map(definition => emitDefinition(definition, indentStr)),
  ];
  debug.emit("types-module", { definitions: types.definitions.length });
  return `${blocks.join("\n\n")}\n`;
}

export function emitDefinition(definition: Definition, indentStr: string = "  "): string {
  switch (definition.kind) {
    case "record":
      return emitRecord(definition, indentStr);
    case "alias":
      return emitAlias(definition);
    case "enum":
      return emitEnum(definition, indentStr);
  }
}

/** Header comment shared by every generated module. */
export function generatedHeader(title: string): string {
  return ["/**", ` * ${title}`, " *", " * Generated by rpcforge. Do not edit.", " */"].join("\n");
}

/* =============================================================================
 * DEFINITIONS
 * ============================================================================= */

/**
 * Named parents become an `extends` clause. Anything else (an inline record
 * as a parent) has no interface form, so the record becomes an intersection.
 */
function emitRecord(record: RecordDefinition, indentStr: string): string {
  const body = emitFields(record.fields, indentStr);
  const namedParents = record.parents.every(parent => parent.kind === "named");

  if (namedParents) {
    const clause = record.parents.length > 0 ? ` extends ${record.parents.map(formatTypeExpr).join(", ")}` : "";
    return withDocs(record.docs, `export interface ${record.name}${clause} ${body}`);
  }

  const parts = record.parents.map(formatTypeExpr);
  if (record.fields.length > 0) parts.push(body);
  return withDocs(record.docs, `export type ${record.name} = ${parts.join(" & ")};`);
}

function emitFields(fields: readonly FieldDefinition[], indentStr: string): string {
  if (fields.length === 0) return "{}";
  const lines = fields.map(field =>
    withDocs(field.docs, `${memberName(field.name)}${field.optional ? "?" : ""}: ${formatTypeExpr(field.type)};`),
  );
  return `{\n${indent(lines.join("\n"), indentStr)}\n}`;
}

function emitAlias(alias: AliasDefinition): string {
  return withDocs(alias.docs, `export type ${alias.name} = ${formatTypeExpr(alias.type)};`);
}

function emitEnum(definition: EnumDefinition, indentStr: string): string {
  if (definition.entries.length === 0) {
    return withDocs(definition.docs, `export enum ${definition.name} {}`);
  }
  const lines = definition.entries.map(entry => {
    const value = typeof entry.value === "string" ? quote(entry.value) : String(entry.value);
    return withDocs(entry.docs, `${memberName(entry.name)} = ${value},`);
  });
  return withDocs(definition.docs, `export enum ${definition.name} {\n${indent(lines.join("\n"), indentStr)}\n}`);
}
