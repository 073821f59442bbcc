/**
 * Emit Package - Formatting Utilities
 *
 * Indentation, escaping and doc comments for TypeScript source generation.
 */

import { formatPropertyName, isValidIdentifier, type Documentation } from "@rpcforge/compiler";

/* =============================================================================
 * INDENTATION
 * ============================================================================= */

/**
 * Indent all lines of a string.
 */
export function indent(text: string, indentStr: string = "  ", levels: number = 1): string {
  const prefix = indentStr.repeat(levels);
  return text
    .split("\n")
    .map(line => line.length > 0 ? prefix + line : line)
    .join("\n");
}

/* =============================================================================
 * STRING ESCAPING
 * ============================================================================= */

/**
 * Escape a string for use in a double-quoted string literal. Control
 * characters other than the common escapes become `\uXXXX`.
 */
export function escapeString(str: string): string {
  return str
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r")
    .replace(/\t/g, "\\t")
    .replace(/\0/g, "\\0")
    .replace(/[\u0001-\u0008\u000b\u000c\u000e-\u001f\u007f\u2028\u2029]/g, ch =>
      `\\u${ch.charCodeAt(0).toString(16).padStart(4, "0")}`);
}

/** `"text"` with escapes applied. */
export function quote(str: string): string {
  return `"${escapeString(str)}"`;
}

/* =============================================================================
 * MEMBER NAMES
 * ============================================================================= */

/** Member access text: `.name`, or `["some-name"]` when not an identifier. */
export function memberAccess(name: string): string {
  return isValidIdentifier(name) ? `.${name}` : `[${quote(name)}]`;
}

/** Declared member name, quoted when not an identifier. */
export function memberName(name: string): string {
  return formatPropertyName(name);
}

/* =============================================================================
 * DOC COMMENTS
 * ============================================================================= */

/**
 * Render documentation as a doc comment, or `""` when there is nothing to
 * say. Text comes first, then `@since`, `@proposed` and `@deprecated`.
 */
export function docComment(docs: Documentation): string {
  const lines: string[] = docs.text ? docs.text.split(/\r?\n/) : [];
  const tags: string[] = [];
  if (docs.since) tags.push(`@since ${docs.since}`);
  if (docs.proposed) tags.push("@proposed");
  if (docs.deprecated !== undefined) tags.push(docs.deprecated ? `@deprecated ${docs.deprecated}` : "@deprecated");

  if (lines.length > 0 && tags.length > 0) lines.push("");
  lines.push(...tags);
  if (lines.length === 0) return "";

  const safe = lines.map(line => line.replace(/\*\//g, "*\\/").trimEnd());
  if (safe.length === 1) return `/** ${safe[0]} */`;
  return ["/**", ...safe.map(line => (line ? ` * ${line}` : " *")), " */"].join("\n");
}

/** Doc comment followed by a newline, or nothing. */
export function withDocs(docs: Documentation, text: string): string {
  const comment = docComment(docs);
  return comment ? `${comment}\n${text}` : text;
}

/* =============================================================================
 * VALUE FORMATTING
 * ============================================================================= */

/**
 * Format a string-to-string table as an object literal, one entry per line.
 */
export function formatTable(
  entries: readonly (readonly [string, string])[],
  indentStr: string = "  ",
  currentIndent: string = "",
): string {
  if (entries.length === 0) return "{}";

  const nextIndent = currentIndent + indentStr;
  const lines = entries.map(([key, value]) => `${nextIndent}${formatKey(key)}: ${quote(value)}`);
  return `{\n${lines.join(",\n")},\n${currentIndent}}`;
}

function formatKey(key: string): string {
  return isValidIdentifier(key) ? key : quote(key);
}
