/**
 * Identifier helpers shared by the message compiler and the emitter.
 */

/**
 * Derive a lower, underscore-delimited identifier from a type name.
 *
 * An underscore goes in at every boundary between a non-uppercase character
 * and an uppercase one; everything is then lowercased.
 *
 * @example
 * toSnakeCase("TextDocumentHover") → "text_document_hover"
 * toSnakeCase("Hover") → "hover"
 */
export function toSnakeCase(text: string): string {
  return text.replace(/([^A-Z])([A-Z])/g, "$1_$2").toLowerCase();
}

/** `handle_` + the method identifier of a type name. */
export function toHandlerName(typeName: string): string {
  return `handle_${toSnakeCase(typeName)}`;
}

/** Handler name of the stub receiving a request's result on the sending side. */
export function toResultHandlerName(typeName: string): string {
  return `${toHandlerName(typeName)}_result`;
}

/**
 * Check if a string is a valid JavaScript identifier.
 */
export function isValidIdentifier(str: string): boolean {
  return /^[a-zA-Z_$][a-zA-Z0-9_$]*$/.test(str);
}

/** Property or member name as source text, quoted when it is not an identifier. */
export function formatPropertyName(name: string): string {
  return isValidIdentifier(name) ? name : JSON.stringify(name);
}
