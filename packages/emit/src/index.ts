/**
 * @rpcforge/emit
 *
 * Render a generation result as TypeScript source files: the types module
 * and one dispatcher module per role.
 *
 * @example
 * ```typescript
 * import { generate } from "@rpcforge/compiler";
 * import { emitArtifacts } from "@rpcforge/emit";
 *
 * for (const file of emitArtifacts(generate(metamodel))) {
 *   writeFileSync(join(outDir, file.path), file.content);
 * }
 * ```
 */

import { debug, type GenerationResult } from "@rpcforge/compiler";
import { emitDispatcherModule } from "./dispatcher.js";
import { emitTypesModule } from "./definitions.js";
import { EmitError, EmitErrorCode } from "./errors.js";
import { normalizeEmitOptions, type EmitOptions } from "./options.js";
import { checkSyntax, formatSyntaxDiagnostic } from "./syntax.js";

export interface EmittedFile {
  kind: "types" | "initiator" | "responder";
  /** Relative to the output directory */
  path: string;
  content: string;
}

/**
 * Emit the three modules of a generation result.
 *
 * @throws EmitError `EMIT_SYNTAX_ERROR` when `check` is on and a module does
 * not parse.
 */
export function emitArtifacts(result: GenerationResult, options?: EmitOptions): EmittedFile[] {
  const resolved = normalizeEmitOptions(options);
  const shared = {
    version: result.version,
    indent: resolved.indent,
    typesModule: resolved.typesModule,
    runtimeModule: resolved.runtimeModule,
  };

  const files: EmittedFile[] = [
    { kind: "types", path: resolved.files.types, content: emitTypesModule(result.types, shared) },
    { kind: "initiator", path: resolved.files.initiator, content: emitDispatcherModule(result.initiator, shared) },
    { kind: "responder", path: resolved.files.responder, content: emitDispatcherModule(result.responder, shared) },
  ];

  if (resolved.check) {
    for (const file of files) {
      const [first, ...rest] = checkSyntax(file.content, file.path);
      if (!first) continue;
      throw new EmitError(
        `Generated ${file.path} does not parse: ${formatSyntaxDiagnostic(first)}` +
          (rest.length > 0 ? ` (and ${rest.length} more)` : ""),
        EmitErrorCode.SYNTAX_ERROR,
        file.path,
        first.line,
        first.column,
      );
    }
  }

  debug.emit("artifacts", { files: files.map(file => file.path), checked: resolved.check });
  return files;
}

export { emitTypesModule, emitDefinition, generatedHeader } from "./definitions.js";
export type { TypesModuleOptions } from "./definitions.js";
export { emitDispatcherModule, RESERVED_MEMBER_NAMES } from "./dispatcher.js";
export type { DispatcherModuleOptions } from "./dispatcher.js";
export { checkSyntax, formatSyntaxDiagnostic } from "./syntax.js";
export type { SyntaxDiagnostic } from "./syntax.js";
export { EmitError, EmitErrorCode } from "./errors.js";
export type { EmitErrorCodeType } from "./errors.js";
export { DEFAULT_EMIT_OPTIONS, normalizeEmitOptions } from "./options.js";
export type { EmitFileNames, EmitOptions, ResolvedEmitOptions } from "./options.js";
export { indent, escapeString, quote, docComment, formatTable } from "./format.js";
