/**
 * Emit Package - Options
 */

export interface EmitFileNames {
  types: string;
  initiator: string;
  responder: string;
}

export interface EmitOptions {
  /** Indentation string (default: two spaces) */
  indent?: string;
  /** Specifier dispatchers import type names from (default: "./types.js") */
  typesModule?: string;
  /** Specifier dispatchers import the runtime from (default: "@rpcforge/runtime") */
  runtimeModule?: string;
  /** Output file names, relative to the output directory */
  files?: Partial<EmitFileNames>;
  /** Parse every emitted file and fail on syntax errors (default: true) */
  check?: boolean;
}

export interface ResolvedEmitOptions {
  indent: string;
  typesModule: string;
  runtimeModule: string;
  files: EmitFileNames;
  check: boolean;
}

export const DEFAULT_EMIT_OPTIONS: ResolvedEmitOptions = {
  indent: "  ",
  typesModule: "./types.js",
  runtimeModule: "@rpcforge/runtime",
  files: {
    types: "types.ts",
    initiator: "initiator.ts",
    responder: "responder.ts",
  },
  check: true,
};

export function normalizeEmitOptions(options: EmitOptions | undefined): ResolvedEmitOptions {
  if (!options) return DEFAULT_EMIT_OPTIONS;
  return {
    indent: options.indent ?? DEFAULT_EMIT_OPTIONS.indent,
    typesModule: options.typesModule ?? DEFAULT_EMIT_OPTIONS.typesModule,
    runtimeModule: options.runtimeModule ?? DEFAULT_EMIT_OPTIONS.runtimeModule,
    files: { ...DEFAULT_EMIT_OPTIONS.files, ...options.files },
    check: options.check ?? DEFAULT_EMIT_OPTIONS.check,
  };
}
