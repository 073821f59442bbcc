/**
 * CLI Package - Configuration
 *
 * This file contains:
 * 1. Default values
 * 2. Normalization (relative paths → absolute, defaults filled in)
 * 3. Config file loading (`rpcforge.config.json`, searched upward)
 * 4. Merging file config with command line options
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, join, resolve as resolvePath } from "node:path";
import { z } from "zod";
import { debug, INLINE_RECORD_MODES, type GenerateOptions } from "@rpcforge/compiler";
import { DEFAULT_EMIT_OPTIONS, type EmitFileNames } from "@rpcforge/emit";
import { ConfigError, ConfigErrorCode } from "./errors.js";
import { formatIssues } from "./loader.js";

// ============================================================================
// Types
// ============================================================================

/** Shape of `rpcforge.config.json`. Paths are relative to the file. */
export interface RpcforgeConfig {
  /** Metamodel JSON file */
  metamodel?: string;
  /** Directory the generated modules are written to */
  outDir?: string;
  files?: Partial<EmitFileNames>;
  /** Specifier generated dispatchers import the runtime from */
  runtimeModule?: string;
  /** Specifier generated dispatchers import the types module from */
  typesModule?: string;
  /** Parse generated modules before writing them */
  check?: boolean;
  compiler?: GenerateOptions;
}

export interface ResolvedConfig {
  /** Absolute path, or null when neither the file nor the command line names one */
  metamodel: string | null;
  /** Absolute path */
  outDir: string;
  files: EmitFileNames;
  runtimeModule: string;
  typesModule: string;
  check: boolean;
  compiler: GenerateOptions;
}

export interface LoadedConfig {
  path: string;
  /** Paths already resolved against the file's directory */
  config: RpcforgeConfig;
}

// ============================================================================
// Default Values
// ============================================================================

export const CONFIG_FILE_NAME = "rpcforge.config.json";

export const DEFAULT_CONFIG: Omit<ResolvedConfig, "metamodel"> = {
  outDir: "generated",
  files: DEFAULT_EMIT_OPTIONS.files,
  runtimeModule: DEFAULT_EMIT_OPTIONS.runtimeModule,
  typesModule: DEFAULT_EMIT_OPTIONS.typesModule,
  check: DEFAULT_EMIT_OPTIONS.check,
  compiler: {},
};

const ConfigSchema = z
  .object({
    metamodel: z.string().optional(),
    outDir: z.string().optional(),
    files: z
      .object({
        types: z.string().optional(),
        initiator: z.string().optional(),
        responder: z.string().optional(),
      })
      .strict()
      .optional(),
    runtimeModule: z.string().optional(),
    typesModule: z.string().optional(),
    check: z.boolean().optional(),
    compiler: z
      .object({
        inlineRecords: z.enum(INLINE_RECORD_MODES).optional(),
        forwardReferences: z.array(z.string()).optional(),
        baseAliases: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

// ============================================================================
// Normalization
// ============================================================================

/**
 * Fill in defaults and resolve paths against `root`.
 */
export function normalizeConfig(config: RpcforgeConfig, root: string): ResolvedConfig {
  return {
    metamodel: config.metamodel ? resolvePath(root, config.metamodel) : null,
    outDir: resolvePath(root, config.outDir ?? DEFAULT_CONFIG.outDir),
    files: { ...DEFAULT_CONFIG.files, ...config.files },
    runtimeModule: config.runtimeModule ?? DEFAULT_CONFIG.runtimeModule,
    typesModule: config.typesModule ?? DEFAULT_CONFIG.typesModule,
    check: config.check ?? DEFAULT_CONFIG.check,
    compiler: { ...DEFAULT_CONFIG.compiler, ...config.compiler },
  };
}

/** Make the path options of a config absolute. */
export function resolveConfigPaths(config: RpcforgeConfig, baseDir: string): RpcforgeConfig {
  return {
    ...config,
    ...(config.metamodel !== undefined ? { metamodel: resolvePath(baseDir, config.metamodel) } : {}),
    ...(config.outDir !== undefined ? { outDir: resolvePath(baseDir, config.outDir) } : {}),
  };
}

/**
 * Merge configs with proper precedence: `override` (command line) wins over
 * `base` (config file); `files` and `compiler` merge key by key.
 */
export function mergeConfigs(base: RpcforgeConfig | null, override: RpcforgeConfig): RpcforgeConfig {
  if (!base) {
    return override;
  }
  return {
    ...base,
    ...override,
    files: { ...base.files, ...override.files },
    compiler: { ...base.compiler, ...override.compiler },
  };
}

// ============================================================================
// Config File Loading
// ============================================================================

/**
 * Find `rpcforge.config.json`, walking up from `startDir` until `stopDir`
 * (or the filesystem root).
 */
export function findConfigFile(startDir: string, stopDir?: string): string | null {
  let current = resolvePath(startDir);
  const stop = stopDir === undefined ? null : resolvePath(stopDir);

  while (true) {
    const candidate = join(current, CONFIG_FILE_NAME);
    if (existsSync(candidate)) {
      return candidate;
    }

    if (current === stop) {
      break;
    }
    const parent = dirname(current);
    if (parent === current) {
      break;
    }
    current = parent;
  }

  return null;
}

/**
 * Search for a config file from `searchFrom` upward and load it.
 *
 * @returns The loaded config, or null if no config file was found
 */
export function loadConfigFile(searchFrom: string, stopDir?: string): LoadedConfig | null {
  const path = findConfigFile(searchFrom, stopDir);
  if (!path) {
    debug.cli("config.none", { searchFrom });
    return null;
  }
  return readConfigFile(path);
}

/** Load a config file at a known path. */
export function readConfigFile(path: string): LoadedConfig {
  const absolute = resolvePath(path);

  let text: string;
  try {
    text = readFileSync(absolute, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Cannot read config ${absolute}: ${error instanceof Error ? error.message : String(error)}`,
      ConfigErrorCode.READ_FAILED,
      absolute,
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(
      `Config ${absolute} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      ConfigErrorCode.INVALID_JSON,
      absolute,
    );
  }

  const parsed = ConfigSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid config ${absolute}:\n${formatIssues(parsed.error)}`,
      ConfigErrorCode.INVALID_CONFIG,
      absolute,
    );
  }

  debug.cli("config.loaded", { path: absolute });
  return { path: absolute, config: resolveConfigPaths(parsed.data, dirname(absolute)) };
}
