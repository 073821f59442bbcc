/**
 * @rpcforge/cli
 *
 * Metamodel loading, `rpcforge.config.json` handling and the `generate`
 * command.
 *
 * @example
 * ```typescript
 * import { loadConfigFile, normalizeConfig, runGenerate } from "@rpcforge/cli";
 *
 * const loaded = loadConfigFile(process.cwd());
 * runGenerate(normalizeConfig(loaded?.config ?? { metamodel: "metaModel.json" }, process.cwd()));
 * ```
 */

export { createProgram, main, VERSION } from "./cli.js";
export type { GenerateCommandOptions, ProgramIO } from "./cli.js";
export {
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  findConfigFile,
  loadConfigFile,
  mergeConfigs,
  normalizeConfig,
  readConfigFile,
  resolveConfigPaths,
} from "./config.js";
export type { LoadedConfig, ResolvedConfig, RpcforgeConfig } from "./config.js";
export { runGenerate } from "./generate.js";
export type { RunGenerateOptions } from "./generate.js";
export { deriveTypeName, formatIssues, loadMetamodelFile, MetamodelSchema, parseMetamodel, TypeSchema } from "./loader.js";
export { ConfigError, ConfigErrorCode, LoaderError, LoaderErrorCode } from "./errors.js";
export type { ConfigErrorCodeType, LoaderErrorCodeType } from "./errors.js";
