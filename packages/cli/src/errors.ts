/**
 * CLI Package - Errors
 */

/** Error codes */
export const LoaderErrorCode = {
  READ_FAILED: "LOADER_READ_FAILED",
  INVALID_JSON: "LOADER_INVALID_JSON",
  INVALID_METAMODEL: "LOADER_INVALID_METAMODEL",
} as const;

export type LoaderErrorCodeType = (typeof LoaderErrorCode)[keyof typeof LoaderErrorCode];

/**
 * The metamodel document could not be read or does not have the expected
 * shape.
 */
export class LoaderError extends Error {
  constructor(
    message: string,
    public readonly code: LoaderErrorCodeType,
    public readonly file?: string,
  ) {
    super(message);
    this.name = "LoaderError";
  }
}

/** Error codes */
export const ConfigErrorCode = {
  READ_FAILED: "CONFIG_READ_FAILED",
  INVALID_JSON: "CONFIG_INVALID_JSON",
  INVALID_CONFIG: "CONFIG_INVALID",
  MISSING_METAMODEL: "CONFIG_MISSING_METAMODEL",
} as const;

export type ConfigErrorCodeType = (typeof ConfigErrorCode)[keyof typeof ConfigErrorCode];

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly code: ConfigErrorCodeType,
    public readonly file?: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}
