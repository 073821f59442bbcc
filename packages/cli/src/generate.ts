/**
 * CLI Package - Generate
 *
 * Load → generate → emit → write. The only part of the tool that touches
 * the file system for output.
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { debug, generate } from "@rpcforge/compiler";
import { emitArtifacts } from "@rpcforge/emit";
import type { ResolvedConfig } from "./config.js";
import { ConfigError, ConfigErrorCode } from "./errors.js";
import { loadMetamodelFile } from "./loader.js";

export interface RunGenerateOptions {
  /** Progress and warning lines (default: console.log) */
  log?: (message: string) => void;
}

/**
 * Generate and write the types, Initiator and Responder modules.
 *
 * @returns Absolute paths of the written files, in write order
 */
export function runGenerate(config: ResolvedConfig, options: RunGenerateOptions = {}): string[] {
  const log = options.log ?? console.log;
  if (!config.metamodel) {
    throw new ConfigError(
      `No metamodel given: pass a path or set "metamodel" in rpcforge.config.json`,
      ConfigErrorCode.MISSING_METAMODEL,
    );
  }

  const model = loadMetamodelFile(config.metamodel);
  const result = generate(model, config.compiler);
  for (const deviation of result.deviations) {
    const reason = deviation.cycle.length > 0 ? `cycle: ${deviation.cycle.join(" -> ")}` : "declared forward";
    log(`warning: ${deviation.from} references ${deviation.to} before it is defined (${reason})`);
  }

  const files = emitArtifacts(result, {
    files: config.files,
    runtimeModule: config.runtimeModule,
    typesModule: config.typesModule,
    check: config.check,
  });

  const written: string[] = [];
  for (const file of files) {
    const path = join(config.outDir, file.path);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, file.content, "utf-8");
    written.push(path);
    log(`wrote ${path}`);
  }

  debug.cli("generated", { version: result.version, files: written, deviations: result.deviations.length });
  return written;
}
