/**
 * CLI Package - Command Line
 *
 * `rpcforge generate [metamodel]`: command line flags win over
 * `rpcforge.config.json`, which wins over the defaults.
 */

import { Command, CommanderError } from "commander";
import { resolve as resolvePath } from "node:path";
import { z } from "zod";
import { configureDebug, debug, INLINE_RECORD_MODES, refreshDebugChannels } from "@rpcforge/compiler";
import {
  loadConfigFile,
  mergeConfigs,
  normalizeConfig,
  readConfigFile,
  resolveConfigPaths,
  type RpcforgeConfig,
} from "./config.js";
import { runGenerate } from "./generate.js";
import { formatIssues } from "./loader.js";

export const VERSION = "0.1.0";

export interface ProgramIO {
  /** Normal output (default: console.log) */
  log?: (message: string) => void;
  /** Error output (default: console.error) */
  error?: (message: string) => void;
  /** Directory relative paths and the config search start from (default: process.cwd()) */
  cwd?: string;
}

const GenerateCommandOptionsSchema = z.object({
  outDir: z.string().optional(),
  config: z.string().optional(),
  inlineRecords: z.enum(INLINE_RECORD_MODES).optional(),
  runtimeModule: z.string().optional(),
  check: z.boolean(),
  debug: z.string().optional(),
  debugFormat: z.enum(["pretty", "json"]).optional(),
});

export type GenerateCommandOptions = z.infer<typeof GenerateCommandOptionsSchema>;

/**
 * Build the command tree. Commander errors (unknown options, `--help`,
 * `--version`) are thrown as `CommanderError` instead of exiting.
 */
export function createProgram(io: ProgramIO = {}): Command {
  const log = io.log ?? console.log;
  const error = io.error ?? console.error;
  const cwd = io.cwd ?? process.cwd();

  const program = new Command();
  program
    .name("rpcforge")
    .description("Generate protocol types and Initiator/Responder dispatchers from an RPC metamodel")
    .version(VERSION)
    .configureOutput({
      writeOut: text => log(text.trimEnd()),
      writeErr: text => error(text.trimEnd()),
    })
    .exitOverride();

  program
    .command("generate")
    .description("Write the types, initiator and responder modules")
    .argument("[metamodel]", "metamodel JSON file (default: from rpcforge.config.json)")
    .option("-o, --out-dir <dir>", "output directory")
    .option("-c, --config <path>", "config file (default: search for rpcforge.config.json)")
    .option("--inline-records <mode>", `inline record rendering: ${INLINE_RECORD_MODES.join("|")}`)
    .option("--runtime-module <specifier>", "module the dispatchers import the runtime from")
    .option("--no-check", "skip parsing the generated modules")
    .option("--debug <channels>", "print debug channels to stderr (comma separated, * for all)")
    .option("--debug-format <format>", "debug output format: pretty|json")
    .action((metamodel: string | undefined, rawOptions: unknown) => {
      const parsed = GenerateCommandOptionsSchema.safeParse(rawOptions);
      if (!parsed.success) {
        throw new Error(`Invalid options:\n${formatIssues(parsed.error)}`);
      }
      const options = parsed.data;
      if (options.debug !== undefined) {
        configureDebug({ output: error, ...(options.debugFormat ? { format: options.debugFormat } : {}) });
        refreshDebugChannels(options.debug);
      }

      const loaded = options.config ? readConfigFile(resolvePath(cwd, options.config)) : loadConfigFile(cwd);
      debug.cli("generate", { metamodel: metamodel ?? null, config: loaded?.path ?? null });

      const merged = mergeConfigs(loaded?.config ?? null, resolveConfigPaths(commandLineConfig(metamodel, options), cwd));
      runGenerate(normalizeConfig(merged, cwd), { log });
    });

  return program;
}

/** Only the flags actually given, so unset flags do not mask the config file. */
function commandLineConfig(metamodel: string | undefined, options: GenerateCommandOptions): RpcforgeConfig {
  return {
    ...(metamodel !== undefined ? { metamodel } : {}),
    ...(options.outDir !== undefined ? { outDir: options.outDir } : {}),
    ...(options.runtimeModule !== undefined ? { runtimeModule: options.runtimeModule } : {}),
    ...(options.check ? {} : { check: false }),
    ...(options.inlineRecords !== undefined ? { compiler: { inlineRecords: options.inlineRecords } } : {}),
  };
}

/**
 * Run the command line.
 *
 * @returns The exit code: 0 on success, non-zero on failure
 */
export async function main(argv: readonly string[] = process.argv, io: ProgramIO = {}): Promise<number> {
  const error = io.error ?? console.error;
  const program = createProgram(io);

  try {
    await program.parseAsync([...argv]);
    return 0;
  } catch (caught: unknown) {
    if (caught instanceof CommanderError) {
      // Commander has already printed help, the version or its own message.
      return caught.exitCode;
    }
    error(`Error: ${caught instanceof Error ? caught.message : String(caught)}`);
    return 1;
  }
}
