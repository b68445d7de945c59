/**
 * Shared command setup: global options, logger and configuration
 */
import type { Command } from "commander";
import { configureLogger, error as logError, info } from "../utils/logger.js";
import { loadConfig, type TracegradeConfig } from "../utils/config.js";
import { toCliError } from "../errors.js";
import type { ModuleImporter } from "../services/executor-loader.js";
import { OUTPUT_FORMATS, type OutputFormat } from "../formatter.js";

/**
 * Global CLI options
 */
export interface GlobalOptions {
  /** Enable verbose output */
  verbose?: boolean;
  /** Minimize output */
  quiet?: boolean;
  /** Configuration file path */
  config?: string;
  /** Disable color output */
  color?: boolean;
  /** Output in JSON format */
  json?: boolean;
}

/**
 * Seams the commands read from instead of process globals
 */
export interface ProgramDependencies {
  cwd?: string;
  homeDir?: string;
  env?: { NO_COLOR?: string };
  importModule?: ModuleImporter;
}

/**
 * Context passed to command handlers
 */
export interface CommandContext {
  globalOptions: GlobalOptions;
  config: TracegradeConfig;
  cwd: string;
  /** Color after --no-color, NO_COLOR and the config file */
  color: boolean;
}

/**
 * Setup global options before command execution
 */
export async function setupGlobalOptions(
  command: Command,
  deps: ProgramDependencies = {}
): Promise<CommandContext> {
  const opts = command.optsWithGlobals<GlobalOptions>();
  const cwd = deps.cwd ?? process.cwd();

  configureLogger({
    verbose: opts.verbose,
    quiet: opts.quiet,
    noColor: opts.color === false,
    json: opts.json,
  });

  const config = await loadConfig({
    configPath: opts.config,
    cwd,
    homeDir: deps.homeDir,
    env: deps.env,
  });

  const color = opts.color !== false && config.color !== false;
  if (!color) {
    configureLogger({ noColor: true });
  }

  return { globalOptions: opts, config, cwd, color };
}

/**
 * --json wins over --format
 */
export function resolveFormat(value: unknown, globalOptions: GlobalOptions): OutputFormat {
  if (globalOptions.json === true) {
    return "json";
  }
  return OUTPUT_FORMATS.find((format) => format === value) ?? "text";
}

/**
 * Log a failure with its suggestion and set the matching exit code
 */
export function reportError(err: unknown): void {
  const cliError = toCliError(err);
  logError(cliError.message, { code: cliError.code });
  if (cliError.suggestion) {
    info(cliError.suggestion);
  }
  process.exitCode = cliError.exitCode;
}
