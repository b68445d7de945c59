/**
 * Logger utility for CLI output
 *
 * Respects --verbose, --quiet, --no-color, --json flags
 */
import chalk, { Chalk, type ChalkInstance } from "chalk";
import type { EvalLogger } from "@tracegrade/core";

/**
 * Log levels in order of verbosity
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Logger configuration options
 */
export interface LoggerOptions {
  /** Enable verbose output (shows debug level) */
  verbose?: boolean;
  /** Minimize output (only show errors) */
  quiet?: boolean;
  /** Disable color output */
  noColor?: boolean;
  /** Emit one JSON object per log line */
  json?: boolean;
}

/**
 * JSON log entry structure
 */
export interface JsonLogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  /** info level with a green check mark */
  success(message: string, data?: Record<string, unknown>): void;
  configure(options: LoggerOptions): void;
  getOptions(): Readonly<LoggerOptions>;
}

const plain = new Chalk({ level: 0 });

let globalOptions: LoggerOptions = {
  verbose: false,
  quiet: false,
  noColor: false,
  json: false,
};

/**
 * chalk instance respecting --no-color
 */
export function palette(): ChalkInstance {
  return globalOptions.noColor ? plain : chalk;
}

function shouldOutput(level: LogLevel): boolean {
  if (globalOptions.quiet) {
    return level === "error";
  }
  return level !== "debug" || globalOptions.verbose === true;
}

function formatTextMessage(level: LogLevel, message: string, prefix?: string): string {
  const c = palette();

  switch (level) {
    case "debug":
      return c.gray(`[debug] ${message}`);
    case "info":
      return prefix ? `${prefix} ${message}` : message;
    case "warn":
      return c.yellow(`${c.bold("warning:")} ${message}`);
    case "error":
      return c.red(`${c.bold("error:")} ${message}`);
  }
}

function outputLog(
  level: LogLevel,
  message: string,
  data?: Record<string, unknown>,
  prefix?: string
): void {
  if (!shouldOutput(level)) {
    return;
  }

  // stdout is reserved for reports
  if (globalOptions.json) {
    const entry: JsonLogEntry = { level, message, timestamp: new Date().toISOString() };
    if (data) {
      entry.data = data;
    }
    process.stderr.write(`${JSON.stringify(entry)}\n`);
    return;
  }

  process.stderr.write(`${formatTextMessage(level, message, prefix)}\n`);

  if (data && globalOptions.verbose) {
    process.stderr.write(`${palette().gray(JSON.stringify(data, null, 2))}\n`);
  }
}

function createLoggerInstance(): Logger {
  return {
    debug(message, data): void {
      outputLog("debug", message, data);
    },

    info(message, data): void {
      outputLog("info", message, data);
    },

    warn(message, data): void {
      outputLog("warn", message, data);
    },

    error(message, data): void {
      outputLog("error", message, data);
    },

    success(message, data): void {
      outputLog("info", message, data, palette().green("✓"));
    },

    configure(options): void {
      globalOptions = { ...globalOptions, ...options };
    },

    getOptions(): Readonly<LoggerOptions> {
      return { ...globalOptions };
    },
  };
}

export const logger = createLoggerInstance();

export const debug = logger.debug.bind(logger);
export const info = logger.info.bind(logger);
export const warn = logger.warn.bind(logger);
export const error = logger.error.bind(logger);
export const success = logger.success.bind(logger);

export function configureLogger(options: LoggerOptions): void {
  logger.configure(options);
}

export function getLoggerOptions(): Readonly<LoggerOptions> {
  return logger.getOptions();
}

/**
 * Adapt the CLI logger to the engine's console-shaped logger
 */
export function toEvalLogger(): EvalLogger {
  const join = (data: unknown[]): string => data.map(String).join(" ");
  return {
    debug: (...data: unknown[]) => logger.debug(join(data)),
    info: (...data: unknown[]) => logger.info(join(data)),
    warn: (...data: unknown[]) => logger.warn(join(data)),
    error: (...data: unknown[]) => logger.error(join(data)),
  };
}
