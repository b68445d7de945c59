/**
 * TraceGrade CLI
 */
export { CLI_NAME, CLI_VERSION, createProgram, run } from "./cli.js";
export * from "./errors.js";
export {
  reportError,
  resolveFormat,
  setupGlobalOptions,
} from "./commands/context.js";
export type { CommandContext, GlobalOptions, ProgramDependencies } from "./commands/context.js";
export { createValidateCommand } from "./commands/validate.js";
export { createRunCommand } from "./commands/run.js";
export type { RunOptions } from "./commands/run.js";
export { createCompareCommand, parseExecutorSpecs } from "./commands/compare.js";
export type { CompareOptions, ExecutorSpec } from "./commands/compare.js";
export * from "./formatter.js";
export * from "./services/suite-loader.js";
export * from "./services/executor-loader.js";
export * from "./services/evaluation-setup.js";
export * from "./utils/config.js";
export {
  configureLogger,
  getLoggerOptions,
  logger,
  palette,
  toEvalLogger,
} from "./utils/logger.js";
export type { JsonLogEntry, LogLevel, Logger, LoggerOptions } from "./utils/logger.js";
