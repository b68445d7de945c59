/**
 * Main CLI setup using Commander.js
 *
 * Creates the main program with global options and registers all command modules
 */
import { Command, Option } from "commander";
import { createValidateCommand } from "./commands/validate.js";
import { createRunCommand } from "./commands/run.js";
import { createCompareCommand } from "./commands/compare.js";
import { reportError, type ProgramDependencies } from "./commands/context.js";

/**
 * CLI version - should match package.json
 */
export const CLI_VERSION = "0.1.0";

/**
 * CLI name
 */
export const CLI_NAME = "tracegrade";

/**
 * Create the main CLI program
 */
export function createProgram(deps: ProgramDependencies = {}): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description("Evaluate and compare multi-agent pipelines")
    .version(CLI_VERSION, "-V, --version", "Output the version number")
    .helpOption("-h, --help", "Display help for command")
    .addHelpText(
      "after",
      `
Examples:
  $ tracegrade validate suite.yaml                            Check a suite file
  $ tracegrade run suite.yaml -e ./dist/executor.js           Evaluate one executor
  $ tracegrade compare suite.yaml -e a=./a.js -e b=./b.js     Pick the better executor`
    );

  // Global options
  program
    .addOption(new Option("-v, --verbose", "Enable verbose output").default(false))
    .addOption(new Option("-q, --quiet", "Minimize output (only errors)").default(false))
    .addOption(new Option("-c, --config <path>", "Configuration file path"))
    .addOption(new Option("--no-color", "Disable color output"))
    .addOption(new Option("--json", "Output in JSON format").default(false));

  program.addCommand(createValidateCommand(deps));
  program.addCommand(createRunCommand(deps));
  program.addCommand(createCompareCommand(deps));

  return program;
}

/**
 * Run the CLI program
 */
export async function run(args?: string[]): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args ?? process.argv);
  } catch (err) {
    reportError(err);
  }
}

export { EXIT_CODES } from "./errors.js";
export { setupGlobalOptions } from "./commands/context.js";
export type { CommandContext, GlobalOptions, ProgramDependencies } from "./commands/context.js";
