/**
 * tracegrade validate command
 *
 * Checks a suite file without running anything:
 * - YAML/JSON parsing
 * - Required fields and field types
 * - Unique scenario names
 */
import { Command, Option } from "commander";
import { loadSuiteFile } from "../services/suite-loader.js";
import { formatValidation, isValidationPassed, OUTPUT_FORMATS } from "../formatter.js";
import { EXIT_CODES } from "../errors.js";
import {
  reportError,
  resolveFormat,
  setupGlobalOptions,
  type ProgramDependencies,
} from "./context.js";

/**
 * Create the validate command
 */
export function createValidateCommand(deps: ProgramDependencies = {}): Command {
  return new Command("validate")
    .description("Validate an evaluation suite file")
    .addHelpText(
      "after",
      `
Examples:
  $ tracegrade validate suite.yaml                 Validate a suite
  $ tracegrade validate suite.yaml --strict        Treat warnings as errors
  $ tracegrade validate suite.yaml --format json   Output as JSON`
    )
    .argument("<suite>", "Suite file (.yaml, .yml or .json)")
    .addOption(new Option("--strict", "Treat warnings as errors").default(false))
    .addOption(
      new Option("--format <format>", "Output format").choices(OUTPUT_FORMATS).default("text")
    )
    .action(async (suitePath: string, options: Record<string, unknown>, command: Command) => {
      try {
        const context = await setupGlobalOptions(command, deps);
        const format = resolveFormat(options["format"], context.globalOptions);

        const loaded = await loadSuiteFile(suitePath, { cwd: context.cwd });
        const report = { ...loaded, strict: options["strict"] === true };

        console.log(formatValidation(report, suitePath, { format, color: context.color }));

        if (!isValidationPassed(report)) {
          process.exitCode = EXIT_CODES.VALIDATION_ERROR;
        }
      } catch (err) {
        reportError(err);
      }
    });
}

export default createValidateCommand;
