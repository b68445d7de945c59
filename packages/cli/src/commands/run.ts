/**
 * tracegrade run command
 *
 * Runs every scenario of a suite against one executor module and prints the report.
 */
import { Command, Option } from "commander";
import ora from "ora";
import { EvalRunner } from "@tracegrade/core";
import { loadExecutor } from "../services/executor-loader.js";
import { buildEvaluationSetup } from "../services/evaluation-setup.js";
import { formatSuiteResult, OUTPUT_FORMATS } from "../formatter.js";
import { evaluationFailedError } from "../errors.js";
import { debug, toEvalLogger } from "../utils/logger.js";
import {
  reportError,
  resolveFormat,
  setupGlobalOptions,
  type ProgramDependencies,
} from "./context.js";
import { concurrencyOption, graderOption, loadValidSuite, toGraderName } from "./shared.js";

/**
 * Run command options
 */
export interface RunOptions {
  executor: string;
  format?: string;
  concurrency?: number;
  grader?: string;
}

/**
 * Create the run command
 */
export function createRunCommand(deps: ProgramDependencies = {}): Command {
  return new Command("run")
    .description("Evaluate one executor against a suite")
    .addHelpText(
      "after",
      `
Examples:
  $ tracegrade run suite.yaml -e ./dist/executor.js
  $ tracegrade run suite.yaml -e ./dist/executor.js --concurrency 4
  $ tracegrade run suite.yaml -e ./dist/executor.js --grader threshold --format json`
    )
    .argument("<suite>", "Suite file (.yaml, .yml or .json)")
    .addOption(
      new Option("-e, --executor <module>", "Module exporting the executor").makeOptionMandatory()
    )
    .addOption(
      new Option("--format <format>", "Output format").choices(OUTPUT_FORMATS).default("text")
    )
    .addOption(concurrencyOption())
    .addOption(graderOption())
    .action(async (suitePath: string, options: RunOptions, command: Command) => {
      const spinner = ora();

      try {
        const context = await setupGlobalOptions(command, deps);
        const format = resolveFormat(options.format, context.globalOptions);

        const suite = await loadValidSuite(suitePath, context.cwd);
        const executor = await loadExecutor(options.executor, {
          cwd: context.cwd,
          importModule: deps.importModule,
        });
        const setup = buildEvaluationSetup(context.config, {
          grader: toGraderName(options.grader),
          concurrency: options.concurrency,
        });
        debug(`Metrics: ${setup.metrics.map((metric) => metric.name).join(", ")}`);

        const runner = new EvalRunner({
          executor,
          metrics: setup.metrics,
          scorer: setup.scorer,
          maxConcurrency: setup.maxConcurrency,
          logger: toEvalLogger(),
        });

        if (format === "text" && context.globalOptions.quiet !== true) {
          spinner.start(`Running ${suite.scenarios.length} scenario(s) from "${suite.name}"...`);
        }
        const result = await runner.runSuite(suite);
        spinner.stop();

        console.log(formatSuiteResult(result, { format, color: context.color }));

        if (result.passRate < setup.minPassRate) {
          throw evaluationFailedError(
            `Pass rate ${(result.passRate * 100).toFixed(1)}% is below the required ${(setup.minPassRate * 100).toFixed(1)}%`
          );
        }
      } catch (err) {
        if (spinner.isSpinning) {
          spinner.fail("Evaluation failed");
        }
        reportError(err);
      }
    });
}

export default createRunCommand;
