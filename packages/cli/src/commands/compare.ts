/**
 * tracegrade compare command
 *
 * Runs the same suite against several executors and picks a winner.
 */
import { Command, Option } from "commander";
import ora from "ora";
import { ComparisonRunner, type PipelineExecutor } from "@tracegrade/core";
import { loadExecutor } from "../services/executor-loader.js";
import { buildEvaluationSetup } from "../services/evaluation-setup.js";
import { formatComparison, OUTPUT_FORMATS } from "../formatter.js";
import { evaluationFailedError, usageError } from "../errors.js";
import { toEvalLogger } from "../utils/logger.js";
import {
  reportError,
  resolveFormat,
  setupGlobalOptions,
  type ProgramDependencies,
} from "./context.js";
import { concurrencyOption, graderOption, loadValidSuite, toGraderName } from "./shared.js";

/**
 * Compare command options
 */
export interface CompareOptions {
  executor: string[];
  format?: string;
  concurrency?: number;
  grader?: string;
  sequential: boolean;
}

export interface ExecutorSpec {
  id: string;
  modulePath: string;
}

function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

/**
 * Parse repeated `id=module` arguments
 */
export function parseExecutorSpecs(values: readonly string[]): ExecutorSpec[] {
  const specs: ExecutorSpec[] = [];
  const seen = new Set<string>();

  for (const value of values) {
    const separator = value.indexOf("=");
    const id = separator > 0 ? value.slice(0, separator).trim() : "";
    const modulePath = separator > 0 ? value.slice(separator + 1).trim() : "";
    if (id.length === 0 || modulePath.length === 0) {
      throw usageError(
        `Invalid executor "${value}"`,
        "Pass executors as id=module, for example -e baseline=./dist/baseline.js"
      );
    }
    if (seen.has(id)) {
      throw usageError(`Executor id "${id}" is used more than once`);
    }
    seen.add(id);
    specs.push({ id, modulePath });
  }

  return specs;
}

/**
 * Create the compare command
 */
export function createCompareCommand(deps: ProgramDependencies = {}): Command {
  return new Command("compare")
    .description("Compare several executors on the same suite")
    .addHelpText(
      "after",
      `
Examples:
  $ tracegrade compare suite.yaml -e fast=./dist/fast.js -e careful=./dist/careful.js
  $ tracegrade compare suite.yaml -e a=./a.js -e b=./b.js --sequential --format json`
    )
    .argument("<suite>", "Suite file (.yaml, .yml or .json)")
    .addOption(
      new Option("-e, --executor <id=module>", "Executor to compare (repeatable)")
        .argParser(collect)
        .makeOptionMandatory()
    )
    .addOption(
      new Option("--format <format>", "Output format").choices(OUTPUT_FORMATS).default("text")
    )
    .addOption(concurrencyOption())
    .addOption(graderOption())
    .addOption(new Option("--sequential", "Run one executor at a time").default(false))
    .action(async (suitePath: string, options: CompareOptions, command: Command) => {
      const spinner = ora();

      try {
        const context = await setupGlobalOptions(command, deps);
        const format = resolveFormat(options.format, context.globalOptions);

        const suite = await loadValidSuite(suitePath, context.cwd);
        const executors: Record<string, PipelineExecutor> = {};
        for (const spec of parseExecutorSpecs(options.executor)) {
          executors[spec.id] = await loadExecutor(spec.modulePath, {
            cwd: context.cwd,
            importModule: deps.importModule,
          });
        }

        const setup = buildEvaluationSetup(context.config, {
          grader: toGraderName(options.grader),
          concurrency: options.concurrency,
        });
        const runner = new ComparisonRunner({
          metrics: setup.metrics,
          scorer: setup.scorer,
          maxConcurrency: setup.maxConcurrency,
          sequential: options.sequential,
          logger: toEvalLogger(),
        });

        if (format === "text" && context.globalOptions.quiet !== true) {
          spinner.start(`Comparing ${Object.keys(executors).length} executor(s) on "${suite.name}"...`);
        }
        const result = await runner.compare(suite, executors);
        spinner.stop();

        console.log(formatComparison(result, { format, color: context.color }));

        if (result.criterion === "no_candidates") {
          throw evaluationFailedError("No executor produced results");
        }
      } catch (err) {
        if (spinner.isSpinning) {
          spinner.fail("Comparison failed");
        }
        reportError(err);
      }
    });
}

export default createCompareCommand;
