/**
 * Report rendering for validate, run and compare
 *
 * Every function returns the full report as a string; commands print it to stdout.
 */
import chalk, { Chalk, type ChalkInstance } from "chalk";
import {
  formatGradeLevel,
  type ComparisonResult,
  type ScenarioResult,
  type SuiteResult,
  type WinnerCriterion,
} from "@tracegrade/core";
import type { SuiteIssue, SuiteLoadResult } from "./services/suite-loader.js";

export type OutputFormat = "text" | "json";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["text", "json"];

export interface FormatOptions {
  format: OutputFormat;
  color?: boolean;
}

const plain = new Chalk({ level: 0 });

function colors(options: FormatOptions): ChalkInstance {
  return options.color === false ? plain : chalk;
}

function percent(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

function ms(value: number): string {
  return `${value.toFixed(1)}ms`;
}

function usd(value: number): string {
  return `$${value.toFixed(4)}`;
}

// --- validate ---------------------------------------------------------------

export interface ValidationReport extends SuiteLoadResult {
  /** Warnings count as errors */
  strict: boolean;
}

/**
 * A suite is valid when it has no errors, and under --strict no warnings either
 */
export function isValidationPassed(report: ValidationReport): boolean {
  return report.errors.length === 0 && (!report.strict || report.warnings.length === 0);
}

function issueLines(issue: SuiteIssue, c: ChalkInstance): string[] {
  const location = issue.path ? ` (${issue.path})` : "";
  const mark = issue.level === "error" ? c.red("✗") : c.yellow("⚠");
  const lines = [`${mark} [${issue.code}] ${issue.message}${location}`];
  if (issue.suggestion) {
    lines.push(c.cyan(`    -> ${issue.suggestion}`));
  }
  return lines;
}

export function formatValidation(
  report: ValidationReport,
  targetPath: string,
  options: FormatOptions
): string {
  const passed = isValidationPassed(report);

  if (options.format === "json") {
    return JSON.stringify(
      {
        valid: passed,
        errors: report.errors,
        warnings: report.warnings,
        summary: {
          suiteName: report.suite?.name ?? null,
          scenarioCount: report.suite?.scenarios.length ?? 0,
          errorCount: report.errors.length,
          warningCount: report.warnings.length,
        },
      },
      null,
      2
    );
  }

  const c = colors(options);
  const lines: string[] = [c.bold(`Validating ${targetPath}...`)];

  if (report.suite) {
    lines.push(
      `${c.green("✓")} Suite "${report.suite.name}" with ${report.suite.scenarios.length} scenario(s)`
    );
  }
  for (const issue of report.errors) {
    lines.push(...issueLines(issue, c));
  }
  for (const issue of report.warnings) {
    lines.push(...issueLines(issue, c));
  }

  lines.push("");
  const errorCount = report.errors.length;
  const warningCount = report.warnings.length;
  if (passed) {
    lines.push(
      c.green(
        warningCount > 0
          ? `Validation passed with ${warningCount} warning(s)`
          : "Validation passed"
      )
    );
  } else {
    const strictNote =
      report.strict && errorCount === 0 ? " (strict mode: warnings treated as errors)" : "";
    lines.push(c.red(`Errors: ${errorCount}, Warnings: ${warningCount}${strictNote}`));
  }

  return lines.join("\n");
}

// --- run --------------------------------------------------------------------

function scenarioLines(result: ScenarioResult, c: ChalkInstance): string[] {
  const mark = result.passed ? c.green("✓") : c.red("✗");
  const lines = [
    `  ${mark} ${result.scenarioName}  score ${result.overallScore.toFixed(3)}  ${formatGradeLevel(result.grade)}  ${ms(result.latencyMs)}`,
  ];

  for (const score of result.scores) {
    lines.push(
      c.dim(`      ${score.metric.padEnd(16)} ${score.value.toFixed(2)}  ${score.explanation}`)
    );
  }
  if (result.failure) {
    lines.push(c.red(`      ! ${result.failure.kind}: ${result.failure.message}`));
  }
  for (const check of result.failedChecks) {
    lines.push(c.yellow(`      ! ${check}`));
  }

  return lines;
}

export function formatSuiteResult(result: SuiteResult, options: FormatOptions): string {
  if (options.format === "json") {
    return JSON.stringify(result, null, 2);
  }

  const c = colors(options);
  const total = result.scenarioResults.length;
  const latency = result.totalLatency;
  const lines: string[] = [c.bold(`Suite: ${result.suiteName}`), ""];

  for (const scenario of result.scenarioResults) {
    lines.push(...scenarioLines(scenario, c));
  }

  lines.push(
    "",
    `Passed: ${result.passedCount}/${total} (${percent(result.passRate)})`,
    `Mean score: ${result.meanScore.toFixed(3)}  Grade: ${formatGradeLevel(result.grade)}`,
    `Total cost: ${usd(result.totalCost.totalUsd)}`,
    `Latency: mean ${ms(latency.meanMs)}  p50 ${ms(latency.p50Ms)}  p95 ${ms(latency.p95Ms)}  p99 ${ms(latency.p99Ms)}`
  );

  return lines.join("\n");
}

// --- compare ----------------------------------------------------------------

const CRITERION_LABELS: Readonly<Record<WinnerCriterion, string>> = {
  mean_score: "by mean score",
  pass_rate: "by pass rate",
  total_cost: "by total cost",
  sole_candidate: "only candidate",
  tie: "tie",
  no_candidates: "no candidates",
};

function winnerLine(result: ComparisonResult): string {
  if (result.criterion === "no_candidates") {
    return "No winner: no executor produced results";
  }
  if (result.winner === null) {
    return `No winner: ${result.tiedExecutors.join(", ")} tied on every criterion`;
  }
  return `Winner: ${result.winner} (${CRITERION_LABELS[result.criterion]})`;
}

export function formatComparison(result: ComparisonResult, options: FormatOptions): string {
  if (options.format === "json") {
    return JSON.stringify(result, null, 2);
  }

  const c = colors(options);
  const width = Math.max(0, ...result.standings.map((s) => s.executorId.length));
  const lines: string[] = [c.bold(`Comparison: ${result.suiteName}`), ""];

  for (const standing of result.standings) {
    lines.push(
      `  #${standing.rank}  ${standing.executorId.padEnd(width)}  mean ${standing.meanScore.toFixed(3)}  pass ${percent(standing.passRate)}  cost ${usd(standing.totalCostUsd)}  ${formatGradeLevel(standing.grade)}`
    );
  }

  if (result.excluded.length > 0) {
    lines.push("", c.yellow("Excluded:"));
    for (const excluded of result.excluded) {
      lines.push(c.yellow(`  - ${excluded.executorId}: ${excluded.reason}`));
    }
  }

  lines.push("", c.bold(winnerLine(result)));
  return lines.join("\n");
}

