/**
 * Report formatting tests
 */

import { describe, it, expect } from "vitest";
import type { ComparisonResult, SuiteResult } from "@tracegrade/core";
import {
  formatComparison,
  formatSuiteResult,
  formatValidation,
  isValidationPassed,
} from "../src/formatter.js";
import { parseSuiteDocument } from "../src/services/suite-loader.js";

const suiteResult: SuiteResult = {
  suiteName: "math",
  scenarioResults: [
    {
      scenarioName: "add",
      scores: [{ metric: "accuracy", value: 1, weight: 1, explanation: "Exact match" }],
      overallScore: 1,
      passed: true,
      grade: "excellent",
      failedChecks: [],
      latencyMs: 12,
    },
    {
      scenarioName: "slow",
      scores: [{ metric: "accuracy", value: 0, weight: 1, explanation: "Timed out" }],
      overallScore: 0,
      passed: false,
      grade: "fail",
      failedChecks: ["overall 0.00 < 0.60"],
      failure: { kind: "timeout", message: 'Scenario "slow" timed out after 20ms' },
      latencyMs: 20,
    },
  ],
  passRate: 0.5,
  passedCount: 1,
  failedCount: 1,
  meanScore: 0.5,
  grade: "poor",
  totalCost: { totalUsd: 0.012, inputTokens: 0, outputTokens: 0, perAgent: {}, perTool: {} },
  totalLatency: {
    totalMs: 32,
    perAgent: {},
    perTool: {},
    meanMs: 16,
    p50Ms: 16,
    p95Ms: 19.6,
    p99Ms: 19.92,
  },
  startedAt: "2026-01-01T00:00:00.000Z",
  durationMs: 25,
};

const comparison: ComparisonResult = {
  suiteName: "math",
  results: {},
  standings: [
    {
      executorId: "fast",
      rank: 1,
      meanScore: 0.9,
      passRate: 1,
      totalCostUsd: 0.01,
      grade: "excellent",
    },
    {
      executorId: "careful",
      rank: 2,
      meanScore: 0.8,
      passRate: 1,
      totalCostUsd: 0.02,
      grade: "good",
    },
  ],
  winner: "fast",
  criterion: "mean_score",
  tiedExecutors: [],
  excluded: [{ executorId: "down", reason: "Run failed: offline" }],
};

describe("formatValidation", () => {
  it("should list errors with their suggestion", () => {
    const loaded = parseSuiteDocument(
      { name: "dupes", scenarios: [{ name: "a" }, { name: "a" }] },
      "suite.yaml"
    );

    const output = formatValidation({ ...loaded, strict: false }, "suite.yaml", {
      format: "text",
      color: false,
    });

    expect(output.split("\n")).toEqual([
      "Validating suite.yaml...",
      '✗ [DUPLICATE_SCENARIO] Duplicate scenario name "a" (first used at scenarios[0]) (scenarios[1].name)',
      "    -> Scenario names must be unique within a suite.",
      "",
      "Errors: 1, Warnings: 0",
    ]);
  });

  it("should fail warnings under strict mode", () => {
    const report = { ...parseSuiteDocument({ name: "empty" }, "suite.yaml"), strict: true };

    expect(isValidationPassed(report)).toBe(false);
    expect(formatValidation(report, "suite.yaml", { format: "text", color: false }).split("\n")).toEqual([
      "Validating suite.yaml...",
      '✓ Suite "empty" with 0 scenario(s)',
      "⚠ [NO_SCENARIOS] Suite has no scenarios (scenarios)",
      "",
      "Errors: 0, Warnings: 1 (strict mode: warnings treated as errors)",
    ]);
  });

  it("should summarize as JSON", () => {
    const report = { ...parseSuiteDocument({ name: "empty" }, "suite.yaml"), strict: true };

    const parsed: unknown = JSON.parse(formatValidation(report, "suite.yaml", { format: "json" }));

    expect(parsed).toMatchObject({
      valid: false,
      summary: { suiteName: "empty", scenarioCount: 0, errorCount: 0, warningCount: 1 },
    });
  });
});

describe("formatSuiteResult", () => {
  it("should render scenarios, scores and totals", () => {
    const output = formatSuiteResult(suiteResult, { format: "text", color: false });

    expect(output.split("\n")).toEqual([
      "Suite: math",
      "",
      "  ✓ add  score 1.000  Excellent  12.0ms",
      "      accuracy         1.00  Exact match",
      "  ✗ slow  score 0.000  Fail  20.0ms",
      "      accuracy         0.00  Timed out",
      '      ! timeout: Scenario "slow" timed out after 20ms',
      "      ! overall 0.00 < 0.60",
      "",
      "Passed: 1/2 (50.0%)",
      "Mean score: 0.500  Grade: Poor",
      "Total cost: $0.0120",
      "Latency: mean 16.0ms  p50 16.0ms  p95 19.6ms  p99 19.9ms",
    ]);
  });

  it("should emit the whole result as JSON", () => {
    const parsed: unknown = JSON.parse(formatSuiteResult(suiteResult, { format: "json" }));

    expect(parsed).toEqual(suiteResult);
  });
});

describe("formatComparison", () => {
  it("should render standings, exclusions and the winner", () => {
    const output = formatComparison(comparison, { format: "text", color: false });

    expect(output.split("\n")).toEqual([
      "Comparison: math",
      "",
      "  #1  fast     mean 0.900  pass 100.0%  cost $0.0100  Excellent",
      "  #2  careful  mean 0.800  pass 100.0%  cost $0.0200  Good",
      "",
      "Excluded:",
      "  - down: Run failed: offline",
      "",
      "Winner: fast (by mean score)",
    ]);
  });

  it("should name the tied executors when there is no winner", () => {
    const tie: ComparisonResult = {
      ...comparison,
      winner: null,
      criterion: "tie",
      tiedExecutors: ["fast", "careful"],
      excluded: [],
    };

    const lines = formatComparison(tie, { format: "text", color: false }).split("\n");

    expect(lines[lines.length - 1]).toBe("No winner: fast, careful tied on every criterion");
  });
});
