/**
 * Metric and scorer construction tests
 */

import { describe, it, expect } from "vitest";
import { buildEvaluationSetup } from "../src/services/evaluation-setup.js";
import { EXIT_CODES } from "../src/errors.js";

describe("buildEvaluationSetup", () => {
  it("should enable accuracy and tool correctness by default", () => {
    const setup = buildEvaluationSetup({});

    expect(setup.metrics.map((metric) => metric.name)).toEqual(["accuracy", "tool_correctness"]);
    expect(setup.scorer.strategy.name).toBe("weighted");
    expect(setup.maxConcurrency).toBeUndefined();
    expect(setup.minPassRate).toBe(0);
  });

  it("should add latency and cost metrics when their targets are set", () => {
    const setup = buildEvaluationSetup({
      metrics: {
        latency: { targetMs: 100, weight: 2 },
        costEfficiency: { budgetUsd: 0.05 },
        toolCorrectness: { enabled: false },
      },
    });

    expect(setup.metrics.map((metric) => [metric.name, metric.weight])).toEqual([
      ["accuracy", 1],
      ["latency", 2],
      ["cost_efficiency", 1],
    ]);
  });

  it("should let overrides replace the configured grader and concurrency", () => {
    const setup = buildEvaluationSetup(
      { grader: "weighted", concurrency: 8 },
      { grader: "threshold", concurrency: 2 }
    );

    expect(setup.scorer.strategy.name).toBe("threshold");
    expect(setup.maxConcurrency).toBe(2);
  });

  it("should refuse a configuration with every metric disabled", () => {
    expect(() =>
      buildEvaluationSetup({
        metrics: { accuracy: { enabled: false }, toolCorrectness: { enabled: false } },
      })
    ).toThrow("Every metric is disabled");
  });

  it("should report grader errors with the config exit code", () => {
    let caught: unknown;
    try {
      buildEvaluationSetup({ passThreshold: 1.5 });
    } catch (err) {
      caught = err;
    }

    expect(caught).toMatchObject({ exitCode: EXIT_CODES.CONFIG_ERROR });
  });
});
