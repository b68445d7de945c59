/**
 * Build metrics and the scorer from merged configuration
 */
import {
  AccuracyMetric,
  CostEfficiencyMetric,
  EvalError,
  LatencyMetric,
  Scorer,
  ThresholdGrader,
  ToolCorrectnessMetric,
  WeightedGrader,
  type GradingStrategy,
  type Metric,
} from "@tracegrade/core";
import { configError } from "../errors.js";
import type { GraderName, TracegradeConfig } from "../utils/config.js";

export interface EvaluationOverrides {
  grader?: GraderName;
  concurrency?: number;
}

export interface EvaluationSetup {
  metrics: Metric[];
  scorer: Scorer;
  maxConcurrency?: number;
  minPassRate: number;
}

/**
 * Accuracy and tool correctness run unless disabled.
 * Latency needs targetMs and cost efficiency needs budgetUsd.
 */
function buildMetrics(config: TracegradeConfig): Metric[] {
  const settings = config.metrics ?? {};
  const metrics: Metric[] = [];

  if (settings.accuracy?.enabled !== false) {
    metrics.push(new AccuracyMetric({ weight: settings.accuracy?.weight }));
  }
  if (settings.toolCorrectness?.enabled !== false) {
    metrics.push(new ToolCorrectnessMetric({ weight: settings.toolCorrectness?.weight }));
  }

  const latency = settings.latency;
  if (latency?.targetMs !== undefined && latency.enabled !== false) {
    metrics.push(new LatencyMetric({ targetMs: latency.targetMs, weight: latency.weight }));
  }

  const cost = settings.costEfficiency;
  if (cost?.budgetUsd !== undefined && cost.enabled !== false) {
    metrics.push(new CostEfficiencyMetric({ budgetUsd: cost.budgetUsd, weight: cost.weight }));
  }

  return metrics;
}

function buildStrategy(grader: GraderName, config: TracegradeConfig): GradingStrategy {
  if (grader === "threshold") {
    return new ThresholdGrader({
      thresholds: config.thresholds,
      defaultThreshold: config.defaultThreshold,
    });
  }
  return new WeightedGrader({ passThreshold: config.passThreshold });
}

export function buildEvaluationSetup(
  config: TracegradeConfig,
  overrides: EvaluationOverrides = {}
): EvaluationSetup {
  const grader = overrides.grader ?? config.grader ?? "weighted";

  try {
    const metrics = buildMetrics(config);
    if (metrics.length === 0) {
      throw configError(
        "Every metric is disabled",
        "Enable at least one metric in .tracegraderc."
      );
    }
    return {
      metrics,
      scorer: new Scorer({ strategy: buildStrategy(grader, config) }),
      maxConcurrency: overrides.concurrency ?? config.concurrency,
      minPassRate: config.minPassRate ?? 0,
    };
  } catch (err) {
    if (err instanceof EvalError) {
      throw configError(err.message, err.suggestion);
    }
    throw err;
  }
}
