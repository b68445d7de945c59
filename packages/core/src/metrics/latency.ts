import type { ExecutionTrace, Scenario } from '../types.js';
import {
  BaseMetric,
  assertPositiveTarget,
  inverseRatioDecay,
  type MetricEvaluation,
} from './metric.js';

export interface LatencyMetricOptions {
  targetMs: number;
  weight?: number;
}

/**
 * 전체 지연 시간이 목표 이하이면 1.0, 초과하면 targetMs / totalMs.
 */
export class LatencyMetric extends BaseMetric {
  readonly targetMs: number;

  constructor(options: LatencyMetricOptions) {
    super('latency', options.weight);
    assertPositiveTarget(options.targetMs, this.name, 'targetMs');
    this.targetMs = options.targetMs;
  }

  protected compute(_scenario: Scenario, trace: ExecutionTrace): MetricEvaluation {
    const totalMs = trace.latency?.totalMs;
    if (totalMs === undefined || !Number.isFinite(totalMs) || totalMs < 0) {
      throw this.missing('latency', 'No latency data');
    }

    return {
      value: inverseRatioDecay(totalMs, this.targetMs),
      explanation: `Target: ${this.targetMs}ms, Actual: ${totalMs.toFixed(1)}ms`,
    };
  }
}
