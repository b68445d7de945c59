import type { ExecutionTrace, Scenario } from '../types.js';
import {
  BaseMetric,
  assertPositiveTarget,
  inverseRatioDecay,
  type MetricEvaluation,
} from './metric.js';

export interface CostEfficiencyMetricOptions {
  budgetUsd: number;
  weight?: number;
}

export class CostEfficiencyMetric extends BaseMetric {
  readonly budgetUsd: number;

  constructor(options: CostEfficiencyMetricOptions) {
    super('cost_efficiency', options.weight);
    assertPositiveTarget(options.budgetUsd, this.name, 'budgetUsd');
    this.budgetUsd = options.budgetUsd;
  }

  protected compute(_scenario: Scenario, trace: ExecutionTrace): MetricEvaluation {
    const totalUsd = trace.cost?.totalUsd;
    if (totalUsd === undefined || !Number.isFinite(totalUsd) || totalUsd < 0) {
      throw this.missing('cost', 'No cost data');
    }

    return {
      value: inverseRatioDecay(totalUsd, this.budgetUsd),
      explanation: `Budget: $${this.budgetUsd.toFixed(4)}, Actual: $${totalUsd.toFixed(4)}`,
    };
  }
}
