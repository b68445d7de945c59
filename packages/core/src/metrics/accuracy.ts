import { isDeepStrictEqual } from 'node:util';
import type { ExecutionTrace, Scenario } from '../types.js';
import { BaseMetric, type MetricEvaluation } from './metric.js';

/**
 * 출력 비교 함수. boolean이면 1/0, number이면 부분 점수로 쓰인다.
 */
export type OutputComparator = (actual: unknown, expected: unknown) => boolean | number;

export interface AccuracyMetricOptions {
  weight?: number;
  comparator?: OutputComparator;
}

/**
 * trace.output과 scenario.expectedOutput을 비교한다.
 * 기본 비교는 구조적 완전 일치다.
 */
export class AccuracyMetric extends BaseMetric {
  private readonly comparator?: OutputComparator;

  constructor(options: AccuracyMetricOptions = {}) {
    super('accuracy', options.weight);
    this.comparator = options.comparator;
  }

  protected compute(scenario: Scenario, trace: ExecutionTrace): MetricEvaluation {
    if (scenario.expectedOutput === undefined) {
      return { value: 1.0, explanation: 'No expected output; skipped' };
    }

    if (this.comparator) {
      const verdict = this.comparator(trace.output, scenario.expectedOutput);
      if (typeof verdict === 'number') {
        return { value: verdict, explanation: `Comparator score: ${verdict.toFixed(2)}` };
      }
      return { value: verdict ? 1.0 : 0.0, explanation: `Match: ${verdict}` };
    }

    const match = isDeepStrictEqual(trace.output, scenario.expectedOutput);
    return { value: match ? 1.0 : 0.0, explanation: `Match: ${match}` };
  }
}
