/**
 * Grading Strategy
 *
 * 시나리오 하나의 점수 목록을 통과/실패 판정과 종합 점수로 결합한다.
 * Scorer 생성 시 주입되며 Runner 안에서 분기하지 않는다.
 */

import type { Score } from '../types.js';
import { GradingConfigurationError } from '../errors.js';
import { atLeast } from '../utils/math.js';

export interface StrategyVerdict {
  /** 보고용 종합 점수 (가중 평균) */
  overallScore: number;
  passed: boolean;
  failedChecks: string[];
}

export interface GradingStrategy {
  readonly name: string;
  evaluate(scores: readonly Score[]): StrategyVerdict;
}

/**
 * Σ(value × weight) / Σ(weight). 전체 가중치가 0이면 0.0.
 *
 * @param weightOverrides - metric 이름별로 score 자체의 weight를 대체한다
 */
export function weightedAverage(
  scores: readonly Score[],
  weightOverrides: Readonly<Record<string, number>> = {}
): number {
  let weighted = 0;
  let totalWeight = 0;

  for (const score of scores) {
    const weight = weightOverrides[score.metric] ?? score.weight;
    weighted += score.value * weight;
    totalWeight += weight;
  }

  if (totalWeight <= 0) return 0;
  return weighted / totalWeight;
}

function assertUnitInterval(value: number, setting: string): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new GradingConfigurationError(`${setting} must be within [0, 1] (got ${value})`, {
      setting,
    });
  }
}

export interface WeightedGraderOptions {
  /** 종합 점수 통과 기준 (기본 0.6) */
  passThreshold?: number;
  /** metric 이름별 가중치 재정의 */
  weights?: Readonly<Record<string, number>>;
}

/**
 * 가중 평균이 passThreshold 이상이면 통과
 */
export class WeightedGrader implements GradingStrategy {
  readonly name = 'weighted';
  readonly passThreshold: number;
  private readonly weights: Readonly<Record<string, number>>;

  constructor(options: WeightedGraderOptions = {}) {
    this.passThreshold = options.passThreshold ?? 0.6;
    assertUnitInterval(this.passThreshold, 'passThreshold');

    const weights = options.weights ?? {};
    let total = 0;
    for (const [metric, weight] of Object.entries(weights)) {
      if (!Number.isFinite(weight) || weight < 0) {
        throw new GradingConfigurationError(
          `Weight for "${metric}" must be a non-negative number (got ${weight})`,
          { setting: `weights.${metric}` }
        );
      }
      total += weight;
    }
    if (Object.keys(weights).length > 0 && total === 0) {
      throw new GradingConfigurationError('Total metric weight must be greater than zero', {
        setting: 'weights',
        suggestion: '최소 하나의 metric에 0보다 큰 가중치를 지정하세요.',
      });
    }
    this.weights = Object.freeze({ ...weights });
  }

  evaluate(scores: readonly Score[]): StrategyVerdict {
    const overallScore = weightedAverage(scores, this.weights);
    const passed = atLeast(overallScore, this.passThreshold);
    return {
      overallScore,
      passed,
      failedChecks: passed
        ? []
        : [`overall ${overallScore.toFixed(2)} < ${this.passThreshold.toFixed(2)}`],
    };
  }
}

export interface ThresholdGraderOptions {
  /** metric 이름별 최소 점수 */
  thresholds?: Readonly<Record<string, number>>;
  /** thresholds에 없는 metric의 최소 점수 (기본 0.6) */
  defaultThreshold?: number;
}

/**
 * 모든 점수가 각자의 최소 점수를 넘어야 통과 (AND).
 * 종합 점수는 보고용 가중 평균이다.
 */
export class ThresholdGrader implements GradingStrategy {
  readonly name = 'threshold';
  readonly defaultThreshold: number;
  private readonly thresholds: Readonly<Record<string, number>>;

  constructor(options: ThresholdGraderOptions = {}) {
    this.defaultThreshold = options.defaultThreshold ?? 0.6;
    assertUnitInterval(this.defaultThreshold, 'defaultThreshold');

    const thresholds = options.thresholds ?? {};
    for (const [metric, threshold] of Object.entries(thresholds)) {
      assertUnitInterval(threshold, `thresholds.${metric}`);
    }
    this.thresholds = Object.freeze({ ...thresholds });
  }

  thresholdFor(metric: string): number {
    return this.thresholds[metric] ?? this.defaultThreshold;
  }

  evaluate(scores: readonly Score[]): StrategyVerdict {
    const failedChecks: string[] = [];
    for (const score of scores) {
      const threshold = this.thresholdFor(score.metric);
      if (!atLeast(score.value, threshold)) {
        failedChecks.push(`${score.metric} ${score.value.toFixed(2)} < ${threshold.toFixed(2)}`);
      }
    }

    return {
      overallScore: weightedAverage(scores),
      passed: scores.length > 0 && failedChecks.length === 0,
      failedChecks,
    };
  }
}
