/**
 * Metric - 채점 기능의 공통 계약
 *
 * metric은 (scenario, trace)의 순수 함수다. 호출 간 공유 가변 상태가 없으므로
 * 여러 시나리오에서 동시에, 임의 순서로 호출될 수 있다.
 */

import type { ExecutionTrace, Scenario, Score } from '../types.js';
import { GradingConfigurationError, MetricDataMissingError } from '../errors.js';
import { clampUnit } from '../utils/math.js';

/**
 * 채점 기능. 새 metric은 이 인터페이스만 구현하면 Runner/Scorer 수정 없이 추가된다.
 */
export interface Metric {
  readonly name: string;
  readonly weight: number;
  score(scenario: Scenario, trace: ExecutionTrace): Score;
}

/** compute()가 돌려주는 값 */
export interface MetricEvaluation {
  value: number;
  explanation: string;
}

export function assertPositiveWeight(weight: number, metric: string): void {
  if (!Number.isFinite(weight) || weight <= 0) {
    throw new GradingConfigurationError(
      `Metric "${metric}" weight must be a positive number (got ${weight})`,
      { setting: `${metric}.weight` }
    );
  }
}

/**
 * 내장 metric의 기반 클래스
 * - weight 검증
 * - 결과 값을 [0, 1]로 clamp
 * - MetricDataMissingError를 0.0 점수로 복구
 */
export abstract class BaseMetric implements Metric {
  readonly name: string;
  readonly weight: number;

  protected constructor(name: string, weight = 1.0) {
    assertPositiveWeight(weight, name);
    this.name = name;
    this.weight = weight;
  }

  score(scenario: Scenario, trace: ExecutionTrace): Score {
    try {
      const { value, explanation } = this.compute(scenario, trace);
      return this.createScore(value, explanation);
    } catch (error) {
      if (error instanceof MetricDataMissingError) {
        return this.createScore(0, error.message);
      }
      throw error;
    }
  }

  protected abstract compute(scenario: Scenario, trace: ExecutionTrace): MetricEvaluation;

  protected createScore(value: number, explanation: string): Score {
    return Object.freeze({
      metric: this.name,
      value: clampUnit(value),
      weight: this.weight,
      explanation,
    });
  }

  protected missing(field: string, message: string): MetricDataMissingError {
    return new MetricDataMissingError(this.name, field, message);
  }
}

/**
 * 목표치 이하이면 1.0, 초과하면 target / actual 로 감소한다 (inverse-ratio).
 * 초과 구간에서 엄격히 감소하고 0 아래로 내려가지 않는다.
 */
export function inverseRatioDecay(actual: number, target: number): number {
  if (actual <= target) return 1.0;
  return target / actual;
}

export function assertPositiveTarget(value: number, metric: string, setting: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new GradingConfigurationError(
      `Metric "${metric}" requires a positive ${setting} (got ${value})`,
      { setting: `${metric}.${setting}` }
    );
  }
}
