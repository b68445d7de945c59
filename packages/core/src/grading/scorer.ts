/**
 * Scorer - grading strategy와 등급 구간을 묶는다
 */

import type { GradeLevel, Score } from '../types.js';
import { mean } from '../utils/math.js';
import {
  DEFAULT_GRADE_BANDS,
  gradeLevelFor,
  validateGradeBands,
  type GradeBands,
} from './grade-level.js';
import { WeightedGrader, type GradingStrategy, type StrategyVerdict } from './strategies.js';

export interface ScorerOptions {
  strategy?: GradingStrategy;
  gradeBands?: GradeBands;
}

export interface ScenarioVerdict extends StrategyVerdict {
  grade: GradeLevel;
}

export interface SuiteSummary {
  passedCount: number;
  failedCount: number;
  passRate: number;
  meanScore: number;
  grade: GradeLevel;
}

/**
 * 시나리오 판정과 스위트 등급을 계산한다. 상태가 없으므로 동시 실행 간에 공유된다.
 */
export class Scorer {
  readonly strategy: GradingStrategy;
  readonly gradeBands: GradeBands;

  constructor(options: ScorerOptions = {}) {
    const gradeBands = options.gradeBands ?? DEFAULT_GRADE_BANDS;
    validateGradeBands(gradeBands);
    this.gradeBands = Object.freeze({ ...gradeBands });
    this.strategy = options.strategy ?? new WeightedGrader();
  }

  judge(scores: readonly Score[]): ScenarioVerdict {
    const verdict = this.strategy.evaluate(scores);
    return { ...verdict, grade: this.gradeFor(verdict.overallScore) };
  }

  gradeFor(score: number): GradeLevel {
    return gradeLevelFor(score, this.gradeBands);
  }

  /**
   * 스위트 등급은 시나리오 종합 점수의 평균으로 정한다.
   */
  summarize(
    results: readonly { readonly overallScore: number; readonly passed: boolean }[]
  ): SuiteSummary {
    const passedCount = results.filter((r) => r.passed).length;
    const meanScore = mean(results.map((r) => r.overallScore));

    return {
      passedCount,
      failedCount: results.length - passedCount,
      passRate: results.length === 0 ? 0 : passedCount / results.length,
      meanScore,
      grade: this.gradeFor(meanScore),
    };
  }
}
