/**
 * 등급 구간
 *
 * 각 구간의 하한은 포함(inclusive)이며, 구간은 연속적으로 [0, 1]을 빈틈없이 덮는다.
 */

import type { GradeLevel } from '../types.js';
import { GradingConfigurationError } from '../errors.js';
import { atLeast } from '../utils/math.js';

/** fail을 제외한 각 등급의 하한 */
export interface GradeBands {
  readonly excellent: number;
  readonly good: number;
  readonly acceptable: number;
  readonly poor: number;
}

export const DEFAULT_GRADE_BANDS: GradeBands = Object.freeze({
  excellent: 0.9,
  good: 0.75,
  acceptable: 0.6,
  poor: 0.4,
});

export const GRADE_LABELS: Readonly<Record<GradeLevel, string>> = Object.freeze({
  excellent: 'Excellent',
  good: 'Good',
  acceptable: 'Acceptable',
  poor: 'Poor',
  fail: 'Fail',
});

/**
 * 구간 하한은 (0, 1] 범위에서 엄격히 내림차순이어야 한다.
 */
export function validateGradeBands(bands: GradeBands): void {
  const ordered: Array<[keyof GradeBands, number]> = [
    ['excellent', bands.excellent],
    ['good', bands.good],
    ['acceptable', bands.acceptable],
    ['poor', bands.poor],
  ];

  let upper = Number.POSITIVE_INFINITY;
  for (const [name, bound] of ordered) {
    if (!Number.isFinite(bound) || bound <= 0 || bound > 1) {
      throw new GradingConfigurationError(
        `Grade band "${name}" must be within (0, 1] (got ${bound})`,
        { setting: `gradeBands.${name}` }
      );
    }
    if (bound >= upper) {
      throw new GradingConfigurationError(
        `Grade band "${name}" (${bound}) must be lower than the band above it (${upper})`,
        { setting: `gradeBands.${name}` }
      );
    }
    upper = bound;
  }
}

export function gradeLevelFor(score: number, bands: GradeBands = DEFAULT_GRADE_BANDS): GradeLevel {
  if (atLeast(score, bands.excellent)) return 'excellent';
  if (atLeast(score, bands.good)) return 'good';
  if (atLeast(score, bands.acceptable)) return 'acceptable';
  if (atLeast(score, bands.poor)) return 'poor';
  return 'fail';
}

export function formatGradeLevel(grade: GradeLevel): string {
  return GRADE_LABELS[grade];
}
