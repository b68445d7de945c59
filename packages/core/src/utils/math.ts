/** 부동소수점 비교 허용 오차 */
export const EPSILON = 1e-9;

export function clampUnit(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function sum(values: readonly number[]): number {
  let total = 0;
  for (const value of values) {
    total += value;
  }
  return total;
}

export function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : sum(values) / values.length;
}

/** a >= b (허용 오차 포함) */
export function atLeast(a: number, b: number): boolean {
  return a >= b - EPSILON;
}

export function nearlyEqual(a: number, b: number, tolerance = EPSILON): boolean {
  return Math.abs(a - b) <= tolerance;
}

/**
 * 정렬된 값에서 선형 보간 백분위수를 계산한다.
 *
 * @param sortedValues - 오름차순 정렬된 값
 * @param pct - 0 ~ 100
 */
export function percentile(sortedValues: readonly number[], pct: number): number {
  if (sortedValues.length === 0) return 0;

  const k = (sortedValues.length - 1) * (pct / 100);
  const lowerIndex = Math.floor(k);
  const lower = sortedValues[lowerIndex] ?? 0;
  const upper = sortedValues[lowerIndex + 1];
  if (upper === undefined) {
    return sortedValues[sortedValues.length - 1] ?? lower;
  }
  return lower + (k - lowerIndex) * (upper - lower);
}
