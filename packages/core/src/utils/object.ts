export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * 값과 그 하위 객체/배열을 모두 동결한다.
 * 이미 동결된 객체는 다시 순회하지 않는다.
 */
export function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== 'object' || Object.isFrozen(value)) {
    return value;
  }

  Object.freeze(value);
  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
  return value;
}

/**
 * 키별 숫자를 더한 새 레코드
 */
export function addToRecord(
  target: Record<string, number>,
  key: string,
  amount: number
): void {
  target[key] = (target[key] ?? 0) + amount;
}
