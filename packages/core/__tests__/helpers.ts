/**
 * 테스트 공용 도구
 */

import { vi } from 'vitest';
import type { EvalLogger } from '../src/runner/eval-runner.js';

export function createSilentLogger(): EvalLogger & {
  debug: ReturnType<typeof vi.fn>;
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
} {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/**
 * ms 후 resolve. signal이 abort되면 타이머를 정리하고 reject한다.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      'abort',
      () => {
        clearTimeout(timer);
        reject(signal.reason);
      },
      { once: true }
    );
  });
}

/**
 * 호출될 때마다 step만큼 증가하는 가짜 시계
 */
export function createSteppingClock(step = 10): () => number {
  let now = 0;
  return () => {
    now += step;
    return now;
  };
}

/**
 * fn이 던진 오류를 돌려준다. 던지지 않으면 실패한다.
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}
