import { RunnerConfigurationError } from '../errors.js';

export type ConcurrencyLimiter = <T>(task: () => Promise<T>) => Promise<T>;

export function assertConcurrency(limit: number): void {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RunnerConfigurationError(
      `maxConcurrency must be a positive integer (got ${limit})`,
      { suggestion: '동시 실행 상한은 1 이상의 정수여야 합니다.' }
    );
  }
}

/**
 * 동시에 실행 중인 작업 수를 limit 이하로 유지한다.
 * 대기 중인 작업은 등록 순서대로 시작된다.
 */
export function createConcurrencyLimiter(limit: number): ConcurrencyLimiter {
  assertConcurrency(limit);

  let active = 0;
  const queue: Array<() => void> = [];

  const release = (): void => {
    active--;
    const next = queue.shift();
    if (next) {
      active++;
      next();
    }
  };

  return <T>(task: () => Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      const start = (): void => {
        void Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(release);
      };

      if (active < limit) {
        active++;
        start();
      } else {
        queue.push(start);
      }
    });
}
