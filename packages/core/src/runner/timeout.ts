import { ScenarioTimeoutError } from '../errors.js';

/** setTimeout이 허용하는 최대 지연 */
const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * timeoutMs 안에 끝나지 않으면 signal을 abort하고 ScenarioTimeoutError로 reject한다.
 * 원래 작업은 취소되지 않으며 Runner는 기다리기만 멈춘다.
 */
export async function runWithTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  scenarioName: string
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new ScenarioTimeoutError(scenarioName, timeoutMs);
      controller.abort(error);
      reject(error);
    }, Math.min(timeoutMs, MAX_TIMER_DELAY_MS));
  });

  try {
    return await Promise.race([operation(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
