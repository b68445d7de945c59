import type { LatencyBreakdown, SuiteLatency } from './types.js';
import { addToRecord, deepFreeze } from './utils/object.js';
import { mean, percentile, sum } from './utils/math.js';

export interface ScenarioLatencySample {
  readonly totalMs: number;
  readonly breakdown?: LatencyBreakdown;
}

/**
 * 시나리오별 지연 시간을 스위트 단위로 집계한다.
 * 입력 순서와 무관하게 같은 값이 나온다.
 */
export function aggregateSuiteLatency(samples: readonly ScenarioLatencySample[]): SuiteLatency {
  const perAgent: Record<string, number> = {};
  const perTool: Record<string, number> = {};

  for (const sample of samples) {
    if (!sample.breakdown) continue;
    for (const [agent, ms] of Object.entries(sample.breakdown.perAgent)) {
      addToRecord(perAgent, agent, ms);
    }
    for (const [tool, ms] of Object.entries(sample.breakdown.perTool)) {
      addToRecord(perTool, tool, ms);
    }
  }

  const sorted = samples.map((s) => s.totalMs).sort((a, b) => a - b);

  return deepFreeze({
    totalMs: sum(sorted),
    meanMs: mean(sorted),
    p50Ms: percentile(sorted, 50),
    p95Ms: percentile(sorted, 95),
    p99Ms: percentile(sorted, 99),
    perAgent,
    perTool,
  });
}
