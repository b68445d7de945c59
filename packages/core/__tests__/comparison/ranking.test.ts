/**
 * 순위 결정 테스트
 */

import { describe, it, expect } from 'vitest';
import { rankCandidates } from '../../src/comparison/ranking.js';
import { createCostBreakdown } from '../../src/cost.js';
import { aggregateSuiteLatency } from '../../src/latency.js';
import type { SuiteResult } from '../../src/types.js';

function suiteResult(meanScore: number, passRate: number, totalUsd = 0): SuiteResult {
  return {
    suiteName: 'suite',
    scenarioResults: [],
    passRate,
    passedCount: 0,
    failedCount: 0,
    meanScore,
    grade: 'good',
    totalCost: createCostBreakdown([{ usd: totalUsd }]),
    totalLatency: aggregateSuiteLatency([]),
    startedAt: '2024-01-01T00:00:00.000Z',
    durationMs: 0,
  };
}

describe('rankCandidates', () => {
  it('동률인 후보는 같은 순위를 공유해야 한다', () => {
    const decision = rankCandidates([
      { executorId: 'b', result: suiteResult(0.5, 1) },
      { executorId: 'a', result: suiteResult(0.9, 1) },
      { executorId: 'c', result: suiteResult(0.5, 1) },
    ]);

    expect(decision.standings.map((s) => [s.executorId, s.rank])).toEqual([
      ['a', 1],
      ['b', 2],
      ['c', 2],
    ]);
    expect(decision.winner).toBe('a');
    expect(decision.criterion).toBe('mean_score');
  });

  it('허용 오차 이내의 차이는 동률로 봐야 한다', () => {
    const decision = rankCandidates([
      { executorId: 'x', result: suiteResult(0.6, 1) },
      { executorId: 'y', result: suiteResult(0.6 + 1e-12, 1) },
    ]);

    expect(decision.criterion).toBe('tie');
    expect(decision.tiedExecutors).toEqual(['x', 'y']);
  });

  it('오차 범위 안의 차이가 이어져도 입력 순서와 무관하게 같은 순위를 내야 한다', () => {
    const low = { executorId: 'low', result: suiteResult(0.5, 1) };
    const mid = { executorId: 'mid', result: suiteResult(0.5 + 6e-10, 1) };
    const high = { executorId: 'high', result: suiteResult(0.5 + 1.2e-9, 1) };

    const ranksFor = (order: (typeof low)[]) =>
      Object.fromEntries(rankCandidates(order).standings.map((s) => [s.executorId, s.rank]));

    const expected = { mid: 1, high: 1, low: 3 };
    expect(ranksFor([low, mid, high])).toEqual(expected);
    expect(ranksFor([high, low, mid])).toEqual(expected);
    expect(ranksFor([mid, high, low])).toEqual(expected);
    expect(rankCandidates([high, low, mid]).criterion).toBe('tie');
  });

  it('단독 후보는 sole_candidate로 이겨야 한다', () => {
    const decision = rankCandidates([{ executorId: 'only', result: suiteResult(0.1, 0) }]);

    expect(decision.winner).toBe('only');
    expect(decision.criterion).toBe('sole_candidate');
    expect(decision.standings[0]?.rank).toBe(1);
  });
});
