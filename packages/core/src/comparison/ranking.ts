/**
 * 비교 순위 결정
 *
 * 기준 순서: 평균 점수(높을수록) → 통과율(높을수록) → 총비용(낮을수록).
 * 세 기준이 모두 같으면 임의로 고르지 않고 동률로 보고한다.
 */

import type { ComparisonStanding, SuiteResult, WinnerCriterion } from '../types.js';
import { EPSILON } from '../utils/math.js';

export interface RankingCandidate {
  readonly executorId: string;
  readonly result: SuiteResult;
}

export interface WinnerDecision {
  readonly standings: readonly ComparisonStanding[];
  readonly winner: string | null;
  readonly criterion: WinnerCriterion;
  readonly tiedExecutors: readonly string[];
}

type RankedCriterion = Extract<WinnerCriterion, 'mean_score' | 'pass_rate' | 'total_cost'>;

/**
 * EPSILON 격자로 반올림한 값. 격자 위에서 비교하면 동률 판정이 추이적이다.
 */
function quantize(value: number): number {
  return Math.round(value / EPSILON);
}

/**
 * a가 앞서면 음수, b가 앞서면 양수, 동률이면 0.
 * 차이를 만든 첫 기준을 함께 돌려준다.
 */
function compareResults(
  a: SuiteResult,
  b: SuiteResult
): { order: number; criterion: RankedCriterion | null } {
  const checks: Array<[RankedCriterion, number]> = [
    ['mean_score', quantize(b.meanScore) - quantize(a.meanScore)],
    ['pass_rate', quantize(b.passRate) - quantize(a.passRate)],
    ['total_cost', quantize(a.totalCost.totalUsd) - quantize(b.totalCost.totalUsd)],
  ];

  for (const [criterion, difference] of checks) {
    if (difference !== 0) {
      return { order: difference, criterion };
    }
  }
  return { order: 0, criterion: null };
}

export function rankCandidates(candidates: readonly RankingCandidate[]): WinnerDecision {
  // 안정 정렬: 완전 동률이면 입력 순서를 유지
  const sorted = [...candidates].sort((a, b) => compareResults(a.result, b.result).order);

  const standings: ComparisonStanding[] = [];
  sorted.forEach((candidate, index) => {
    const previous = sorted[index - 1];
    const previousStanding = standings[index - 1];
    const tiedWithPrevious =
      previous !== undefined &&
      compareResults(previous.result, candidate.result).order === 0;

    standings.push({
      executorId: candidate.executorId,
      rank: tiedWithPrevious && previousStanding ? previousStanding.rank : index + 1,
      meanScore: candidate.result.meanScore,
      passRate: candidate.result.passRate,
      totalCostUsd: candidate.result.totalCost.totalUsd,
      grade: candidate.result.grade,
    });
  });

  const first = sorted[0];
  const second = sorted[1];

  if (!first) {
    return { standings, winner: null, criterion: 'no_candidates', tiedExecutors: [] };
  }
  if (!second) {
    return { standings, winner: first.executorId, criterion: 'sole_candidate', tiedExecutors: [] };
  }

  const { criterion } = compareResults(first.result, second.result);
  if (criterion === null) {
    const tiedExecutors = standings.filter((s) => s.rank === 1).map((s) => s.executorId);
    return { standings, winner: null, criterion: 'tie', tiedExecutors };
  }

  return { standings, winner: first.executorId, criterion, tiedExecutors: [] };
}
