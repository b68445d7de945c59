/**
 * 비용 귀속 계산
 *
 * 모든 CostBreakdown은 CostEntry 목록에서 만들어진다.
 * 각 entry는 정확히 하나의 agent와 하나의 tool에 귀속되므로
 * totalUsd = Σ perAgent = Σ perTool 이 항상 성립한다.
 */

import type { CostBreakdown } from './types.js';
import { addToRecord, deepFreeze } from './utils/object.js';
import { EPSILON, nearlyEqual, sum } from './utils/math.js';

/** agent가 지정되지 않은 비용의 귀속 키 */
export const UNATTRIBUTED_AGENT = '(unattributed)';

/** 도구 호출이 아닌 모델 사용 비용의 귀속 키 */
export const MODEL_USAGE_TOOL = '(model)';

/** 단일 비용 항목 */
export interface CostEntry {
  readonly usd: number;
  readonly agentId?: string;
  readonly toolId?: string;
  readonly inputTokens?: number;
  readonly outputTokens?: number;
}

export const EMPTY_COST: CostBreakdown = deepFreeze({
  totalUsd: 0,
  inputTokens: 0,
  outputTokens: 0,
  perAgent: {},
  perTool: {},
});

export function createCostBreakdown(entries: readonly CostEntry[]): CostBreakdown {
  const perAgent: Record<string, number> = {};
  const perTool: Record<string, number> = {};
  let totalUsd = 0;
  let inputTokens = 0;
  let outputTokens = 0;

  for (const entry of entries) {
    if (!Number.isFinite(entry.usd) || entry.usd < 0) {
      throw new RangeError(`Cost entries must be non-negative finite numbers (got ${entry.usd})`);
    }
    totalUsd += entry.usd;
    inputTokens += entry.inputTokens ?? 0;
    outputTokens += entry.outputTokens ?? 0;
    addToRecord(perAgent, entry.agentId ?? UNATTRIBUTED_AGENT, entry.usd);
    addToRecord(perTool, entry.toolId ?? MODEL_USAGE_TOOL, entry.usd);
  }

  return deepFreeze({ totalUsd, inputTokens, outputTokens, perAgent, perTool });
}

/**
 * 여러 비용 집계를 합산한다 (스위트 총비용).
 */
export function mergeCostBreakdowns(
  breakdowns: readonly (CostBreakdown | undefined)[]
): CostBreakdown {
  const perAgent: Record<string, number> = {};
  const perTool: Record<string, number> = {};
  let totalUsd = 0;
  let inputTokens = 0;
  let outputTokens = 0;

  for (const breakdown of breakdowns) {
    if (!breakdown) continue;
    totalUsd += breakdown.totalUsd;
    inputTokens += breakdown.inputTokens;
    outputTokens += breakdown.outputTokens;
    for (const [agent, usd] of Object.entries(breakdown.perAgent)) {
      addToRecord(perAgent, agent, usd);
    }
    for (const [tool, usd] of Object.entries(breakdown.perTool)) {
      addToRecord(perTool, tool, usd);
    }
  }

  return deepFreeze({ totalUsd, inputTokens, outputTokens, perAgent, perTool });
}

export function isCostBreakdownConsistent(
  breakdown: CostBreakdown,
  tolerance = EPSILON
): boolean {
  return (
    nearlyEqual(breakdown.totalUsd, sum(Object.values(breakdown.perAgent)), tolerance) &&
    nearlyEqual(breakdown.totalUsd, sum(Object.values(breakdown.perTool)), tolerance)
  );
}
