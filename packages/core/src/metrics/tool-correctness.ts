import type { ExecutionTrace, Scenario } from '../types.js';
import { BaseMetric, type MetricEvaluation } from './metric.js';

/** 하위 신호 혼합 가중치 */
const PRESENCE_WEIGHT = 0.5;
const ORDER_WEIGHT = 0.3;
const EXTRAS_WEIGHT = 0.2;

export interface ToolCorrectnessMetricOptions {
  weight?: number;
}

export interface ToolCorrectnessBreakdown {
  presence: number;
  order: number;
  extras: number;
  extrasPenalty: number;
}

/**
 * 최장 공통 부분수열 길이
 */
export function longestCommonSubsequence(a: readonly string[], b: readonly string[]): number {
  let previous = new Array<number>(b.length + 1).fill(0);

  for (const left of a) {
    const current = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j++) {
      current[j] =
        left === b[j - 1]
          ? (previous[j - 1] ?? 0) + 1
          : Math.max(previous[j] ?? 0, current[j - 1] ?? 0);
    }
    previous = current;
  }

  return previous[b.length] ?? 0;
}

export function analyzeToolCalls(
  expected: readonly string[],
  actual: readonly string[]
): ToolCorrectnessBreakdown {
  const expectedSet = new Set(expected);
  const calledSet = new Set(actual);

  let presence = 1.0;
  let order = 1.0;
  if (expectedSet.size > 0) {
    let found = 0;
    for (const tool of expectedSet) {
      if (calledSet.has(tool)) found++;
    }
    presence = found / expectedSet.size;
    order = longestCommonSubsequence(expected, actual) / expected.length;
  }

  // 중복 호출도 각각 센다
  const extras = actual.filter((tool) => !expectedSet.has(tool)).length;
  const extrasPenalty = extras / (extras + Math.max(expected.length, 1));

  return { presence, order, extras, extrasPenalty };
}

/**
 * 기대 도구 호출과 실제 호출을 비교한다.
 *
 * - presence: 기대 도구 중 한 번 이상 호출된 비율
 * - order: 기대 순서가 실제 호출에 부분수열로 나타나는 정도 (사이에 낀 호출은 감점하지 않음)
 * - extras: 기대 집합에 없는 호출 수에 비례한 감점
 */
export class ToolCorrectnessMetric extends BaseMetric {
  constructor(options: ToolCorrectnessMetricOptions = {}) {
    super('tool_correctness', options.weight);
  }

  protected compute(scenario: Scenario, trace: ExecutionTrace): MetricEvaluation {
    const expected = scenario.expectedToolCalls;
    const actual = trace.toolCalls.map((call) => call.toolName);
    const { presence, order, extras, extrasPenalty } = analyzeToolCalls(expected, actual);

    const value =
      PRESENCE_WEIGHT * presence +
      ORDER_WEIGHT * order +
      EXTRAS_WEIGHT * (1 - extrasPenalty);

    return {
      value,
      explanation:
        `Presence: ${presence.toFixed(2)}, Order: ${order.toFixed(2)}, Extras: ${extras}, ` +
        `Expected: [${expected.join(', ')}], Actual: [${actual.join(', ')}]`,
    };
  }
}
