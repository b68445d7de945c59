/**
 * ToolCorrectnessMetric 테스트
 */

import { describe, it, expect } from 'vitest';
import {
  ToolCorrectnessMetric,
  analyzeToolCalls,
  longestCommonSubsequence,
} from '../../src/metrics/tool-correctness.js';
import { createScenario } from '../../src/suite.js';
import { createExecutionTrace } from '../../src/trace.js';

function scoreFor(expected: string[], actual: string[]): number {
  const scenario = createScenario({ name: 'tools', expectedToolCalls: expected });
  const trace = createExecutionTrace({ toolCalls: actual.map((toolName) => ({ toolName })) });
  return new ToolCorrectnessMetric().score(scenario, trace).value;
}

describe('longestCommonSubsequence', () => {
  it('최장 공통 부분수열 길이를 계산해야 한다', () => {
    expect(longestCommonSubsequence(['a', 'b', 'c', 'd', 'e'], ['a', 'c', 'e'])).toBe(3);
    expect(longestCommonSubsequence(['a', 'b'], ['b', 'a'])).toBe(1);
    expect(longestCommonSubsequence([], ['a'])).toBe(0);
  });
});

describe('analyzeToolCalls', () => {
  it('사이에 낀 호출은 순서 점수를 깎지 않아야 한다', () => {
    expect(analyzeToolCalls(['a', 'b'], ['a', 'x', 'b'])).toEqual({
      presence: 1,
      order: 1,
      extras: 1,
      extrasPenalty: 1 / 3,
    });
  });

  it('중복된 예상 외 호출도 각각 세야 한다', () => {
    expect(analyzeToolCalls(['a'], ['a', 'x', 'x']).extras).toBe(2);
  });
});

describe('ToolCorrectnessMetric', () => {
  it('기대 순서와 정확히 같으면 1.0이어야 한다', () => {
    const scenario = createScenario({ name: 'exact', expectedToolCalls: ['search', 'summarize'] });
    const trace = createExecutionTrace({
      toolCalls: [{ toolName: 'search' }, { toolName: 'summarize' }],
    });

    const score = new ToolCorrectnessMetric().score(scenario, trace);

    expect(score.metric).toBe('tool_correctness');
    expect(score.value).toBe(1);
    expect(score.explanation).toBe(
      'Presence: 1.00, Order: 1.00, Extras: 0, ' +
        'Expected: [search, summarize], Actual: [search, summarize]'
    );
  });

  it('순서가 바뀌면 순서 점수만 감점되어야 한다', () => {
    // 0.5 * 1 + 0.3 * 0.5 + 0.2 * 1
    expect(scoreFor(['a', 'b'], ['b', 'a'])).toBeCloseTo(0.85, 10);
  });

  it('아무 도구도 호출하지 않으면 extras 점수만 남아야 한다', () => {
    expect(scoreFor(['a', 'b'], [])).toBeCloseTo(0.2, 10);
  });

  it('기대 호출이 없으면 presence와 order는 만점이어야 한다', () => {
    expect(scoreFor([], [])).toBe(1);
    // extras 1개: penalty = 1 / (1 + 1)
    expect(scoreFor([], ['x'])).toBeCloseTo(0.9, 10);
  });

  it('예상 외 호출이 늘어날수록 점수가 엄격히 감소해야 한다', () => {
    const values: number[] = [];
    for (let extras = 0; extras <= 6; extras++) {
      values.push(scoreFor(['a', 'b'], ['a', 'b', ...Array<string>(extras).fill('noise')]));
    }

    for (let i = 1; i < values.length; i++) {
      expect(values[i]).toBeLessThan(values[i - 1] ?? Number.POSITIVE_INFINITY);
    }
    expect(values.every((v) => v >= 0 && v <= 1)).toBe(true);
  });

  it('일부만 호출하면 presence가 비례해야 한다', () => {
    // presence 0.5, order 0.5, extras 0
    expect(scoreFor(['a', 'b'], ['a'])).toBeCloseTo(0.25 + 0.15 + 0.2, 10);
  });
});
