/**
 * AccuracyMetric 테스트
 */

import { describe, it, expect } from 'vitest';
import { AccuracyMetric } from '../../src/metrics/accuracy.js';
import { createScenario } from '../../src/suite.js';
import { createExecutionTrace } from '../../src/trace.js';
import { GradingConfigurationError } from '../../src/errors.js';

describe('AccuracyMetric', () => {
  const scenario = createScenario({
    name: 'lookup',
    expectedOutput: { city: 'Seoul', tags: ['capital'] },
  });

  it('구조적으로 같은 출력이면 1.0이어야 한다', () => {
    const score = new AccuracyMetric().score(
      scenario,
      createExecutionTrace({ output: { city: 'Seoul', tags: ['capital'] } })
    );

    expect(score).toEqual({
      metric: 'accuracy',
      value: 1,
      weight: 1,
      explanation: 'Match: true',
    });
  });

  it('다른 출력이면 0.0이어야 한다', () => {
    const score = new AccuracyMetric().score(
      scenario,
      createExecutionTrace({ output: { city: 'Busan', tags: ['capital'] } })
    );

    expect(score.value).toBe(0);
    expect(score.explanation).toBe('Match: false');
  });

  it('기대 출력이 없으면 1.0으로 건너뛰어야 한다', () => {
    const score = new AccuracyMetric().score(
      createScenario({ name: 'open-ended' }),
      createExecutionTrace({ output: 'anything' })
    );

    expect(score.value).toBe(1);
    expect(score.explanation).toBe('No expected output; skipped');
  });

  it('숫자를 돌려주는 comparator는 부분 점수가 되어야 한다', () => {
    const metric = new AccuracyMetric({ comparator: () => 0.5 });
    const score = metric.score(scenario, createExecutionTrace({ output: null }));

    expect(score.value).toBe(0.5);
    expect(score.explanation).toBe('Comparator score: 0.50');
  });

  it('comparator 점수는 [0, 1]로 제한되어야 한다', () => {
    const metric = new AccuracyMetric({ comparator: () => 1.7 });
    expect(metric.score(scenario, createExecutionTrace()).value).toBe(1);
  });

  it('boolean comparator를 지원해야 한다', () => {
    const metric = new AccuracyMetric({
      comparator: (actual, expected) => JSON.stringify(actual) === JSON.stringify(expected),
    });
    const score = metric.score(
      scenario,
      createExecutionTrace({ output: { city: 'Seoul', tags: ['capital'] } })
    );

    expect(score.value).toBe(1);
    expect(score.explanation).toBe('Match: true');
  });

  it('가중치를 반영해야 한다', () => {
    expect(new AccuracyMetric({ weight: 2.5 }).weight).toBe(2.5);
  });

  it('0 이하의 가중치는 거부해야 한다', () => {
    expect(() => new AccuracyMetric({ weight: 0 })).toThrow(GradingConfigurationError);
  });
});
