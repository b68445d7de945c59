/**
 * Scenario / EvalSuite 생성 테스트
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_SCENARIO_TIMEOUT_MS,
  createEvalSuite,
  createScenario,
} from '../../src/suite.js';
import { SuiteConstructionError } from '../../src/errors.js';
import { captureError } from '../helpers.js';

describe('createScenario', () => {
  it('기본값을 채워야 한다', () => {
    const scenario = createScenario({ name: 'add' });

    expect(scenario.description).toBe('');
    expect(scenario.inputData).toEqual({});
    expect(scenario.expectedOutput).toBeUndefined();
    expect(scenario.expectedToolCalls).toEqual([]);
    expect(scenario.tags).toEqual([]);
    expect(scenario.timeoutMs).toBe(DEFAULT_SCENARIO_TIMEOUT_MS);
    expect(scenario.metadata).toEqual({});
  });

  it('생성된 시나리오는 동결되어야 한다', () => {
    const scenario = createScenario({
      name: 'add',
      inputData: { numbers: [1, 2] },
      expectedToolCalls: ['calculator'],
    });

    expect(Object.isFrozen(scenario)).toBe(true);
    expect(Object.isFrozen(scenario.inputData)).toBe(true);
    expect(Object.isFrozen(scenario.inputData['numbers'])).toBe(true);
    expect(Object.isFrozen(scenario.expectedToolCalls)).toBe(true);
  });

  it('입력 객체를 복사해야 한다', () => {
    const inputData: Record<string, unknown> = { a: 1 };
    const scenario = createScenario({ name: 'copy', inputData });

    inputData['a'] = 99;

    expect(scenario.inputData).toEqual({ a: 1 });
  });

  it('빈 이름은 거부해야 한다', () => {
    expect(() => createScenario({ name: '   ' })).toThrow(SuiteConstructionError);
  });

  it('0 이하의 타임아웃은 거부해야 한다', () => {
    expect(() => createScenario({ name: 'bad', timeoutMs: 0 })).toThrow(
      'Scenario "bad" has an invalid timeout: 0'
    );
  });

  it('빈 기대 도구 이름은 거부해야 한다', () => {
    const error = captureError(() =>
      createScenario({ name: 'tools', expectedToolCalls: ['search', ''] })
    );

    expect(error).toBeInstanceOf(SuiteConstructionError);
    if (error instanceof SuiteConstructionError) {
      expect(error.path).toBe('scenario.expectedToolCalls[1]');
    }
  });

  it('구조화 복제할 수 없는 입력은 거부해야 한다', () => {
    expect(() => createScenario({ name: 'fn', inputData: { callback: () => 1 } })).toThrow(
      SuiteConstructionError
    );
  });
});

describe('createEvalSuite', () => {
  it('시나리오 순서를 유지해야 한다', () => {
    const suite = createEvalSuite({
      name: 'math',
      scenarios: [{ name: 'add' }, { name: 'sub' }, { name: 'mul' }],
    });

    expect(suite.scenarios.map((s) => s.name)).toEqual(['add', 'sub', 'mul']);
    expect(Object.isFrozen(suite.scenarios)).toBe(true);
  });

  it('시나리오가 없는 스위트도 허용해야 한다', () => {
    const suite = createEvalSuite({ name: 'empty' });
    expect(suite.scenarios).toEqual([]);
  });

  it('중복된 시나리오 이름을 모두 보고해야 한다', () => {
    const error = captureError(() =>
      createEvalSuite({
        name: 'dup',
        scenarios: [{ name: 'a' }, { name: 'b' }, { name: 'a' }, { name: 'b' }, { name: 'c' }],
      })
    );

    expect(error).toBeInstanceOf(SuiteConstructionError);
    if (error instanceof SuiteConstructionError) {
      expect(error.duplicates).toEqual(['a', 'b']);
      expect(error.message).toBe('Duplicate scenario names in suite "dup": a, b');
      expect(error.code).toBe('SUITE_CONSTRUCTION_ERROR');
    }
  });

  it('잘못된 시나리오의 경로를 알려야 한다', () => {
    const error = captureError(() =>
      createEvalSuite({ name: 's', scenarios: [{ name: 'ok' }, { name: '' }] })
    );

    expect(error).toBeInstanceOf(SuiteConstructionError);
    if (error instanceof SuiteConstructionError) {
      expect(error.path).toBe('scenarios[1].name');
    }
  });

  it('빈 스위트 이름은 거부해야 한다', () => {
    expect(() => createEvalSuite({ name: '' })).toThrow('Suite name must be a non-empty string');
  });
});
