/**
 * Scenario / EvalSuite 생성과 구조 검증
 *
 * 잘못된 스위트는 실행 전에 SuiteConstructionError로 거부된다.
 */

import type { EvalSuite, Scenario } from './types.js';
import { SuiteConstructionError } from './errors.js';
import { deepFreeze } from './utils/object.js';

export const DEFAULT_SCENARIO_TIMEOUT_MS = 30_000;

export interface ScenarioInit {
  name: string;
  description?: string;
  inputData?: Record<string, unknown>;
  expectedOutput?: unknown;
  expectedToolCalls?: readonly string[];
  tags?: readonly string[];
  timeoutMs?: number;
  metadata?: Record<string, unknown>;
}

export interface EvalSuiteInit {
  name: string;
  description?: string;
  scenarios?: readonly ScenarioInit[];
  tags?: readonly string[];
  metadata?: Record<string, unknown>;
}

function validateScenario(init: ScenarioInit, path: string): void {
  if (typeof init.name !== 'string' || init.name.trim().length === 0) {
    throw new SuiteConstructionError('Scenario name must be a non-empty string', {
      path: `${path}.name`,
    });
  }

  const timeoutMs = init.timeoutMs ?? DEFAULT_SCENARIO_TIMEOUT_MS;
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new SuiteConstructionError(
      `Scenario "${init.name}" has an invalid timeout: ${timeoutMs}`,
      { path: `${path}.timeoutMs`, suggestion: 'timeoutMs는 0보다 큰 밀리초 값이어야 합니다.' }
    );
  }

  const expected = init.expectedToolCalls ?? [];
  expected.forEach((tool, index) => {
    if (typeof tool !== 'string' || tool.length === 0) {
      throw new SuiteConstructionError(
        `Scenario "${init.name}" has an invalid expected tool call at index ${index}`,
        { path: `${path}.expectedToolCalls[${index}]` }
      );
    }
  });
}

function cloneValue<T>(value: T, path: string): T {
  try {
    return structuredClone(value);
  } catch (error) {
    throw new SuiteConstructionError(`${path} must contain only structured data`, {
      path,
      cause: error,
    });
  }
}

function buildScenario(init: ScenarioInit, path: string): Scenario {
  validateScenario(init, path);

  const scenario: Scenario = {
    name: init.name,
    description: init.description ?? '',
    inputData: cloneValue(init.inputData ?? {}, `${path}.inputData`),
    ...(init.expectedOutput !== undefined
      ? { expectedOutput: cloneValue(init.expectedOutput, `${path}.expectedOutput`) }
      : {}),
    expectedToolCalls: [...(init.expectedToolCalls ?? [])],
    tags: [...(init.tags ?? [])],
    timeoutMs: init.timeoutMs ?? DEFAULT_SCENARIO_TIMEOUT_MS,
    metadata: cloneValue(init.metadata ?? {}, `${path}.metadata`),
  };

  return deepFreeze(scenario);
}

/**
 * 시나리오를 생성한다. 입력값은 복사된 뒤 동결된다.
 */
export function createScenario(init: ScenarioInit): Scenario {
  return buildScenario(init, 'scenario');
}

function findDuplicates(names: readonly string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      duplicates.add(name);
    }
    seen.add(name);
  }
  return [...duplicates];
}

/**
 * 스위트를 생성한다.
 *
 * - 이름이 비어 있으면 거부
 * - 각 시나리오 검증
 * - 시나리오 이름 중복 시 모든 중복 이름을 담아 거부
 */
export function createEvalSuite(init: EvalSuiteInit): EvalSuite {
  if (typeof init.name !== 'string' || init.name.trim().length === 0) {
    throw new SuiteConstructionError('Suite name must be a non-empty string', { path: 'name' });
  }

  const scenarios = (init.scenarios ?? []).map((scenario, index) =>
    buildScenario(scenario, `scenarios[${index}]`)
  );

  const duplicates = findDuplicates(scenarios.map((s) => s.name));
  if (duplicates.length > 0) {
    throw new SuiteConstructionError(
      `Duplicate scenario names in suite "${init.name}": ${duplicates.join(', ')}`,
      {
        path: 'scenarios',
        duplicates,
        suggestion: '스위트 안에서 시나리오 이름은 유일해야 합니다.',
      }
    );
  }

  return deepFreeze({
    name: init.name,
    description: init.description ?? '',
    scenarios,
    tags: [...(init.tags ?? [])],
    metadata: cloneValue(init.metadata ?? {}, 'metadata'),
  });
}
