/**
 * 함수 하나를 PipelineExecutor로 감싼다
 */

import type { ExecutionTrace, Scenario } from '../types.js';
import type { ExecuteOptions, PipelineExecutor } from '../runner/executor.js';
import { createExecutionTrace, isExecutionTrace, type ExecutionTraceInit } from '../trace.js';

export type ExecutorFunction = (
  scenario: Scenario,
  options?: ExecuteOptions
) => Promise<ExecutionTrace | ExecutionTraceInit>;

const INIT_ONLY_KEYS = ['modelCharges', 'totalLatencyMs', 'agentLatencyMs'] as const;

/**
 * 완성된 trace인지 판별한다. init 전용 필드가 있으면 init으로 본다.
 */
function isCompleteTrace(value: ExecutionTrace | ExecutionTraceInit): value is ExecutionTrace {
  return isExecutionTrace(value) && !INIT_ONLY_KEYS.some((key) => key in value);
}

export function createExecutor(fn: ExecutorFunction): PipelineExecutor {
  return {
    async execute(scenario, options) {
      const produced = await fn(scenario, options);
      return isCompleteTrace(produced) ? produced : createExecutionTrace(produced);
    },
  };
}
