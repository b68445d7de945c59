/**
 * TraceGrade Core - 멀티 에이전트 파이프라인 평가 엔진
 *
 * @packageDocumentation
 */

// Types
export * from './types.js';

// Errors
export * from './errors.js';

// Data model
export { DEFAULT_SCENARIO_TIMEOUT_MS, createEvalSuite, createScenario } from './suite.js';
export type { EvalSuiteInit, ScenarioInit } from './suite.js';
export {
  createExecutionTrace,
  findTraceProblem,
  isExecutionTrace,
  withObservedLatency,
} from './trace.js';
export type { ExecutionTraceInit, ModelChargeInit, ToolCallInit } from './trace.js';
export {
  EMPTY_COST,
  MODEL_USAGE_TOOL,
  UNATTRIBUTED_AGENT,
  createCostBreakdown,
  isCostBreakdownConsistent,
  mergeCostBreakdowns,
} from './cost.js';
export type { CostEntry } from './cost.js';
export { aggregateSuiteLatency } from './latency.js';
export type { ScenarioLatencySample } from './latency.js';

// Utilities
export { isRecord } from './utils/object.js';

// Metrics
export * from './metrics/index.js';

// Grading
export * from './grading/index.js';

// Runner
export * from './runner/index.js';

// Comparison
export * from './comparison/index.js';

// Adapters
export * from './adapters/index.js';
