export {
  BaseMetric,
  assertPositiveWeight,
  inverseRatioDecay,
} from './metric.js';
export type { Metric, MetricEvaluation } from './metric.js';
export { AccuracyMetric } from './accuracy.js';
export type { AccuracyMetricOptions, OutputComparator } from './accuracy.js';
export {
  ToolCorrectnessMetric,
  analyzeToolCalls,
  longestCommonSubsequence,
} from './tool-correctness.js';
export type {
  ToolCorrectnessBreakdown,
  ToolCorrectnessMetricOptions,
} from './tool-correctness.js';
export { LatencyMetric } from './latency.js';
export type { LatencyMetricOptions } from './latency.js';
export { CostEfficiencyMetric } from './cost-efficiency.js';
export type { CostEfficiencyMetricOptions } from './cost-efficiency.js';
