export { EvalRunner } from './eval-runner.js';
export type { EvalLogger, EvalRunnerOptions } from './eval-runner.js';
export { isPipelineExecutor } from './executor.js';
export type { ExecuteOptions, PipelineExecutor } from './executor.js';
export { assertConcurrency, createConcurrencyLimiter } from './concurrency.js';
export type { ConcurrencyLimiter } from './concurrency.js';
export { runWithTimeout } from './timeout.js';
