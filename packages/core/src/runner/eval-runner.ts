/**
 * Eval Runner - 스위트의 모든 시나리오를 하나의 executor로 실행하고 채점한다
 *
 * - 시나리오는 동시에 실행되며, maxConcurrency로 상한을 둘 수 있다
 * - 한 시나리오의 실패/타임아웃은 다른 시나리오에 영향을 주지 않는다
 * - 결과는 완료 순서가 아니라 스위트 선언 순서를 따른다
 */

import type {
  EvalSuite,
  ExecutionTrace,
  Scenario,
  ScenarioFailure,
  ScenarioResult,
  Score,
  SuiteResult,
} from '../types.js';
import type { Metric } from '../metrics/metric.js';
import { assertPositiveWeight } from '../metrics/metric.js';
import { Scorer } from '../grading/scorer.js';
import {
  ExecutorInfrastructureError,
  RunnerConfigurationError,
  ScenarioTimeoutError,
  describeError,
} from '../errors.js';
import { mergeCostBreakdowns } from '../cost.js';
import { aggregateSuiteLatency } from '../latency.js';
import { findTraceProblem, isExecutionTrace, withObservedLatency } from '../trace.js';
import { clampUnit } from '../utils/math.js';
import { deepFreeze } from '../utils/object.js';
import { isPipelineExecutor, type PipelineExecutor } from './executor.js';
import { assertConcurrency, createConcurrencyLimiter } from './concurrency.js';
import { runWithTimeout } from './timeout.js';

export type EvalLogger = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

export interface EvalRunnerOptions {
  executor: PipelineExecutor;
  metrics?: readonly Metric[];
  scorer?: Scorer;
  /** 동시에 실행할 시나리오 수 상한 (기본: 제한 없음) */
  maxConcurrency?: number;
  logger?: EvalLogger;
  /** 단조 증가 시계 (ms) */
  clock?: () => number;
}

export class EvalRunner {
  private readonly executor: PipelineExecutor;
  private readonly metrics: readonly Metric[];
  private readonly scorer: Scorer;
  private readonly maxConcurrency?: number;
  private readonly logger: EvalLogger;
  private readonly clock: () => number;

  constructor(options: EvalRunnerOptions) {
    if (!isPipelineExecutor(options.executor)) {
      throw new RunnerConfigurationError('executor must expose an execute(scenario) function');
    }
    if (options.maxConcurrency !== undefined) {
      assertConcurrency(options.maxConcurrency);
    }

    const metrics = options.metrics ?? [];
    for (const metric of metrics) {
      assertPositiveWeight(metric.weight, metric.name);
    }

    this.executor = options.executor;
    this.metrics = Object.freeze([...metrics]);
    this.scorer = options.scorer ?? new Scorer();
    this.maxConcurrency = options.maxConcurrency;
    this.logger = options.logger ?? console;
    this.clock = options.clock ?? (() => performance.now());
  }

  async runSuite(suite: EvalSuite): Promise<SuiteResult> {
    const startedAt = new Date().toISOString();
    const start = this.clock();
    const limit = createConcurrencyLimiter(
      this.maxConcurrency ?? Math.max(suite.scenarios.length, 1)
    );

    this.logger.debug(`Running suite "${suite.name}" (${suite.scenarios.length} scenarios)`);

    // 모두 시작 → 모두 대기 → 원래 인덱스 순서로 재조립
    const scenarioResults = await Promise.all(
      suite.scenarios.map((scenario) => limit(() => this.runScenario(scenario)))
    );

    const summary = this.scorer.summarize(scenarioResults);
    const result: SuiteResult = {
      suiteName: suite.name,
      scenarioResults,
      passRate: summary.passRate,
      passedCount: summary.passedCount,
      failedCount: summary.failedCount,
      meanScore: summary.meanScore,
      grade: summary.grade,
      totalCost: mergeCostBreakdowns(scenarioResults.map((r) => r.trace?.cost)),
      totalLatency: aggregateSuiteLatency(
        scenarioResults.map((r) => ({ totalMs: r.latencyMs, breakdown: r.trace?.latency }))
      ),
      startedAt,
      durationMs: this.clock() - start,
    };

    this.logger.debug(
      `Suite "${suite.name}" finished: ${summary.passedCount}/${scenarioResults.length} passed`
    );
    return deepFreeze(result);
  }

  /**
   * 시나리오 하나를 실행한다. reject하지 않는다.
   */
  async runScenario(scenario: Scenario): Promise<ScenarioResult> {
    const start = this.clock();
    let trace: ExecutionTrace;

    try {
      const produced = await runWithTimeout(
        (signal) => this.invokeExecutor(scenario, signal),
        scenario.timeoutMs,
        scenario.name
      );
      trace = withObservedLatency(produced, this.clock() - start);
    } catch (error) {
      return this.failedResult(scenario, error, this.clock() - start);
    }

    return this.scoreTrace(scenario, trace);
  }

  private async invokeExecutor(scenario: Scenario, signal: AbortSignal): Promise<ExecutionTrace> {
    let produced: unknown;
    try {
      produced = await this.executor.execute(scenario, { signal });
    } catch (error) {
      throw new ExecutorInfrastructureError(
        `Executor failed on scenario "${scenario.name}": ${describeError(error)}`,
        { cause: error, scenarioName: scenario.name }
      );
    }

    if (!isExecutionTrace(produced)) {
      throw new ExecutorInfrastructureError(
        `Executor returned an invalid trace for scenario "${scenario.name}": ` +
          `${findTraceProblem(produced) ?? 'unknown shape'}`,
        { scenarioName: scenario.name }
      );
    }
    return Object.isFrozen(produced) ? produced : this.snapshot(scenario, produced);
  }

  /**
   * executor가 계속 쥐고 있는 trace를 복사해 동결한다.
   */
  private snapshot(scenario: Scenario, trace: ExecutionTrace): ExecutionTrace {
    try {
      return deepFreeze(structuredClone(trace));
    } catch (error) {
      throw new ExecutorInfrastructureError(
        `Executor returned a trace that cannot be copied for scenario "${scenario.name}": ` +
          describeError(error),
        { cause: error, scenarioName: scenario.name }
      );
    }
  }

  private scoreTrace(scenario: Scenario, trace: ExecutionTrace): ScenarioResult {
    const scores = this.metrics.map((metric) => this.safeScore(metric, scenario, trace));
    const verdict = this.scorer.judge(scores);

    const failedChecks = trace.success
      ? verdict.failedChecks
      : [`pipeline failed: ${trace.error ?? 'no error detail'}`, ...verdict.failedChecks];

    this.logger.debug(
      `Scenario "${scenario.name}": overall ${verdict.overallScore.toFixed(3)}, ` +
        `${trace.success && verdict.passed ? 'passed' : 'failed'}`
    );

    const result: ScenarioResult = {
      scenarioName: scenario.name,
      scores,
      overallScore: verdict.overallScore,
      passed: trace.success && verdict.passed,
      grade: verdict.grade,
      failedChecks,
      trace,
      latencyMs: trace.latency?.totalMs ?? 0,
    };
    return deepFreeze(result);
  }

  /**
   * metric 하나의 오류가 평가 전체를 중단시키지 않도록 0.0 점수로 복구한다.
   */
  private safeScore(metric: Metric, scenario: Scenario, trace: ExecutionTrace): Score {
    try {
      const score = metric.score(scenario, trace);
      return Object.freeze({ ...score, value: clampUnit(score.value) });
    } catch (error) {
      const message = describeError(error);
      this.logger.warn(`Metric "${metric.name}" failed on scenario "${scenario.name}": ${message}`);
      return Object.freeze({
        metric: metric.name,
        value: 0,
        weight: metric.weight,
        explanation: `Metric error: ${message}`,
      });
    }
  }

  private failedResult(scenario: Scenario, error: unknown, elapsedMs: number): ScenarioResult {
    const kind: ScenarioFailure['kind'] =
      error instanceof ScenarioTimeoutError ? 'timeout' : 'infrastructure';
    const message = describeError(error);
    this.logger.warn(message);

    const explanation =
      kind === 'timeout' ? `Scenario timed out: ${message}` : `Executor failure: ${message}`;
    const scores: Score[] = this.metrics.map((metric) =>
      Object.freeze({ metric: metric.name, value: 0, weight: metric.weight, explanation })
    );

    const result: ScenarioResult = {
      scenarioName: scenario.name,
      scores,
      overallScore: 0,
      passed: false,
      grade: this.scorer.gradeFor(0),
      failedChecks: [message],
      failure: { kind, message },
      latencyMs: Math.max(0, elapsedMs),
    };
    return deepFreeze(result);
  }
}
