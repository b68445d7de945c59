/**
 * Comparison Runner - 같은 스위트를 여러 executor로 실행해 순위를 매긴다
 *
 * 모든 executor는 동일한(동결된) Scenario 객체를 받는다.
 * 한 executor의 실패는 다른 executor의 평가를 중단시키지 않는다.
 */

import type {
  ComparisonResult,
  EvalSuite,
  ExcludedExecutor,
  SuiteResult,
} from '../types.js';
import type { Metric } from '../metrics/metric.js';
import { Scorer } from '../grading/scorer.js';
import { describeError } from '../errors.js';
import { deepFreeze } from '../utils/object.js';
import { EvalRunner, type EvalLogger } from '../runner/eval-runner.js';
import { assertConcurrency } from '../runner/concurrency.js';
import { isPipelineExecutor, type PipelineExecutor } from '../runner/executor.js';
import { rankCandidates, type RankingCandidate } from './ranking.js';

export interface ComparisonRunnerOptions {
  metrics?: readonly Metric[];
  scorer?: Scorer;
  /** executor별 실행에 각각 적용되는 동시성 상한 */
  maxConcurrency?: number;
  logger?: EvalLogger;
  /** true이면 executor를 하나씩 순서대로 실행 */
  sequential?: boolean;
  clock?: () => number;
}

type ExecutorOutcome =
  | { executorId: string; status: 'completed'; result: SuiteResult }
  | { executorId: string; status: 'excluded'; reason: string; result?: SuiteResult };

/**
 * 모든 시나리오가 인프라 오류로 실패했다면 executor 자체를 쓸 수 없는 것으로 본다.
 */
function unusableReason(result: SuiteResult): string | undefined {
  const results = result.scenarioResults;
  if (results.length === 0) return undefined;
  if (!results.every((r) => r.failure?.kind === 'infrastructure')) return undefined;
  const first = results[0]?.failure?.message ?? 'unknown error';
  return `Executor failed on every scenario (${first})`;
}

export class ComparisonRunner {
  private readonly metrics: readonly Metric[];
  private readonly scorer: Scorer;
  private readonly maxConcurrency?: number;
  private readonly logger: EvalLogger;
  private readonly sequential: boolean;
  private readonly clock?: () => number;

  constructor(options: ComparisonRunnerOptions = {}) {
    if (options.maxConcurrency !== undefined) {
      assertConcurrency(options.maxConcurrency);
    }
    this.metrics = Object.freeze([...(options.metrics ?? [])]);
    this.scorer = options.scorer ?? new Scorer();
    this.maxConcurrency = options.maxConcurrency;
    this.logger = options.logger ?? console;
    this.sequential = options.sequential ?? false;
    this.clock = options.clock;
  }

  async compare(
    suite: EvalSuite,
    executors: Readonly<Record<string, PipelineExecutor>>
  ): Promise<ComparisonResult> {
    const entries = Object.entries(executors);
    this.logger.debug(`Comparing ${entries.length} executor(s) on suite "${suite.name}"`);

    const outcomes: ExecutorOutcome[] = [];
    if (this.sequential) {
      for (const [executorId, executor] of entries) {
        outcomes.push(await this.evaluate(suite, executorId, executor));
      }
    } else {
      outcomes.push(
        ...(await Promise.all(
          entries.map(([executorId, executor]) => this.evaluate(suite, executorId, executor))
        ))
      );
    }

    const results: Record<string, SuiteResult> = {};
    const excluded: ExcludedExecutor[] = [];
    const candidates: RankingCandidate[] = [];

    for (const outcome of outcomes) {
      if (outcome.result) {
        results[outcome.executorId] = outcome.result;
      }
      if (outcome.status === 'excluded') {
        this.logger.warn(`Executor "${outcome.executorId}" excluded: ${outcome.reason}`);
        excluded.push({ executorId: outcome.executorId, reason: outcome.reason });
      } else {
        candidates.push({ executorId: outcome.executorId, result: outcome.result });
      }
    }

    const decision = rankCandidates(candidates);
    const comparison: ComparisonResult = {
      suiteName: suite.name,
      results,
      standings: decision.standings,
      winner: decision.winner,
      criterion: decision.criterion,
      tiedExecutors: decision.tiedExecutors,
      excluded,
    };
    return deepFreeze(comparison);
  }

  private async evaluate(
    suite: EvalSuite,
    executorId: string,
    executor: PipelineExecutor
  ): Promise<ExecutorOutcome> {
    if (!isPipelineExecutor(executor)) {
      return {
        executorId,
        status: 'excluded',
        reason: 'Executor does not expose an execute(scenario) function',
      };
    }

    let result: SuiteResult;
    try {
      const runner = new EvalRunner({
        executor,
        metrics: this.metrics,
        scorer: this.scorer,
        maxConcurrency: this.maxConcurrency,
        logger: this.logger,
        clock: this.clock,
      });
      result = await runner.runSuite(suite);
    } catch (error) {
      return { executorId, status: 'excluded', reason: `Run failed: ${describeError(error)}` };
    }

    const reason = unusableReason(result);
    if (reason) {
      return { executorId, status: 'excluded', reason, result };
    }
    return { executorId, status: 'completed', result };
  }
}
