/**
 * AgentPipelineAdapter - 멀티 에이전트 파이프라인 객체를 executor로 감싼다
 *
 * 파이프라인의 각 step(에이전트 실행 결과)을 trace로 옮긴다.
 * - step이 보고한 도구 호출은 해당 에이전트 이름으로 귀속
 * - 도구 호출을 보고하지 않은 step은 step 자체를 하나의 호출로 기록
 * - step의 costUsd는 에이전트의 모델 사용 비용
 * - 전체 지연 시간은 adapter가 직접 측정
 */

import type { ExecutionTrace, Scenario } from '../types.js';
import type { PipelineExecutor } from '../runner/executor.js';
import {
  createExecutionTrace,
  type ModelChargeInit,
  type ToolCallInit,
} from '../trace.js';
import { addToRecord } from '../utils/object.js';

export interface PipelineToolCall {
  toolName: string;
  arguments?: Record<string, unknown>;
  result?: unknown;
  success?: boolean;
  error?: string;
  durationMs?: number;
  costUsd?: number;
  tokenCount?: number;
}

export interface PipelineStepResult {
  agentName: string;
  success: boolean;
  error?: string | null;
  durationMs: number;
  costUsd?: number;
  inputTokens?: number;
  outputTokens?: number;
  toolCalls?: readonly PipelineToolCall[];
}

export interface PipelineRunResult {
  success: boolean;
  outputs: unknown;
  steps: readonly PipelineStepResult[];
}

export interface AgentPipeline {
  execute(context: unknown): Promise<PipelineRunResult>;
}

export interface PipelineContext {
  data: Readonly<Record<string, unknown>>;
}

export interface AgentPipelineAdapterOptions {
  buildContext?: (scenario: Scenario) => unknown;
  extractOutput?: (result: PipelineRunResult, context: unknown) => unknown;
  clock?: () => number;
}

function defaultContext(scenario: Scenario): PipelineContext {
  return { data: scenario.inputData };
}

function toToolCalls(step: PipelineStepResult): ToolCallInit[] {
  if (!step.toolCalls || step.toolCalls.length === 0) {
    return [
      {
        toolName: step.agentName,
        agentId: step.agentName,
        success: step.success,
        ...(step.error ? { error: step.error } : {}),
        durationMs: step.durationMs,
      },
    ];
  }

  return step.toolCalls.map((call) => ({ ...call, agentId: step.agentName }));
}

function toModelCharge(step: PipelineStepResult): ModelChargeInit | undefined {
  if (step.costUsd === undefined) return undefined;
  return {
    agentId: step.agentName,
    costUsd: step.costUsd,
    inputTokens: step.inputTokens,
    outputTokens: step.outputTokens,
  };
}

function firstError(steps: readonly PipelineStepResult[]): string | undefined {
  for (const step of steps) {
    if (!step.success && step.error) {
      return step.error;
    }
  }
  return undefined;
}

export class AgentPipelineAdapter implements PipelineExecutor {
  private readonly pipeline: AgentPipeline;
  private readonly buildContext: (scenario: Scenario) => unknown;
  private readonly extractOutput: (result: PipelineRunResult, context: unknown) => unknown;
  private readonly clock: () => number;

  constructor(pipeline: AgentPipeline, options: AgentPipelineAdapterOptions = {}) {
    this.pipeline = pipeline;
    this.buildContext = options.buildContext ?? defaultContext;
    this.extractOutput = options.extractOutput ?? ((result) => result.outputs);
    this.clock = options.clock ?? (() => performance.now());
  }

  async execute(scenario: Scenario): Promise<ExecutionTrace> {
    const context = this.buildContext(scenario);

    const start = this.clock();
    const result = await this.pipeline.execute(context);
    const elapsedMs = Math.max(0, this.clock() - start);

    const agentLatencyMs: Record<string, number> = {};
    const modelCharges: ModelChargeInit[] = [];
    for (const step of result.steps) {
      addToRecord(agentLatencyMs, step.agentName, step.durationMs);
      const charge = toModelCharge(step);
      if (charge) modelCharges.push(charge);
    }

    const error = result.success ? undefined : firstError(result.steps) ?? 'Pipeline failed';

    return createExecutionTrace({
      output: this.extractOutput(result, context),
      success: result.success,
      ...(error !== undefined ? { error } : {}),
      toolCalls: result.steps.flatMap(toToolCalls),
      modelCharges,
      totalLatencyMs: elapsedMs,
      agentLatencyMs,
    });
  }
}
