/**
 * ExecutionTrace 생성 도구
 *
 * executor는 createExecutionTrace로 trace를 만든다.
 * 도구 호출 위치, 비용 귀속, 도구별 지연 시간은 여기서 파생된다.
 */

import type { ExecutionTrace, LatencyBreakdown, ToolCallRecord } from './types.js';
import { createCostBreakdown, type CostEntry } from './cost.js';
import { addToRecord, deepFreeze, isRecord } from './utils/object.js';

/** 도구 호출 입력 */
export interface ToolCallInit {
  toolName: string;
  agentId?: string;
  arguments?: Record<string, unknown>;
  result?: unknown;
  success?: boolean;
  error?: string;
  durationMs?: number;
  /** 비용이 없으면 생략 (비용 데이터 없음과 0달러는 구분된다) */
  costUsd?: number;
  tokenCount?: number;
}

/** 도구 호출이 아닌 에이전트의 모델 사용 비용 */
export interface ModelChargeInit {
  agentId: string;
  costUsd: number;
  inputTokens?: number;
  outputTokens?: number;
}

export interface ExecutionTraceInit {
  output?: unknown;
  /** 기본값: error가 없으면 true */
  success?: boolean;
  error?: string;
  toolCalls?: readonly ToolCallInit[];
  modelCharges?: readonly ModelChargeInit[];
  /** 전체 지연 시간. 생략하면 latency가 없는 trace가 된다 */
  totalLatencyMs?: number;
  agentLatencyMs?: Readonly<Record<string, number>>;
}

function assertNonNegative(value: number, label: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new RangeError(`${label} must be a non-negative finite number (got ${value})`);
  }
}

/**
 * executor가 계속 소유하는 값과 분리된 복사본을 만든다.
 */
function copyStructured<T>(value: T, path: string): T {
  try {
    return structuredClone(value);
  } catch (error) {
    throw new TypeError(`${path} must contain only structured data`, { cause: error });
  }
}

function toToolCallRecord(init: ToolCallInit, position: number): ToolCallRecord {
  const durationMs = init.durationMs ?? 0;
  const costUsd = init.costUsd ?? 0;
  assertNonNegative(durationMs, `toolCalls[${position}].durationMs`);
  assertNonNegative(costUsd, `toolCalls[${position}].costUsd`);

  return {
    toolName: init.toolName,
    position,
    ...(init.agentId !== undefined ? { agentId: init.agentId } : {}),
    arguments: copyStructured(init.arguments ?? {}, `toolCalls[${position}].arguments`),
    ...(init.result !== undefined
      ? { result: copyStructured(init.result, `toolCalls[${position}].result`) }
      : {}),
    success: init.success ?? init.error === undefined,
    ...(init.error !== undefined ? { error: init.error } : {}),
    durationMs,
    costUsd,
    tokenCount: init.tokenCount ?? 0,
  };
}

function collectCostEntries(init: ExecutionTraceInit): CostEntry[] {
  const entries: CostEntry[] = [];

  for (const call of init.toolCalls ?? []) {
    if (call.costUsd === undefined) continue;
    entries.push({ usd: call.costUsd, agentId: call.agentId, toolId: call.toolName });
  }
  for (const charge of init.modelCharges ?? []) {
    entries.push({
      usd: charge.costUsd,
      agentId: charge.agentId,
      inputTokens: charge.inputTokens,
      outputTokens: charge.outputTokens,
    });
  }

  return entries;
}

function buildLatency(
  totalMs: number,
  toolCalls: readonly ToolCallRecord[],
  agentLatencyMs: Readonly<Record<string, number>> = {}
): LatencyBreakdown {
  assertNonNegative(totalMs, 'totalLatencyMs');

  const perTool: Record<string, number> = {};
  for (const call of toolCalls) {
    addToRecord(perTool, call.toolName, call.durationMs);
  }

  const perAgent: Record<string, number> = {};
  for (const [agent, ms] of Object.entries(agentLatencyMs)) {
    assertNonNegative(ms, `agentLatencyMs.${agent}`);
    perAgent[agent] = ms;
  }

  return { totalMs, perAgent, perTool };
}

export function createExecutionTrace(init: ExecutionTraceInit = {}): ExecutionTrace {
  const toolCalls = (init.toolCalls ?? []).map(toToolCallRecord);
  const costEntries = collectCostEntries(init);

  const trace: ExecutionTrace = {
    output: copyStructured(init.output, 'output'),
    success: init.success ?? init.error === undefined,
    toolCalls,
    ...(costEntries.length > 0 ? { cost: createCostBreakdown(costEntries) } : {}),
    ...(init.totalLatencyMs !== undefined
      ? { latency: buildLatency(init.totalLatencyMs, toolCalls, init.agentLatencyMs) }
      : {}),
    ...(init.error !== undefined ? { error: init.error } : {}),
  };

  return deepFreeze(trace);
}

/**
 * 관측된 지연 시간을 붙인 새 trace를 만든다. 원본 trace는 변경하지 않는다.
 */
export function withObservedLatency(trace: ExecutionTrace, elapsedMs: number): ExecutionTrace {
  if (trace.latency) {
    return trace;
  }
  return deepFreeze({
    ...trace,
    latency: buildLatency(Math.max(0, elapsedMs), trace.toolCalls),
  });
}

function isNumberRecord(value: unknown): boolean {
  return isRecord(value) && Object.values(value).every((entry) => typeof entry === 'number');
}

function findToolCallProblem(call: unknown, path: string): string | undefined {
  if (!isRecord(call)) return `${path} must be an object`;
  if (typeof call['toolName'] !== 'string') return `${path}.toolName must be a string`;
  for (const key of ['position', 'durationMs', 'costUsd', 'tokenCount']) {
    if (typeof call[key] !== 'number') return `${path}.${key} must be a number`;
  }
  if (typeof call['success'] !== 'boolean') return `${path}.success must be a boolean`;
  if (!isRecord(call['arguments'])) return `${path}.arguments must be an object`;
  if (call['agentId'] !== undefined && typeof call['agentId'] !== 'string') {
    return `${path}.agentId must be a string`;
  }
  if (call['error'] !== undefined && typeof call['error'] !== 'string') {
    return `${path}.error must be a string`;
  }
  return undefined;
}

function findBreakdownProblem(
  value: unknown,
  path: string,
  numericKeys: readonly string[]
): string | undefined {
  if (value === undefined) return undefined;
  if (!isRecord(value)) return `${path} must be an object`;
  for (const key of numericKeys) {
    if (typeof value[key] !== 'number') return `${path}.${key} must be a number`;
  }
  for (const key of ['perAgent', 'perTool']) {
    if (!isNumberRecord(value[key])) return `${path}.${key} must map names to numbers`;
  }
  return undefined;
}

/**
 * trace 형태가 아닌 첫 번째 이유를 돌려준다. 올바른 trace면 undefined.
 */
export function findTraceProblem(value: unknown): string | undefined {
  if (!isRecord(value)) return 'trace must be an object';
  if (typeof value['success'] !== 'boolean') return 'success must be a boolean';
  if (value['error'] !== undefined && typeof value['error'] !== 'string') {
    return 'error must be a string';
  }

  const toolCalls = value['toolCalls'];
  if (!Array.isArray(toolCalls)) return 'toolCalls must be an array';
  for (const [index, call] of toolCalls.entries()) {
    const problem = findToolCallProblem(call, `toolCalls[${index}]`);
    if (problem) return problem;
  }

  return (
    findBreakdownProblem(value['cost'], 'cost', ['totalUsd', 'inputTokens', 'outputTokens']) ??
    findBreakdownProblem(value['latency'], 'latency', ['totalMs'])
  );
}

/**
 * executor가 돌려준 값이 trace 형태인지 검사한다.
 */
export function isExecutionTrace(value: unknown): value is ExecutionTrace {
  return findTraceProblem(value) === undefined;
}
