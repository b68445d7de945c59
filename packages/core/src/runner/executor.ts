/**
 * Pipeline Executor 계약
 *
 * 평가 대상 파이프라인과 평가 엔진 사이의 유일한 결합 지점이다.
 * execute를 가진 객체라면 무엇이든 executor가 된다 (기반 클래스 없음).
 */

import type { ExecutionTrace, Scenario } from '../types.js';
import { isRecord } from '../utils/object.js';

export interface ExecuteOptions {
  /** 시나리오 타임아웃 시 abort된다. 진행 중인 호출 정리는 executor의 책임이다 */
  readonly signal: AbortSignal;
}

/**
 * 파이프라인 실패는 success: false trace로 돌려준다.
 * throw/reject는 인프라 오류로 취급된다.
 */
export interface PipelineExecutor {
  execute(scenario: Scenario, options?: ExecuteOptions): Promise<ExecutionTrace>;
}

export function isPipelineExecutor(value: unknown): value is PipelineExecutor {
  return isRecord(value) && typeof value['execute'] === 'function';
}
