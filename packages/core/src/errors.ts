/**
 * 평가 엔진 오류 타입 정의
 *
 * 구성 시점 오류(SuiteConstructionError, GradingConfigurationError,
 * RunnerConfigurationError)만 실행 전에 전파된다.
 * 나머지는 Runner가 결과 객체로 복구한다.
 */

/**
 * 평가 오류의 기본 클래스
 */
export class EvalError extends Error {
  readonly code: string;
  readonly errorCause?: unknown;
  /** 사용자에게 다음 행동을 안내하는 메시지 */
  readonly suggestion?: string;

  constructor(
    message: string,
    options: { code?: string; cause?: unknown; suggestion?: string } = {}
  ) {
    super(message);
    this.name = 'EvalError';
    this.code = options.code ?? 'EVAL_ERROR';
    if (options.cause !== undefined) {
      this.errorCause = options.cause;
    }
    this.suggestion = options.suggestion;

    // Error 프로토타입 체인 복원
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * SuiteConstructionError 옵션
 */
export interface SuiteConstructionErrorOptions {
  cause?: unknown;
  /** 문제 필드 경로 (예: scenarios[1].name) */
  path?: string;
  /** 중복된 시나리오 이름 */
  duplicates?: readonly string[];
  suggestion?: string;
}

/**
 * 스위트/시나리오 구조 불변식 위반
 */
export class SuiteConstructionError extends EvalError {
  readonly path?: string;
  readonly duplicates: readonly string[];

  constructor(message: string, options: SuiteConstructionErrorOptions = {}) {
    super(message, {
      code: 'SUITE_CONSTRUCTION_ERROR',
      cause: options.cause,
      suggestion: options.suggestion,
    });
    this.name = 'SuiteConstructionError';
    this.path = options.path;
    this.duplicates = options.duplicates ?? [];

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * 가중치/threshold/등급 구간 설정 오류
 */
export class GradingConfigurationError extends EvalError {
  /** 문제 설정 키 */
  readonly setting?: string;

  constructor(message: string, options: { setting?: string; suggestion?: string } = {}) {
    super(message, { code: 'GRADING_CONFIGURATION_ERROR', suggestion: options.suggestion });
    this.name = 'GradingConfigurationError';
    this.setting = options.setting;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Runner 설정 오류 (동시성 상한 등)
 */
export class RunnerConfigurationError extends EvalError {
  constructor(message: string, options: { suggestion?: string } = {}) {
    super(message, { code: 'RUNNER_CONFIGURATION_ERROR', suggestion: options.suggestion });
    this.name = 'RunnerConfigurationError';

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * 시나리오 실행 시간 초과
 */
export class ScenarioTimeoutError extends EvalError {
  readonly scenarioName: string;
  readonly timeoutMs: number;

  constructor(scenarioName: string, timeoutMs: number) {
    super(`Scenario "${scenarioName}" timed out after ${timeoutMs}ms`, {
      code: 'SCENARIO_TIMEOUT',
    });
    this.name = 'ScenarioTimeoutError';
    this.scenarioName = scenarioName;
    this.timeoutMs = timeoutMs;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * executor 자체를 사용할 수 없는 인프라 오류
 */
export class ExecutorInfrastructureError extends EvalError {
  readonly scenarioName?: string;

  constructor(message: string, options: { cause?: unknown; scenarioName?: string } = {}) {
    super(message, { code: 'EXECUTOR_INFRASTRUCTURE_ERROR', cause: options.cause });
    this.name = 'ExecutorInfrastructureError';
    this.scenarioName = options.scenarioName;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * metric이 필요한 trace 데이터가 없음 (내부적으로 0.0 점수로 복구된다)
 */
export class MetricDataMissingError extends EvalError {
  readonly metric: string;
  readonly field: string;

  constructor(metric: string, field: string, message?: string) {
    super(message ?? `Missing ${field} data`, { code: 'METRIC_DATA_MISSING' });
    this.name = 'MetricDataMissingError';
    this.metric = metric;
    this.field = field;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function isEvalError(value: unknown): value is EvalError {
  return value instanceof EvalError;
}

/**
 * unknown 오류를 메시지 문자열로 변환
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
