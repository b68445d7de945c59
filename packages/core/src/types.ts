/**
 * 평가 엔진 데이터 모델
 *
 * 모든 엔티티는 한 번 생성된 뒤 읽기 전용이다.
 * 재실행은 기존 객체를 갱신하지 않고 새 인스턴스를 만든다.
 */

/** 등급 */
export type GradeLevel = 'excellent' | 'good' | 'acceptable' | 'poor' | 'fail';

/** 평가 시나리오 */
export interface Scenario {
  /** 스위트 안에서 유일한 이름 */
  readonly name: string;
  readonly description: string;
  /** executor에게 그대로 전달되는 입력 */
  readonly inputData: Readonly<Record<string, unknown>>;
  /** 비교 기반 metric이 사용하는 기대 출력 (없으면 undefined) */
  readonly expectedOutput?: unknown;
  /** 기대 도구 호출 순서 (순서가 의미를 가진다) */
  readonly expectedToolCalls: readonly string[];
  readonly tags: readonly string[];
  /** 타임아웃 (ms) */
  readonly timeoutMs: number;
  readonly metadata: Readonly<Record<string, unknown>>;
}

/** 시나리오 집합 */
export interface EvalSuite {
  readonly name: string;
  readonly description: string;
  readonly scenarios: readonly Scenario[];
  readonly tags: readonly string[];
  readonly metadata: Readonly<Record<string, unknown>>;
}

/** 실행 중 발생한 단일 도구 호출 기록 */
export interface ToolCallRecord {
  readonly toolName: string;
  /** 호출 순서상 위치 (0부터) */
  readonly position: number;
  /** 호출한 에이전트 */
  readonly agentId?: string;
  readonly arguments: Readonly<Record<string, unknown>>;
  readonly result?: unknown;
  readonly success: boolean;
  readonly error?: string;
  readonly durationMs: number;
  readonly costUsd: number;
  readonly tokenCount: number;
}

/**
 * 비용 귀속
 *
 * totalUsd는 perAgent 합계와 같고, perTool 합계와도 같다.
 * 한 달러는 정확히 하나의 agent와 하나의 tool에 귀속된다.
 */
export interface CostBreakdown {
  readonly totalUsd: number;
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly perAgent: Readonly<Record<string, number>>;
  readonly perTool: Readonly<Record<string, number>>;
}

/** 지연 시간 귀속 */
export interface LatencyBreakdown {
  readonly totalMs: number;
  readonly perAgent: Readonly<Record<string, number>>;
  readonly perTool: Readonly<Record<string, number>>;
}

/** 스위트 단위 지연 시간 집계 */
export interface SuiteLatency extends LatencyBreakdown {
  readonly meanMs: number;
  readonly p50Ms: number;
  readonly p95Ms: number;
  readonly p99Ms: number;
}

/** (시나리오, executor) 한 쌍의 실행 기록 */
export interface ExecutionTrace {
  readonly output: unknown;
  readonly success: boolean;
  readonly toolCalls: readonly ToolCallRecord[];
  /** 비용 데이터가 없으면 undefined */
  readonly cost?: CostBreakdown;
  /** 지연 시간 데이터가 없으면 undefined */
  readonly latency?: LatencyBreakdown;
  /** success가 false일 때의 오류 내용 */
  readonly error?: string;
}

/** 단일 metric 점수 */
export interface Score {
  readonly metric: string;
  /** 0.0 ~ 1.0 */
  readonly value: number;
  /** 양수, 기본 1.0 */
  readonly weight: number;
  readonly explanation: string;
}

/** trace를 만들지 못한 실행의 실패 정보 */
export interface ScenarioFailure {
  readonly kind: 'timeout' | 'infrastructure';
  readonly message: string;
}

/** 단일 시나리오 결과 */
export interface ScenarioResult {
  readonly scenarioName: string;
  readonly scores: readonly Score[];
  readonly overallScore: number;
  readonly passed: boolean;
  readonly grade: GradeLevel;
  /** 통과하지 못한 threshold 검사 목록 */
  readonly failedChecks: readonly string[];
  readonly trace?: ExecutionTrace;
  readonly failure?: ScenarioFailure;
  /** 관측된 지연 시간 (ms) */
  readonly latencyMs: number;
}

/** 스위트 실행 결과 */
export interface SuiteResult {
  readonly suiteName: string;
  /** 스위트 선언 순서를 따른다 */
  readonly scenarioResults: readonly ScenarioResult[];
  readonly passRate: number;
  readonly passedCount: number;
  readonly failedCount: number;
  readonly meanScore: number;
  readonly grade: GradeLevel;
  readonly totalCost: CostBreakdown;
  readonly totalLatency: SuiteLatency;
  readonly startedAt: string;
  readonly durationMs: number;
}

/** 승자 선정 기준 */
export type WinnerCriterion =
  | 'mean_score'
  | 'pass_rate'
  | 'total_cost'
  | 'sole_candidate'
  | 'tie'
  | 'no_candidates';

/** 비교 순위표의 한 행 */
export interface ComparisonStanding {
  readonly executorId: string;
  /** 1부터, 모든 기준에서 동률이면 같은 순위 */
  readonly rank: number;
  readonly meanScore: number;
  readonly passRate: number;
  readonly totalCostUsd: number;
  readonly grade: GradeLevel;
}

/** 승자 후보에서 제외된 executor */
export interface ExcludedExecutor {
  readonly executorId: string;
  readonly reason: string;
}

/** 여러 executor 비교 결과 */
export interface ComparisonResult {
  readonly suiteName: string;
  readonly results: Readonly<Record<string, SuiteResult>>;
  readonly standings: readonly ComparisonStanding[];
  readonly winner: string | null;
  readonly criterion: WinnerCriterion;
  readonly tiedExecutors: readonly string[];
  readonly excluded: readonly ExcludedExecutor[];
}
