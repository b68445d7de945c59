export {
  DEFAULT_GRADE_BANDS,
  GRADE_LABELS,
  formatGradeLevel,
  gradeLevelFor,
  validateGradeBands,
} from './grade-level.js';
export type { GradeBands } from './grade-level.js';
export { ThresholdGrader, WeightedGrader, weightedAverage } from './strategies.js';
export type {
  GradingStrategy,
  StrategyVerdict,
  ThresholdGraderOptions,
  WeightedGraderOptions,
} from './strategies.js';
export { Scorer } from './scorer.js';
export type { ScenarioVerdict, ScorerOptions, SuiteSummary } from './scorer.js';
