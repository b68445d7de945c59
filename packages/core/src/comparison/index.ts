export { ComparisonRunner } from './comparison-runner.js';
export type { ComparisonRunnerOptions } from './comparison-runner.js';
export { rankCandidates } from './ranking.js';
export type { RankingCandidate, WinnerDecision } from './ranking.js';
