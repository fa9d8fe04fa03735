/**
 * Call Evaluator Agent
 *
 * Grades sales-call transcripts through a stage graph with model
 * analysis and keyword fallback per stage.
 *
 * @module call-evaluator
 */

// === Contracts (API boundaries) ===
export * from './contracts';

// === Types (internal) ===
export * from './types';

// === Core Modules ===
export * from './heuristics';
export * from './stages';
export * from './workflow';
export * from './aggregation';
export {
  CallEvaluatorLogger,
  logger as callEvaluatorLogger,
  createLogger as createCallEvaluatorLogger,
} from './logger';

// === Agent ===
export { CallEvaluatorAgent, createCallEvaluatorAgent } from './agent';
