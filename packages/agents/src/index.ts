/**
 * SignalRank Agents
 *
 * Lead prioritization and call evaluation agents.
 *
 * @module @signalrank/agents
 */

// Lead Scorer Agent
export * from './lead-scorer';

// Call Evaluator Agent
// Its default logger is re-exported as callEvaluatorLogger to avoid
// clashing with the lead scorer's `logger` and `createLogger`.
export * from './call-evaluator';
