/**
 * SignalRank Library
 *
 * Shared engine plumbing for the SignalRank agents.
 */

// Types
export * from './types';

// Errors
export * from './errors';

// Configuration
export {
  EngineConfigSchema,
  LeadWeightsSchema,
  CallWeightsSchema,
  ModelSettingsSchema,
  WEIGHT_SUM_TOLERANCE,
  loadConfig,
  defaultConfig,
  readEnvOptions,
  sumWeights,
  type EngineConfig,
  type EngineConfigInput,
  type LeadWeights,
  type CallWeights,
  type ModelSettings,
} from './config';

// Logging
export {
  StructuredLogger,
  silentOutput,
  type LogLevel,
  type LoggerConfig,
  type LogEntry,
} from './logger';

// Keyword Matching (heuristic analyzers)
export { containsPhrase, containsAny, matchKeywords } from './keywords';

// Model Client (Anthropic-backed generation with enforced timeouts)
export * from './model-client';

// Text Analyzer (model with heuristic fallback)
export * from './text-analyzer';

// Structured Outputs (Zod schema in the prompt, Zod validation on the reply)
export * from './structured-outputs';
