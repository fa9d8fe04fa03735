/**
 * Call Evaluator Agent Types
 *
 * Internal types used by the call evaluator agent.
 * For contract types, see ./contracts/
 *
 * @module call-evaluator/types
 */

import type { EngineConfig, ModelClient } from '@signalrank/lib';
import type { CallEvaluatorLogger } from './logger';

// ===========================================
// Configuration Types
// ===========================================

export interface CallEvaluatorDependencies {
  /** Engine configuration (defaults to loadConfig()) */
  config?: Readonly<EngineConfig>;

  /**
   * Model backend for stage analysis and summaries. `undefined` builds one
   * from config; `null` runs heuristics only.
   */
  modelClient?: ModelClient | null;

  logger?: CallEvaluatorLogger;
}

// ===========================================
// Logging Event Types
// ===========================================

export type CallEvaluatorEvent =
  | 'stage_started'
  | 'stage_completed'
  | 'stage_failed'
  | 'stage_degraded'
  | 'transcript_untagged'
  | 'evaluation_completed'
  | 'validation_failed';
