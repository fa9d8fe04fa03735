/**
 * Lead Scorer Agent Types
 *
 * Internal types used by the lead scorer agent.
 * For contract types, see ./contracts/
 *
 * @module lead-scorer/types
 */

import type { EngineConfig, ModelClient } from '@signalrank/lib';
import type { LeadScorerLogger } from './logger';

// ===========================================
// Configuration Types
// ===========================================

export interface LeadScorerDependencies {
  /** Engine configuration (defaults to loadConfig()) */
  config?: Readonly<EngineConfig>;

  /**
   * Model backend for notes analysis. `undefined` builds one from config;
   * `null` disables model analysis.
   */
  modelClient?: ModelClient | null;

  logger?: LeadScorerLogger;
}

// ===========================================
// Processing Types
// ===========================================

export interface ScoreLeadOptions {
  /** Attempt model analysis of notes (default: true) */
  useModel?: boolean;
}

// ===========================================
// Logging Event Types
// ===========================================

export type LeadScorerEvent =
  | 'lead_scored'
  | 'notes_degraded'
  | 'batch_started'
  | 'batch_completed'
  | 'validation_failed';
