/**
 * Structured JSON Logger for Lead Scorer
 *
 * Provides structured logging for lead scoring events:
 * - lead_scored: Lead scored (debug)
 * - notes_degraded: Model unavailable, keyword notes score used
 * - batch_started: Batch processing started
 * - batch_completed: Batch processing completed
 * - validation_failed: Request rejected
 *
 * @module lead-scorer/logger
 */

import { StructuredLogger, type LoggerConfig, type ModelFailureKind } from '@signalrank/lib';
import type { NotesMode, PriorityBucket } from './contracts/scoring-result';
import type { LeadScorerEvent } from './types';

// ===========================================
// Logger Class
// ===========================================

export class LeadScorerLogger extends StructuredLogger<LeadScorerEvent> {
  constructor(config: Partial<LoggerConfig> = {}) {
    super({ ...config, metadata: { agent: 'lead-scorer', ...config.metadata } });
  }

  // ===========================================
  // Scoring Events
  // ===========================================

  /**
   * Log a scored lead (debug level, one per lead)
   */
  leadScored(data: {
    lead_id: string;
    total: number;
    bucket: PriorityBucket;
    notes_mode: NotesMode;
    processing_time_ms: number;
  }): void {
    this.log('debug', 'lead_scored', data);
  }

  /**
   * Log fallback to keyword notes scoring
   */
  notesDegraded(data: {
    lead_id: string;
    failure_kind: ModelFailureKind;
    error_message: string;
  }): void {
    this.log('warn', 'notes_degraded', data);
  }

  // ===========================================
  // Batch Events
  // ===========================================

  batchStarted(data: {
    batch_id: string;
    total_leads: number;
    max_results: number;
    use_llm: boolean;
  }): void {
    this.log('info', 'batch_started', data);
  }

  batchCompleted(data: {
    batch_id: string;
    total_processed: number;
    returned: number;
    by_bucket: Record<PriorityBucket, number>;
    degraded_count: number;
    total_time_ms: number;
  }): void {
    this.log('info', 'batch_completed', data);
  }

  // ===========================================
  // Request Events
  // ===========================================

  validationFailed(data: { error_message: string; issues: string[] }): void {
    this.log('warn', 'validation_failed', data);
  }
}

// ===========================================
// Default Instance
// ===========================================

/**
 * Default logger instance for the lead scorer module
 */
export const logger = new LeadScorerLogger();

/**
 * Create a new logger with custom configuration
 */
export function createLogger(config?: Partial<LoggerConfig>): LeadScorerLogger {
  return new LeadScorerLogger(config);
}
