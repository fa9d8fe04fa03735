/**
 * Structured JSON Logger for Call Evaluator
 *
 * @module call-evaluator/logger
 */

import { StructuredLogger, type LoggerConfig, type ModelFailureKind } from '@signalrank/lib';
import type { AnalysisStage } from './contracts/verdict';
import type { CallEvaluatorEvent } from './types';
import type { StageName } from './workflow';

export class CallEvaluatorLogger extends StructuredLogger<CallEvaluatorEvent> {
  constructor(config: Partial<LoggerConfig> = {}) {
    super({ ...config, metadata: { agent: 'call-evaluator', ...config.metadata } });
  }

  // ===========================================
  // Stage Events
  // ===========================================

  stageStarted(data: { call_id: string; stage: StageName }): void {
    this.log('debug', 'stage_started', data);
  }

  stageCompleted(data: { call_id: string; stage: StageName; duration_ms: number }): void {
    this.log('debug', 'stage_completed', data);
  }

  stageFailed(data: {
    call_id: string;
    stage: StageName;
    error_message: string;
    duration_ms: number;
  }): void {
    this.log('error', 'stage_failed', data);
  }

  /**
   * Model unavailable for a stage; its heuristic was used
   */
  stageDegraded(data: {
    call_id: string;
    stage: AnalysisStage;
    failure_kind: ModelFailureKind;
    error_message: string;
  }): void {
    this.log('warn', 'stage_degraded', data);
  }

  // ===========================================
  // Evaluation Events
  // ===========================================

  transcriptUntagged(data: { call_id: string; length: number }): void {
    this.log('warn', 'transcript_untagged', data);
  }

  evaluationCompleted(data: {
    call_id: string;
    lead_id?: string;
    quality_score: number;
    is_good_call: boolean;
    degraded_stages: AnalysisStage[];
    summary_mode: string;
    total_time_ms: number;
  }): void {
    this.log('info', 'evaluation_completed', data);
  }

  validationFailed(data: { error_message: string; issues: string[] }): void {
    this.log('warn', 'validation_failed', data);
  }
}

/**
 * Default logger instance for the call evaluator module
 */
export const logger = new CallEvaluatorLogger();

export function createLogger(config?: Partial<LoggerConfig>): CallEvaluatorLogger {
  return new CallEvaluatorLogger(config);
}
