/**
 * Call Evaluator Agent
 *
 * Grades a sales-call transcript on rapport, need discovery, closing and
 * compliance risk. The four stages run concurrently through the workflow
 * engine; aggregation joins them into a verdict with summary and
 * next actions.
 *
 * @module call-evaluator/agent
 */

import {
  ValidationError,
  createModelClient,
  loadConfig,
  succeed,
  fail,
  type EngineConfig,
  type ModelClient,
  type Outcome,
} from '@signalrank/lib';
import { CallTranscriptSchema, hasSpeakerTags } from './contracts/call-input';
import type { Verdict } from './contracts/verdict';
import type { CallEvaluatorDependencies } from './types';
import { createAnalysisNodes, createStageAnalyzers } from './stages';
import { createAggregationNode } from './aggregation';
import { CallWorkflowEngine, type WorkflowObserver } from './workflow';
import { logger as defaultLogger, CallEvaluatorLogger } from './logger';

// ===========================================
// Agent Class
// ===========================================

export class CallEvaluatorAgent {
  private readonly config: Readonly<EngineConfig>;
  private readonly modelClient: ModelClient | null;
  private readonly engine: CallWorkflowEngine;
  private logger: CallEvaluatorLogger;

  constructor(deps: CallEvaluatorDependencies = {}) {
    this.config = deps.config ?? loadConfig();
    this.modelClient =
      deps.modelClient === undefined ? createModelClient(this.config) : deps.modelClient;
    this.logger = deps.logger ?? defaultLogger;

    const analyzers = createStageAnalyzers(this.modelClient, this.config.llm_timeout_ms);
    this.engine = new CallWorkflowEngine([
      ...createAnalysisNodes(analyzers),
      createAggregationNode(this.modelClient, {
        weights: this.config.call_weights,
        goodCallThreshold: this.config.good_call_threshold,
        timeoutMs: this.config.llm_timeout_ms,
      }),
    ]);
  }

  /**
   * Set a custom logger
   */
  setLogger(customLogger: CallEvaluatorLogger): void {
    this.logger = customLogger;
  }

  /**
   * Validate a transcript and evaluate it.
   * Invalid input is returned as a ValidationError, never thrown.
   */
  async evaluateCall(input: unknown): Promise<Outcome<Verdict, ValidationError>> {
    const parsed = CallTranscriptSchema.safeParse(input);
    if (!parsed.success) {
      const error = ValidationError.fromZod(parsed.error, 'call transcript');
      this.logger.validationFailed({ error_message: error.message, issues: error.issues });
      return fail(error);
    }

    const call = parsed.data;
    const callId = call.call_id;
    const log = this.logger;

    if (!hasSpeakerTags(call.transcript)) {
      log.transcriptUntagged({ call_id: callId, length: call.transcript.length });
    }

    const observer: WorkflowObserver = {
      stageStarted: (stage) => log.stageStarted({ call_id: callId, stage }),
      stageCompleted: (stage, durationMs) =>
        log.stageCompleted({ call_id: callId, stage, duration_ms: durationMs }),
      stageFailed: (stage, errorMessage, durationMs) =>
        log.stageFailed({ call_id: callId, stage, error_message: errorMessage, duration_ms: durationMs }),
    };

    const startedAt = Date.now();
    const state = await this.engine.run(
      {
        call,
        startedAt,
        onStageDegraded: (stage, failure) =>
          log.stageDegraded({
            call_id: callId,
            stage,
            failure_kind: failure.kind,
            error_message: failure.message,
          }),
      },
      observer
    );

    const verdict = state.verdict;
    if (!verdict) {
      throw new Error(
        `Aggregation did not produce a verdict for ${callId}: ${state.errorOf('aggregation') ?? 'unknown error'}`
      );
    }

    log.evaluationCompleted({
      call_id: callId,
      lead_id: call.lead_id,
      quality_score: verdict.quality_score,
      is_good_call: verdict.is_good_call,
      degraded_stages: verdict.degraded_stages,
      summary_mode: verdict.model_metadata.summary_mode,
      total_time_ms: Date.now() - startedAt,
    });

    return succeed(verdict);
  }
}

// ===========================================
// Factory Function
// ===========================================

/**
 * Create a new CallEvaluatorAgent instance
 */
export function createCallEvaluatorAgent(deps?: CallEvaluatorDependencies): CallEvaluatorAgent {
  return new CallEvaluatorAgent(deps);
}
