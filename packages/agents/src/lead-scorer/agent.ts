/**
 * Lead Scorer Agent
 *
 * Scores leads on recency, engagement, source, budget and notes,
 * buckets them hot/warm/cold, and returns a ranked shortlist.
 *
 * Leads in a batch are scored concurrently; ranking is a pure sort
 * afterwards, so the result does not depend on completion order.
 *
 * @module lead-scorer/agent
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
import type { LeadInput } from './contracts/lead-input';
import { LeadBatchSchema, LeadInputSchema } from './contracts/lead-input';
import type {
  BucketThresholds,
  PriorityBucket,
  PrioritizationResult,
  ScoreBreakdown,
} from './contracts/scoring-result';
import type { LeadScorerDependencies, ScoreLeadOptions } from './types';
import { evaluateRules } from './rules';
import { NotesScorer, type NotesScore } from './notes-scorer';
import { buildBreakdown, rankLeads, type ScoredLead } from './scoring';
import { logger as defaultLogger, LeadScorerLogger } from './logger';

interface LeadEvaluation {
  scored: ScoredLead;
  notes: NotesScore;
}

// ===========================================
// Agent Class
// ===========================================

export class LeadScorerAgent {
  private readonly config: Readonly<EngineConfig>;
  private readonly modelClient: ModelClient | null;
  private readonly notesScorer: NotesScorer;
  private logger: LeadScorerLogger;

  constructor(deps: LeadScorerDependencies = {}) {
    this.config = deps.config ?? loadConfig();
    this.modelClient =
      deps.modelClient === undefined ? createModelClient(this.config) : deps.modelClient;
    this.notesScorer = new NotesScorer(this.modelClient, {
      timeoutMs: this.config.llm_timeout_ms,
      modelWeight: this.config.notes_model_weight,
    });
    this.logger = deps.logger ?? defaultLogger;
  }

  /**
   * Set a custom logger
   */
  setLogger(customLogger: LeadScorerLogger): void {
    this.logger = customLogger;
  }

  private get thresholds(): BucketThresholds {
    return { hot: this.config.hot_threshold, warm: this.config.warm_threshold };
  }

  // ===========================================
  // Single Lead Scoring
  // ===========================================

  /**
   * Validate and score one lead. Model failures degrade the notes
   * sub-score; they never reject.
   */
  async scoreLead(
    input: unknown,
    options: ScoreLeadOptions = {}
  ): Promise<Outcome<ScoreBreakdown, ValidationError>> {
    const parsed = LeadInputSchema.safeParse(input);
    if (!parsed.success) {
      const error = ValidationError.fromZod(parsed.error, 'lead');
      this.logger.validationFailed({ error_message: error.message, issues: error.issues });
      return fail(error);
    }

    const { scored } = await this.evaluateLead(parsed.data, options.useModel ?? true);
    return succeed(scored.breakdown);
  }

  private async evaluateLead(lead: LeadInput, useModel: boolean): Promise<LeadEvaluation> {
    const elapsed = this.logger.startTimer();

    const rules = evaluateRules(lead);
    const notes = await this.notesScorer.score(lead.notes, useModel);

    if (notes.mode === 'degraded' && notes.failure) {
      this.logger.notesDegraded({
        lead_id: lead.lead_id,
        failure_kind: notes.failure.kind,
        error_message: notes.failure.message,
      });
    }

    const breakdown = buildBreakdown(
      {
        subScores: {
          recency: rules.recency.score,
          engagement: rules.engagement.score,
          source: rules.source.score,
          budget: rules.budget.score,
          notes: notes.score,
        },
        reasons: [
          rules.recency.reason,
          rules.engagement.reason,
          rules.source.reason,
          rules.budget.reason,
          ...notes.reasons,
        ],
        notesMode: notes.mode,
      },
      this.config.lead_weights,
      this.thresholds
    );

    this.logger.leadScored({
      lead_id: lead.lead_id,
      total: breakdown.total,
      bucket: breakdown.bucket,
      notes_mode: breakdown.notes_mode,
      processing_time_ms: elapsed(),
    });

    return {
      scored: {
        lead_id: lead.lead_id,
        last_activity_minutes_ago: lead.last_activity_minutes_ago,
        breakdown,
      },
      notes,
    };
  }

  // ===========================================
  // Batch Prioritization
  // ===========================================

  /**
   * Validate a batch, score every lead, and return the ranked shortlist.
   * Invalid input is returned as a ValidationError, never thrown.
   */
  async prioritizeLeads(input: unknown): Promise<Outcome<PrioritizationResult, ValidationError>> {
    const parsed = LeadBatchSchema.safeParse(input);
    if (!parsed.success) {
      const error = ValidationError.fromZod(parsed.error, 'lead batch');
      this.logger.validationFailed({ error_message: error.message, issues: error.issues });
      return fail(error);
    }

    const batch = parsed.data;
    const batchId = generateBatchId();
    const elapsed = this.logger.startTimer();

    this.logger.batchStarted({
      batch_id: batchId,
      total_leads: batch.leads.length,
      max_results: batch.max_results,
      use_llm: batch.use_llm,
    });

    const evaluations = await Promise.all(
      batch.leads.map((lead) => this.evaluateLead(lead, batch.use_llm))
    );

    const ranked = rankLeads(
      evaluations.map((e) => e.scored),
      batch.max_results
    );
    const degradedCount = evaluations.filter((e) => e.notes.mode === 'degraded').length;
    const llmEnabled = batch.use_llm && this.modelClient !== null;

    this.logger.batchCompleted({
      batch_id: batchId,
      total_processed: evaluations.length,
      returned: ranked.length,
      by_bucket: countByBucket(evaluations.map((e) => e.scored.breakdown.bucket)),
      degraded_count: degradedCount,
      total_time_ms: elapsed(),
    });

    return succeed({
      ranked_leads: ranked,
      total_processed: evaluations.length,
      model_metadata: {
        model_used: llmEnabled && this.modelClient ? this.modelClient.model : null,
        llm_enabled: llmEnabled,
        scoring_weights: { ...this.config.lead_weights },
        thresholds: this.thresholds,
        degraded_count: degradedCount,
      },
    });
  }
}

// ===========================================
// Helpers
// ===========================================

function generateBatchId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 8);
  return `lb_${timestamp}_${random}`;
}

function countByBucket(buckets: PriorityBucket[]): Record<PriorityBucket, number> {
  const counts: Record<PriorityBucket, number> = { hot: 0, warm: 0, cold: 0 };
  for (const bucket of buckets) {
    counts[bucket] += 1;
  }
  return counts;
}

// ===========================================
// Factory Function
// ===========================================

/**
 * Create a new LeadScorerAgent instance
 */
export function createLeadScorerAgent(deps?: LeadScorerDependencies): LeadScorerAgent {
  return new LeadScorerAgent(deps);
}
