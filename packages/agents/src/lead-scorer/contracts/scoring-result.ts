/**
 * Scoring Result Contract
 *
 * Defines the output schema for lead prioritization.
 * This contract is used by:
 * - Lead Scorer Agent (producer)
 * - Sales dashboards and call queues (consumers)
 *
 * @module contracts/scoring-result
 */

import { z } from 'zod';

// ===========================================
// Enums
// ===========================================

export const PriorityBucketSchema = z.enum([
  'hot',   // Call now
  'warm',  // Follow up today
  'cold',  // Nurture
]);

export type PriorityBucket = z.infer<typeof PriorityBucketSchema>;

export const NotesModeSchema = z.enum(['model', 'heuristic', 'degraded']);

export type NotesMode = z.infer<typeof NotesModeSchema>;

// ===========================================
// Score Breakdown Schema
// ===========================================

const UnitScore = z.number().min(0).max(1);

export const SubScoresSchema = z.object({
  recency: UnitScore.describe('Freshness of last activity'),
  engagement: UnitScore.describe('Interaction count plus pipeline status'),
  source: UnitScore.describe('Channel quality'),
  budget: UnitScore.describe('Budget segment'),
  notes: UnitScore.describe('Intent read from agent notes'),
});

export type SubScores = z.infer<typeof SubScoresSchema>;

export type SubScoreName = keyof SubScores;

export const ScoreBreakdownSchema = z.object({
  sub_scores: SubScoresSchema,

  total: UnitScore
    .describe('Weighted sum of sub-scores'),

  bucket: PriorityBucketSchema
    .describe('Bucket assigned from thresholds'),

  reasons: z
    .array(z.string())
    .describe('Ordered human-readable explanations'),

  notes_mode: NotesModeSchema
    .describe('How the notes sub-score was produced'),
});

export type ScoreBreakdown = z.infer<typeof ScoreBreakdownSchema>;

export const RankedLeadSchema = z.object({
  lead_id: z.string().min(1),
  breakdown: ScoreBreakdownSchema,
});

export type RankedLead = z.infer<typeof RankedLeadSchema>;

// ===========================================
// Prioritization Result Schema
// ===========================================

export const PrioritizationMetadataSchema = z.object({
  model_used: z
    .string()
    .nullable()
    .describe('Model identifier, or null when no model was consulted'),

  llm_enabled: z
    .boolean()
    .describe('Whether notes analysis attempted the model'),

  scoring_weights: SubScoresSchema
    .describe('Weights applied to each sub-score'),

  thresholds: z.object({
    hot: UnitScore,
    warm: UnitScore,
  }),

  degraded_count: z
    .number()
    .int()
    .nonnegative()
    .describe('Leads whose notes fell back to heuristics'),
});

export type PrioritizationMetadata = z.infer<typeof PrioritizationMetadataSchema>;

export const PrioritizationResultSchema = z.object({
  ranked_leads: z.array(RankedLeadSchema),

  total_processed: z
    .number()
    .int()
    .nonnegative()
    .describe('Number of leads scored before truncation'),

  model_metadata: PrioritizationMetadataSchema,
});

export type PrioritizationResult = z.infer<typeof PrioritizationResultSchema>;

// ===========================================
// Bucket Thresholds
// ===========================================

export interface BucketThresholds {
  hot: number;   // total >= this is 'hot' (default: 0.7)
  warm: number;  // total >= this is 'warm' (default: 0.4)
}

export const DEFAULT_BUCKET_THRESHOLDS: BucketThresholds = {
  hot: 0.7,
  warm: 0.4,
};

/**
 * Calculate bucket from total using thresholds
 */
export function calculateBucket(
  total: number,
  thresholds: BucketThresholds = DEFAULT_BUCKET_THRESHOLDS
): PriorityBucket {
  if (total >= thresholds.hot) return 'hot';
  if (total >= thresholds.warm) return 'warm';
  return 'cold';
}
