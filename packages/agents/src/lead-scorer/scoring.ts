/**
 * Priority Aggregation Module
 *
 * Combines sub-scores into a weighted total, assigns a bucket from the
 * configured thresholds, and ranks scored leads.
 *
 * @module lead-scorer/scoring
 */

import { clampUnit, type LeadWeights } from '@signalrank/lib';
import type {
  BucketThresholds,
  NotesMode,
  RankedLead,
  ScoreBreakdown,
  SubScores,
} from './contracts/scoring-result';
import { calculateBucket } from './contracts/scoring-result';

// ===========================================
// Score Calculation
// ===========================================

/**
 * Weighted sum of sub-scores, clamped to [0,1]. Not rounded.
 */
export function calculateTotal(subScores: SubScores, weights: LeadWeights): number {
  return clampUnit(
    weights.recency * subScores.recency +
      weights.engagement * subScores.engagement +
      weights.source * subScores.source +
      weights.budget * subScores.budget +
      weights.notes * subScores.notes
  );
}

export interface BreakdownInput {
  subScores: SubScores;
  reasons: string[];
  notesMode: NotesMode;
}

/**
 * Assemble the full score breakdown for one lead
 */
export function buildBreakdown(
  input: BreakdownInput,
  weights: LeadWeights,
  thresholds: BucketThresholds
): ScoreBreakdown {
  const sub_scores: SubScores = {
    recency: clampUnit(input.subScores.recency),
    engagement: clampUnit(input.subScores.engagement),
    source: clampUnit(input.subScores.source),
    budget: clampUnit(input.subScores.budget),
    notes: clampUnit(input.subScores.notes),
  };
  const total = calculateTotal(sub_scores, weights);

  return {
    sub_scores,
    total,
    bucket: calculateBucket(total, thresholds),
    reasons: input.reasons,
    notes_mode: input.notesMode,
  };
}

// ===========================================
// Ranking
// ===========================================

export interface ScoredLead {
  lead_id: string;
  last_activity_minutes_ago: number;
  breakdown: ScoreBreakdown;
}

/**
 * Total descending, then more recent activity, then lead_id ascending
 */
export function compareScoredLeads(a: ScoredLead, b: ScoredLead): number {
  if (a.breakdown.total !== b.breakdown.total) {
    return b.breakdown.total - a.breakdown.total;
  }
  if (a.last_activity_minutes_ago !== b.last_activity_minutes_ago) {
    return a.last_activity_minutes_ago - b.last_activity_minutes_ago;
  }
  if (a.lead_id === b.lead_id) return 0;
  return a.lead_id < b.lead_id ? -1 : 1;
}

/**
 * Sort and truncate. Does not mutate its input.
 */
export function rankLeads(scored: readonly ScoredLead[], maxResults: number): RankedLead[] {
  return [...scored]
    .sort(compareScoredLeads)
    .slice(0, maxResults)
    .map(({ lead_id, breakdown }) => ({ lead_id, breakdown }));
}
