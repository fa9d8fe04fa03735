/**
 * Rule Scoring Module
 *
 * Deterministic sub-scores for the structured lead fields.
 * Pure functions: same input, same output, no model calls.
 *
 * @module lead-scorer/rules
 */

import type { LeadInput, LeadStatus } from './contracts/lead-input';

export interface RuleScore {
  score: number;
  reason: string;
}

// ===========================================
// Recency
// ===========================================

/** Upper bounds (exclusive, minutes) and their scores, most recent first */
const RECENCY_STEPS: ReadonlyArray<{ below: number; score: number; reason: string }> = [
  { below: 30, score: 1.0, reason: 'Very recent activity (< 30 mins)' },
  { below: 60, score: 0.85, reason: 'Recent activity (< 1 hour)' },
  { below: 240, score: 0.7, reason: 'Activity within 4 hours' },
  { below: 1440, score: 0.5, reason: 'Activity within 24 hours' },
  { below: 10080, score: 0.25, reason: 'Activity within 7 days' },
];

const STALE_RECENCY: RuleScore = { score: 0.1, reason: 'Old lead (> 7 days since activity)' };

/**
 * Score freshness of the last activity. Monotone non-increasing in minutes.
 */
export function scoreRecency(minutesAgo: number): RuleScore {
  const step = RECENCY_STEPS.find((s) => minutesAgo < s.below);
  return step ? { score: step.score, reason: step.reason } : STALE_RECENCY;
}

// ===========================================
// Engagement
// ===========================================

export const STATUS_BONUS: Record<LeadStatus, number> = {
  new: 0,
  contacted: 0.1,
  follow_up: 0.15,
  qualified: 0.2,
};

/**
 * Score prior interactions plus a pipeline-status bonus, capped at 1.0
 */
export function scoreEngagement(pastInteractions: number, status: LeadStatus): RuleScore {
  const interactionScore = Math.min(pastInteractions / 10, 1);
  const score = Math.min(interactionScore + STATUS_BONUS[status], 1);

  let reason: string;
  if (pastInteractions >= 5) {
    reason = `Highly engaged (${pastInteractions} interactions)`;
  } else if (pastInteractions >= 2) {
    reason = `Moderate engagement (${pastInteractions} interactions)`;
  } else {
    reason = `Low engagement (${pastInteractions} interactions)`;
  }

  return { score, reason };
}

// ===========================================
// Source
// ===========================================

export const SOURCE_SCORES: Readonly<Record<string, number>> = {
  referral: 1.0,
  'walk-in': 0.9,
  portal: 0.75,
  magicbricks: 0.75,
  '99acres': 0.75,
  'housing.com': 0.7,
  website: 0.6,
  social: 0.4,
  social_media: 0.4,
};

export const DEFAULT_SOURCE_SCORE = 0.5;

/**
 * Score channel quality. Unknown sources get the default; never fails.
 */
export function scoreSource(source: string): RuleScore {
  const key = source.trim().toLowerCase();
  const score = Object.hasOwn(SOURCE_SCORES, key) ? SOURCE_SCORES[key] : DEFAULT_SOURCE_SCORE;

  let reason: string;
  if (score >= 0.9) {
    reason = `High-quality source (${source})`;
  } else if (score >= 0.7) {
    reason = `Good source (${source})`;
  } else {
    reason = `Standard source (${source})`;
  }

  return { score, reason };
}

// ===========================================
// Budget
// ===========================================

const CRORE = 10_000_000;
const LAKH = 100_000;

/**
 * Score budget segment (INR). Monotone non-decreasing in budget.
 */
export function scoreBudget(budget: number): RuleScore {
  const crore = budget / CRORE;
  const croreLabel = `₹${crore.toFixed(1)}Cr`;
  const lakhLabel = `₹${(budget / LAKH).toFixed(0)}L`;

  if (crore >= 5) return { score: 1.0, reason: `Premium budget (${croreLabel})` };
  if (crore >= 2) return { score: 0.85, reason: `High budget (${croreLabel})` };
  if (crore >= 1) return { score: 0.7, reason: `Good budget (${croreLabel})` };
  if (crore >= 0.5) return { score: 0.55, reason: `Moderate budget (${lakhLabel})` };
  return { score: 0.4, reason: `Lower budget segment (${lakhLabel})` };
}

// ===========================================
// Combined
// ===========================================

export interface RuleScores {
  recency: RuleScore;
  engagement: RuleScore;
  source: RuleScore;
  budget: RuleScore;
}

/**
 * Evaluate all four rule dimensions for a lead
 */
export function evaluateRules(lead: LeadInput): RuleScores {
  return {
    recency: scoreRecency(lead.last_activity_minutes_ago),
    engagement: scoreEngagement(lead.past_interactions, lead.status),
    source: scoreSource(lead.source),
    budget: scoreBudget(lead.budget),
  };
}
