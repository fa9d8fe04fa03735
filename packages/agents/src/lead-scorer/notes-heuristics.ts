/**
 * Heuristic Notes Analyzer
 *
 * Keyword scoring of free-text agent notes. Total function: any string
 * yields a score in [0,1] and at least one reason.
 *
 * @module lead-scorer/notes-heuristics
 */

import { z } from 'zod';
import { clampUnit, matchKeywords, type Analysis } from '@signalrank/lib';
import notesKeywords from './data/notes-keywords.json';

// ===========================================
// Keyword Lists
// ===========================================

export const NotesKeywordsSchema = z.object({
  urgency: z.array(z.string().min(1)),
  timeline: z.array(z.string().min(1)),
  positive: z.array(z.string().min(1)),
  negative: z.array(z.string().min(1)),
});

export type NotesKeywords = z.infer<typeof NotesKeywordsSchema>;

export const NOTES_KEYWORDS: NotesKeywords = NotesKeywordsSchema.parse(notesKeywords);

const BASE_SCORE = 0.5;
const URGENCY_BONUS = 0.2;
const TIMELINE_BONUS = 0.15;
const POSITIVE_BONUS = 0.15;
const NEGATIVE_PENALTY = 0.3;

/** Matches listed per reason */
const MAX_LISTED = 2;

// ===========================================
// Analysis
// ===========================================

export function analyzeNotesHeuristically(
  notes: string,
  keywords: NotesKeywords = NOTES_KEYWORDS
): Analysis {
  if (!notes.trim()) {
    return { score: BASE_SCORE, evidence: ['No notes available'] };
  }

  let score = BASE_SCORE;
  const evidence: string[] = [];

  const urgency = matchKeywords(notes, keywords.urgency);
  if (urgency.length > 0) {
    score += URGENCY_BONUS;
    evidence.push(`Urgency signals detected: ${urgency.slice(0, MAX_LISTED).join(', ')}`);
  }

  const timeline = matchKeywords(notes, keywords.timeline);
  if (timeline.length > 0) {
    score += TIMELINE_BONUS;
    evidence.push(`Timeline mentioned: ${timeline[0]}`);
  }

  const positive = matchKeywords(notes, keywords.positive);
  if (positive.length > 0) {
    score += POSITIVE_BONUS;
    evidence.push(`Positive signals: ${positive.slice(0, MAX_LISTED).join(', ')}`);
  }

  const negative = matchKeywords(notes, keywords.negative);
  if (negative.length > 0) {
    score -= NEGATIVE_PENALTY;
    evidence.push(`Negative signals: ${negative.slice(0, MAX_LISTED).join(', ')}`);
  }

  if (evidence.length === 0) {
    evidence.push('Neutral notes content');
  }

  return { score: clampUnit(score), evidence };
}
