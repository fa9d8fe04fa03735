/**
 * Stage Heuristics
 *
 * Deterministic keyword scoring for each call-evaluation stage, used
 * when no model is configured or the model is unavailable.
 *
 * @module call-evaluator/heuristics
 */

import { z } from 'zod';
import { clampUnit, containsPhrase, matchKeywords, type Analysis } from '@signalrank/lib';
import type { AnalysisStage } from './contracts/verdict';
import stageKeywords from './data/stage-keywords.json';

// ===========================================
// Keyword Tables
// ===========================================

const SignalSchema = z.object({
  label: z.string().min(1),
  weight: z.number(),
  phrases: z.array(z.string().min(1)).min(1),
});

const StageKeywordsSchema = z.object({
  base: z.number().min(0).max(1),
  none: z.string(),
  signals: z.array(SignalSchema),
});

export type StageKeywords = z.infer<typeof StageKeywordsSchema>;

export const StageKeywordTableSchema = z.object({
  rapport: StageKeywordsSchema,
  need_discovery: StageKeywordsSchema,
  closing: StageKeywordsSchema,
  compliance: StageKeywordsSchema,
});

export type StageKeywordTable = z.infer<typeof StageKeywordTableSchema>;

export const STAGE_KEYWORDS: StageKeywordTable = StageKeywordTableSchema.parse(stageKeywords);

const QUESTION_WEIGHT = 0.05;
const MAX_QUESTION_BONUS = 0.3;

const ABRUPT_ENDING_PENALTY = 0.1;
const ABRUPT_ENDING_MAX_LENGTH = 200;

// ===========================================
// Scoring
// ===========================================

interface Accumulator {
  score: number;
  evidence: string[];
}

function applySignals(transcript: string, keywords: StageKeywords): Accumulator {
  const result: Accumulator = { score: keywords.base, evidence: [] };

  for (const signal of keywords.signals) {
    const matches = matchKeywords(transcript, signal.phrases);
    if (matches.length > 0) {
      result.score += signal.weight;
      result.evidence.push(`${signal.label}: ${matches.slice(0, 2).join(', ')}`);
    }
  }

  return result;
}

function finish(result: Accumulator, keywords: StageKeywords): Analysis {
  return {
    score: clampUnit(result.score),
    evidence: result.evidence.length > 0 ? result.evidence : [keywords.none],
  };
}

export function scoreRapport(transcript: string, table: StageKeywordTable = STAGE_KEYWORDS): Analysis {
  return finish(applySignals(transcript, table.rapport), table.rapport);
}

export function scoreNeedDiscovery(
  transcript: string,
  table: StageKeywordTable = STAGE_KEYWORDS
): Analysis {
  const result = applySignals(transcript, table.need_discovery);

  const questions = transcript.split('?').length - 1;
  if (questions > 0) {
    result.score += Math.min(MAX_QUESTION_BONUS, questions * QUESTION_WEIGHT);
    result.evidence.unshift(`${questions} question${questions === 1 ? '' : 's'} asked`);
  }

  return finish(result, table.need_discovery);
}

export function scoreClosing(transcript: string, table: StageKeywordTable = STAGE_KEYWORDS): Analysis {
  return finish(applySignals(transcript, table.closing), table.closing);
}

/**
 * Compliance risk: higher is worse
 */
export function scoreComplianceRisk(
  transcript: string,
  table: StageKeywordTable = STAGE_KEYWORDS
): Analysis {
  const result = applySignals(transcript, table.compliance);

  const trimmed = transcript.trim();
  if (containsPhrase(trimmed, 'bye') && trimmed.length < ABRUPT_ENDING_MAX_LENGTH) {
    result.score += ABRUPT_ENDING_PENALTY;
    result.evidence.push('Abrupt ending');
  }

  return finish(result, table.compliance);
}

export const STAGE_HEURISTICS: Record<AnalysisStage, (transcript: string) => Analysis> = {
  rapport: (transcript) => scoreRapport(transcript),
  need_discovery: (transcript) => scoreNeedDiscovery(transcript),
  closing: (transcript) => scoreClosing(transcript),
  compliance: (transcript) => scoreComplianceRisk(transcript),
};
