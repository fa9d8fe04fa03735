/**
 * Notes Scorer
 *
 * Produces the notes sub-score. When a model is available and requested,
 * the model's reading of the notes is blended with the keyword score;
 * when the model times out, is unreachable, or answers with unusable JSON,
 * the keyword score is used and the result is marked degraded.
 *
 * @module lead-scorer/notes-scorer
 */

import { z } from 'zod';
import {
  HeuristicAnalyzer,
  createTextAnalyzer,
  type ModelClient,
  type ModelFailure,
  type TextAnalyzer,
  type ModelPrompt,
} from '@signalrank/lib';
import type { NotesMode } from './contracts/scoring-result';
import { analyzeNotesHeuristically } from './notes-heuristics';

// ===========================================
// Model Reply Schema
// ===========================================

export const NotesModelReplySchema = z.object({
  score: z
    .number()
    .describe('Likelihood the lead converts, 0.0 to 1.0'),

  reasons: z
    .array(z.string())
    .default([])
    .describe('Specific reasons for the score'),

  urgency_level: z
    .enum(['high', 'medium', 'low'])
    .optional(),

  buyer_intent: z
    .enum(['strong', 'moderate', 'weak'])
    .optional(),

  red_flags: z
    .array(z.string())
    .default([])
    .describe('Warning signs such as unreachable contact or unrealistic expectations'),
});

export type NotesModelReply = z.infer<typeof NotesModelReplySchema>;

export function buildNotesPrompt(notes: string): ModelPrompt {
  return {
    system: 'You are a real estate sales analyst scoring how likely a lead is to convert.',
    prompt: `Analyze the following lead notes and score from 0.0 to 1.0 how likely this lead is to convert, with specific reasons.

Lead Notes:
${notes}

Consider:
1. Urgency signals (urgent, asap, immediately, timeline mentions)
2. Buyer intent (serious vs casual, ready to buy vs just browsing)
3. Financial readiness (budget flexibility, loan approval, cash buyer)
4. Engagement level (scheduled visits, confirmation, follow-ups)
5. Red flags (not picking calls, unrealistic expectations, wrong contact)`,
  };
}

export function notesReplyToAnalysis(reply: NotesModelReply): { score: number; evidence: string[] } {
  const evidence = [...reply.reasons];
  if (reply.red_flags.length > 0) {
    evidence.push(`Red flags: ${reply.red_flags.join(', ')}`);
  }
  return { score: reply.score, evidence };
}

// ===========================================
// Notes Scorer
// ===========================================

export interface NotesScorerConfig {
  /** Per-call model timeout */
  timeoutMs: number;

  /** Share of the model score in the blend */
  modelWeight: number;
}

export interface NotesScore {
  score: number;
  reasons: string[];
  mode: NotesMode;
  model?: string;
  failure?: ModelFailure;
}

export class NotesScorer {
  private readonly heuristic: TextAnalyzer;
  private readonly analyzer: TextAnalyzer;
  private readonly hasModel: boolean;

  constructor(client: ModelClient | null, config: NotesScorerConfig) {
    this.heuristic = new HeuristicAnalyzer('notes', (text) => analyzeNotesHeuristically(text));
    this.analyzer = createTextAnalyzer(client, {
      name: 'notes',
      timeoutMs: config.timeoutMs,
      modelWeight: config.modelWeight,
      buildPrompt: buildNotesPrompt,
      schema: NotesModelReplySchema,
      toAnalysis: notesReplyToAnalysis,
      heuristic: (text) => analyzeNotesHeuristically(text),
    });
    this.hasModel = client !== null;
  }

  /**
   * Score notes. Never rejects for model failures.
   */
  async score(notes: string, useModel: boolean): Promise<NotesScore> {
    const analyzer = useModel && this.hasModel && notes.trim() ? this.analyzer : this.heuristic;
    const outcome = await analyzer.analyze(notes);

    const reasons = outcome.degradedReason
      ? [...outcome.evidence, outcome.degradedReason]
      : outcome.evidence;

    return {
      score: outcome.score,
      reasons,
      mode: outcome.mode,
      model: outcome.model,
      failure: outcome.failure,
    };
  }
}
