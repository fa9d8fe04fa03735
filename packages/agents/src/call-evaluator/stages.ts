/**
 * Analysis Stages
 *
 * One text analyzer per call dimension (model prompt with keyword
 * fallback) and the workflow nodes that run them.
 *
 * @module call-evaluator/stages
 */

import { z } from 'zod';
import {
  createTextAnalyzer,
  type ModelClient,
  type ModelPrompt,
  type TextAnalyzer,
} from '@signalrank/lib';
import type { AnalysisStage } from './contracts/verdict';
import { ANALYSIS_STAGES } from './contracts/verdict';
import { STAGE_HEURISTICS } from './heuristics';
import type { AnalysisNode } from './workflow';

// ===========================================
// Prompts
// ===========================================

export const CALL_EVALUATION_SYSTEM_PROMPT = `You are an expert call quality analyst for a real estate company. You evaluate sales call transcripts and give structured, objective feedback on agent performance.`;

const STAGE_QUESTIONS: Record<AnalysisStage, string> = {
  rapport:
    'Rapport building: did the agent greet properly, show empathy, and personalize the conversation? Score 0.0 (none) to 1.0 (excellent).',
  need_discovery:
    "Need discovery: did the agent ask relevant questions to understand the customer's requirements, budget and preferences? Score 0.0 (none) to 1.0 (thorough).",
  closing:
    'Closing attempt: did the agent close with a clear next step, commitment, or booking? Score 0.0 (none) to 1.0 (firm next step).',
  compliance:
    'Compliance risk: any false promises, pressure tactics, or unprofessional behavior? Score 0.0 (no risk) to 1.0 (severe risk).',
};

export const StageReplySchema = z.object({
  score: z
    .number()
    .describe('Score for this dimension, 0.0 to 1.0'),

  evidence: z
    .array(z.string())
    .default([])
    .describe('Short quotes or observations supporting the score'),
});

export type StageReply = z.infer<typeof StageReplySchema>;

export function buildStagePrompt(stage: AnalysisStage, transcript: string): ModelPrompt {
  return {
    system: CALL_EVALUATION_SYSTEM_PROMPT,
    prompt: `Evaluate one dimension of the following sales call.

${STAGE_QUESTIONS[stage]}

Call Transcript:
${transcript}`,
  };
}

// ===========================================
// Analyzers
// ===========================================

export type StageAnalyzers = Record<AnalysisStage, TextAnalyzer>;

/**
 * Build an analyzer per stage. Without a client every stage is heuristic.
 */
export function createStageAnalyzers(client: ModelClient | null, timeoutMs: number): StageAnalyzers {
  const build = (stage: AnalysisStage): TextAnalyzer =>
    createTextAnalyzer(client, {
      name: stage,
      timeoutMs,
      buildPrompt: (transcript) => buildStagePrompt(stage, transcript),
      schema: StageReplySchema,
      toAnalysis: (reply) => ({ score: reply.score, evidence: reply.evidence }),
      heuristic: STAGE_HEURISTICS[stage],
    });

  return {
    rapport: build('rapport'),
    need_discovery: build('need_discovery'),
    closing: build('closing'),
    compliance: build('compliance'),
  };
}

// ===========================================
// Workflow Nodes
// ===========================================

/**
 * Wrap each analyzer as an independent workflow node. Degraded results
 * are reported through `context.onStageDegraded`.
 */
export function createAnalysisNodes(analyzers: StageAnalyzers): AnalysisNode[] {
  return ANALYSIS_STAGES.map(
    (stage): AnalysisNode => ({
      kind: 'analysis',
      name: stage,
      dependsOn: [],
      async run(context) {
        const outcome = await analyzers[stage].analyze(context.call.transcript);
        if (outcome.mode === 'degraded' && outcome.failure) {
          context.onStageDegraded?.(stage, outcome.failure);
        }
        return {
          stage,
          label: outcome.score,
          evidence: outcome.evidence,
          mode: outcome.mode,
        };
      },
    })
  );
}
