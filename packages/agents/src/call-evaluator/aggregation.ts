/**
 * Verdict Aggregation
 *
 * Joins the four stage results into a quality score and verdict, then
 * summarizes the call: model summary when available, otherwise a
 * template built from which dimensions scored above or below 0.5.
 *
 * @module call-evaluator/aggregation
 */

import { z } from 'zod';
import {
  clampUnit,
  requestStructured,
  withModelFallback,
  type CallWeights,
  type ModelClient,
} from '@signalrank/lib';
import type { AnalysisStage, CallLabels, StageResult, SummaryMode, Verdict } from './contracts/verdict';
import { ANALYSIS_STAGES } from './contracts/verdict';
import { CALL_EVALUATION_SYSTEM_PROMPT } from './stages';
import type { AggregationNode, WorkflowStateView } from './workflow';

/** Label used for a stage that failed outright */
export const NEUTRAL_LABEL = 0.5;

/** Dimensions above this are strengths, below it weaknesses */
const STRENGTH_PIVOT = 0.5;

const STAGE_DISPLAY_NAMES: Record<AnalysisStage, string> = {
  rapport: 'rapport',
  need_discovery: 'need discovery',
  closing: 'closing',
  compliance: 'compliance',
};

// ===========================================
// Quality Score
// ===========================================

/**
 * Weighted quality; compliance contributes (1 - risk). Not rounded.
 */
export function calculateQuality(labels: CallLabels, weights: CallWeights): number {
  return clampUnit(
    weights.rapport * labels.rapport +
      weights.need_discovery * labels.need_discovery +
      weights.closing * labels.closing +
      weights.compliance * (1 - labels.compliance_risk)
  );
}

export interface CollectedStages {
  labels: CallLabels;
  results: StageResult[];
  /** Stages that fell back to heuristics or failed */
  degraded: AnalysisStage[];
  /** Stages that failed and were scored neutral */
  failed: AnalysisStage[];
}

/**
 * Read stage outputs from the run state; failed stages score neutral.
 */
export function collectStages(state: WorkflowStateView): CollectedStages {
  const results: StageResult[] = [];
  const degraded: AnalysisStage[] = [];
  const failed: AnalysisStage[] = [];

  const labelOf = (stage: AnalysisStage): number => {
    const result = state.statusOf(stage) === 'completed' ? state.resultOf(stage) : undefined;
    if (!result) {
      degraded.push(stage);
      failed.push(stage);
      return NEUTRAL_LABEL;
    }
    results.push(result);
    if (result.mode === 'degraded') degraded.push(stage);
    return clampUnit(result.label);
  };

  const labels: CallLabels = {
    rapport: labelOf('rapport'),
    need_discovery: labelOf('need_discovery'),
    closing: labelOf('closing'),
    compliance_risk: labelOf('compliance'),
  };

  return { labels, results, degraded, failed };
}

// ===========================================
// Summary
// ===========================================

export interface CallSummary {
  summary: string;
  key_points: string[];
  next_actions: string[];
}

/** Per-dimension score where higher is better */
function dimensionScores(labels: CallLabels): Record<AnalysisStage, number> {
  return {
    rapport: labels.rapport,
    need_discovery: labels.need_discovery,
    closing: labels.closing,
    compliance: 1 - labels.compliance_risk,
  };
}

const WEAKNESS_ACTIONS: Record<AnalysisStage, string> = {
  closing: 'Propose a concrete next step such as a site visit on a specific day',
  need_discovery: 'Call back to clarify requirements, budget and preferences',
  rapport: "Open with a personal greeting and acknowledge the customer's concerns",
  compliance: 'Review the call for pressure tactics or promises before the next contact',
};

/** Order in which follow-ups are recommended */
const ACTION_PRIORITY: readonly AnalysisStage[] = ['closing', 'need_discovery', 'rapport', 'compliance'];

export interface TemplateSummaryInput {
  labels: CallLabels;
  quality: number;
  isGoodCall: boolean;
  results: StageResult[];
  degraded: AnalysisStage[];
  failed: AnalysisStage[];
}

/**
 * Deterministic summary from the stage labels
 */
export function buildTemplateSummary(input: TemplateSummaryInput): CallSummary {
  const scores = dimensionScores(input.labels);
  const strengths = ANALYSIS_STAGES.filter((stage) => scores[stage] > STRENGTH_PIVOT);
  const weaknesses = ANALYSIS_STAGES.filter((stage) => scores[stage] < STRENGTH_PIVOT);
  const names = (stages: AnalysisStage[]): string =>
    stages.length > 0 ? stages.map((s) => STAGE_DISPLAY_NAMES[s]).join(', ') : 'none';

  const sentences = [
    `${input.isGoodCall ? 'Good call' : 'Call needs improvement'} (quality ${input.quality.toFixed(2)}).`,
    `Strengths: ${names(strengths)}.`,
    `Weaknesses: ${names(weaknesses)}.`,
  ];
  if (input.degraded.length > 0) {
    sentences.push(describeDegradedStages(input.degraded));
  }

  const key_points = input.results
    .filter((result) => result.evidence.length > 0)
    .map((result) => `${capitalize(STAGE_DISPLAY_NAMES[result.stage])}: ${result.evidence[0]}`);

  const next_actions = ACTION_PRIORITY.filter((stage) => weaknesses.includes(stage)).map(
    (stage) => WEAKNESS_ACTIONS[stage]
  );
  if (input.failed.length > 0) {
    next_actions.push(MANUAL_REVIEW_ACTION);
  }
  if (next_actions.length === 0) {
    next_actions.push('Follow up as agreed on the call');
  }

  return { summary: sentences.join(' '), key_points, next_actions };
}

export const MANUAL_REVIEW_ACTION = 'Manual review required';

export function describeDegradedStages(stages: AnalysisStage[]): string {
  return `Degraded analysis: ${stages.map((s) => STAGE_DISPLAY_NAMES[s]).join(', ')}.`;
}

export const SummaryReplySchema = z.object({
  summary: z
    .string()
    .min(1)
    .describe('Two or three sentence summary of the call'),

  key_points: z
    .array(z.string())
    .default([])
    .describe('Key points discussed'),

  next_actions: z
    .array(z.string())
    .default([])
    .describe('Recommended next actions, most important first'),
});

export function buildSummaryPrompt(transcript: string, results: StageResult[]): string {
  const stageLines = results.map(
    (result) =>
      `- ${STAGE_DISPLAY_NAMES[result.stage]}: ${result.label.toFixed(2)} (${result.evidence.join('; ') || 'no evidence'})`
  );

  return `Summarize the following sales call for the agent's manager.

Stage scores (compliance is a risk, lower is better):
${stageLines.join('\n')}

Provide a brief summary (2-3 sentences), the key points discussed, and recommended next actions if the deal is not closed.

Call Transcript:
${transcript}`;
}

// ===========================================
// Aggregation Node
// ===========================================

export interface AggregationConfig {
  weights: CallWeights;
  goodCallThreshold: number;
  timeoutMs: number;
}

/**
 * Join node: waits on all four analysis stages.
 */
export function createAggregationNode(
  client: ModelClient | null,
  config: AggregationConfig
): AggregationNode {
  return {
    kind: 'aggregation',
    name: 'aggregation',
    dependsOn: ANALYSIS_STAGES,
    async run(context, state): Promise<Verdict> {
      const collected = collectStages(state);
      const quality = calculateQuality(collected.labels, config.weights);
      const isGoodCall = quality >= config.goodCallThreshold;

      const template = (): CallSummary =>
        buildTemplateSummary({ ...collected, quality, isGoodCall });

      let summary: CallSummary;
      let summaryMode: SummaryMode = 'template';

      if (client) {
        const result = await withModelFallback(async () => {
          const reply = await requestStructured({
            client,
            system: CALL_EVALUATION_SYSTEM_PROMPT,
            prompt: buildSummaryPrompt(context.call.transcript, collected.results),
            timeoutMs: config.timeoutMs,
            schema: SummaryReplySchema,
          });
          return reply.data;
        }, template);
        summary = result.value;
        if (result.mode === 'model') {
          summaryMode = 'model';
          if (collected.degraded.length > 0) {
            summary = {
              ...summary,
              summary: `${summary.summary} ${describeDegradedStages(collected.degraded)}`,
            };
          }
          if (collected.failed.length > 0 && !summary.next_actions.includes(MANUAL_REVIEW_ACTION)) {
            summary = { ...summary, next_actions: [...summary.next_actions, MANUAL_REVIEW_ACTION] };
          }
        }
      } else {
        summary = template();
      }

      const modelAnswered =
        summaryMode === 'model' || collected.results.some((result) => result.mode === 'model');

      return {
        call_id: context.call.call_id,
        quality_score: quality,
        labels: collected.labels,
        is_good_call: isGoodCall,
        summary: summary.summary,
        key_points: summary.key_points,
        next_actions: summary.next_actions,
        degraded_stages: collected.degraded,
        model_metadata: {
          model_name: modelAnswered && client ? client.model : null,
          latency_ms: Date.now() - context.startedAt,
          summary_mode: summaryMode,
        },
      };
    },
  };
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
