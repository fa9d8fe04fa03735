/**
 * Verdict Contract
 *
 * Defines stage results and the final call verdict.
 *
 * @module contracts/verdict
 */

import { z } from 'zod';

// ===========================================
// Enums
// ===========================================

export const AnalysisStageSchema = z.enum([
  'rapport',
  'need_discovery',
  'closing',
  'compliance',
]);

export type AnalysisStage = z.infer<typeof AnalysisStageSchema>;

export const ANALYSIS_STAGES: readonly AnalysisStage[] = AnalysisStageSchema.options;

export const StageModeSchema = z.enum(['model', 'heuristic', 'degraded']);

export type StageMode = z.infer<typeof StageModeSchema>;

const UnitScore = z.number().min(0).max(1);

// ===========================================
// Stage Result Schema
// ===========================================

export const StageResultSchema = z.object({
  stage: AnalysisStageSchema,

  label: UnitScore
    .describe('Stage score; for compliance this is a risk (higher is worse)'),

  evidence: z
    .array(z.string())
    .describe('Phrases or observations behind the label'),

  mode: StageModeSchema,
});

export type StageResult = z.infer<typeof StageResultSchema>;

// ===========================================
// Verdict Schema
// ===========================================

export const CallLabelsSchema = z.object({
  rapport: UnitScore,
  need_discovery: UnitScore,
  closing: UnitScore,
  compliance_risk: UnitScore.describe('Lower is better'),
});

export type CallLabels = z.infer<typeof CallLabelsSchema>;

export const SummaryModeSchema = z.enum(['model', 'template']);

export type SummaryMode = z.infer<typeof SummaryModeSchema>;

export const VerdictMetadataSchema = z.object({
  model_name: z
    .string()
    .nullable()
    .describe('Model that answered at least one request, or null'),

  latency_ms: z
    .number()
    .nonnegative()
    .describe('Wall-clock time of the evaluation'),

  summary_mode: SummaryModeSchema,
});

export type VerdictMetadata = z.infer<typeof VerdictMetadataSchema>;

export const VerdictSchema = z.object({
  call_id: z.string().min(1),

  quality_score: UnitScore
    .describe('Weighted quality of the call'),

  labels: CallLabelsSchema,

  is_good_call: z
    .boolean()
    .describe('quality_score >= good_call_threshold'),

  summary: z.string(),

  key_points: z
    .array(z.string())
    .describe('Notable points from the conversation'),

  next_actions: z
    .array(z.string())
    .describe('Ordered follow-ups for the agent'),

  degraded_stages: z
    .array(AnalysisStageSchema)
    .describe('Stages that fell back to heuristics or failed and were scored neutral'),

  model_metadata: VerdictMetadataSchema,
});

export type Verdict = z.infer<typeof VerdictSchema>;
