/**
 * Text Analyzer
 *
 * One capability, three variants:
 * - HeuristicAnalyzer: wraps a pure keyword function, never fails
 * - ModelBackedAnalyzer: prompts a ModelClient and validates the JSON answer;
 *   throws ModelUnavailableError on any backend or parse failure
 * - FallbackAnalyzer: tries the model, optionally blends it with the
 *   heuristic, and degrades to the heuristic when the model is unavailable
 *
 * @module text-analyzer
 */

import type { ZodType, ZodTypeDef } from 'zod';
import type { ModelFailure } from './errors';
import { ModelUnavailableError } from './errors';
import type { ModelClient, ModelResponse } from './model-client';
import { classifyModelError, withTimeout } from './model-client';
import { describeJsonResponse } from './structured-outputs/zod-to-schema';
import { parseStructuredOutput } from './structured-outputs/json-output';
import type { Analysis, AnalysisMode } from './types';
import { clampUnit } from './types';

// ===========================================
// Contract
// ===========================================

export interface AnalysisOutcome extends Analysis {
  mode: AnalysisMode;
  /** Explanation appended by callers when mode is 'degraded' */
  degradedReason?: string;
  failure?: ModelFailure;
  model?: string;
  latencyMs?: number;
}

export interface TextAnalyzer {
  readonly name: string;
  analyze(text: string): Promise<AnalysisOutcome>;
}

// ===========================================
// Structured Model Requests
// ===========================================

export interface StructuredRequest<T> {
  client: ModelClient;
  prompt: string;
  system?: string;
  timeoutMs: number;
  schema: ZodType<T, ZodTypeDef, unknown>;
}

export interface StructuredReply<T> {
  data: T;
  model: string;
  latencyMs: number;
}

/**
 * Ask the model for JSON matching `schema`. The client call is bounded by
 * `timeoutMs` even when the client does not enforce it.
 * @throws ModelUnavailableError on timeout, transport failure, or unusable output
 */
export async function requestStructured<T>(request: StructuredRequest<T>): Promise<StructuredReply<T>> {
  // Caller-supplied clients may throw or never settle
  let response: ModelResponse;
  try {
    response = await withTimeout(
      () =>
        request.client.generate({
          prompt: `${request.prompt}\n\n${describeJsonResponse(request.schema)}`,
          system: request.system,
          timeoutMs: request.timeoutMs,
        }),
      request.timeoutMs
    );
  } catch (error) {
    throw new ModelUnavailableError(classifyModelError(error));
  }

  if (!response.ok) {
    throw new ModelUnavailableError(response.failure);
  }

  const parsed = parseStructuredOutput(response.text, request.schema);
  if (!parsed.success) {
    throw new ModelUnavailableError({ kind: 'malformed_response', message: parsed.error });
  }

  return { data: parsed.data, model: response.model, latencyMs: response.latencyMs };
}

// ===========================================
// Fallback Helper
// ===========================================

export type FallbackResult<T> =
  | { value: T; mode: 'model' }
  | { value: T; mode: 'degraded'; failure: ModelFailure };

/**
 * Run `attempt`; if it throws ModelUnavailableError, use `fallback` instead.
 * Any other error propagates.
 */
export async function withModelFallback<T>(
  attempt: () => Promise<T>,
  fallback: () => T | Promise<T>
): Promise<FallbackResult<T>> {
  try {
    return { value: await attempt(), mode: 'model' };
  } catch (error) {
    if (!(error instanceof ModelUnavailableError)) {
      throw error;
    }
    return { value: await fallback(), mode: 'degraded', failure: error.toFailure() };
  }
}

export function describeDegradation(failure: ModelFailure): string {
  return `Model analysis unavailable (${failure.kind}); keyword heuristics used`;
}

// ===========================================
// Heuristic Analyzer
// ===========================================

export class HeuristicAnalyzer implements TextAnalyzer {
  constructor(
    readonly name: string,
    private readonly scoreText: (text: string) => Analysis
  ) {}

  async analyze(text: string): Promise<AnalysisOutcome> {
    const { score, evidence } = this.scoreText(text);
    return { score: clampUnit(score), evidence, mode: 'heuristic' };
  }
}

// ===========================================
// Model-Backed Analyzer
// ===========================================

export interface ModelPrompt {
  system?: string;
  prompt: string;
}

export interface ModelBackedAnalyzerConfig<T> {
  name: string;
  timeoutMs: number;
  buildPrompt: (text: string) => ModelPrompt;
  schema: ZodType<T, ZodTypeDef, unknown>;
  toAnalysis: (reply: T) => Analysis;
}

export class ModelBackedAnalyzer<T> implements TextAnalyzer {
  readonly name: string;

  constructor(
    private readonly client: ModelClient,
    private readonly config: ModelBackedAnalyzerConfig<T>
  ) {
    this.name = config.name;
  }

  async analyze(text: string): Promise<AnalysisOutcome> {
    const { prompt, system } = this.config.buildPrompt(text);
    const reply = await requestStructured({
      client: this.client,
      prompt,
      system,
      timeoutMs: this.config.timeoutMs,
      schema: this.config.schema,
    });

    const { score, evidence } = this.config.toAnalysis(reply.data);
    return {
      score: clampUnit(score),
      evidence,
      mode: 'model',
      model: reply.model,
      latencyMs: reply.latencyMs,
    };
  }
}

// ===========================================
// Fallback Analyzer
// ===========================================

export interface FallbackAnalyzerConfig {
  /**
   * Share of the model score when blending with the heuristic score.
   * When omitted the model result is used as-is.
   */
  modelWeight?: number;
}

export class FallbackAnalyzer implements TextAnalyzer {
  readonly name: string;

  constructor(
    private readonly primary: TextAnalyzer,
    private readonly heuristic: TextAnalyzer,
    private readonly config: FallbackAnalyzerConfig = {}
  ) {
    this.name = primary.name;
  }

  async analyze(text: string): Promise<AnalysisOutcome> {
    const heuristic = await this.heuristic.analyze(text);
    const result = await withModelFallback(
      () => this.primary.analyze(text),
      () => heuristic
    );

    if (result.mode === 'degraded') {
      return {
        score: heuristic.score,
        evidence: heuristic.evidence,
        mode: 'degraded',
        degradedReason: describeDegradation(result.failure),
        failure: result.failure,
      };
    }

    const model = result.value;
    const weight = this.config.modelWeight;
    if (weight === undefined) {
      return model;
    }

    return {
      ...model,
      score: clampUnit(weight * model.score + (1 - weight) * heuristic.score),
      evidence: [...model.evidence, ...heuristic.evidence],
      mode: 'model',
    };
  }
}

// ===========================================
// Factory Function
// ===========================================

export interface AnalyzerOptions<T> extends ModelBackedAnalyzerConfig<T>, FallbackAnalyzerConfig {
  heuristic: (text: string) => Analysis;
}

/**
 * Build the analyzer for one signal: model with heuristic fallback when a
 * client is available, heuristic only otherwise.
 */
export function createTextAnalyzer<T>(
  client: ModelClient | null,
  options: AnalyzerOptions<T>
): TextAnalyzer {
  const heuristic = new HeuristicAnalyzer(options.name, options.heuristic);
  if (!client) {
    return heuristic;
  }

  return new FallbackAnalyzer(new ModelBackedAnalyzer(client, options), heuristic, {
    modelWeight: options.modelWeight,
  });
}
