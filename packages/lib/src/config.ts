/**
 * Engine Configuration
 *
 * The single configuration surface shared by every scoring component:
 * bucket and verdict thresholds, aggregation weights, the notes blend ratio,
 * and model backend settings. Validated once at load time and frozen.
 *
 * @module config
 */

import { z } from 'zod';
import { ConfigurationError } from './errors';

// ===========================================
// Schemas
// ===========================================

/** Tolerance for weight sums */
export const WEIGHT_SUM_TOLERANCE = 1e-9;

const UnitSchema = z.number().min(0).max(1);

export const LeadWeightsSchema = z.object({
  recency: UnitSchema.default(0.25),
  engagement: UnitSchema.default(0.2),
  source: UnitSchema.default(0.15),
  budget: UnitSchema.default(0.2),
  notes: UnitSchema.default(0.2),
});

export type LeadWeights = z.infer<typeof LeadWeightsSchema>;

export const CallWeightsSchema = z.object({
  rapport: UnitSchema.default(0.25),
  need_discovery: UnitSchema.default(0.3),
  closing: UnitSchema.default(0.3),
  /** Applied to (1 - compliance_risk) */
  compliance: UnitSchema.default(0.15),
});

export type CallWeights = z.infer<typeof CallWeightsSchema>;

export const ModelSettingsSchema = z.object({
  base_url: z
    .string()
    .url()
    .optional()
    .describe('Model backend address (defaults to the provider endpoint)'),

  name: z
    .string()
    .min(1)
    .default('claude-3-5-haiku-latest')
    .describe('Model identifier'),

  max_tokens: z
    .number()
    .int()
    .positive()
    .default(512),

  temperature: z
    .number()
    .min(0)
    .max(1)
    .default(0.1),

  api_key: z
    .string()
    .min(1)
    .optional()
    .describe('API key; without one, analysis runs heuristics only'),
});

export type ModelSettings = z.infer<typeof ModelSettingsSchema>;

export const EngineConfigSchema = z
  .object({
    hot_threshold: UnitSchema.default(0.7),
    warm_threshold: UnitSchema.default(0.4),
    good_call_threshold: UnitSchema.default(0.6),

    llm_timeout_ms: z
      .number()
      .int()
      .positive()
      .default(10_000)
      .describe('Per-call model timeout'),

    lead_weights: LeadWeightsSchema.default({}),
    call_weights: CallWeightsSchema.default({}),

    notes_model_weight: UnitSchema
      .default(0.6)
      .describe('Share of the model score when blending with the keyword score'),

    model: ModelSettingsSchema.default({}),
  })
  .superRefine((config, ctx) => {
    if (config.warm_threshold > config.hot_threshold) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['warm_threshold'],
        message: `warm_threshold (${config.warm_threshold}) must not exceed hot_threshold (${config.hot_threshold})`,
      });
    }

    const leadSum = sumWeights(config.lead_weights);
    if (Math.abs(leadSum - 1) > WEIGHT_SUM_TOLERANCE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['lead_weights'],
        message: `weights must sum to 1.0 (got ${leadSum})`,
      });
    }

    const callSum = sumWeights(config.call_weights);
    if (Math.abs(callSum - 1) > WEIGHT_SUM_TOLERANCE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['call_weights'],
        message: `weights must sum to 1.0 (got ${callSum})`,
      });
    }
  });

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

/** Raw, partially specified options accepted by loadConfig */
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

// ===========================================
// Loading
// ===========================================

/**
 * Read recognized options from environment variables.
 * Unset variables are left undefined so schema defaults apply.
 */
export function readEnvOptions(env: NodeJS.ProcessEnv): EngineConfigInput {
  return {
    hot_threshold: readNumber(env.HOT_THRESHOLD),
    warm_threshold: readNumber(env.WARM_THRESHOLD),
    good_call_threshold: readNumber(env.GOOD_CALL_THRESHOLD),
    llm_timeout_ms: readNumber(env.LLM_TIMEOUT_MS),
    model: {
      base_url: env.LLM_BASE_URL || undefined,
      name: env.LLM_MODEL || undefined,
      max_tokens: readNumber(env.LLM_MAX_TOKENS),
      api_key: env.ANTHROPIC_API_KEY || undefined,
    },
  };
}

/**
 * Load and validate the engine configuration.
 *
 * Explicit overrides win over environment variables, which win over defaults.
 * @throws ConfigurationError if any invariant is violated
 */
export function loadConfig(
  overrides: EngineConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): Readonly<EngineConfig> {
  const fromEnv = readEnvOptions(env);

  const merged: EngineConfigInput = {
    ...stripUndefined(fromEnv),
    ...stripUndefined(overrides),
    model: {
      ...stripUndefined(fromEnv.model ?? {}),
      ...stripUndefined(overrides.model ?? {}),
    },
  };

  const result = EngineConfigSchema.safeParse(merged);
  if (!result.success) {
    throw ConfigurationError.fromZod(result.error);
  }

  return deepFreeze(result.data);
}

/**
 * Default configuration (no environment lookups)
 */
export function defaultConfig(): Readonly<EngineConfig> {
  return loadConfig({}, {});
}

// ===========================================
// Helpers
// ===========================================

export function sumWeights(weights: Record<string, number>): number {
  return Object.values(weights).reduce((sum, w) => sum + w, 0);
}

function readNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  return Number(raw);
}

function stripUndefined<T extends object>(value: T): Partial<T> {
  const result: Partial<T> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (entry !== undefined) {
      Object.assign(result, { [key]: entry });
    }
  }
  return result;
}

function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === 'object') {
    for (const entry of Object.values(value)) {
      deepFreeze(entry);
    }
    Object.freeze(value);
  }
  return value;
}
