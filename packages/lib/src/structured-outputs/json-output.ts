/**
 * JSON Output Parsing
 *
 * Extracts a JSON object from free-form model text and validates it
 * against a Zod schema. Models often wrap JSON in prose or code fences;
 * both are tolerated.
 *
 * @module @signalrank/lib/structured-outputs
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { formatZodIssues } from '../errors';
import type { Outcome } from '../types';

const FENCED_JSON = /```(?:json)?\s*([\s\S]*?)\s*```/;
const BARE_OBJECT = /\{[\s\S]*\}/;

/**
 * Pull the first JSON object out of model text.
 * Tries the whole text, then a fenced block, then the outermost braces.
 * Returns null when nothing parses.
 */
export function extractJson(text: string): unknown {
  const candidates: string[] = [text.trim()];

  const fenced = text.match(FENCED_JSON);
  if (fenced?.[1]) candidates.push(fenced[1]);

  const bare = text.match(BARE_OBJECT);
  if (bare) candidates.push(bare[0]);

  for (const candidate of candidates) {
    try {
      return JSON.parse(candidate);
    } catch {
      continue;
    }
  }

  return null;
}

/**
 * Extract and validate structured output.
 * The failure side carries a message suitable for logs.
 */
export function parseStructuredOutput<T>(
  text: string,
  schema: ZodType<T, ZodTypeDef, unknown>
): Outcome<T, string> {
  const raw = extractJson(text);
  if (raw === null) {
    return { success: false, error: `No JSON found in model response: ${text.slice(0, 200)}` };
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return {
      success: false,
      error: `Model response failed validation: ${formatZodIssues(parsed.error).join('; ')}`,
    };
  }

  return { success: true, data: parsed.data };
}
