/**
 * Zod to JSON Schema Converter
 *
 * Converts Zod schemas to JSON Schema for embedding in model prompts,
 * so the response format the model is asked for and the schema its
 * answer is validated against are the same object.
 *
 * @module @signalrank/lib/structured-outputs
 */

import { zodToJsonSchema as zodToJsonSchemaLib } from 'zod-to-json-schema';
import type { ZodSchema } from 'zod';

/**
 * JSON Schema object as produced by zod-to-json-schema
 */
export type JsonSchema = Record<string, unknown>;

/**
 * Convert a Zod schema to JSON Schema format.
 *
 * - Inlines references ($refStrategy 'none')
 * - Targets JSON Schema draft-07
 * - Drops the $schema marker
 *
 * @example
 * ```typescript
 * const NotesSchema = z.object({
 *   score: z.number().min(0).max(1).describe('Conversion likelihood'),
 *   reasons: z.array(z.string()),
 * });
 *
 * zodToJsonSchema(NotesSchema);
 * // {
 * //   type: 'object',
 * //   properties: {
 * //     score: { type: 'number', minimum: 0, maximum: 1, description: 'Conversion likelihood' },
 * //     reasons: { type: 'array', items: { type: 'string' } }
 * //   },
 * //   required: ['score', 'reasons'],
 * //   additionalProperties: false
 * // }
 * ```
 */
export function zodToJsonSchema(schema: ZodSchema): JsonSchema {
  const { $schema: _schemaMarker, ...cleanSchema } = zodToJsonSchemaLib(schema, {
    $refStrategy: 'none',
    target: 'jsonSchema7',
  });

  return cleanSchema;
}

/**
 * Render a schema as a prompt block asking for a bare JSON answer.
 */
export function describeJsonResponse(schema: ZodSchema): string {
  return [
    'Respond ONLY with a JSON object matching this JSON Schema:',
    '```json',
    JSON.stringify(zodToJsonSchema(schema), null, 2),
    '```',
  ].join('\n');
}
