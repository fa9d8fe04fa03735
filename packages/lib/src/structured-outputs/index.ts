/**
 * Structured Outputs Module
 *
 * Prompt-side JSON Schema rendering and response-side JSON extraction,
 * both driven by the same Zod schema.
 *
 * @module @signalrank/lib/structured-outputs
 */

export {
  zodToJsonSchema,
  describeJsonResponse,
  type JsonSchema,
} from './zod-to-schema';

export { extractJson, parseStructuredOutput } from './json-output';
