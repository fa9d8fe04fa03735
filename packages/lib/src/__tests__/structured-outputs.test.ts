/**
 * Structured Output Tests
 *
 * @module __tests__/structured-outputs
 */

import { describe, test, expect } from 'vitest';
import { z } from 'zod';
import {
  describeJsonResponse,
  extractJson,
  parseStructuredOutput,
  zodToJsonSchema,
} from '../structured-outputs';

const ScoreSchema = z.object({
  score: z.number().describe('Likelihood of conversion'),
  reasons: z.array(z.string()).default([]),
});

describe('extractJson', () => {
  test('parses bare JSON', () => {
    expect(extractJson('{"score": 0.4}')).toEqual({ score: 0.4 });
  });

  test('parses a fenced block', () => {
    expect(extractJson('Here you go:\n```json\n{"score": 0.7}\n```\nThanks')).toEqual({ score: 0.7 });
  });

  test('parses an object embedded in prose', () => {
    expect(extractJson('Result: {"score": 0.2, "reasons": ["cold"]} as requested')).toEqual({
      score: 0.2,
      reasons: ['cold'],
    });
  });

  test('returns null when nothing parses', () => {
    expect(extractJson('no structure here')).toBeNull();
    expect(extractJson('{broken')).toBeNull();
  });
});

describe('parseStructuredOutput', () => {
  test('validates and applies defaults', () => {
    expect(parseStructuredOutput('{"score": 0.6}', ScoreSchema)).toEqual({
      success: true,
      data: { score: 0.6, reasons: [] },
    });
  });

  test('reports missing JSON', () => {
    expect(parseStructuredOutput('nope', ScoreSchema)).toEqual({
      success: false,
      error: 'No JSON found in model response: nope',
    });
  });

  test('reports schema violations with their path', () => {
    const result = parseStructuredOutput('{"score": "high"}', ScoreSchema);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBe('Model response failed validation: score: Expected number, received string');
    }
  });
});

describe('zodToJsonSchema', () => {
  test('keeps descriptions and drops the $schema marker', () => {
    const schema = zodToJsonSchema(ScoreSchema);

    expect(schema.$schema).toBeUndefined();
    expect(schema.type).toBe('object');
    expect(schema.properties).toEqual({
      score: { type: 'number', description: 'Likelihood of conversion' },
      reasons: { type: 'array', items: { type: 'string' }, default: [] },
    });
  });

  test('describeJsonResponse wraps the schema in a json fence', () => {
    const lines = describeJsonResponse(ScoreSchema).split('\n');

    expect(lines[0]).toBe('Respond ONLY with a JSON object matching this JSON Schema:');
    expect(lines[1]).toBe('```json');
    expect(lines[lines.length - 1]).toBe('```');
  });
});
