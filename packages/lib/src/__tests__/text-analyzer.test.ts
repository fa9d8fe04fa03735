/**
 * Text Analyzer Tests
 *
 * @module __tests__/text-analyzer
 */

import { describe, test, expect } from 'vitest';
import { z } from 'zod';
import { ModelUnavailableError } from '../errors';
import type { ModelClient, ModelResponse } from '../model-client';
import {
  FallbackAnalyzer,
  HeuristicAnalyzer,
  ModelBackedAnalyzer,
  createTextAnalyzer,
  requestStructured,
  withModelFallback,
  type TextAnalyzer,
} from '../text-analyzer';

// ===========================================
// Test Fixtures
// ===========================================

const ReplySchema = z.object({
  score: z.number(),
  evidence: z.array(z.string()).default([]),
});

function clientAnswering(response: ModelResponse): ModelClient & { prompts: string[] } {
  const prompts: string[] = [];
  return {
    model: 'test-model',
    prompts,
    async generate(request) {
      prompts.push(request.prompt);
      return response;
    },
  };
}

function reply(text: string): ModelResponse {
  return { ok: true, text, model: 'test-model', latencyMs: 5 };
}

const keywordScore = (text: string) =>
  text.includes('urgent')
    ? { score: 0.85, evidence: ['Urgent wording'] }
    : { score: 0.5, evidence: ['Nothing notable'] };

const analyzerOptions = {
  name: 'notes',
  timeoutMs: 1000,
  buildPrompt: (text: string) => ({ prompt: `Rate: ${text}` }),
  schema: ReplySchema,
  toAnalysis: (data: z.infer<typeof ReplySchema>) => ({ score: data.score, evidence: data.evidence }),
  heuristic: keywordScore,
};

// ===========================================
// HeuristicAnalyzer
// ===========================================

describe('HeuristicAnalyzer', () => {
  test('reports heuristic mode and clamps the score', async () => {
    const analyzer = new HeuristicAnalyzer('over', () => ({ score: 1.4, evidence: ['many'] }));

    expect(await analyzer.analyze('x')).toEqual({ score: 1, evidence: ['many'], mode: 'heuristic' });
  });
});

// ===========================================
// Model-backed analysis
// ===========================================

describe('ModelBackedAnalyzer', () => {
  test('appends the response schema to the prompt', async () => {
    const client = clientAnswering(reply('{"score": 0.9, "evidence": ["Asked for a visit"]}'));
    const analyzer = new ModelBackedAnalyzer(client, analyzerOptions);

    const outcome = await analyzer.analyze('call me');

    expect(outcome).toEqual({
      score: 0.9,
      evidence: ['Asked for a visit'],
      mode: 'model',
      model: 'test-model',
      latencyMs: 5,
    });
    expect(client.prompts[0]).toContain('Rate: call me\n\nRespond ONLY with a JSON object');
  });

  test('clamps out-of-range model scores', async () => {
    const analyzer = new ModelBackedAnalyzer(clientAnswering(reply('{"score": 3}')), analyzerOptions);

    expect((await analyzer.analyze('x')).score).toBe(1);
  });

  test('throws ModelUnavailableError on unparseable output', async () => {
    const analyzer = new ModelBackedAnalyzer(clientAnswering(reply('I think it is good')), analyzerOptions);

    await expect(analyzer.analyze('x')).rejects.toBeInstanceOf(ModelUnavailableError);
  });
});

describe('requestStructured', () => {
  test('surfaces backend failures with their kind', async () => {
    const client = clientAnswering({
      ok: false,
      failure: { kind: 'timeout', message: 'Model call exceeded 10ms' },
      latencyMs: 10,
    });

    const error = await requestStructured({
      client,
      prompt: 'x',
      timeoutMs: 10,
      schema: ReplySchema,
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ModelUnavailableError);
    if (error instanceof ModelUnavailableError) {
      expect(error.kind).toBe('timeout');
    }
  });

  test('treats a throwing client as unreachable', async () => {
    const client: ModelClient = {
      model: 'test-model',
      generate: async () => {
        throw new Error('ECONNREFUSED');
      },
    };

    const error = await requestStructured({ client, prompt: 'x', timeoutMs: 1000, schema: ReplySchema }).catch(
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(ModelUnavailableError);
    if (error instanceof ModelUnavailableError) {
      expect(error.toFailure()).toEqual({ kind: 'unreachable', message: 'ECONNREFUSED' });
    }
  });

  test('times out a client that never answers', async () => {
    const client: ModelClient = {
      model: 'test-model',
      generate: () => new Promise<ModelResponse>(() => {}),
    };

    const error = await requestStructured({ client, prompt: 'x', timeoutMs: 20, schema: ReplySchema }).catch(
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(ModelUnavailableError);
    if (error instanceof ModelUnavailableError) {
      expect(error.toFailure()).toEqual({ kind: 'timeout', message: 'Model call exceeded 20ms' });
    }
  });

  test('reports schema violations as malformed responses', async () => {
    const error = await requestStructured({
      client: clientAnswering(reply('{"score": "high"}')),
      prompt: 'x',
      timeoutMs: 10,
      schema: ReplySchema,
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ModelUnavailableError);
    if (error instanceof ModelUnavailableError) {
      expect(error.kind).toBe('malformed_response');
    }
  });
});

// ===========================================
// Fallback
// ===========================================

describe('withModelFallback', () => {
  test('uses the attempt when it succeeds', async () => {
    expect(await withModelFallback(async () => 'model', () => 'fallback')).toEqual({
      value: 'model',
      mode: 'model',
    });
  });

  test('falls back on ModelUnavailableError', async () => {
    const result = await withModelFallback(
      async () => {
        throw new ModelUnavailableError({ kind: 'unreachable', message: 'down' });
      },
      () => 'fallback'
    );

    expect(result).toEqual({
      value: 'fallback',
      mode: 'degraded',
      failure: { kind: 'unreachable', message: 'down' },
    });
  });

  test('propagates other errors', async () => {
    await expect(
      withModelFallback(
        async () => {
          throw new TypeError('bug');
        },
        () => 'fallback'
      )
    ).rejects.toThrow('bug');
  });
});

describe('FallbackAnalyzer', () => {
  const heuristic = new HeuristicAnalyzer('notes', keywordScore);

  test('degrades to the heuristic when the model is unavailable', async () => {
    const failing: TextAnalyzer = {
      name: 'notes',
      analyze: async () => {
        throw new ModelUnavailableError({ kind: 'timeout', message: 'late' });
      },
    };
    const analyzer = new FallbackAnalyzer(failing, heuristic);

    expect(await analyzer.analyze('urgent buyer')).toEqual({
      score: 0.85,
      evidence: ['Urgent wording'],
      mode: 'degraded',
      degradedReason: 'Model analysis unavailable (timeout); keyword heuristics used',
      failure: { kind: 'timeout', message: 'late' },
    });
  });

  test('blends model and heuristic scores when a weight is set', async () => {
    const client = clientAnswering(reply('{"score": 0.9, "evidence": ["Model says hot"]}'));
    const analyzer = new FallbackAnalyzer(new ModelBackedAnalyzer(client, analyzerOptions), heuristic, {
      modelWeight: 0.6,
    });

    const outcome = await analyzer.analyze('urgent buyer');

    expect(outcome.mode).toBe('model');
    expect(outcome.score).toBeCloseTo(0.88, 9);
    expect(outcome.evidence).toEqual(['Model says hot', 'Urgent wording']);
  });

  test('uses the model result as-is without a weight', async () => {
    const client = clientAnswering(reply('{"score": 0.2}'));
    const analyzer = new FallbackAnalyzer(new ModelBackedAnalyzer(client, analyzerOptions), heuristic);

    const outcome = await analyzer.analyze('urgent buyer');

    expect(outcome.score).toBe(0.2);
    expect(outcome.evidence).toEqual([]);
  });
});

describe('createTextAnalyzer', () => {
  test('is heuristic-only without a client', async () => {
    const analyzer = createTextAnalyzer(null, analyzerOptions);

    expect(analyzer).toBeInstanceOf(HeuristicAnalyzer);
    expect((await analyzer.analyze('plain')).mode).toBe('heuristic');
  });

  test('degrades on malformed model output', async () => {
    const analyzer = createTextAnalyzer(clientAnswering(reply('not json')), analyzerOptions);

    const outcome = await analyzer.analyze('urgent');

    expect(outcome.mode).toBe('degraded');
    expect(outcome.score).toBe(0.85);
    expect(outcome.failure?.kind).toBe('malformed_response');
  });
});
