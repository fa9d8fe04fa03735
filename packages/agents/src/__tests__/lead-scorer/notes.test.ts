/**
 * Notes Scoring Tests
 *
 * Keyword heuristics and the model/heuristic notes scorer.
 */

import { describe, test, expect } from 'vitest';
import { analyzeNotesHeuristically } from '../../lead-scorer/notes-heuristics';
import { NotesScorer, notesReplyToAnalysis } from '../../lead-scorer/notes-scorer';
import { hangingClient, modelFailure, modelReply, scriptedClient, throwingClient } from '../fixtures';

const EXAMPLE_NOTES = 'Very interested, wants to visit this weekend!';

// ===========================================
// Heuristics
// ===========================================

describe('analyzeNotesHeuristically', () => {
  test('rewards urgency and positive intent', () => {
    expect(analyzeNotesHeuristically(EXAMPLE_NOTES)).toEqual({
      score: 0.85,
      evidence: ['Urgency signals detected: this weekend', 'Positive signals: interested'],
    });
  });

  test('stacks every positive category up to 1.0', () => {
    expect(analyzeNotesHeuristically('Wants possession before Diwali, cash buyer, ready to book!!')).toEqual({
      score: 1,
      evidence: [
        'Urgency signals detected: ready to book, !!',
        'Timeline mentioned: diwali',
        'Positive signals: ready, cash buyer',
      ],
    });
  });

  test('penalizes negative signals', () => {
    const result = analyzeNotesHeuristically('not interested, wrong number');

    expect(result.score).toBeCloseTo(0.35, 9);
    expect(result.evidence).toEqual([
      'Positive signals: interested',
      'Negative signals: wrong number, not interested',
    ]);
  });

  test('does not read "this weekend" as "this week"', () => {
    expect(analyzeNotesHeuristically('Said she will decide this weekend')).toEqual({
      score: 0.7,
      evidence: ['Urgency signals detected: this weekend'],
    });
  });

  test('handles neutral and empty notes', () => {
    expect(analyzeNotesHeuristically('Asked about loans.')).toEqual({
      score: 0.5,
      evidence: ['Neutral notes content'],
    });
    expect(analyzeNotesHeuristically('   ')).toEqual({ score: 0.5, evidence: ['No notes available'] });
  });

  test('accepts a custom keyword table', () => {
    const keywords = { urgency: ['rush'], timeline: [], positive: [], negative: [] };
    expect(analyzeNotesHeuristically('in a rush', keywords).score).toBeCloseTo(0.7, 9);
  });
});

// ===========================================
// Notes Scorer
// ===========================================

describe('notesReplyToAnalysis', () => {
  test('appends red flags after the reasons', () => {
    expect(
      notesReplyToAnalysis({ score: 0.4, reasons: ['Browsing'], red_flags: ['Not picking calls'] })
    ).toEqual({ score: 0.4, evidence: ['Browsing', 'Red flags: Not picking calls'] });
  });
});

describe('NotesScorer', () => {
  const config = { timeoutMs: 1000, modelWeight: 0.6 };

  test('uses heuristics without a client', async () => {
    const scorer = new NotesScorer(null, config);

    expect(await scorer.score(EXAMPLE_NOTES, true)).toEqual({
      score: 0.85,
      reasons: ['Urgency signals detected: this weekend', 'Positive signals: interested'],
      mode: 'heuristic',
      model: undefined,
      failure: undefined,
    });
  });

  test('blends the model score with the keyword score', async () => {
    const client = scriptedClient(() =>
      modelReply({ score: 0.9, reasons: ['Ready to visit'], red_flags: ['Budget unclear'] })
    );
    const scorer = new NotesScorer(client, config);

    const result = await scorer.score(EXAMPLE_NOTES, true);

    expect(result.mode).toBe('model');
    expect(result.score).toBeCloseTo(0.88, 9);
    expect(result.model).toBe('test-model');
    expect(result.reasons).toEqual([
      'Ready to visit',
      'Red flags: Budget unclear',
      'Urgency signals detected: this weekend',
      'Positive signals: interested',
    ]);
    expect(client.requests[0].prompt).toContain(EXAMPLE_NOTES);
  });

  test('skips the model when not requested', async () => {
    const client = scriptedClient(() => modelReply({ score: 0.9 }));
    const scorer = new NotesScorer(client, config);

    const result = await scorer.score(EXAMPLE_NOTES, false);

    expect(result.mode).toBe('heuristic');
    expect(client.requests).toHaveLength(0);
  });

  test('skips the model for empty notes', async () => {
    const client = scriptedClient(() => modelReply({ score: 0.9 }));
    const scorer = new NotesScorer(client, config);

    const result = await scorer.score('', true);

    expect(result).toMatchObject({ score: 0.5, reasons: ['No notes available'], mode: 'heuristic' });
    expect(client.requests).toHaveLength(0);
  });

  test('degrades to keywords on timeout', async () => {
    const client = scriptedClient(() => modelFailure({ kind: 'timeout', message: 'Model call exceeded 1000ms' }));
    const scorer = new NotesScorer(client, config);

    const result = await scorer.score(EXAMPLE_NOTES, true);

    expect(result).toEqual({
      score: 0.85,
      reasons: [
        'Urgency signals detected: this weekend',
        'Positive signals: interested',
        'Model analysis unavailable (timeout); keyword heuristics used',
      ],
      mode: 'degraded',
      model: undefined,
      failure: { kind: 'timeout', message: 'Model call exceeded 1000ms' },
    });
  });

  test('degrades when the client throws', async () => {
    const scorer = new NotesScorer(throwingClient(), config);

    const result = await scorer.score(EXAMPLE_NOTES, true);

    expect(result).toEqual({
      score: 0.85,
      reasons: [
        'Urgency signals detected: this weekend',
        'Positive signals: interested',
        'Model analysis unavailable (unreachable); keyword heuristics used',
      ],
      mode: 'degraded',
      model: undefined,
      failure: { kind: 'unreachable', message: 'connect ECONNREFUSED' },
    });
  });

  test('degrades when the client never answers', async () => {
    const scorer = new NotesScorer(hangingClient(), { timeoutMs: 20, modelWeight: 0.6 });

    const result = await scorer.score(EXAMPLE_NOTES, true);

    expect(result.mode).toBe('degraded');
    expect(result.score).toBe(0.85);
    expect(result.failure).toEqual({ kind: 'timeout', message: 'Model call exceeded 20ms' });
  });

  test('degrades on an answer without JSON', async () => {
    const client = scriptedClient(() => ({ ok: true, text: 'Looks promising!', model: 'test-model', latencyMs: 2 }));
    const scorer = new NotesScorer(client, config);

    const result = await scorer.score(EXAMPLE_NOTES, true);

    expect(result.mode).toBe('degraded');
    expect(result.failure?.kind).toBe('malformed_response');
    expect(result.score).toBe(0.85);
  });
});
