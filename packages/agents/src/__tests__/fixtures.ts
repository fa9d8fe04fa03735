/**
 * Shared Test Fixtures
 *
 * In-process model clients and sample inputs for agent tests.
 *
 * @module __tests__/fixtures
 */

import {
  createLogger as createLeadScorerLogger,
  type LeadInput,
} from '../lead-scorer';
import { createCallEvaluatorLogger } from '../call-evaluator';
import type { GenerateRequest, ModelClient, ModelFailure, ModelResponse } from '@signalrank/lib';
import { silentOutput } from '@signalrank/lib';

// ===========================================
// Model Clients
// ===========================================

export interface RecordingClient extends ModelClient {
  requests: GenerateRequest[];
}

/**
 * Client that answers every request through `respond`
 */
export function scriptedClient(
  respond: (request: GenerateRequest) => ModelResponse
): RecordingClient {
  const requests: GenerateRequest[] = [];
  return {
    model: 'test-model',
    requests,
    async generate(request) {
      requests.push(request);
      return respond(request);
    },
  };
}

export function modelReply(body: unknown): ModelResponse {
  return { ok: true, text: JSON.stringify(body), model: 'test-model', latencyMs: 3 };
}

export function modelFailure(failure: ModelFailure): ModelResponse {
  return { ok: false, failure, latencyMs: 3 };
}

/** Client whose backend is always down */
export function unreachableClient(): RecordingClient {
  return scriptedClient(() => modelFailure({ kind: 'unreachable', message: 'connect ECONNREFUSED' }));
}

/** Client whose `generate` rejects instead of returning a failure */
export function throwingClient(message = 'connect ECONNREFUSED'): ModelClient {
  return {
    model: 'test-model',
    async generate() {
      throw new Error(message);
    },
  };
}

/** Client whose `generate` never settles */
export function hangingClient(): ModelClient {
  return {
    model: 'test-model',
    generate: () => new Promise<ModelResponse>(() => {}),
  };
}

// ===========================================
// Loggers
// ===========================================

export const quietLeadLogger = () => createLeadScorerLogger({ output: silentOutput });

export const quietCallLogger = () => createCallEvaluatorLogger({ output: silentOutput });

// ===========================================
// Leads
// ===========================================

export function createLead(overrides: Partial<LeadInput> = {}): LeadInput {
  return {
    lead_id: 'L1',
    source: 'referral',
    budget: 15_000_000,
    city: 'Bengaluru',
    property_type: '3BHK',
    last_activity_minutes_ago: 30,
    past_interactions: 5,
    notes: 'Very interested, wants to visit this weekend!',
    status: 'contacted',
    ...overrides,
  };
}

// ===========================================
// Transcripts
// ===========================================

export const GOOD_TRANSCRIPT = [
  'Agent: Good morning Ms. Rao, thank you for calling. What kind of home are you looking for?',
  'Customer: A 2BHK near the lake, ready by next year.',
  'Agent: I understand. What budget do you have in mind? Which floor would you prefer? Is parking important?',
  'Customer: Around 80 lakhs. Parking is a must.',
  'Agent: I will personally share the floor plans. Shall we schedule a site visit this Saturday at 11? I will send the details on WhatsApp.',
  'Customer: Saturday works.',
  'Agent: Looking forward to meeting you.',
].join('\n');

export const PUSHY_TRANSCRIPT =
  'Agent: Yes? Price is fixed, today only. Last chance, I guarantee it sells. Bye.';
