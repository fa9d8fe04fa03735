/**
 * Model Client
 *
 * Capability boundary to a generative-text backend: send a prompt, get back
 * text or a typed failure. The caller's timeout is enforced here even when
 * the backend ignores it. No retries: retry policy belongs to callers.
 *
 * @module model-client
 */

import Anthropic from '@anthropic-ai/sdk';
import type { EngineConfig } from './config';
import type { ModelFailure } from './errors';
import { getErrorMessage } from './errors';

// ===========================================
// Contract
// ===========================================

export interface GenerateRequest {
  prompt: string;
  system?: string;
  timeoutMs: number;
  maxTokens?: number;
}

export interface ModelUsage {
  input: number;
  output: number;
}

export interface ModelSuccess {
  ok: true;
  text: string;
  model: string;
  latencyMs: number;
  usage?: ModelUsage;
}

export interface ModelError {
  ok: false;
  failure: ModelFailure;
  latencyMs: number;
}

export type ModelResponse = ModelSuccess | ModelError;

export interface ModelClient {
  /** Model identifier reported in metadata */
  readonly model: string;

  /** Resolves within timeoutMs plus scheduling overhead; never rejects */
  generate(request: GenerateRequest): Promise<ModelResponse>;
}

// ===========================================
// Timeout Enforcement
// ===========================================

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/**
 * Race an operation against a deadline. The signal is aborted when the
 * deadline passes so cooperative backends can stop early.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
): Promise<T> {
  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const abortPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(`Model call exceeded ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), abortPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

// ===========================================
// Anthropic Implementation
// ===========================================

/** Content block shape read from a messages response */
export interface MessageContentBlock {
  type: string;
  text?: string;
}

export interface MessageResponse {
  model: string;
  content: MessageContentBlock[];
  usage?: { input_tokens: number; output_tokens: number };
}

export interface MessageCreateBody {
  model: string;
  max_tokens: number;
  temperature?: number;
  system?: string;
  messages: Array<{ role: 'user'; content: string }>;
}

/** The slice of the Anthropic messages API this client uses */
export interface MessagesApi {
  create(
    body: MessageCreateBody,
    options?: { signal?: AbortSignal; timeout?: number }
  ): Promise<MessageResponse>;
}

export interface AnthropicModelClientConfig {
  model: string;
  maxTokens: number;
  temperature: number;
  apiKey?: string;
  baseUrl?: string;
}

export interface AnthropicModelClientDependencies {
  /** Messages API; defaults to a new Anthropic client's */
  messages?: MessagesApi;
}

export class AnthropicModelClient implements ModelClient {
  readonly model: string;
  private readonly config: AnthropicModelClientConfig;
  private readonly messages: MessagesApi;

  constructor(
    config: AnthropicModelClientConfig,
    deps: AnthropicModelClientDependencies = {}
  ) {
    this.config = config;
    this.model = config.model;
    this.messages =
      deps.messages ??
      new Anthropic({
        apiKey: config.apiKey,
        baseURL: config.baseUrl,
        maxRetries: 0,
      }).messages;
  }

  async generate(request: GenerateRequest): Promise<ModelResponse> {
    const startTime = Date.now();

    try {
      const response = await withTimeout(
        (signal) =>
          this.messages.create(
            {
              model: this.config.model,
              max_tokens: request.maxTokens ?? this.config.maxTokens,
              temperature: this.config.temperature,
              system: request.system,
              messages: [{ role: 'user', content: request.prompt }],
            },
            { signal, timeout: request.timeoutMs }
          ),
        request.timeoutMs
      );

      const latencyMs = Date.now() - startTime;
      const text = response.content
        .filter((block) => block.type === 'text')
        .map((block) => block.text ?? '')
        .join('')
        .trim();

      if (!text) {
        return {
          ok: false,
          failure: { kind: 'malformed_response', message: 'No text response from model' },
          latencyMs,
        };
      }

      return {
        ok: true,
        text,
        model: response.model,
        latencyMs,
        usage: response.usage
          ? { input: response.usage.input_tokens, output: response.usage.output_tokens }
          : undefined,
      };
    } catch (error) {
      return {
        ok: false,
        failure: classifyModelError(error),
        latencyMs: Date.now() - startTime,
      };
    }
  }
}

/**
 * Map a thrown backend error onto the failure taxonomy.
 */
export function classifyModelError(error: unknown): ModelFailure {
  const message = getErrorMessage(error);

  if (
    error instanceof TimeoutError ||
    error instanceof Anthropic.APIConnectionTimeoutError ||
    error instanceof Anthropic.APIUserAbortError
  ) {
    return { kind: 'timeout', message };
  }

  if (error instanceof Anthropic.APIConnectionError) {
    return { kind: 'unreachable', message };
  }

  if (error instanceof Anthropic.APIError) {
    return { kind: 'unreachable', message: `Model backend error (${error.status ?? 'no status'}): ${message}` };
  }

  if (error instanceof SyntaxError) {
    return { kind: 'malformed_response', message };
  }

  return { kind: 'unreachable', message };
}

// ===========================================
// Factory Function
// ===========================================

/**
 * Create a model client from engine configuration.
 * Returns null when no API key is configured; callers then run heuristics only.
 */
export function createModelClient(config: Readonly<EngineConfig>): ModelClient | null {
  if (!config.model.api_key) {
    return null;
  }

  return new AnthropicModelClient({
    model: config.model.name,
    maxTokens: config.model.max_tokens,
    temperature: config.model.temperature,
    apiKey: config.model.api_key,
    baseUrl: config.model.base_url,
  });
}
