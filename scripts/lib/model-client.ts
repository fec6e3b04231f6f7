/**
 * Chat completion clients.
 *
 * One request per call, no state. Model ids are routed the same way the
 * hybrid generators always have: `claude-*` goes to Anthropic directly,
 * `mistral-*` to Mistral, and anything else (vendor/model slugs such as
 * `anthropic/claude-sonnet-4`) to an OpenAI-compatible endpoint.
 *
 * Every client throws TransportFailure or TimeoutFailure; retrying is left to
 * `withRetry`.
 */

import Anthropic from '@anthropic-ai/sdk';
import { Mistral } from '@mistralai/mistralai';
import { z } from 'zod';
import { INITIAL_BACKOFF_MS, type ProviderEnv } from './config';
import { PipelineError, TimeoutFailure, TransportFailure, describeError } from './errors';

export interface CompletionRequest {
  prompt: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

export interface ModelClient {
  complete(request: CompletionRequest): Promise<string>;
}

// ─── OpenAI-compatible (OpenRouter) ──────────────────────────────────────────

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.union([
            z.string(),
            z.array(z.object({ type: z.string().optional(), text: z.string().optional() })),
            z.null(),
          ]),
        }),
      }),
    )
    .min(1),
});

function resolveCompletionsUrl(baseUrl: string): string {
  const trimmed = baseUrl.replace(/\/+$/, '');
  if (/\/chat\/completions$/i.test(trimmed)) {
    return trimmed;
  }
  return `${trimmed}/chat/completions`;
}

function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

export interface OpenRouterOptions {
  apiKey: string;
  baseUrl: string;
  fetchImpl?: typeof fetch;
}

export class OpenRouterClient implements ModelClient {
  private readonly completionsUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: OpenRouterOptions) {
    this.completionsUrl = resolveCompletionsUrl(options.baseUrl);
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async complete(request: CompletionRequest): Promise<string> {
    let res: Response;
    try {
      res = await this.fetchImpl(this.completionsUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.options.apiKey}`,
        },
        body: JSON.stringify({
          model: request.model,
          messages: [{ role: 'user', content: request.prompt }],
          max_tokens: request.maxTokens,
          temperature: request.temperature,
        }),
        signal: AbortSignal.timeout(request.timeoutMs),
      });
    } catch (error) {
      if (isTimeoutError(error)) throw new TimeoutFailure(request.timeoutMs);
      throw new TransportFailure(`Network error: ${describeError(error)}`);
    }

    let body: string;
    try {
      body = await res.text();
    } catch (error) {
      if (isTimeoutError(error)) throw new TimeoutFailure(request.timeoutMs);
      throw new TransportFailure(`Failed reading response body: ${describeError(error)}`, res.status);
    }

    if (!res.ok) {
      throw new TransportFailure(`API error: ${res.status} - ${body.substring(0, 200)}`, res.status);
    }

    return extractCompletionText(body, res.status);
  }
}

function extractCompletionText(body: string, status: number): string {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    throw new TransportFailure(`Completion response is not JSON: ${body.substring(0, 200)}`, status);
  }

  const parsed = chatCompletionSchema.safeParse(json);
  if (!parsed.success) {
    throw new TransportFailure('Completion response has no choices[0].message.content', status);
  }

  const content = parsed.data.choices[0].message.content;
  const text = Array.isArray(content) ? content.map(part => part.text ?? '').join('') : content ?? '';
  if (!text.trim()) {
    throw new TransportFailure('Completion response has empty content', status);
  }
  return text;
}

// ─── Anthropic ───────────────────────────────────────────────────────────────

export class AnthropicClient implements ModelClient {
  private readonly anthropic: Anthropic;

  constructor(apiKey: string) {
    this.anthropic = new Anthropic({ apiKey, maxRetries: 0 });
  }

  async complete(request: CompletionRequest): Promise<string> {
    try {
      const message = await this.anthropic.messages.create(
        {
          model: request.model,
          max_tokens: request.maxTokens,
          temperature: request.temperature,
          messages: [{ role: 'user', content: request.prompt }],
        },
        { timeout: request.timeoutMs },
      );
      const text = message.content
        .map(block => (block.type === 'text' ? block.text : ''))
        .join('');
      if (!text.trim()) {
        throw new TransportFailure('Anthropic response has no text content', 200);
      }
      return text;
    } catch (error) {
      if (error instanceof PipelineError) throw error;
      if (error instanceof Anthropic.APIConnectionTimeoutError) throw new TimeoutFailure(request.timeoutMs);
      if (error instanceof Anthropic.APIError) {
        throw new TransportFailure(`API error: ${error.status ?? 'network'} - ${error.message}`, error.status ?? undefined);
      }
      throw new TransportFailure(`Anthropic request failed: ${describeError(error)}`);
    }
  }
}

// ─── Mistral ─────────────────────────────────────────────────────────────────

function statusCodeOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

export class MistralClient implements ModelClient {
  private readonly mistral: Mistral;

  constructor(apiKey: string) {
    this.mistral = new Mistral({ apiKey });
  }

  async complete(request: CompletionRequest): Promise<string> {
    try {
      const response = await this.mistral.chat.complete(
        {
          model: request.model,
          messages: [{ role: 'user', content: request.prompt }],
          maxTokens: request.maxTokens,
          temperature: request.temperature,
        },
        { timeoutMs: request.timeoutMs },
      );
      const content = response.choices?.[0]?.message?.content;
      const text = typeof content === 'string'
        ? content
        : Array.isArray(content)
          ? content.map(chunk => ('text' in chunk && typeof chunk.text === 'string' ? chunk.text : '')).join('')
          : '';
      if (!text.trim()) {
        throw new TransportFailure('Mistral response has no text content', 200);
      }
      return text;
    } catch (error) {
      if (error instanceof PipelineError) throw error;
      if (isTimeoutError(error) || (error instanceof Error && error.name === 'RequestTimeoutError')) {
        throw new TimeoutFailure(request.timeoutMs);
      }
      const status = statusCodeOf(error);
      throw new TransportFailure(`Mistral request failed: ${describeError(error)}`, status);
    }
  }
}

// ─── Routing + retry ─────────────────────────────────────────────────────────

export type Provider = 'anthropic' | 'mistral' | 'openrouter';

export function providerFor(model: string): Provider {
  if (model.startsWith('claude-')) return 'anthropic';
  if (model.startsWith('mistral-')) return 'mistral';
  return 'openrouter';
}

export function createModelClient(model: string, env: ProviderEnv): ModelClient {
  switch (providerFor(model)) {
    case 'anthropic':
      return new AnthropicClient(env.anthropicApiKey);
    case 'mistral':
      return new MistralClient(env.mistralApiKey);
    case 'openrouter':
      return new OpenRouterClient({ apiKey: env.openRouterApiKey, baseUrl: env.openRouterBaseUrl });
  }
}

function isRetryable(error: unknown): boolean {
  if (error instanceof TimeoutFailure) return true;
  if (error instanceof TransportFailure) return error.retryable;
  return false;
}

export interface RetryOptions {
  maxRetries: number;
  initialBackoffMs?: number;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (error: PipelineError, attempt: number, backoffMs: number) => void;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Retry timeouts, network errors, 429 and 5xx with exponential backoff.
 * Anything else is rethrown on the first attempt.
 */
export function withRetry(client: ModelClient, options: RetryOptions): ModelClient {
  const initialBackoffMs = options.initialBackoffMs ?? INITIAL_BACKOFF_MS;
  const wait = options.sleep ?? sleep;

  return {
    async complete(request: CompletionRequest): Promise<string> {
      for (let attempt = 0; ; attempt++) {
        try {
          return await client.complete(request);
        } catch (error) {
          if (attempt >= options.maxRetries || !isRetryable(error) || !(error instanceof PipelineError)) {
            throw error;
          }
          const backoff = initialBackoffMs * Math.pow(2, attempt);
          options.onRetry?.(error, attempt + 1, backoff);
          await wait(backoff);
        }
      }
    },
  };
}
