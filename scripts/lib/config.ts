/**
 * Model ids, per-stage request settings and environment accessors shared by
 * the pipeline scripts.
 *
 * Scripts load `.env.local` with dotenv before importing this module.
 */

import type { PipelineVariant } from './types';

export const MODELS = {
  generation: 'anthropic/claude-sonnet-4',
  review: 'anthropic/claude-opus-4',
} as const;

export type Stage = 'generate-v1' | 'generate-v3' | 'generate-v4' | 'review' | 'defend';

export interface RequestSettings {
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
  /** Courtesy pause after every request. */
  delayMs: number;
}

export const REQUEST_SETTINGS: Record<Stage, RequestSettings> = {
  // Some creativity for diverse questions
  'generate-v1': { maxTokens: 2000, temperature: 0.8, timeoutMs: 60_000, delayMs: 500 },
  'generate-v3': { maxTokens: 2500, temperature: 0.7, timeoutMs: 90_000, delayMs: 1000 },
  'generate-v4': { maxTokens: 2500, temperature: 0.7, timeoutMs: 90_000, delayMs: 1000 },
  // Low temperature for consistent verdicts
  review: { maxTokens: 500, temperature: 0.3, timeoutMs: 90_000, delayMs: 1000 },
  defend: { maxTokens: 600, temperature: 0.3, timeoutMs: 90_000, delayMs: 1000 },
};

export const DEFAULT_QUESTIONS_PER_TOPIC: Record<PipelineVariant, number> = {
  v1: 1,
  v3: 2,
  v4: 2,
};

export const DEFAULT_OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';
export const DEFAULT_MAX_RETRIES = 2;
export const INITIAL_BACKOFF_MS = 2000;

export interface ProviderEnv {
  openRouterApiKey: string;
  openRouterBaseUrl: string;
  anthropicApiKey: string;
  mistralApiKey: string;
}

/**
 * Read provider credentials from the environment.
 * Missing keys are passed through as empty strings; the provider rejects the
 * first request instead.
 */
export function readProviderEnv(env: NodeJS.ProcessEnv = process.env): ProviderEnv {
  return {
    openRouterApiKey: env.OPENROUTER_API_KEY || '',
    openRouterBaseUrl: env.OPENROUTER_BASE_URL || DEFAULT_OPENROUTER_BASE_URL,
    anthropicApiKey: env.ANTHROPIC_API_KEY || '',
    mistralApiKey: env.MISTRAL_API_KEY || '',
  };
}

export function readMaxRetries(env: NodeJS.ProcessEnv = process.env): number {
  const parsed = parseInt(env.MODEL_MAX_RETRIES || '', 10);
  return isNaN(parsed) || parsed < 0 ? DEFAULT_MAX_RETRIES : parsed;
}

export function dataDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.GENETICS_DATA_DIR || './genetics_training_data';
}
