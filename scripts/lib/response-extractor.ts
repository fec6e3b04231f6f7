/**
 * Pull the JSON payload out of a model response.
 *
 * Fallback order:
 *   1. the first ```json fence (any case)
 *   2. the first bare ``` fence, dropping a language tag on its opening line
 *   3. the whole text
 *
 * The payload is whatever sits between the opening marker and the next ```.
 * Responses with several fenced blocks, or bare JSON wrapped in prose, are
 * outside this contract and fail with a ParseFailure.
 */

import { ParseFailure } from './errors';

const FENCE = '```';
const JSON_FENCE = /```json\b/i;
const LANGUAGE_TAG = /^[\w+-]*[^\S\n]*\n/;

export function extractJsonPayload(text: string): string {
  const jsonFence = JSON_FENCE.exec(text);
  if (jsonFence) {
    return between(text, jsonFence.index + jsonFence[0].length);
  }

  const bareStart = text.indexOf(FENCE);
  if (bareStart !== -1) {
    const inner = between(text, bareStart + FENCE.length);
    return inner.replace(LANGUAGE_TAG, '').trim();
  }

  return text.trim();
}

function between(text: string, contentStart: number): string {
  const close = text.indexOf(FENCE, contentStart);
  if (close === -1) {
    throw new ParseFailure('Unterminated code fence in model response', text.slice(contentStart));
  }
  return text.slice(contentStart, close).trim();
}

/** Extract and parse the payload. Throws ParseFailure on malformed JSON. */
export function parseModelJson(text: string): unknown {
  const payload = extractJsonPayload(text);
  if (!payload) {
    throw new ParseFailure('Model response contained no payload', payload);
  }
  try {
    return JSON.parse(payload);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ParseFailure(`JSON parse error: ${detail}`, payload);
  }
}
