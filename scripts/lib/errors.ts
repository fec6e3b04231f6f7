/**
 * Failures raised while turning one work item into a record.
 *
 * The pipeline driver catches every PipelineError per item; none of them is
 * fatal to a run.
 */

import type { FailureKind } from './types';

export abstract class PipelineError extends Error {
  abstract readonly kind: FailureKind;
}

/** Non-2xx status, network error, or a 2xx body with no completion text. */
export class TransportFailure extends PipelineError {
  readonly kind = 'transport';

  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'TransportFailure';
  }

  /** Network errors, 429 and 5xx are worth another attempt. */
  get retryable(): boolean {
    return this.status === undefined || this.status === 429 || this.status >= 500;
  }
}

export class TimeoutFailure extends PipelineError {
  readonly kind = 'timeout';

  constructor(readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutFailure';
  }
}

export class ParseFailure extends PipelineError {
  readonly kind = 'parse';

  constructor(
    message: string,
    readonly payload: string,
  ) {
    super(message);
    this.name = 'ParseFailure';
  }
}

export type ViolationReason =
  | 'missing-field'
  | 'invalid-field'
  | 'option-count'
  | 'answer-not-in-options'
  | 'confidence-gate';

export class SchemaViolation extends PipelineError {
  readonly kind = 'schema';

  constructor(
    readonly reason: ViolationReason,
    message: string,
    readonly field?: string,
  ) {
    super(message);
    this.name = 'SchemaViolation';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
