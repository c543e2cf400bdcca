import { isAxiosError } from 'axios';

export type PipelineErrorKind = 'transient' | 'validation' | 'structural';

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Network timeouts, throttling, empty or malformed provider payloads. */
export class TransientFetchError extends PipelineError {
  readonly kind = 'transient';
}

export class MalformedDateError extends PipelineError {
  readonly kind = 'validation';

  constructor(readonly input: unknown) {
    super(`Unparseable date: ${String(input)}`);
  }
}

export class MalformedTimestampError extends PipelineError {
  readonly kind = 'validation';

  constructor(readonly input: unknown) {
    super(`Unparseable timestamp: ${String(input)}`);
  }
}

export class RecordValidationError extends PipelineError {
  readonly kind = 'validation';
}

export class InsufficientDataError extends PipelineError {
  readonly kind = 'structural';
}

export class NoTradingDayError extends PipelineError {
  readonly kind = 'structural';

  constructor(
    readonly from: string,
    readonly horizonDays: number,
  ) {
    super(`No trading day found within ${horizonDays} days after ${from}`);
  }
}

export class InvalidSplitRatiosError extends PipelineError {
  readonly kind = 'structural';
}

const TRANSIENT_ERROR_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ECONNRESET', 'EAI_AGAIN']);

/**
 * Whether a failed fetch is worth retrying. Axios errors count when the
 * request never got a response, timed out, or came back 429/5xx.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof TransientFetchError) {
    return true;
  }

  if (isAxiosError(error)) {
    if (error.code && TRANSIENT_ERROR_CODES.has(error.code)) {
      return true;
    }
    const status = error.response?.status;
    if (status === undefined) {
      return true;
    }
    return status === 429 || status >= 500;
  }

  return false;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
