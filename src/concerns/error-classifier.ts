import { ZodError } from 'zod';
import { CollectorFailure, HttpStatusError } from '../errors.js';
import type { AdapterOutcome } from '../types/investigation.types.js';

export const RETRIABLE = 'RETRIABLE' as const;
export const NON_RETRIABLE = 'NON_RETRIABLE' as const;

export type ErrorClassification = typeof RETRIABLE | typeof NON_RETRIABLE;

export type FailureOutcome = Exclude<AdapterOutcome, 'Success'>;

const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_SOCKET'
]);

const NOT_AVAILABLE_CODES = new Set(['ENOENT', 'EACCES']);

const TIMEOUT_ERROR_NAMES = new Set(['AbortError', 'TimeoutError']);

const AUTH_STATUS_CODES = new Set([401, 403]);

export interface ClassifyOptions {
  /** Whether the caller's deadline had already expired when the error surfaced. */
  deadlineExpired?: boolean;
}

function readCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  if (error.cause instanceof Error) {
    return readCode(error.cause);
  }
  return undefined;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Maps raw failures raised while talking to an external tool onto adapter
 * outcomes. Only transport failures are worth another attempt.
 */
export class ErrorClassifier {
  static toOutcome(raw: unknown, options: ClassifyOptions = {}): FailureOutcome {
    const error = toError(raw);

    if (error instanceof CollectorFailure) {
      return error.outcome;
    }

    if (TIMEOUT_ERROR_NAMES.has(error.name) && (options.deadlineExpired ?? true)) {
      return 'Timeout';
    }

    if (error instanceof HttpStatusError && error.statusCode !== undefined) {
      if (error.statusCode === 429) return 'RateLimited';
      if (AUTH_STATUS_CODES.has(error.statusCode)) return 'AuthMissing';
      return 'NetworkError';
    }

    if (error instanceof ZodError || error instanceof SyntaxError) {
      return 'ParseError';
    }

    const code = readCode(error);
    if (code && NOT_AVAILABLE_CODES.has(code)) {
      return 'NotAvailable';
    }
    if (code && NETWORK_ERROR_CODES.has(code)) {
      return 'NetworkError';
    }

    // Anything unrecognised is treated as a failed exchange with the source.
    return 'NetworkError';
  }

  static classify(raw: unknown, options: ClassifyOptions = {}): ErrorClassification {
    return this.toOutcome(raw, options) === 'NetworkError' ? RETRIABLE : NON_RETRIABLE;
  }

  static isRetriable(raw: unknown, options: ClassifyOptions = {}): boolean {
    return this.classify(raw, options) === RETRIABLE;
  }

  static describe(raw: unknown): string {
    const error = toError(raw);
    const code = readCode(error);
    return code && !error.message.includes(code) ? `${error.message} (${code})` : error.message;
  }
}
