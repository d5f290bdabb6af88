/**
 * Error classes
 *
 * Fatal errors abort an investigation before any collector runs. Collector
 * failures never surface as thrown errors outside a collector: they end up
 * as an AdapterResult outcome (see concerns/error-classifier.ts).
 */

import type { AdapterOutcome, TargetKind } from './types/investigation.types.js';

export interface BaseErrorContext {
  message?: string;
  code?: string;
  statusCode?: number;
  original?: unknown;
  description?: string;
  suggestion?: string;
  retriable?: boolean;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  code?: string;
  statusCode?: number;
  thrownAt: Date;
  retriable: boolean;
  suggestion?: string;
  description?: string;
  data: Record<string, unknown>;
  stack?: string;
}

export class BaseError extends Error {
  code?: string;
  statusCode?: number;
  original?: unknown;
  description?: string;
  suggestion?: string;
  retriable: boolean;
  thrownAt: Date;
  data: Record<string, unknown>;

  constructor(context: BaseErrorContext) {
    const {
      message = 'Unknown error',
      code,
      statusCode,
      original,
      description,
      suggestion,
      retriable,
      ...rest
    } = context;

    super(message);

    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor);
    }

    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.original = original;
    this.description = description;
    this.suggestion = suggestion;
    this.retriable = retriable ?? false;
    this.thrownAt = new Date();
    this.data = { ...rest };
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      thrownAt: this.thrownAt,
      retriable: this.retriable,
      suggestion: this.suggestion,
      description: this.description,
      data: this.data,
      stack: this.stack
    };
  }

  override toString(): string {
    return `${this.name} | ${this.message}`;
  }
}

export interface OsintErrorDetails {
  code?: string;
  statusCode?: number;
  original?: unknown;
  description?: string;
  suggestion?: string;
  retriable?: boolean;
  [key: string]: unknown;
}

export class OsintError extends BaseError {
  constructor(message: string, details: OsintErrorDetails = {}) {
    super({ ...details, message });
  }
}

export class InvalidTargetError extends OsintError {
  rawInput: string;

  constructor(rawInput: string, details: OsintErrorDetails = {}) {
    super(`Cannot classify target "${rawInput}" as a domain, IP address, email or username`, {
      code: 'INVALID_TARGET',
      suggestion: 'Pass a domain (example.com), an IP literal, an email address or a username.',
      ...details,
      rawInput
    });
    this.rawInput = rawInput;
  }
}

export class DuplicateAdapterError extends OsintError {
  adapterName: string;

  constructor(adapterName: string) {
    super(`Collector "${adapterName}" is already registered`, {
      code: 'DUPLICATE_ADAPTER',
      suggestion: 'Give every collector a unique name.',
      adapterName
    });
    this.adapterName = adapterName;
  }
}

export class RegistrySealedError extends OsintError {
  constructor(adapterName: string) {
    super(`Cannot register "${adapterName}": the collector registry is sealed`, {
      code: 'REGISTRY_SEALED',
      description: 'Collectors are registered once at startup, before any investigation runs.',
      adapterName
    });
  }
}

export class UnknownCollectorError extends OsintError {
  constructor(adapterName: string) {
    super(`No collector named "${adapterName}" is registered`, {
      code: 'UNKNOWN_COLLECTOR',
      adapterName
    });
  }
}

export class NoApplicableCollectorError extends OsintError {
  targetKind: TargetKind;

  constructor(targetKind: TargetKind, details: OsintErrorDetails = {}) {
    super(`No enabled collector accepts targets of kind ${targetKind}`, {
      code: 'NO_APPLICABLE_COLLECTOR',
      suggestion: 'Register a collector for this target kind or enable one in the configuration.',
      ...details,
      targetKind
    });
    this.targetKind = targetKind;
  }
}

export interface ConfigurationIssue {
  path: string;
  message: string;
}

export class ConfigurationError extends OsintError {
  issues: ConfigurationIssue[];

  constructor(message: string, details: OsintErrorDetails & { issues?: ConfigurationIssue[] } = {}) {
    const { issues = [], ...rest } = details;
    super(message, {
      code: 'INVALID_CONFIGURATION',
      suggestion: 'Fix the listed configuration entries and run again.',
      ...rest,
      issues
    });
    this.issues = issues;
  }
}

export class UnsupportedFormatError extends OsintError {
  constructor(format: string, supported: readonly string[]) {
    super(`Unsupported report format "${format}"`, {
      code: 'UNSUPPORTED_FORMAT',
      suggestion: `Use one of: ${supported.join(', ')}.`,
      format
    });
  }
}

/**
 * Raised inside a collector to report a failure whose outcome is already
 * known. The collector harness turns it into an AdapterResult.
 */
export class CollectorFailure extends OsintError {
  outcome: Exclude<AdapterOutcome, 'Success'>;

  constructor(outcome: Exclude<AdapterOutcome, 'Success'>, message: string, details: OsintErrorDetails = {}) {
    super(message, {
      code: outcome,
      retriable: outcome === 'NetworkError',
      ...details
    });
    this.outcome = outcome;
  }
}

export class HttpStatusError extends OsintError {
  retryAfterMs: number | null;

  constructor(statusCode: number, url: string, retryAfterMs: number | null = null) {
    super(`HTTP ${statusCode} from ${url}`, {
      code: `HTTP_${statusCode}`,
      statusCode,
      retriable: statusCode >= 500,
      url
    });
    this.retryAfterMs = retryAfterMs;
  }
}

export class DeadlineExceededError extends OsintError {
  constructor(message = 'Deadline exceeded') {
    super(message, { code: 'DEADLINE_EXCEEDED' });
    this.name = 'TimeoutError';
  }
}

export class TaskCancelledError extends OsintError {
  constructor(taskId: string) {
    super(`Task ${taskId} was cancelled before it started`, { code: 'TASK_CANCELLED', taskId });
  }
}
