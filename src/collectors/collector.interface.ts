import type { Deadline } from '../concerns/deadline.js';
import type { Logger } from '../concerns/logger.js';
import type { RateLimit } from '../concerns/token-bucket.js';
import type { AdapterResult, Finding, Target, TargetKind } from '../types/investigation.types.js';

export type CollectorTransport = 'http' | 'process' | 'custom';

export interface CollectorDescriptor {
  readonly name: string;
  readonly transport: CollectorTransport;
  readonly acceptedTargetKinds: readonly TargetKind[];
  readonly requiredConfigKeys: readonly string[];
  readonly rateLimit: RateLimit;
  /** Higher runs first when selecting; defaults to 0. */
  readonly priority?: number;
  readonly defaultTimeoutMs?: number;
  readonly description?: string;
}

/**
 * Per-collector configuration. Keys other than the recognized three are
 * opaque options handed to the collector untouched.
 */
export interface CollectorConfig {
  readonly apiKey?: string;
  readonly timeoutMs?: number;
  readonly enabled?: boolean;
  readonly [option: string]: unknown;
}

export interface InvokeOptions {
  logger?: Logger;
}

export interface CollectorAdapter {
  readonly descriptor: CollectorDescriptor;
  /** Never rejects: every failure ends up as the result's outcome. */
  invoke(target: Target, config: CollectorConfig, deadline: Deadline, options?: InvokeOptions): Promise<AdapterResult>;
}

export interface ExecuteContext {
  target: Target;
  config: CollectorConfig;
  /** Aborts at the collector's deadline; pass it to the transport. */
  signal: AbortSignal;
  deadline: Deadline;
  logger: Logger;
}

export interface CollectorDefinition<Raw> {
  descriptor: CollectorDescriptor;
  /** Performs the external call and returns its raw output. */
  execute(context: ExecuteContext): Promise<Raw>;
  /** Maps raw output to findings; throws CollectorFailure('ParseError') when nothing is usable. */
  parse(raw: Raw, target: Target): Finding[];
}
