/**
 * Collector harness
 *
 * Wraps a collector definition into an adapter with the uniform invoke
 * contract: configuration checks, deadline enforcement, failure
 * classification and result sanitizing live here, so the definitions only
 * describe the external call and how to read its output.
 */

import { createHash } from 'node:crypto';
import type { Deadline } from '../concerns/deadline.js';
import { ErrorClassifier, type FailureOutcome } from '../concerns/error-classifier.js';
import { getRootLogger } from '../concerns/logger.js';
import { sanitizeAttributes } from '../concerns/safe-merge.js';
import { CollectorFailure } from '../errors.js';
import { FINDING_TYPES, type AdapterResult, type Finding, type FindingType, type Target } from '../types/investigation.types.js';
import type { CollectorAdapter, CollectorConfig, CollectorDefinition, CollectorDescriptor, InvokeOptions } from './collector.interface.js';

const EXPIRED = Symbol('expired');

const FINDING_TYPE_SET: ReadonlySet<string> = new Set(FINDING_TYPES);

export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function makeFinding(
  type: FindingType,
  value: string,
  confidence: number,
  attributes: Record<string, string> = {}
): Finding {
  return Object.freeze({
    type,
    value,
    confidence: clampConfidence(confidence),
    attributes: Object.freeze(sanitizeAttributes(attributes))
  });
}

/** Finding standing in for an output fragment the collector could not map. */
export function otherFinding(adapterName: string, fragment: string, confidence: number = 0.1): Finding {
  const digest = createHash('sha1').update(fragment).digest('hex').slice(0, 12);
  return makeFinding('Other', `${adapterName}:${digest}`, confidence, { raw: fragment });
}

/**
 * Maps each fragment with `mapFragment`; fragments it returns null for are
 * kept as `Other` findings carrying the raw text.
 */
export function parseFragments<F>(
  adapterName: string,
  fragments: readonly F[],
  mapFragment: (fragment: F) => Finding[] | null,
  describe: (fragment: F) => string
): Finding[] {
  const findings: Finding[] = [];
  for (const fragment of fragments) {
    const mapped = mapFragment(fragment);
    if (mapped) {
      findings.push(...mapped);
    } else {
      findings.push(otherFinding(adapterName, describe(fragment)));
    }
  }
  return findings;
}

export function parseJson(text: string, adapterName: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CollectorFailure('ParseError', `${adapterName} returned malformed JSON: ${message}`, { original: error });
  }
}

type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

function settle<T>(run: () => Promise<T>): Promise<Settled<T>> {
  return Promise.resolve()
    .then(run)
    .then(
      (value): Settled<T> => ({ ok: true, value }),
      (error: unknown): Settled<T> => ({ ok: false, error })
    );
}

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

/** Required configuration keys the collector's entry leaves unset or blank. */
export function missingConfigKeys(descriptor: Pick<CollectorDescriptor, 'requiredConfigKeys'>, config: CollectorConfig): string[] {
  return descriptor.requiredConfigKeys.filter(key => isBlank(config[key]));
}

export function describeMissingKeys(missing: readonly string[]): string {
  return `Missing required configuration: ${missing.join(', ')}`;
}

function sanitizeFindings(findings: readonly Finding[]): Finding[] {
  return findings
    .filter(finding => FINDING_TYPE_SET.has(finding.type) && typeof finding.value === 'string' && finding.value.trim() !== '')
    .map(finding => makeFinding(finding.type, finding.value, finding.confidence, { ...finding.attributes }));
}

export function defineCollector<Raw>(definition: CollectorDefinition<Raw>): CollectorAdapter {
  const descriptor = Object.freeze({
    ...definition.descriptor,
    acceptedTargetKinds: Object.freeze([...definition.descriptor.acceptedTargetKinds]),
    requiredConfigKeys: Object.freeze([...definition.descriptor.requiredConfigKeys]),
    rateLimit: Object.freeze({ ...definition.descriptor.rateLimit })
  });

  async function invoke(
    target: Target,
    config: CollectorConfig,
    deadline: Deadline,
    options: InvokeOptions = {}
  ): Promise<AdapterResult> {
    const startedAt = Date.now();
    const logger = (options.logger ?? getRootLogger()).child({ collector: descriptor.name });

    const finish = (
      outcome: AdapterResult['outcome'],
      attempts: number,
      findings: readonly Finding[] = [],
      errorDetail?: string
    ): AdapterResult => {
      const result: AdapterResult = {
        adapterName: descriptor.name,
        outcome,
        durationMs: Date.now() - startedAt,
        findings: Object.freeze(outcome === 'Success' ? [...findings] : []),
        attempts,
        finishedAt: new Date().toISOString(),
        ...(errorDetail !== undefined ? { errorDetail } : {})
      };
      logger.debug({ outcome, attempts, findings: result.findings.length, durationMs: result.durationMs }, 'collector finished');
      return Object.freeze(result);
    };

    const fail = (outcome: FailureOutcome, detail: string): AdapterResult => finish(outcome, 1, [], detail);

    const missing = missingConfigKeys(descriptor, config);
    if (missing.length > 0) {
      return finish('AuthMissing', 0, [], describeMissingKeys(missing));
    }

    if (deadline.expired) {
      return finish('Timeout', 0, [], 'Deadline expired before the call started');
    }

    const execution = settle(() => definition.execute({
      target,
      config,
      signal: deadline.signal,
      deadline,
      logger
    }));
    const raced = await Promise.race([execution, deadline.whenExpired().then((): typeof EXPIRED => EXPIRED)]);

    if (raced === EXPIRED || deadline.expired) {
      return fail('Timeout', `No complete response within ${Date.now() - startedAt}ms`);
    }

    if (!raced.ok) {
      return fail(ErrorClassifier.toOutcome(raced.error, { deadlineExpired: false }), ErrorClassifier.describe(raced.error));
    }

    let findings: Finding[];
    try {
      findings = definition.parse(raced.value, target);
    } catch (error: unknown) {
      const outcome = error instanceof CollectorFailure ? error.outcome : 'ParseError';
      return fail(outcome, ErrorClassifier.describe(error));
    }

    return finish('Success', 1, sanitizeFindings(findings));
  }

  return Object.freeze({ descriptor, invoke });
}
