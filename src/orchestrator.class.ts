/**
 * Orchestrator
 *
 * Runs one investigation: normalizes the target, selects collectors, runs
 * them on a bounded pool under per-collector timeouts, rate limits and
 * retries, and feeds every result to the aggregator as soon as it arrives.
 * The investigation deadline cancels whatever is still outstanding.
 */

import { EventEmitter } from 'node:events';
import { FindingAggregator } from './aggregator.class.js';
import type { CollectorRegistry } from './collector-registry.class.js';
import type { CollectorAdapter, CollectorConfig, CollectorDescriptor } from './collectors/collector.interface.js';
import { describeMissingKeys, missingConfigKeys } from './collectors/harness.js';
import { Deadline } from './concerns/deadline.js';
import { investigationId } from './concerns/id.js';
import { getRootLogger, type Logger } from './concerns/logger.js';
import { TokenBucket } from './concerns/token-bucket.js';
import { NoApplicableCollectorError, TaskCancelledError } from './errors.js';
import { Investigation } from './investigation.class.js';
import { TargetNormalizer } from './target-normalizer.class.js';
import { TasksPool, type TaskRetryEvent } from './tasks/tasks-pool.class.js';
import type {
  AdapterOutcome,
  AdapterResult,
  InvestigationGraph,
  Target
} from './types/investigation.types.js';

export interface OrchestratorOptions {
  registry: CollectorRegistry;
  concurrency?: number;
  retries?: number;
  retryDelayMs?: number;
  maxRetryDelayMs?: number;
  defaultTimeoutMs?: number;
  collectors?: Readonly<Record<string, CollectorConfig>>;
  logger?: Logger;
  /** Source of randomness for backoff jitter. */
  random?: () => number;
}

export interface InvestigateRequest {
  rawTarget: string;
  deadlineMs: number;
  /** Aborting it ends the investigation as if its deadline had passed. */
  signal?: AbortSignal;
}

export interface InvestigationPlan {
  target: Target;
  selected: CollectorDescriptor[];
  skipped: string[];
}

export interface InvestigationOutcome {
  investigation: Investigation;
  graph: InvestigationGraph;
}

export interface InvestigationStartedEvent {
  investigationId: string;
  target: Target;
  selected: string[];
  skipped: string[];
  deadline: number;
}

export interface CollectorStartedEvent {
  investigationId: string;
  collector: string;
  timeoutMs: number;
}

export interface CollectorRetryEvent {
  investigationId: string;
  collector: string;
  attempt: number;
  delayMs: number;
}

export interface CollectorCompletedEvent {
  investigationId: string;
  result: AdapterResult;
}

export interface InvestigationSealedEvent {
  investigation: Investigation;
  graph: InvestigationGraph;
}

export const DEFAULT_CONCURRENCY = 8;
export const DEFAULT_RETRIES = 2;
export const DEFAULT_RETRY_DELAY_MS = 250;
export const DEFAULT_MAX_RETRY_DELAY_MS = 10000;
export const DEFAULT_TIMEOUT_MS = 30000;

function syntheticResult(
  adapterName: string,
  outcome: Exclude<AdapterOutcome, 'Success'>,
  errorDetail: string,
  durationMs: number,
  attempts: number
): AdapterResult {
  return Object.freeze({
    adapterName,
    outcome,
    durationMs,
    findings: Object.freeze([]),
    errorDetail,
    attempts,
    finishedAt: new Date().toISOString()
  });
}

export class Orchestrator extends EventEmitter {
  readonly registry: CollectorRegistry;
  readonly concurrency: number;
  readonly retries: number;
  readonly retryDelayMs: number;
  readonly maxRetryDelayMs: number;
  readonly defaultTimeoutMs: number;

  private readonly collectors: Readonly<Record<string, CollectorConfig>>;
  private readonly buckets = new Map<string, TokenBucket>();
  private readonly logger: Logger;
  private readonly random: () => number;

  constructor(options: OrchestratorOptions) {
    super();
    this.registry = options.registry.seal();
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.retries = options.retries ?? DEFAULT_RETRIES;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.maxRetryDelayMs = options.maxRetryDelayMs ?? DEFAULT_MAX_RETRY_DELAY_MS;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.collectors = options.collectors ?? {};
    this.logger = options.logger ?? getRootLogger().child({ component: 'orchestrator' });
    this.random = options.random ?? Math.random;
  }

  configFor(name: string): CollectorConfig {
    return this.collectors[name] ?? {};
  }

  /**
   * Normalizes the target and picks the collectors to run. Throws the fatal
   * setup errors; nothing has been dispatched when it does.
   */
  plan(rawTarget: string): InvestigationPlan {
    const target = TargetNormalizer.normalize(rawTarget);
    const selected: CollectorDescriptor[] = [];
    const skipped: string[] = [];

    for (const descriptor of this.registry.select(target)) {
      if (this.configFor(descriptor.name).enabled === false) {
        skipped.push(descriptor.name);
      } else {
        selected.push(descriptor);
      }
    }

    if (selected.length === 0) {
      throw new NoApplicableCollectorError(target.kind, { skipped });
    }

    return { target, selected, skipped };
  }

  async investigate(request: InvestigateRequest): Promise<InvestigationOutcome> {
    const { target, selected, skipped } = this.plan(request.rawTarget);

    const startTime = Date.now();
    const deadline = Deadline.after(request.deadlineMs, { parent: request.signal });
    const investigation = new Investigation({
      id: investigationId(),
      target,
      startTime,
      deadline: deadline.at,
      selected: selected.map(descriptor => descriptor.name),
      skipped
    });

    const logger = this.logger.child({ investigation: investigation.id });
    const aggregator = new FindingAggregator({ logger });
    const pool = new TasksPool({
      concurrency: this.concurrency,
      retries: this.retries,
      retryDelay: this.retryDelayMs,
      maxRetryDelay: this.maxRetryDelayMs,
      random: this.random
    });

    pool.on('pool:taskRetry', (event: TaskRetryEvent) => {
      const collector = typeof event.metadata.collector === 'string' ? event.metadata.collector : 'unknown';
      logger.info({ collector, attempt: event.attempt, delayMs: event.delayMs }, 'retrying collector');
      const payload: CollectorRetryEvent = {
        investigationId: investigation.id,
        collector,
        attempt: event.attempt,
        delayMs: event.delayMs
      };
      this.emit('collector:retry', payload);
    });

    const started: InvestigationStartedEvent = {
      investigationId: investigation.id,
      target,
      selected: [...investigation.selected],
      skipped,
      deadline: deadline.at
    };
    logger.info({ target: target.normalizedValue, kind: target.kind, selected: started.selected, skipped }, 'investigation started');
    this.emit('investigation:started', started);

    const accept = (result: AdapterResult, capped: boolean): void => {
      if (result.outcome === 'Timeout' && capped && deadline.expired) {
        investigation.markExpired();
      }
      if (!investigation.record(result)) {
        logger.debug({ collector: result.adapterName, outcome: result.outcome }, 'ignoring late collector result');
        return;
      }

      logger.info(
        { collector: result.adapterName, outcome: result.outcome, findings: result.findings.length, durationMs: result.durationMs },
        'collector completed'
      );
      const completed: CollectorCompletedEvent = { investigationId: investigation.id, result };
      this.emit('collector:completed', completed);

      aggregator.merge(result).catch((error: unknown) => {
        logger.error({ err: error, collector: result.adapterName }, 'failed to merge collector result');
      });
    };

    const tasks = selected.map(descriptor =>
      this.runCollector(descriptor, target, investigation, deadline, pool, logger, accept)
    );
    const allSettled = Promise.all(tasks);

    await Promise.race([allSettled, deadline.whenExpired()]);

    if (investigation.outstanding().length > 0) {
      investigation.markExpired();
      pool.stop();
      const elapsed = Date.now() - startTime;
      for (const name of investigation.outstanding()) {
        accept(syntheticResult(name, 'Timeout', 'Investigation deadline reached before the collector finished', elapsed, 0), true);
      }
      logger.warn({ deadlineMs: request.deadlineMs }, 'investigation deadline reached');
    }

    await allSettled;
    await aggregator.idle();

    const graph = aggregator.snapshot();
    investigation.seal(investigation.expired ? 'TimedOut' : 'Completed', graph);
    deadline.dispose();

    logger.info(
      { status: investigation.status, nodes: graph.nodes.size, pendingEdges: aggregator.pendingEdgeCount(), ...investigation.summary() },
      'investigation sealed'
    );
    const sealed: InvestigationSealedEvent = { investigation, graph };
    this.emit('investigation:sealed', sealed);

    return { investigation, graph };
  }

  private bucketFor(descriptor: CollectorDescriptor): TokenBucket {
    let bucket = this.buckets.get(descriptor.name);
    if (!bucket) {
      bucket = new TokenBucket(descriptor.rateLimit);
      this.buckets.set(descriptor.name, bucket);
    }
    return bucket;
  }

  /**
   * One collector's task. Its timeout budget starts when the pool picks the
   * task up and covers every attempt and backoff. Never rejects.
   */
  private async runCollector(
    descriptor: CollectorDescriptor,
    target: Target,
    investigation: Investigation,
    deadline: Deadline,
    pool: TasksPool,
    logger: Logger,
    accept: (result: AdapterResult, capped: boolean) => void
  ): Promise<void> {
    const name = descriptor.name;
    const adapter = this.registry.resolve(name);
    const config = this.configFor(name);
    const timeoutMs = config.timeoutMs ?? descriptor.defaultTimeoutMs ?? this.defaultTimeoutMs;
    const bucket = this.bucketFor(descriptor);

    // Checked before a rate-limit token is spent on a call that cannot be made.
    const missing = missingConfigKeys(descriptor, config);
    if (missing.length > 0) {
      accept(syntheticResult(name, 'AuthMissing', describeMissingKeys(missing), 0, 0), false);
      return;
    }

    const state: { budget: Deadline | null; capped: boolean; startedAt: number; attempts: number } = {
      budget: null,
      capped: false,
      startedAt: Date.now(),
      attempts: 0
    };

    try {
      const result = await pool.enqueue<AdapterResult>(async (context) => {
        let budget = state.budget;
        if (!budget) {
          const child = deadline.child(timeoutMs);
          budget = child.deadline;
          state.budget = budget;
          state.capped = child.capped;
          context.signal.addEventListener('abort', () => child.deadline.abort(), { once: true });
          state.startedAt = Date.now();
          const payload: CollectorStartedEvent = { investigationId: investigation.id, collector: name, timeoutMs };
          this.emit('collector:started', payload);
        }

        if (!(await bucket.acquire(budget))) {
          const waited = Date.now() - state.startedAt;
          return budget.expired
            ? syntheticResult(name, 'Timeout', 'Deadline expired while waiting for a rate-limit token', waited, state.attempts)
            : syntheticResult(name, 'RateLimited', `No rate-limit token available within ${timeoutMs}ms`, waited, state.attempts);
        }

        logger.debug({ collector: name, attempt: context.attempt }, 'invoking collector');
        const attempt = await this.invokeGuarded(adapter, target, config, budget, logger);
        state.attempts += attempt.attempts;

        const combined: AdapterResult = {
          ...attempt,
          durationMs: Date.now() - state.startedAt,
          attempts: state.attempts
        };
        return Object.freeze(combined);
      }, {
        retryWhen: (value) => value.outcome === 'NetworkError',
        budget: () => state.budget?.remaining() ?? timeoutMs,
        metadata: { collector: name }
      });

      accept(result, state.capped);
    } catch (error: unknown) {
      const detail = error instanceof TaskCancelledError
        ? 'Cancelled at the investigation deadline'
        : error instanceof Error ? error.message : String(error);
      const outcome = error instanceof TaskCancelledError || deadline.expired ? 'Timeout' : 'NetworkError';
      accept(syntheticResult(name, outcome, detail, Date.now() - state.startedAt, state.attempts), state.capped || outcome === 'Timeout');
    } finally {
      state.budget?.dispose();
    }
  }

  /** Bounds an adapter call by its budget even if the adapter ignores it. */
  private async invokeGuarded(
    adapter: CollectorAdapter,
    target: Target,
    config: CollectorConfig,
    budget: Deadline,
    logger: Logger
  ): Promise<AdapterResult> {
    const name = adapter.descriptor.name;
    const started = Date.now();

    const invocation = adapter.invoke(target, config, budget, { logger }).catch((error: unknown): AdapterResult =>
      syntheticResult(name, 'NetworkError', error instanceof Error ? error.message : String(error), Date.now() - started, 1)
    );
    const expiry = budget.whenExpired().then((): AdapterResult =>
      syntheticResult(name, 'Timeout', 'Collector did not stop at its deadline', Date.now() - started, 1)
    );

    return Promise.race([invocation, expiry]);
  }
}
