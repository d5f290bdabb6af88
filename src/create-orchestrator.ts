import type { CollectorRegistry } from './collector-registry.class.js';
import { createDefaultRegistry } from './collectors/index.js';
import type { CommandRunner } from './concerns/command-runner.js';
import type { HttpClient } from './concerns/http-client.js';
import type { Logger } from './concerns/logger.js';
import type { OsintConfig } from './config.js';
import { Orchestrator } from './orchestrator.class.js';

export interface CreateOrchestratorOptions {
  /** Defaults to the bundled collectors. */
  registry?: CollectorRegistry;
  http?: HttpClient;
  runner?: CommandRunner;
  logger?: Logger;
}

export function createOrchestrator(config: OsintConfig, options: CreateOrchestratorOptions = {}): Orchestrator {
  const registry = options.registry ?? createDefaultRegistry({ http: options.http, runner: options.runner });

  return new Orchestrator({
    registry,
    concurrency: config.concurrency,
    retries: config.retries,
    retryDelayMs: config.retryDelayMs,
    maxRetryDelayMs: config.maxRetryDelayMs,
    defaultTimeoutMs: config.defaultTimeoutMs,
    collectors: config.collectors,
    logger: options.logger
  });
}
