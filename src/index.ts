// =============================================================================
// Investigation pipeline
// =============================================================================

export { TargetNormalizer, normalize } from './target-normalizer.class.js';
export { CollectorRegistry } from './collector-registry.class.js';
export { Orchestrator } from './orchestrator.class.js';
export type {
  OrchestratorOptions,
  InvestigateRequest,
  InvestigationPlan,
  InvestigationOutcome,
  InvestigationStartedEvent,
  CollectorStartedEvent,
  CollectorRetryEvent,
  CollectorCompletedEvent,
  InvestigationSealedEvent
} from './orchestrator.class.js';
export { Investigation } from './investigation.class.js';
export type { InvestigationSummary, InvestigationJSON } from './investigation.class.js';
export { FindingAggregator } from './aggregator.class.js';
export type { MergeStats } from './aggregator.class.js';
export { ReportGenerator, reportExtension, SCHEMA_VERSION } from './report-generator.class.js';
export { createOrchestrator } from './create-orchestrator.js';
export { runInvestigation, worstExitCode, EXIT_CODES } from './run-investigation.js';
export type { ExitCode, RunInvestigationOptions, RunInvestigationResult } from './run-investigation.js';

// =============================================================================
// Collectors
// =============================================================================

export * from './collectors/index.js';

// =============================================================================
// Configuration, errors & types
// =============================================================================

export { loadConfig, parseConfig, DEFAULT_CONFIG_FILE } from './config.js';
export type { OsintConfig, CollectorConfigEntry, LoadConfigOptions } from './config.js';
export * from './errors.js';
export * from './types/investigation.types.js';

// =============================================================================
// Concerns
// =============================================================================

export { Deadline } from './concerns/deadline.js';
export { TokenBucket, type RateLimit } from './concerns/token-bucket.js';
export { ErrorClassifier } from './concerns/error-classifier.js';
export { FetchHttpClient, createHttpClient } from './concerns/http-client.js';
export type { HttpClient, HttpResponse, RequestOptions } from './concerns/http-client.js';
export { SpawnCommandRunner, createCommandRunner } from './concerns/command-runner.js';
export type { CommandRunner, CommandOutput, CommandOptions } from './concerns/command-runner.js';
export { createLogger, type Logger } from './concerns/logger.js';
