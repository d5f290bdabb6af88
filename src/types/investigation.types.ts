/**
 * Domain types shared by the normalizer, collectors, orchestrator,
 * aggregator and report generator.
 */

export const TARGET_KINDS = ['Domain', 'IPAddress', 'Email', 'Username'] as const;
export type TargetKind = typeof TARGET_KINDS[number];

export interface Target {
  readonly kind: TargetKind;
  readonly normalizedValue: string;
  readonly rawInput: string;
}

export const FINDING_TYPES = [
  'Subdomain',
  'IPAddress',
  'EmailAddress',
  'SocialProfile',
  'FileMetadata',
  'OpenPort',
  'CredentialLeak',
  'Other'
] as const;
export type FindingType = typeof FINDING_TYPES[number];

export interface Finding {
  readonly type: FindingType;
  readonly value: string;
  /** Schema-free secondary data. `parentType`, `parentValue` and `relation` are relationship hints. */
  readonly attributes: Readonly<Record<string, string>>;
  readonly confidence: number;
}

export const ADAPTER_OUTCOMES = [
  'Success',
  'Timeout',
  'NotAvailable',
  'AuthMissing',
  'RateLimited',
  'NetworkError',
  'ParseError'
] as const;
export type AdapterOutcome = typeof ADAPTER_OUTCOMES[number];

export interface AdapterResult {
  readonly adapterName: string;
  readonly outcome: AdapterOutcome;
  readonly durationMs: number;
  readonly findings: readonly Finding[];
  readonly errorDetail?: string;
  /** External-call attempts made; 0 when the call was never attempted. */
  readonly attempts: number;
  /** ISO-8601 completion time, used as the provenance observation time. */
  readonly finishedAt: string;
}

export type InvestigationStatus = 'Running' | 'Completed' | 'TimedOut';

export interface ProvenanceRecord {
  readonly adapterName: string;
  readonly observedAt: string;
  readonly confidence: number;
}

export interface GraphEdge {
  readonly relation: string;
  /** Canonical key of the node the edge points to. */
  readonly target: string;
}

export interface GraphNode {
  readonly key: string;
  readonly type: FindingType;
  readonly value: string;
  readonly attributes: Readonly<Record<string, string>>;
  readonly confidence: number;
  readonly provenance: readonly ProvenanceRecord[];
  readonly edges: readonly GraphEdge[];
}

export interface InvestigationGraph {
  readonly nodes: ReadonlyMap<string, GraphNode>;
}

export const REPORT_FORMATS = ['structured', 'tabular', 'csv'] as const;
export type ReportFormat = typeof REPORT_FORMATS[number];
