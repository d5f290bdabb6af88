/**
 * FindingAggregator
 *
 * Single writer of the investigation graph. Findings are keyed by
 * `type:canonicalValue`; merges run one at a time through a serial queue and
 * give the same node whatever order the results arrive in.
 */

import { canonicalizeValue, canonicalKey } from './concerns/canonicalize.js';
import { compareStrings } from './concerns/compare.js';
import { getRootLogger, type Logger } from './concerns/logger.js';
import { sanitizeAttributes } from './concerns/safe-merge.js';
import { SerialQueue } from './concerns/serial-queue.js';
import { clampConfidence } from './collectors/harness.js';
import {
  FINDING_TYPES,
  type AdapterResult,
  type Finding,
  type FindingType,
  type GraphEdge,
  type GraphNode,
  type InvestigationGraph,
  type ProvenanceRecord
} from './types/investigation.types.js';

/** Attribute keys that declare a relationship instead of describing the finding. */
export const HINT_KEYS: ReadonlySet<string> = new Set(['parentType', 'parentValue', 'relation']);
export const DEFAULT_RELATION = 'belongs_to';

const FINDING_TYPE_SET: ReadonlySet<string> = new Set(FINDING_TYPES);

interface AttributeCandidate {
  value: string;
  confidence: number;
  observedAt: string;
  adapterName: string;
}

interface NodeState {
  key: string;
  type: FindingType;
  value: string;
  confidence: number;
  attributes: Map<string, AttributeCandidate>;
  provenance: Map<string, ProvenanceRecord>;
  edges: Map<string, GraphEdge>;
}

interface PendingEdge {
  from: string;
  relation: string;
}

export interface MergeStats {
  created: number;
  updated: number;
  edges: number;
  pending: number;
}

export interface FindingAggregatorOptions {
  logger?: Logger;
}

function isFindingType(value: string): value is FindingType {
  return FINDING_TYPE_SET.has(value);
}

/**
 * Total order over attribute candidates: higher confidence, then earlier
 * observation, then adapter name, then value.
 */
export function preferCandidate(a: AttributeCandidate, b: AttributeCandidate): boolean {
  if (a.confidence !== b.confidence) return a.confidence > b.confidence;
  if (a.observedAt !== b.observedAt) return a.observedAt < b.observedAt;
  if (a.adapterName !== b.adapterName) return a.adapterName < b.adapterName;
  return a.value < b.value;
}

function edgeId(edge: GraphEdge): string {
  return `${edge.relation}\u0000${edge.target}`;
}

export class FindingAggregator {
  private readonly nodes = new Map<string, NodeState>();
  private readonly pending = new Map<string, PendingEdge[]>();
  private readonly queue = new SerialQueue();
  private readonly logger: Logger;

  constructor(options: FindingAggregatorOptions = {}) {
    this.logger = options.logger ?? getRootLogger().child({ component: 'aggregator' });
  }

  /** Queues a merge; resolves once this result is reflected in the graph. */
  merge(result: AdapterResult): Promise<MergeStats> {
    return this.queue.run(() => this.apply(result));
  }

  /** Resolves once every merge queued so far has been applied. */
  idle(): Promise<void> {
    return this.queue.idle();
  }

  get size(): number {
    return this.nodes.size;
  }

  /** Number of declared relationships still waiting for their parent node. */
  pendingEdgeCount(): number {
    let count = 0;
    for (const edges of this.pending.values()) count += edges.length;
    return count;
  }

  snapshot(): InvestigationGraph {
    const keys = [...this.nodes.keys()].sort(compareStrings);
    const nodes = new Map<string, GraphNode>();

    for (const key of keys) {
      const state = this.nodes.get(key);
      if (!state) continue;
      nodes.set(key, this.freezeNode(state));
    }

    return Object.freeze({ nodes });
  }

  private apply(result: AdapterResult): MergeStats {
    const stats: MergeStats = { created: 0, updated: 0, edges: 0, pending: 0 };
    if (result.outcome !== 'Success') {
      return stats;
    }

    for (const finding of result.findings) {
      this.applyFinding(finding, result, stats);
    }

    this.logger.debug({ collector: result.adapterName, ...stats, nodes: this.nodes.size }, 'merged collector result');
    return stats;
  }

  private applyFinding(finding: Finding, result: AdapterResult, stats: MergeStats): void {
    if (!isFindingType(finding.type)) return;

    const value = canonicalizeValue(finding.type, finding.value);
    if (value === '') return;

    const key = `${finding.type}:${value}`;
    const confidence = clampConfidence(finding.confidence);
    const observedAt = result.finishedAt;
    const adapterName = result.adapterName;

    let node = this.nodes.get(key);
    if (node) {
      stats.updated++;
    } else {
      node = {
        key,
        type: finding.type,
        value,
        confidence,
        attributes: new Map(),
        provenance: new Map(),
        edges: new Map()
      };
      this.nodes.set(key, node);
      stats.created++;
      stats.edges += this.resolvePending(key);
    }

    node.confidence = Math.max(node.confidence, confidence);

    const previous = node.provenance.get(adapterName);
    node.provenance.set(adapterName, Object.freeze({
      adapterName,
      observedAt: previous && previous.observedAt < observedAt ? previous.observedAt : observedAt,
      confidence: Math.max(previous?.confidence ?? 0, confidence)
    }));

    const attributes = sanitizeAttributes(finding.attributes);
    for (const [name, attributeValue] of Object.entries(attributes)) {
      if (HINT_KEYS.has(name)) continue;
      const candidate: AttributeCandidate = { value: attributeValue, confidence, observedAt, adapterName };
      const current = node.attributes.get(name);
      if (!current || preferCandidate(candidate, current)) {
        node.attributes.set(name, candidate);
      }
    }

    const parentType = attributes.parentType;
    const parentValue = attributes.parentValue;
    if (parentType && parentValue && isFindingType(parentType)) {
      const parentKey = canonicalKey(parentType, parentValue);
      const relation = attributes.relation?.trim() || DEFAULT_RELATION;
      if (parentKey !== key) {
        if (this.nodes.has(parentKey)) {
          if (this.addEdge(node, { relation, target: parentKey })) stats.edges++;
        } else {
          const waiting = this.pending.get(parentKey) ?? [];
          waiting.push({ from: key, relation });
          this.pending.set(parentKey, waiting);
          stats.pending++;
        }
      }
    }
  }

  private resolvePending(parentKey: string): number {
    const waiting = this.pending.get(parentKey);
    if (!waiting) return 0;
    this.pending.delete(parentKey);

    let added = 0;
    for (const { from, relation } of waiting) {
      const child = this.nodes.get(from);
      if (child && this.addEdge(child, { relation, target: parentKey })) added++;
    }
    return added;
  }

  private addEdge(node: NodeState, edge: GraphEdge): boolean {
    const id = edgeId(edge);
    if (node.edges.has(id)) return false;
    node.edges.set(id, Object.freeze(edge));
    return true;
  }

  private freezeNode(state: NodeState): GraphNode {
    const attributes: Record<string, string> = {};
    for (const name of [...state.attributes.keys()].sort(compareStrings)) {
      const candidate = state.attributes.get(name);
      if (candidate) attributes[name] = candidate.value;
    }

    const provenance = [...state.provenance.values()]
      .sort((a, b) => compareStrings(a.adapterName, b.adapterName))
      .map(record => Object.freeze({ ...record }));

    const edges = [...state.edges.values()]
      .sort((a, b) => compareStrings(a.relation, b.relation) || compareStrings(a.target, b.target))
      .map(edge => Object.freeze({ ...edge }));

    return Object.freeze({
      key: state.key,
      type: state.type,
      value: state.value,
      attributes: Object.freeze(attributes),
      confidence: state.confidence,
      provenance: Object.freeze(provenance),
      edges: Object.freeze(edges)
    });
  }
}
