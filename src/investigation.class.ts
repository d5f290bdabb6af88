import type {
  AdapterOutcome,
  AdapterResult,
  InvestigationGraph,
  InvestigationStatus,
  Target
} from './types/investigation.types.js';
import { compareStrings } from './concerns/compare.js';

export interface InvestigationInit {
  id: string;
  target: Target;
  startTime: number;
  deadline: number;
  selected: readonly string[];
  skipped?: readonly string[];
}

export interface InvestigationSummary {
  selected: number;
  completed: number;
  succeeded: number;
  failed: number;
  outcomes: Partial<Record<AdapterOutcome, number>>;
}

export interface InvestigationJSON {
  id: string;
  target: Target;
  status: InvestigationStatus;
  startTime: string;
  deadline: string;
  finishedAt: string | null;
  selected: string[];
  skipped: string[];
  adapters: AdapterResult[];
}

/**
 * One run against one target. Only the orchestrator mutates it; once sealed
 * it accepts nothing further.
 */
export class Investigation {
  readonly id: string;
  readonly target: Target;
  readonly startTime: number;
  readonly deadline: number;
  readonly selected: readonly string[];
  readonly skipped: readonly string[];

  private _status: InvestigationStatus = 'Running';
  private _finishedAt: number | null = null;
  private _graph: InvestigationGraph | null = null;
  private _expired = false;
  private readonly results = new Map<string, AdapterResult>();

  constructor(init: InvestigationInit) {
    this.id = init.id;
    this.target = init.target;
    this.startTime = init.startTime;
    this.deadline = init.deadline;
    this.selected = Object.freeze([...init.selected]);
    this.skipped = Object.freeze([...(init.skipped ?? [])]);
  }

  get status(): InvestigationStatus {
    return this._status;
  }

  get sealed(): boolean {
    return this._status !== 'Running';
  }

  get finishedAt(): number | null {
    return this._finishedAt;
  }

  get graph(): InvestigationGraph | null {
    return this._graph;
  }

  /** Whether the investigation deadline fired while collectors were outstanding. */
  get expired(): boolean {
    return this._expired;
  }

  markExpired(): void {
    if (!this.sealed) this._expired = true;
  }

  /**
   * Stores a collector's result. Returns false, storing nothing, once sealed,
   * for a collector that was not selected, or for a second result.
   */
  record(result: AdapterResult): boolean {
    if (this.sealed || !this.selected.includes(result.adapterName) || this.results.has(result.adapterName)) {
      return false;
    }
    this.results.set(result.adapterName, Object.isFrozen(result) ? result : Object.freeze({ ...result }));
    return true;
  }

  result(adapterName: string): AdapterResult | undefined {
    return this.results.get(adapterName);
  }

  /** Results ordered by collector name. */
  adapterResults(): AdapterResult[] {
    return [...this.results.values()].sort((a, b) => compareStrings(a.adapterName, b.adapterName));
  }

  outstanding(): string[] {
    return this.selected.filter(name => !this.results.has(name));
  }

  seal(status: Exclude<InvestigationStatus, 'Running'>, graph: InvestigationGraph, finishedAt: number = Date.now()): void {
    if (this.sealed) return;
    this._status = status;
    this._graph = graph;
    this._finishedAt = finishedAt;
  }

  summary(): InvestigationSummary {
    const outcomes: Partial<Record<AdapterOutcome, number>> = {};
    let succeeded = 0;
    for (const result of this.results.values()) {
      outcomes[result.outcome] = (outcomes[result.outcome] ?? 0) + 1;
      if (result.outcome === 'Success') succeeded++;
    }
    return {
      selected: this.selected.length,
      completed: this.results.size,
      succeeded,
      failed: this.results.size - succeeded,
      outcomes
    };
  }

  toJSON(): InvestigationJSON {
    return {
      id: this.id,
      target: { ...this.target },
      status: this._status,
      startTime: new Date(this.startTime).toISOString(),
      deadline: new Date(this.deadline).toISOString(),
      finishedAt: this._finishedAt === null ? null : new Date(this._finishedAt).toISOString(),
      selected: [...this.selected],
      skipped: [...this.skipped],
      adapters: this.adapterResults()
    };
  }
}
