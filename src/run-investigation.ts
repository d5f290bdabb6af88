import { OsintError } from './errors.js';
import type { Investigation } from './investigation.class.js';
import type { Orchestrator } from './orchestrator.class.js';
import { ReportGenerator, assertReportFormat } from './report-generator.class.js';
import type { InvestigationGraph, ReportFormat } from './types/investigation.types.js';

export const EXIT_CODES = {
  Completed: 0,
  SetupError: 1,
  TimedOut: 2
} as const;

export type ExitCode = typeof EXIT_CODES[keyof typeof EXIT_CODES];

const EXIT_SEVERITY: Record<ExitCode, number> = {
  [EXIT_CODES.Completed]: 0,
  [EXIT_CODES.TimedOut]: 1,
  [EXIT_CODES.SetupError]: 2
};

/** The most severe of several runs' exit codes: setup error, then timeout, then success. */
export function worstExitCode(codes: readonly ExitCode[]): ExitCode {
  let worst: ExitCode = EXIT_CODES.Completed;
  for (const code of codes) {
    if (EXIT_SEVERITY[code] > EXIT_SEVERITY[worst]) worst = code;
  }
  return worst;
}

export interface RunInvestigationOptions {
  orchestrator: Orchestrator;
  rawTarget: string;
  deadlineMs: number;
  format: string;
  signal?: AbortSignal;
  reportGenerator?: ReportGenerator;
}

export type RunInvestigationResult =
  | {
      exitCode: typeof EXIT_CODES.Completed | typeof EXIT_CODES.TimedOut;
      format: ReportFormat;
      report: Buffer;
      investigation: Investigation;
      graph: InvestigationGraph;
      error: null;
    }
  | {
      exitCode: typeof EXIT_CODES.SetupError;
      report: null;
      investigation: null;
      graph: null;
      error: OsintError;
    };

/**
 * Runs one investigation end to end and renders its report. Fatal setup
 * errors come back as exit code 1 with no report; anything else that is
 * thrown is a bug and propagates.
 */
export async function runInvestigation(options: RunInvestigationOptions): Promise<RunInvestigationResult> {
  const generator = options.reportGenerator ?? new ReportGenerator();

  try {
    const format = assertReportFormat(options.format);
    const { investigation, graph } = await options.orchestrator.investigate({
      rawTarget: options.rawTarget,
      deadlineMs: options.deadlineMs,
      signal: options.signal
    });

    return {
      exitCode: investigation.status === 'TimedOut' ? EXIT_CODES.TimedOut : EXIT_CODES.Completed,
      format,
      report: generator.render(investigation, graph, format),
      investigation,
      graph,
      error: null
    };
  } catch (error: unknown) {
    if (error instanceof OsintError) {
      return { exitCode: EXIT_CODES.SetupError, report: null, investigation: null, graph: null, error };
    }
    throw error;
  }
}
