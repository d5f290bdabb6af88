/**
 * osint-conductor command-line interface.
 *
 * Reports go to stdout (or a file); progress, colours and diagnostics go to
 * stderr so that a report can be piped.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import chalk from 'chalk';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import ora, { type Ora } from 'ora';
import type { CollectorRegistry } from '../collector-registry.class.js';
import type { CollectorConfig } from '../collectors/collector.interface.js';
import { createDefaultRegistry } from '../collectors/index.js';
import { renderTable } from '../concerns/table.js';
import { loadConfig, type OsintConfig } from '../config.js';
import { createOrchestrator } from '../create-orchestrator.js';
import { OsintError } from '../errors.js';
import type { CollectorCompletedEvent, CollectorRetryEvent, Orchestrator } from '../orchestrator.class.js';
import { reportExtension } from '../report-generator.class.js';
import { EXIT_CODES, runInvestigation, worstExitCode, type ExitCode } from '../run-investigation.js';
import { TargetNormalizer } from '../target-normalizer.class.js';

export const VERSION = '0.1.0';

export interface CliContext {
  createRegistry?: () => CollectorRegistry;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Cancels running investigations (wired to SIGINT by the executable). */
  signal?: AbortSignal;
}

interface CommonOptions {
  config?: string;
  deadline?: number;
  format?: string;
  concurrency?: number;
  retries?: number;
  quiet?: boolean;
}

interface InvestigateOptions extends CommonOptions {
  output?: string;
}

interface BatchOptions extends CommonOptions {
  outDir: string;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

/**
 * Targets file: one target per line, blank lines and `#` comments ignored,
 * repeated targets (after normalization) kept once.
 */
export function parseTargetsFile(text: string): string[] {
  const targets: string[] = [];
  const seen = new Set<string>();

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;

    let key = `raw:${line}`;
    try {
      const target = TargetNormalizer.normalize(line);
      key = `${target.kind}:${target.normalizedValue}`;
    } catch (error: unknown) {
      if (!(error instanceof OsintError)) throw error;
    }

    if (seen.has(key)) continue;
    seen.add(key);
    targets.push(line);
  }

  return targets;
}

export function reportFileName(index: number, rawTarget: string, extension: string): string {
  const slug = rawTarget.trim().toLowerCase().replace(/[^a-z0-9._-]+/g, '_').replace(/^_+|_+$/g, '') || 'target';
  return `${String(index + 1).padStart(3, '0')}-${slug}.${extension}`;
}

export async function runCli(argv: readonly string[], context: CliContext = {}): Promise<number> {
  const stdout = context.stdout ?? process.stdout;
  const stderr = context.stderr ?? process.stderr;
  const env = context.env ?? process.env;
  const cwd = context.cwd ?? process.cwd();
  const createRegistry = context.createRegistry ?? (() => createDefaultRegistry());
  let exitCode: ExitCode = EXIT_CODES.Completed;

  const say = (text: string): void => {
    stderr.write(`${text}\n`);
  };

  const settings = async (options: CommonOptions): Promise<OsintConfig> => {
    const overrides: Record<string, unknown> = {};
    if (options.concurrency !== undefined) overrides.concurrency = options.concurrency;
    if (options.retries !== undefined) overrides.retries = options.retries;
    if (options.deadline !== undefined) overrides.deadlineMs = options.deadline;
    if (options.format !== undefined) overrides.format = options.format;
    return loadConfig({ path: options.config, cwd, env, overrides });
  };

  const trackProgress = (orchestrator: Orchestrator, spinner: Ora, label: string): void => {
    let done = 0;
    orchestrator.on('investigation:started', () => {
      done = 0;
    });
    orchestrator.on('collector:completed', (event: CollectorCompletedEvent) => {
      done++;
      spinner.text = `${label}: ${event.result.adapterName} ${event.result.outcome} (${done} finished)`;
    });
    orchestrator.on('collector:retry', (event: CollectorRetryEvent) => {
      spinner.text = `${label}: retrying ${event.collector} (attempt ${event.attempt + 1})`;
    });
  };

  const fail = (error: unknown, spinner?: Ora): void => {
    const message = error instanceof Error ? error.message : String(error);
    // A quiet spinner prints nothing, so errors bypass it.
    spinner?.stop();
    say(chalk.red(message));
    if (error instanceof OsintError && error.suggestion) {
      say(chalk.gray(error.suggestion));
    }
    exitCode = EXIT_CODES.SetupError;
  };

  const program = new Command();

  program
    .name('osint-conductor')
    .description('Run OSINT collectors against a target and merge their findings into one report')
    .version(VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => stdout.write(text),
      writeErr: (text) => stderr.write(text)
    });

  const withCommonOptions = (command: Command): Command => command
    .option('-c, --config <path>', 'Configuration file (default: ./osint.config.json when present)')
    .option('-d, --deadline <ms>', 'Investigation deadline in milliseconds', parseInteger)
    .option('-f, --format <format>', 'Report format: structured, tabular or csv')
    .option('--concurrency <n>', 'Collectors running at once', parseInteger)
    .option('--retries <n>', 'Retries for transient network failures', parseInteger)
    .option('-q, --quiet', 'Do not show progress');

  withCommonOptions(program.command('investigate <target>'))
    .description('Investigate a domain, IP address, email address or username')
    .option('-o, --output <file>', 'Write the report to a file instead of stdout')
    .action(async (rawTarget: string, options: InvestigateOptions) => {
      let config: OsintConfig;
      try {
        config = await settings(options);
      } catch (error: unknown) {
        fail(error);
        return;
      }

      const orchestrator = createOrchestrator(config, { registry: createRegistry() });
      const spinner = ora({ text: `Investigating ${rawTarget}`, stream: stderr, isSilent: options.quiet ?? false }).start();
      trackProgress(orchestrator, spinner, rawTarget);

      const result = await runInvestigation({
        orchestrator,
        rawTarget,
        deadlineMs: config.deadlineMs,
        format: config.format,
        signal: context.signal
      });

      if (result.error) {
        fail(result.error, spinner);
        return;
      }

      const summary = result.investigation.summary();
      const message = `${result.investigation.target.normalizedValue}: ${summary.succeeded}/${summary.selected} collectors succeeded, ${result.graph.nodes.size} findings`;
      if (result.investigation.status === 'TimedOut') {
        spinner.warn(chalk.yellow(`${message} (deadline reached)`));
      } else {
        spinner.succeed(chalk.green(message));
      }

      if (options.output) {
        const path = resolve(cwd, options.output);
        await writeFile(path, result.report);
        say(chalk.gray(`Report written to ${path}`));
      } else {
        stdout.write(result.report);
      }

      exitCode = result.exitCode;
    });

  withCommonOptions(program.command('batch <file>'))
    .description('Investigate every target listed in a file, one report per target')
    .option('--out-dir <dir>', 'Directory receiving the reports', 'reports')
    .action(async (file: string, options: BatchOptions) => {
      let config: OsintConfig;
      let targets: string[];
      try {
        config = await settings(options);
        targets = parseTargetsFile(await readFile(resolve(cwd, file), 'utf8'));
      } catch (error: unknown) {
        fail(error);
        return;
      }

      const outDir = resolve(cwd, options.outDir);
      await mkdir(outDir, { recursive: true });

      const orchestrator = createOrchestrator(config, { registry: createRegistry() });
      const spinner = ora({ stream: stderr, isSilent: options.quiet ?? false });
      const codes: ExitCode[] = [];

      for (const [index, rawTarget] of targets.entries()) {
        const label = `[${index + 1}/${targets.length}] ${rawTarget}`;
        spinner.start(label);
        orchestrator.removeAllListeners();
        trackProgress(orchestrator, spinner, label);

        const result = await runInvestigation({
          orchestrator,
          rawTarget,
          deadlineMs: config.deadlineMs,
          format: config.format,
          signal: context.signal
        });
        codes.push(result.exitCode);

        if (result.error) {
          spinner.stop();
          say(chalk.red(`${label}: ${result.error.message}`));
          continue;
        }

        const path = join(outDir, reportFileName(index, rawTarget, reportExtension(result.format)));
        await writeFile(path, result.report);
        const status = `${label}: ${result.investigation.status}, ${result.graph.nodes.size} findings -> ${path}`;
        if (result.investigation.status === 'TimedOut') {
          spinner.warn(chalk.yellow(status));
        } else {
          spinner.succeed(chalk.green(status));
        }
      }

      if (targets.length === 0) {
        say(chalk.yellow('No targets found'));
      }
      exitCode = worstExitCode(codes);
    });

  program
    .command('collectors')
    .description('List the registered collectors')
    .option('-c, --config <path>', 'Configuration file (default: ./osint.config.json when present)')
    .action(async (options: { config?: string }) => {
      let config: OsintConfig;
      try {
        config = await loadConfig({ path: options.config, cwd, env });
      } catch (error: unknown) {
        fail(error);
        return;
      }

      const rows = createRegistry().list().map(descriptor => {
        const collectorConfig: CollectorConfig = config.collectors[descriptor.name] ?? {};
        const missing = descriptor.requiredConfigKeys.filter(key => collectorConfig[key] === undefined);
        const { maxCalls, perIntervalMs } = descriptor.rateLimit;
        return [
          descriptor.name,
          descriptor.acceptedTargetKinds.join(', '),
          descriptor.transport,
          maxCalls > 0 && perIntervalMs > 0 ? `${maxCalls}/${perIntervalMs}ms` : 'none',
          collectorConfig.enabled === false ? 'disabled' : missing.length > 0 ? `missing ${missing.join(', ')}` : 'ready'
        ];
      });

      stdout.write(`${renderTable(['Collector', 'Targets', 'Transport', 'Rate limit', 'Status'], rows, { headStyle: ['cyan'] })}\n`);
    });

  try {
    await program.parseAsync([...argv]);
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_CODES.Completed : EXIT_CODES.SetupError;
    }
    throw error;
  }

  return exitCode;
}
