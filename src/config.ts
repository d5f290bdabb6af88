/**
 * Configuration loading: an optional JSON file, then environment overrides,
 * then validation. Collector entries keep any option they do not recognize.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z, type ZodError } from 'zod';
import { ConfigurationError, type ConfigurationIssue } from './errors.js';
import { REPORT_FORMATS } from './types/investigation.types.js';

export const DEFAULT_CONFIG_FILE = 'osint.config.json';

const API_KEY_PATTERN = /^OSINT_([A-Z0-9_]+)_API_KEY$/;

export const collectorConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().optional(),
  enabled: z.boolean().optional()
}).passthrough();

export const configSchema = z.object({
  concurrency: z.number().int().min(1).max(64).default(8),
  retries: z.number().int().min(0).max(10).default(2),
  retryDelayMs: z.number().int().min(0).default(250),
  maxRetryDelayMs: z.number().int().min(0).default(10000),
  defaultTimeoutMs: z.number().int().positive().default(30000),
  deadlineMs: z.number().int().positive().default(120000),
  format: z.enum(REPORT_FORMATS).default('structured'),
  collectors: z.record(z.string(), collectorConfigSchema).default({})
}).strict();

export type OsintConfig = z.infer<typeof configSchema>;
export type CollectorConfigEntry = z.infer<typeof collectorConfigSchema>;

export interface LoadConfigOptions {
  /** Explicit file; it must exist. Without it `osint.config.json` in `cwd` is used when present. */
  path?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Applied last, over the file and the environment (command-line flags). */
  overrides?: Record<string, unknown>;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toIssues(error: ZodError): ConfigurationIssue[] {
  return error.issues.map(issue => ({
    path: issue.path.join('.') || '(root)',
    message: issue.message
  }));
}

export function parseConfig(input: unknown, source: string = 'configuration'): OsintConfig {
  const parsed = configSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const issues = toIssues(parsed.error);
    const listed = issues.map(issue => `${issue.path}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid ${source}: ${listed}`, { issues, source });
  }
  return parsed.data;
}

function numberFromEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

/**
 * Layers OSINT_CONCURRENCY, OSINT_RETRIES, OSINT_DEADLINE_MS and
 * OSINT_<COLLECTOR>_API_KEY over a raw (not yet validated) configuration.
 */
export function applyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  let config: Record<string, unknown>;
  if (raw === undefined) {
    config = {};
  } else if (isPlainObject(raw)) {
    config = { ...raw };
  } else {
    return raw;
  }

  const overrides: Array<[key: string, value: number | undefined]> = [
    ['concurrency', numberFromEnv(env.OSINT_CONCURRENCY)],
    ['retries', numberFromEnv(env.OSINT_RETRIES)],
    ['deadlineMs', numberFromEnv(env.OSINT_DEADLINE_MS)]
  ];
  for (const [key, value] of overrides) {
    if (value !== undefined) config[key] = value;
  }

  const existing = config.collectors;
  if (existing !== undefined && !isPlainObject(existing)) {
    return config;
  }

  const collectors: Record<string, unknown> = isPlainObject(existing) ? { ...existing } : {};
  for (const [name, value] of Object.entries(env)) {
    const match = API_KEY_PATTERN.exec(name);
    if (!match?.[1] || !value) continue;

    const collector = match[1].toLowerCase();
    const current = collectors[collector];
    collectors[collector] = { ...(isPlainObject(current) ? current : {}), apiKey: value };
  }
  config.collectors = collectors;

  return config;
}

async function readConfigFile(path: string, required: boolean): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error: unknown) {
    if (!required && error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined;
    }
    throw new ConfigurationError(`Cannot read configuration file ${path}`, { original: error, path });
  }

  try {
    return JSON.parse(text);
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Configuration file ${path} is not valid JSON: ${reason}`, { original: error, path });
  }
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<OsintConfig> {
  const { cwd = process.cwd(), env = process.env } = options;
  const path = options.path ? resolve(cwd, options.path) : resolve(cwd, DEFAULT_CONFIG_FILE);

  const raw = await readConfigFile(path, Boolean(options.path));
  const layered = applyEnvOverrides(raw, env);
  const merged = options.overrides && isPlainObject(layered) ? { ...layered, ...options.overrides } : layered;
  return parseConfig(merged, options.path ? path : 'configuration');
}
