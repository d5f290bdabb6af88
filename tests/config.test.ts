import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_CONFIG_FILE, loadConfig, parseConfig } from '../src/config.js';
import { ConfigurationError } from '../src/errors.js';

describe('configuration', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'osint-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should use defaults without a file', async () => {
    await expect(loadConfig({ cwd: dir, env: {} })).resolves.toEqual({
      concurrency: 8,
      retries: 2,
      retryDelayMs: 250,
      maxRetryDelayMs: 10000,
      defaultTimeoutMs: 30000,
      deadlineMs: 120000,
      format: 'structured',
      collectors: {}
    });
  });

  it('should read the default file and keep collector options', async () => {
    await writeFile(join(dir, DEFAULT_CONFIG_FILE), JSON.stringify({
      concurrency: 4,
      collectors: { theharvester: { binary: '/opt/theHarvester', sources: ['bing'] } }
    }));

    const config = await loadConfig({ cwd: dir, env: {} });

    expect(config.concurrency).toBe(4);
    expect(config.collectors.theharvester).toEqual({ binary: '/opt/theHarvester', sources: ['bing'] });
  });

  it('should layer environment variables over the file', async () => {
    await writeFile(join(dir, DEFAULT_CONFIG_FILE), JSON.stringify({
      concurrency: 4,
      collectors: { shodan: { timeoutMs: 5000 } }
    }));

    const config = await loadConfig({
      cwd: dir,
      env: { OSINT_CONCURRENCY: '3', OSINT_DEADLINE_MS: '60000', OSINT_SHODAN_API_KEY: 'test-key', OSINT_HIBP_API_KEY: '' }
    });

    expect(config.concurrency).toBe(3);
    expect(config.deadlineMs).toBe(60000);
    expect(config.collectors).toEqual({ shodan: { timeoutMs: 5000, apiKey: 'test-key' } });
  });

  it('should apply overrides last', async () => {
    const config = await loadConfig({ cwd: dir, env: { OSINT_CONCURRENCY: '3' }, overrides: { concurrency: 2, format: 'csv' } });

    expect(config.concurrency).toBe(2);
    expect(config.format).toBe('csv');
  });

  it('should require an explicitly named file', async () => {
    await expect(loadConfig({ cwd: dir, env: {}, path: 'missing.json' })).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('should reject malformed JSON', async () => {
    await writeFile(join(dir, 'broken.json'), '{ concurrency: ');

    await expect(loadConfig({ cwd: dir, env: {}, path: 'broken.json' }))
      .rejects.toThrow(`Configuration file ${join(dir, 'broken.json')} is not valid JSON`);
  });

  it('should reject non-numeric environment values', async () => {
    await expect(loadConfig({ cwd: dir, env: { OSINT_RETRIES: 'many' } })).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('should list every invalid entry', () => {
    try {
      parseConfig({ concurrency: 0, format: 'xml', colectors: {} });
      expect.fail('expected parseConfig to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.issues.map(issue => issue.path)).toEqual(['concurrency', 'format', '(root)']);
        expect(error.message.startsWith('Invalid configuration: concurrency: ')).toBe(true);
      }
    }
  });
});
