import { describe, it, expect } from 'vitest';
import { createRedactRules, REDACT_CENSOR } from '../../src/concerns/logger-redact.js';
import { getLoggerOptionsFromEnv } from '../../src/concerns/logger.js';

describe('logger', () => {
  it('should read level and format from the environment', () => {
    expect(getLoggerOptionsFromEnv({ name: 'test' }, { OSINT_LOG_LEVEL: 'DEBUG', OSINT_LOG_FORMAT: 'json' }))
      .toEqual({ name: 'test', level: 'debug', format: 'json' });
  });

  it('should ignore unknown values', () => {
    expect(getLoggerOptionsFromEnv({ level: 'warn' }, { OSINT_LOG_LEVEL: 'loud', OSINT_LOG_FORMAT: 'xml' }))
      .toEqual({ level: 'warn' });
  });

  it('should always redact API keys', () => {
    const rules = createRedactRules(['token', 'apiKey']);
    expect(rules.censor).toBe(REDACT_CENSOR);
    expect(rules.paths).toContain('collectors.*.apiKey');
    expect(rules.paths.filter(path => path === 'apiKey')).toHaveLength(1);
    expect(rules.paths[rules.paths.length - 1]).toBe('token');
  });
});
