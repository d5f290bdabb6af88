export const REDACT_CENSOR = '[REDACTED]';

const DEFAULT_REDACT_PATHS = [
  'apiKey',
  'config.apiKey',
  '*.apiKey',
  'collectors.*.apiKey',
  'headers.authorization',
  'headers["hibp-api-key"]',
  '*.headers.authorization',
  '*.headers["hibp-api-key"]'
];

export interface RedactRules {
  paths: string[];
  censor: string;
}

export function createRedactRules(extraPaths: string[] = []): RedactRules {
  return {
    paths: [...new Set([...DEFAULT_REDACT_PATHS, ...extraPaths])],
    censor: REDACT_CENSOR
  };
}
