/**
 * Sherlock process wrapper: looks a username up across social networks and
 * reports each profile it finds.
 *
 *   [*] Checking username alice on:
 *   [+] GitHub: https://www.github.com/alice
 *   [*] Search completed with 1 results
 */

import { devNull } from 'node:os';
import type { CommandOutput, CommandRunner } from '../concerns/command-runner.js';
import { CollectorFailure } from '../errors.js';
import type { Finding, Target } from '../types/investigation.types.js';
import type { CollectorAdapter } from './collector.interface.js';
import { defineCollector, makeFinding, otherFinding } from './harness.js';
import { numberOption, stringOption } from './options.js';

const NAME = 'sherlock';
const CONFIDENCE = 0.6;

const FOUND_PATTERN = /^\[\+\]\s+([^:]+?):\s+(https?:\/\/\S+)$/;

export function parseSherlockOutput(output: CommandOutput, target: Target): Finding[] {
  const findings: Finding[] = [];
  let markers = 0;

  for (const rawLine of output.stdout.split(/\r?\n/)) {
    const line = rawLine.trim();

    if (line.startsWith('[*]')) {
      markers++;
      continue;
    }
    if (!line.startsWith('[+]')) continue;

    markers++;
    const match = FOUND_PATTERN.exec(line);
    if (!match) {
      findings.push(otherFinding(NAME, line));
      continue;
    }

    const [, site = '', url = ''] = match;
    findings.push(makeFinding('SocialProfile', url, CONFIDENCE, {
      site: site.trim(),
      username: target.normalizedValue
    }));
  }

  if (markers === 0) {
    if (output.exitCode !== 0) {
      throw new CollectorFailure('NetworkError', `sherlock exited with code ${output.exitCode}: ${output.stderr || 'no output'}`);
    }
    throw new CollectorFailure('ParseError', 'sherlock output has no recognizable lines');
  }

  return findings;
}

export interface SherlockCollectorOptions {
  runner: CommandRunner;
}

export function createSherlockCollector(options: SherlockCollectorOptions): CollectorAdapter {
  const { runner } = options;

  return defineCollector<CommandOutput>({
    descriptor: {
      name: NAME,
      transport: 'process',
      acceptedTargetKinds: ['Username'],
      requiredConfigKeys: [],
      rateLimit: { maxCalls: 0, perIntervalMs: 0 },
      priority: 5,
      defaultTimeoutMs: 180000,
      description: 'Sherlock username search across social networks'
    },
    async execute({ target, config, signal }) {
      const binary = stringOption(config, 'binary', 'sherlock');
      const siteTimeout = numberOption(config, 'siteTimeoutSec', 10);
      const args = [
        target.normalizedValue,
        '--print-found',
        '--no-color',
        '--timeout', String(siteTimeout),
        '--output', devNull
      ];
      return runner.run(binary, args, { signal });
    },
    parse: parseSherlockOutput
  });
}
