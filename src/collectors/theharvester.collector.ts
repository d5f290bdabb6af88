/**
 * theHarvester process wrapper. The tool prints one block per result kind:
 *
 *   [*] Hosts found: 2
 *   ---------------------
 *   mail.example.com:192.0.2.10
 *   www.example.com
 *
 * Lines inside a block it does not understand are kept as Other findings.
 */

import type { CommandOutput, CommandRunner } from '../concerns/command-runner.js';
import { normalizeIp } from '../concerns/ip.js';
import { CollectorFailure } from '../errors.js';
import { TargetNormalizer } from '../target-normalizer.class.js';
import type { Finding, Target } from '../types/investigation.types.js';
import type { CollectorAdapter } from './collector.interface.js';
import { defineCollector, makeFinding, otherFinding } from './harness.js';
import { numberOption, stringListOption, stringOption } from './options.js';

const NAME = 'theharvester';
const EMAIL_CONFIDENCE = 0.6;
const HOST_CONFIDENCE = 0.5;
const IP_CONFIDENCE = 0.5;

const SECTION_PATTERN = /^\[\*\]\s+(?:No\s+)?([A-Za-z ]+?)\s+found\b/i;

type Section = 'emails' | 'hosts' | 'ips' | 'other';

function sectionOf(title: string): Section {
  const normalized = title.toLowerCase();
  if (normalized.endsWith('emails')) return 'emails';
  if (normalized.endsWith('hosts')) return 'hosts';
  if (normalized.endsWith('ips')) return 'ips';
  return 'other';
}

function parseHostLine(line: string, domain: string): Finding[] | null {
  const separator = line.indexOf(':');
  const hostPart = separator === -1 ? line : line.slice(0, separator);
  const host = TargetNormalizer.normalizeDomain(hostPart);
  if (!host) return null;

  const parent: Record<string, string> = host !== domain && host.endsWith(`.${domain}`)
    ? { parentType: 'Subdomain', parentValue: domain }
    : {};

  const addresses = separator === -1
    ? []
    : line.slice(separator + 1).split(',').map(part => normalizeIp(part)).filter((ip): ip is string => ip !== null);

  if (addresses.length === 0) {
    return [makeFinding('Subdomain', host, HOST_CONFIDENCE, parent)];
  }

  const findings: Finding[] = [];
  for (const ip of addresses) {
    findings.push(makeFinding('IPAddress', ip, IP_CONFIDENCE));
    findings.push(makeFinding('Subdomain', host, HOST_CONFIDENCE, {
      parentType: 'IPAddress',
      parentValue: ip,
      relation: 'resolves_to'
    }));
  }
  return findings;
}

function parseLine(section: Section, line: string, domain: string): Finding[] | null {
  switch (section) {
    case 'emails': {
      const email = TargetNormalizer.normalizeEmail(line);
      return email ? [makeFinding('EmailAddress', email, EMAIL_CONFIDENCE)] : null;
    }
    case 'hosts':
      return parseHostLine(line, domain);
    case 'ips': {
      const ip = normalizeIp(line);
      return ip ? [makeFinding('IPAddress', ip, IP_CONFIDENCE)] : null;
    }
    default:
      return null;
  }
}

export function parseHarvesterOutput(output: CommandOutput, target: Target): Finding[] {
  const findings: Finding[] = [];
  let section: Section | null = null;
  let markers = 0;

  for (const rawLine of output.stdout.split(/\r?\n/)) {
    const line = rawLine.trim();

    const header = SECTION_PATTERN.exec(line);
    if (header) {
      markers++;
      section = sectionOf(header[1] ?? '');
      continue;
    }

    if (line.startsWith('[')) {
      section = null;
      continue;
    }

    if (!section || line === '' || /^-+$/.test(line)) continue;

    const mapped = parseLine(section, line, target.normalizedValue);
    findings.push(...(mapped ?? [otherFinding(NAME, line)]));
  }

  if (markers === 0) {
    if (output.exitCode !== 0) {
      throw new CollectorFailure('NetworkError', `theHarvester exited with code ${output.exitCode}: ${output.stderr || 'no output'}`);
    }
    throw new CollectorFailure('ParseError', 'theHarvester output has no result sections');
  }

  return findings;
}

export interface HarvesterCollectorOptions {
  runner: CommandRunner;
}

export function createHarvesterCollector(options: HarvesterCollectorOptions): CollectorAdapter {
  const { runner } = options;

  return defineCollector<CommandOutput>({
    descriptor: {
      name: NAME,
      transport: 'process',
      acceptedTargetKinds: ['Domain'],
      requiredConfigKeys: [],
      rateLimit: { maxCalls: 0, perIntervalMs: 0 },
      priority: 5,
      defaultTimeoutMs: 120000,
      description: 'theHarvester e-mail and host harvesting'
    },
    async execute({ target, config, signal }) {
      const binary = stringOption(config, 'binary', 'theHarvester');
      const sources = stringListOption(config, 'sources', ['crtsh', 'duckduckgo', 'hackertarget']);
      const limit = numberOption(config, 'limit', 500);
      return runner.run(binary, ['-d', target.normalizedValue, '-b', sources.join(','), '-l', String(limit)], { signal });
    },
    parse: parseHarvesterOutput
  });
}
