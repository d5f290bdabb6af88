/**
 * Shodan host lookup. Reports the address itself, every exposed service as
 * an OpenPort and the hostnames Shodan saw resolving to it.
 */

import { z } from 'zod';
import { normalizeIp } from '../concerns/ip.js';
import { expectOk, type HttpClient } from '../concerns/http-client.js';
import { CollectorFailure } from '../errors.js';
import type { Finding, Target } from '../types/investigation.types.js';
import type { CollectorAdapter } from './collector.interface.js';
import { defineCollector, makeFinding, parseFragments, parseJson } from './harness.js';
import { stringOption } from './options.js';

const NAME = 'shodan';
const CONFIDENCE = 0.9;

const serviceSchema = z.object({
  port: z.number().int().min(0).max(65535),
  transport: z.string().default('tcp'),
  product: z.string().optional(),
  version: z.string().optional()
});

const hostSchema = z.object({
  ip_str: z.string(),
  hostnames: z.array(z.string()).default([]),
  ports: z.array(z.number().int()).default([]),
  data: z.array(z.unknown()).default([]),
  org: z.string().nullish(),
  isp: z.string().nullish(),
  asn: z.string().nullish(),
  os: z.string().nullish(),
  country_name: z.string().nullish()
});

export interface ShodanCollectorOptions {
  http: HttpClient;
  baseUrl?: string;
}

export function parseShodanResponse(body: string, target: Target): Finding[] {
  if (body.trim() === '') {
    return [];
  }

  const host = hostSchema.safeParse(parseJson(body, NAME));
  if (!host.success) {
    throw new CollectorFailure('ParseError', `Unexpected Shodan host record: ${host.error.issues[0]?.message ?? 'invalid shape'}`);
  }

  const record = host.data;
  const ip = normalizeIp(record.ip_str) ?? target.normalizedValue;

  const ipAttributes: Record<string, string> = {};
  if (record.org) ipAttributes.org = record.org;
  if (record.isp) ipAttributes.isp = record.isp;
  if (record.asn) ipAttributes.asn = record.asn;
  if (record.os) ipAttributes.os = record.os;
  if (record.country_name) ipAttributes.country = record.country_name;

  const findings: Finding[] = [makeFinding('IPAddress', ip, CONFIDENCE, ipAttributes)];

  const services = parseFragments(
    NAME,
    record.data,
    (entry) => {
      const service = serviceSchema.safeParse(entry);
      if (!service.success) return null;

      const { port, transport, product, version } = service.data;
      const attributes: Record<string, string> = {
        port: String(port),
        transport,
        parentType: 'IPAddress',
        parentValue: ip,
        relation: 'exposes'
      };
      if (product) attributes.product = product;
      if (version) attributes.version = version;
      return [makeFinding('OpenPort', `${ip}:${port}/${transport}`, CONFIDENCE, attributes)];
    },
    (entry) => JSON.stringify(entry)
  );
  findings.push(...services);

  // Hosts without banner data still list their open ports.
  if (record.data.length === 0) {
    for (const port of record.ports) {
      findings.push(makeFinding('OpenPort', `${ip}:${port}/tcp`, CONFIDENCE, {
        port: String(port),
        transport: 'tcp',
        parentType: 'IPAddress',
        parentValue: ip,
        relation: 'exposes'
      }));
    }
  }

  for (const hostname of record.hostnames) {
    findings.push(makeFinding('Subdomain', hostname, CONFIDENCE, {
      parentType: 'IPAddress',
      parentValue: ip,
      relation: 'resolves_to'
    }));
  }

  return findings;
}

export function createShodanCollector(options: ShodanCollectorOptions): CollectorAdapter {
  const { http } = options;

  return defineCollector<string>({
    descriptor: {
      name: NAME,
      transport: 'http',
      acceptedTargetKinds: ['IPAddress'],
      requiredConfigKeys: ['apiKey'],
      rateLimit: { maxCalls: 1, perIntervalMs: 1000 },
      priority: 10,
      defaultTimeoutMs: 20000,
      description: 'Shodan host lookup (open services, hostnames)'
    },
    async execute({ target, config, signal }) {
      const baseUrl = stringOption(config, 'baseUrl', options.baseUrl ?? 'https://api.shodan.io');
      const endpoint = `${baseUrl}/shodan/host/${encodeURIComponent(target.normalizedValue)}`;
      const url = `${endpoint}?key=${encodeURIComponent(config.apiKey ?? '')}`;
      // 404 means Shodan holds no record for the address.
      const response = expectOk(await http.get(url, { signal }), endpoint, [404]);
      return response.status === 404 ? '' : response.body;
    },
    parse: parseShodanResponse
  });
}
