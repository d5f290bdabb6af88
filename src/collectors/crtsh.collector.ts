/**
 * crt.sh certificate-transparency search. Every name on a certificate logged
 * for the domain (or one of its subdomains) becomes a Subdomain finding;
 * e-mail addresses that show up in certificate names are kept too.
 */

import { z } from 'zod';
import { canonicalizeHostname } from '../concerns/canonicalize.js';
import { expectOk, type HttpClient } from '../concerns/http-client.js';
import { CollectorFailure } from '../errors.js';
import type { Finding, Target } from '../types/investigation.types.js';
import type { CollectorAdapter } from './collector.interface.js';
import { defineCollector, makeFinding, otherFinding, parseJson } from './harness.js';
import { stringOption } from './options.js';

const NAME = 'crtsh';
const SUBDOMAIN_CONFIDENCE = 0.7;
const EMAIL_CONFIDENCE = 0.5;

const certificateSchema = z.object({
  name_value: z.string(),
  issuer_name: z.string().optional(),
  not_before: z.string().optional()
});

export interface CrtShCollectorOptions {
  http: HttpClient;
  baseUrl?: string;
}

export function parseCrtShResponse(body: string, target: Target): Finding[] {
  const payload = parseJson(body, NAME);
  if (!Array.isArray(payload)) {
    throw new CollectorFailure('ParseError', 'crt.sh answer is not a list of certificates');
  }

  const entries: unknown[] = payload;
  const domain = target.normalizedValue;
  const seen = new Map<string, Finding>();
  const findings: Finding[] = [];

  for (const entry of entries) {
    const certificate = certificateSchema.safeParse(entry);
    if (!certificate.success) {
      findings.push(otherFinding(NAME, JSON.stringify(entry)));
      continue;
    }

    const { name_value: nameValue, issuer_name: issuer, not_before: notBefore } = certificate.data;
    for (const rawName of nameValue.split('\n')) {
      const name = rawName.trim();
      if (!name) continue;

      const attributes: Record<string, string> = {};
      if (issuer) attributes.issuer = issuer;
      if (notBefore) attributes.notBefore = notBefore;

      if (name.includes('@')) {
        const email = name.toLowerCase();
        if (!seen.has(email)) {
          seen.set(email, makeFinding('EmailAddress', email, EMAIL_CONFIDENCE, attributes));
        }
        continue;
      }

      const host = canonicalizeHostname(name);
      if (seen.has(host) || (host !== domain && !host.endsWith(`.${domain}`))) continue;

      if (host !== domain) {
        attributes.parentType = 'Subdomain';
        attributes.parentValue = domain;
      }
      seen.set(host, makeFinding('Subdomain', host, SUBDOMAIN_CONFIDENCE, attributes));
    }
  }

  return [...findings, ...seen.values()];
}

export function createCrtShCollector(options: CrtShCollectorOptions): CollectorAdapter {
  const { http } = options;

  return defineCollector<string>({
    descriptor: {
      name: NAME,
      transport: 'http',
      acceptedTargetKinds: ['Domain'],
      requiredConfigKeys: [],
      rateLimit: { maxCalls: 5, perIntervalMs: 60000 },
      priority: 10,
      defaultTimeoutMs: 60000,
      description: 'Certificate-transparency log search (crt.sh)'
    },
    async execute({ target, config, signal }) {
      const baseUrl = stringOption(config, 'baseUrl', options.baseUrl ?? 'https://crt.sh');
      const url = `${baseUrl}/?q=${encodeURIComponent(`%.${target.normalizedValue}`)}&output=json`;
      const response = expectOk(await http.get(url, { signal }), url, [404]);
      return response.status === 404 ? '[]' : response.body;
    },
    parse: parseCrtShResponse
  });
}
