/**
 * Have I Been Pwned breached-account lookup.
 */

import { z } from 'zod';
import { expectOk, type HttpClient } from '../concerns/http-client.js';
import { CollectorFailure } from '../errors.js';
import type { Finding, Target } from '../types/investigation.types.js';
import type { CollectorAdapter } from './collector.interface.js';
import { defineCollector, makeFinding, parseFragments, parseJson } from './harness.js';
import { stringOption } from './options.js';

const NAME = 'hibp';
const VERIFIED_CONFIDENCE = 0.95;
const UNVERIFIED_CONFIDENCE = 0.6;

const breachSchema = z.object({
  Name: z.string().min(1),
  Title: z.string().optional(),
  Domain: z.string().optional(),
  BreachDate: z.string().optional(),
  DataClasses: z.array(z.string()).default([]),
  IsVerified: z.boolean().default(true)
});

export interface HibpCollectorOptions {
  http: HttpClient;
  baseUrl?: string;
}

export function parseHibpResponse(body: string, target: Target): Finding[] {
  if (body.trim() === '') {
    return [];
  }

  const payload = parseJson(body, NAME);
  if (!Array.isArray(payload)) {
    throw new CollectorFailure('ParseError', 'HIBP answer is not a list of breaches');
  }
  const entries: unknown[] = payload;
  const email = target.normalizedValue;

  const leaks = parseFragments(
    NAME,
    entries,
    (entry) => {
      const breach = breachSchema.safeParse(entry);
      if (!breach.success) return null;

      const { Name, Title, Domain, BreachDate, DataClasses, IsVerified } = breach.data;
      const attributes: Record<string, string> = {
        breach: Name,
        verified: String(IsVerified),
        parentType: 'EmailAddress',
        parentValue: email,
        relation: 'leaked_in'
      };
      if (Title) attributes.title = Title;
      if (Domain) attributes.domain = Domain;
      if (BreachDate) attributes.breachDate = BreachDate;
      if (DataClasses.length > 0) attributes.dataClasses = DataClasses.join(', ');

      const confidence = IsVerified ? VERIFIED_CONFIDENCE : UNVERIFIED_CONFIDENCE;
      return [makeFinding('CredentialLeak', `${Name}:${email}`, confidence, attributes)];
    },
    (entry) => JSON.stringify(entry)
  );

  return [
    makeFinding('EmailAddress', email, VERIFIED_CONFIDENCE, { breaches: String(entries.length) }),
    ...leaks
  ];
}

export function createHibpCollector(options: HibpCollectorOptions): CollectorAdapter {
  const { http } = options;

  return defineCollector<string>({
    descriptor: {
      name: NAME,
      transport: 'http',
      acceptedTargetKinds: ['Email'],
      requiredConfigKeys: ['apiKey'],
      rateLimit: { maxCalls: 10, perIntervalMs: 60000 },
      priority: 10,
      defaultTimeoutMs: 20000,
      description: 'Have I Been Pwned breached-account search'
    },
    async execute({ target, config, signal }) {
      const baseUrl = stringOption(config, 'baseUrl', options.baseUrl ?? 'https://haveibeenpwned.com');
      const url = `${baseUrl}/api/v3/breachedaccount/${encodeURIComponent(target.normalizedValue)}?truncateResponse=false`;
      // 404 means the account appears in no breach.
      const response = expectOk(
        await http.get(url, { signal, headers: { 'hibp-api-key': config.apiKey ?? '' } }),
        url,
        [404]
      );
      return response.status === 404 ? '' : response.body;
    },
    parse: parseHibpResponse
  });
}
