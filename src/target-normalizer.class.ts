/**
 * TargetNormalizer
 *
 * Classifies a raw investigation subject into a typed Target:
 * - IP literals (IPv4, IPv6, bracketed IPv6)
 * - Email addresses
 * - Domain names (URLs are reduced to their host)
 * - Usernames, for anything else that looks like a handle
 */

import { canonicalizeHostname } from './concerns/canonicalize.js';
import { normalizeIp } from './concerns/ip.js';
import { InvalidTargetError } from './errors.js';
import type { Target } from './types/investigation.types.js';

const LABEL_PATTERN = /^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/;
const TLD_PATTERN = /^[a-z]{2,63}$/;
const USERNAME_PATTERN = /^[A-Za-z0-9_.-]{1,64}$/;
const MAX_DOMAIN_LENGTH = 253;

export class TargetNormalizer {
  static normalize(rawInput: string): Target {
    const candidate = this.stripUrl(rawInput.trim());
    if (!candidate) {
      throw new InvalidTargetError(rawInput);
    }

    const ip = normalizeIp(candidate);
    if (ip) {
      return this.target('IPAddress', ip, rawInput);
    }

    if (candidate.includes('@')) {
      const email = this.normalizeEmail(candidate);
      if (!email) {
        throw new InvalidTargetError(rawInput, { description: 'Malformed email address.' });
      }
      return this.target('Email', email, rawInput);
    }

    if (candidate.includes('.')) {
      const domain = this.normalizeDomain(candidate);
      if (domain) {
        return this.target('Domain', domain, rawInput);
      }
    }

    if (USERNAME_PATTERN.test(candidate)) {
      return this.target('Username', candidate, rawInput);
    }

    throw new InvalidTargetError(rawInput);
  }

  /** Lower-cased domain without the root dot, or null when the syntax is invalid. */
  static normalizeDomain(value: string): string | null {
    const domain = canonicalizeHostname(value);
    if (domain.length === 0 || domain.length > MAX_DOMAIN_LENGTH) {
      return null;
    }

    const labels = domain.split('.');
    if (labels.length < 2) {
      return null;
    }

    const tld = labels[labels.length - 1] ?? '';
    if (!TLD_PATTERN.test(tld)) {
      return null;
    }

    return labels.every(label => LABEL_PATTERN.test(label)) ? domain : null;
  }

  static normalizeEmail(value: string): string | null {
    const parts = value.split('@');
    if (parts.length !== 2) {
      return null;
    }

    const [local = '', domainPart = ''] = parts;
    if (local.length === 0 || local.length > 64 || /\s/.test(local)) {
      return null;
    }

    const domain = this.normalizeDomain(domainPart);
    if (!domain || domainPart.startsWith('*.')) {
      return null;
    }

    return `${local.toLowerCase()}@${domain}`;
  }

  private static stripUrl(value: string): string {
    if (!/^[a-z][a-z0-9+.-]*:\/\//i.test(value)) {
      return value;
    }
    try {
      return new URL(value).hostname;
    } catch {
      return value;
    }
  }

  private static target(kind: Target['kind'], normalizedValue: string, rawInput: string): Target {
    return Object.freeze({ kind, normalizedValue, rawInput });
  }
}

export function normalize(rawInput: string): Target {
  return TargetNormalizer.normalize(rawInput);
}
