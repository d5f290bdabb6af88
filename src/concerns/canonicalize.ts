import type { FindingType } from '../types/investigation.types.js';
import { normalizeIp } from './ip.js';

export function canonicalizeHostname(value: string): string {
  let host = value.trim().toLowerCase();
  if (host.endsWith('.')) host = host.slice(0, -1);
  if (host.startsWith('*.')) host = host.slice(2);
  return host;
}

/**
 * Per-type canonical value used for deduplication. Usernames and free-form
 * values keep their case.
 */
export function canonicalizeValue(type: FindingType, value: string): string {
  switch (type) {
    case 'Subdomain':
      return canonicalizeHostname(value);
    case 'IPAddress':
      return normalizeIp(value) ?? value.trim().toLowerCase();
    case 'EmailAddress':
    case 'OpenPort':
      return value.trim().toLowerCase();
    default:
      return value.trim();
  }
}

export function canonicalKey(type: FindingType, value: string): string {
  return `${type}:${canonicalizeValue(type, value)}`;
}
