import { isIPv4, isIPv6 } from 'node:net';

export function isValidIPv4(value: string): boolean {
  return isIPv4(value);
}

export function isValidIPv6(value: string): boolean {
  return isIPv6(stripBrackets(value));
}

function stripBrackets(value: string): string {
  return value.startsWith('[') && value.endsWith(']') ? value.slice(1, -1) : value;
}

export function normalizeIPv4(address: string): string {
  return address.split('.').map(octet => String(Number.parseInt(octet, 10))).join('.');
}

function parseGroups(part: string): number[] | null {
  if (part === '') return [];

  const groups: number[] = [];
  const pieces = part.split(':');
  for (let i = 0; i < pieces.length; i++) {
    const piece = pieces[i] ?? '';
    if (i === pieces.length - 1 && piece.includes('.')) {
      if (!isIPv4(piece)) return null;
      const [a = 0, b = 0, c = 0, d = 0] = piece.split('.').map(octet => Number.parseInt(octet, 10));
      groups.push((a << 8) | b, (c << 8) | d);
      continue;
    }
    if (!/^[0-9a-f]{1,4}$/i.test(piece)) return null;
    groups.push(Number.parseInt(piece, 16));
  }
  return groups;
}

/**
 * Expand an IPv6 literal into its eight 16-bit groups. Embedded IPv4 tails
 * (::ffff:192.0.2.1) become two hex groups.
 */
export function expandIPv6(address: string): number[] | null {
  const halves = address.split('::');
  if (halves.length > 2) return null;

  const head = parseGroups(halves[0] ?? '');
  const tail = halves.length === 2 ? parseGroups(halves[1] ?? '') : [];
  if (!head || !tail) return null;

  if (halves.length === 1) {
    return head.length === 8 ? head : null;
  }

  const missing = 8 - head.length - tail.length;
  if (missing < 1) return null;
  return [...head, ...new Array<number>(missing).fill(0), ...tail];
}

/**
 * RFC 5952 text form: lower-case hex, no leading zeros, the longest run of
 * two or more zero groups replaced by "::" (the first one on a tie).
 */
export function compressIPv6(groups: readonly number[]): string {
  let bestStart = -1;
  let bestLength = 0;
  let runStart = -1;

  for (let i = 0; i <= groups.length; i++) {
    if (i < groups.length && groups[i] === 0) {
      if (runStart === -1) runStart = i;
      continue;
    }
    if (runStart !== -1) {
      const length = i - runStart;
      if (length > bestLength) {
        bestStart = runStart;
        bestLength = length;
      }
      runStart = -1;
    }
  }

  const hex = groups.map(group => group.toString(16));
  if (bestLength < 2) {
    return hex.join(':');
  }

  const left = hex.slice(0, bestStart).join(':');
  const right = hex.slice(bestStart + bestLength).join(':');
  return `${left}::${right}`;
}

/**
 * Canonical textual form of an IP literal, or null when the value is not one.
 */
export function normalizeIp(value: string): string | null {
  const candidate = stripBrackets(value.trim());

  if (isIPv4(candidate)) {
    return normalizeIPv4(candidate);
  }

  if (isIPv6(candidate)) {
    const zoneIndex = candidate.indexOf('%');
    const address = zoneIndex === -1 ? candidate : candidate.slice(0, zoneIndex);
    const zone = zoneIndex === -1 ? '' : candidate.slice(zoneIndex);
    const groups = expandIPv6(address);
    return groups ? `${compressIPv6(groups)}${zone}` : null;
  }

  return null;
}
