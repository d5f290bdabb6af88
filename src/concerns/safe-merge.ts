/**
 * Safe Merge Utilities
 *
 * Finding attributes come from untrusted tool output and are merged key by
 * key into graph nodes, so keys that could reach an object prototype are
 * dropped before any merge.
 */

const DANGEROUS_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

/**
 * Check if a key is dangerous for object property assignment.
 * Handles both simple keys and dot-notation paths.
 */
export function isDangerousKey(key: string): boolean {
  return key.split('.').some(part => DANGEROUS_KEYS.has(part));
}

/**
 * Copy a string map, keeping only safe keys with string values.
 * The copy has no prototype.
 */
export function sanitizeAttributes(attributes: Readonly<Record<string, unknown>>): Record<string, string> {
  const result: Record<string, string> = Object.create(null);

  for (const [key, value] of Object.entries(attributes)) {
    if (isDangerousKey(key) || typeof value !== 'string') continue;
    result[key] = value;
  }

  return result;
}
