import { customAlphabet, nanoid } from 'nanoid';

const LOWER_ALPHANUMERIC = '0123456789abcdefghijklmnopqrstuvwxyz';

const shortId = customAlphabet(LOWER_ALPHANUMERIC, 12);

/** Identifier for pool tasks. */
export function idGenerator(): string {
  return nanoid();
}

/** Investigation ids are short, lower-case and safe in file names. */
export function investigationId(): string {
  return `inv_${shortId()}`;
}
