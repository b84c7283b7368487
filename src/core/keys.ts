/**
 * Canonical keys and digests for identity types.
 */

import blake from 'blakejs';
import canonicalizeJson from 'canonicalize';

/** Canonical JSON (RFC 8785) */
export function canonicalize(obj: unknown): string {
  const result = canonicalizeJson(obj);
  if (result === undefined) {
    throw new Error('Failed to canonicalize object');
  }
  return result;
}

/** BLAKE2b-64 digest of a string, hex encoded (16 chars). */
export function digest64(input: string): string {
  return blake.blake2bHex(input, undefined, 8);
}
