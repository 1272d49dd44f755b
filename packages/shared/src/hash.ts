import { createHash } from 'node:crypto';
import { objectHash } from 'ohash';

export function sha256(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

/**
 * sha256 over a key-order-independent serialization of `value`.
 */
export function canonicalDigest(value: unknown): string {
  return sha256(objectHash(value));
}
