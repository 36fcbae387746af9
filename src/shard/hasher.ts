import { createHash } from 'crypto';
import { DIGEST_LENGTH } from '../types/shard';

const HEX_DIGEST_PATTERN = /^[0-9a-f]{64}$/i;

/**
 * Calculate the SHA-256 digest of one chunk
 */
export function digestChunk(data: Uint8Array): Uint8Array {
  return new Uint8Array(createHash('sha256').update(data).digest());
}

export function toHex(digest: Uint8Array): string {
  return Buffer.from(digest).toString('hex');
}

/**
 * Decode a 64-character hex digest, returning null when it is malformed
 */
export function fromHex(hex: string): Uint8Array | null {
  if (!HEX_DIGEST_PATTERN.test(hex)) {
    return null;
  }
  return new Uint8Array(Buffer.from(hex, 'hex'));
}

/**
 * Compare two 32-byte digests
 */
export function digestsEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== DIGEST_LENGTH || b.length !== DIGEST_LENGTH) {
    return false;
  }
  return Buffer.from(a).equals(Buffer.from(b));
}
