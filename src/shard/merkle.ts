import { createHash } from 'crypto';

/**
 * Merkle root over the ordered chunk digests, for attestation consumers
 * that commit to a chunk set without reading chunk bytes.
 *
 * Leaves are the digests themselves; a parent is sha256(left || right) and
 * an odd node at the end of a level is paired with itself.
 */
export function merkleRoot(digests: readonly Uint8Array[]): Uint8Array | null {
  if (digests.length === 0) {
    return null;
  }

  let level: Uint8Array[] = [...digests];
  while (level.length > 1) {
    const next: Uint8Array[] = [];
    for (let i = 0; i < level.length; i += 2) {
      const left = level[i];
      const right = i + 1 < level.length ? level[i + 1] : left;
      next.push(new Uint8Array(createHash('sha256').update(left).update(right).digest()));
    }
    level = next;
  }

  return level[0];
}
