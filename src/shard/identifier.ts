import { createHash } from 'crypto';
import { CID, digest as multihashDigest } from 'multiformats';
import { FormatError, errorMessage } from '../errors/types';
import {
  IdentifierInfo,
  ShardManifest,
  RAW_CODEC,
  SHA2_256_CODE,
  DIGEST_LENGTH,
} from '../types/shard';

/**
 * Composite digest over a file's identity and its ordered chunk digests:
 * sha256(utf8(name) || u64be(totalSize) || digest_0 || ... || digest_n-1)
 */
export function compositeDigest(
  originalFile: string,
  totalSize: number,
  orderedDigests: readonly Uint8Array[]
): Uint8Array {
  const hasher = createHash('sha256');
  hasher.update(Buffer.from(originalFile, 'utf8'));

  const sizeBytes = Buffer.alloc(8);
  sizeBytes.writeBigUInt64BE(BigInt(totalSize));
  hasher.update(sizeBytes);

  for (const chunkDigest of orderedDigests) {
    hasher.update(chunkDigest);
  }

  return new Uint8Array(hasher.digest());
}

/**
 * Build the content identifier for a sharded file.
 *
 * The composite digest is wrapped as a sha2-256 multihash inside a CIDv1
 * with the raw codec, rendered as base32 text (`bafkrei...`).
 */
export function buildIdentifier(
  originalFile: string,
  totalSize: number,
  orderedDigests: readonly Uint8Array[]
): string {
  const composite = compositeDigest(originalFile, totalSize, orderedDigests);
  const multihash = multihashDigest.create(SHA2_256_CODE, composite);
  return CID.createV1(RAW_CODEC, multihash).toString();
}

/**
 * Recompute the identifier a manifest should carry
 */
export function identifierFor(manifest: Pick<ShardManifest, 'originalFile' | 'totalSize' | 'chunks'>): string {
  const ordered = [...manifest.chunks]
    .sort((a, b) => a.index - b.index)
    .map((chunk) => chunk.digest);
  return buildIdentifier(manifest.originalFile, manifest.totalSize, ordered);
}

/**
 * Decode an identifier token, accepting only raw/sha2-256 CIDv1 values
 */
export function parseIdentifier(token: string): IdentifierInfo {
  let cid: CID;
  try {
    cid = CID.parse(token);
  } catch (error) {
    const reason = errorMessage(error);
    throw new FormatError(`Invalid content identifier "${token}": ${reason}`, { cid: token });
  }

  if (cid.version !== 1) {
    throw new FormatError(`Content identifier must be CIDv1, got v${cid.version}`, { cid: token });
  }
  if (cid.code !== RAW_CODEC) {
    throw new FormatError(
      `Content identifier must use the raw codec (0x55), got 0x${cid.code.toString(16)}`,
      { cid: token }
    );
  }
  if (cid.multihash.code !== SHA2_256_CODE || cid.multihash.digest.length !== DIGEST_LENGTH) {
    throw new FormatError(
      `Content identifier must carry a sha2-256 digest, got 0x${cid.multihash.code.toString(16)}`,
      { cid: token }
    );
  }

  return {
    version: cid.version,
    codec: cid.code,
    hashCode: cid.multihash.code,
    digest: cid.multihash.digest,
  };
}
