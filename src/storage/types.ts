import { ChunkDescriptor } from '../types/shard';

/**
 * Where the reassembler reads chunk bytes from
 */
export interface ChunkSource {
  readChunk(chunk: ChunkDescriptor): Promise<Buffer>;
}

export interface BlobReceipt {
  name: string;
  size: number;
  location: string;
}

/**
 * Capability interface for anything that can store a chunk set.
 *
 * Backends treat chunks and manifests as opaque blobs; remote variants
 * (pinning services, S3-compatible buckets) are configured by their callers.
 */
export interface StorageBackend {
  readonly name: string;

  putBlob(name: string, data: Uint8Array): Promise<BlobReceipt>;
}
