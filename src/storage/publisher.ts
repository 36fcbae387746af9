import { AppError, ErrorCode, OperationCancelledError, errorMessage } from '../errors/types';
import { ShardManifest } from '../types/shard';
import { manifestFileName, serializeManifest } from '../shard/manifest';
import { retryOperation, RetryOptions } from '../utils/retry';
import { logger } from '../utils/logger';
import { BlobReceipt, ChunkSource, StorageBackend } from './types';

export interface PublishOptions {
  retry?: RetryOptions;
  signal?: AbortSignal;
  onProgress?: (publishedChunks: number, totalChunks: number) => void;
}

export interface PublishResult {
  backend: string;
  receipts: BlobReceipt[];
  manifestReceipt: BlobReceipt;
}

/**
 * Hand a chunk set and its manifest to a storage backend.
 *
 * Chunks go first, in index order. The manifest is stored last.
 */
export async function publishShardSet(
  manifest: ShardManifest,
  source: ChunkSource,
  backend: StorageBackend,
  options: PublishOptions = {}
): Promise<PublishResult> {
  const receipts: BlobReceipt[] = [];
  const retry: RetryOptions = { ...options.retry, signal: options.signal };
  const ordered = [...manifest.chunks].sort((a, b) => a.index - b.index);

  for (const chunk of ordered) {
    if (options.signal?.aborted) {
      throw new OperationCancelledError('Publishing');
    }
    const data = await source.readChunk(chunk);
    const receipt = await putWithRetry(backend, chunk.filename, data, retry);
    receipts.push(receipt);
    options.onProgress?.(receipts.length, manifest.chunkCount);
  }

  const manifestReceipt = await putWithRetry(
    backend,
    manifestFileName(manifest.originalFile),
    serializeManifest(manifest),
    retry
  );

  return { backend: backend.name, receipts, manifestReceipt };
}

async function putWithRetry(
  backend: StorageBackend,
  name: string,
  data: Uint8Array,
  retry: RetryOptions = {}
): Promise<BlobReceipt> {
  try {
    return await retryOperation(() => backend.putBlob(name, data), {
      ...retry,
      onRetry: (error, attempt) => {
        logger.warn(`Storing ${name} on ${backend.name} failed (attempt ${attempt}): ${error.message}`);
        retry.onRetry?.(error, attempt);
      },
    });
  } catch (error) {
    if (error instanceof AppError) {
      throw error;
    }
    const reason = errorMessage(error);
    throw new AppError(
      `Failed to store ${name} on ${backend.name}: ${reason}`,
      ErrorCode.PUBLISH_FAILED,
      { backend: backend.name, name },
      true
    );
  }
}
