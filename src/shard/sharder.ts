import * as fs from 'fs/promises';
import * as path from 'path';
import { IoError } from '../errors/types';
import {
  ChunkDescriptor,
  ShardConfig,
  ShardManifest,
  ShardOptions,
} from '../types/shard';
import { validateChunkSize, validateConcurrency, validateFilePath } from '../utils/validation';
import { logger } from '../utils/logger';
import { digestChunk, toHex } from './hasher';
import { buildIdentifier } from './identifier';
import { chunkFileName } from './manifest';
import { runWorkerPool } from './pool';

/**
 * Splits a file into fixed-size chunk files and derives its manifest
 */
export class FileSharder {
  /**
   * Shard the input described by `config`.
   *
   * Chunk files are written to `config.outputDir`; the returned manifest is
   * only produced once every chunk has been written. Chunks already on disk
   * when a run fails are left in place.
   */
  async shard(config: ShardConfig, options: ShardOptions = {}): Promise<ShardManifest> {
    const { inputPath, outputDir, chunkSizeBytes, concurrency } = config;

    validateChunkSize(chunkSizeBytes);
    validateConcurrency(concurrency);

    const stats = await validateFilePath(inputPath);
    const totalSize = stats.size;
    const originalFile = path.basename(inputPath);
    const chunkCount = this.calculateChunkCount(totalSize, chunkSizeBytes);

    try {
      await fs.mkdir(outputDir, { recursive: true });
    } catch (error) {
      throw IoError.fromSystemError(error, `Cannot create output directory ${outputDir}`, { path: outputDir });
    }

    logger.debug(`Sharding ${inputPath} (${totalSize} bytes) into ${chunkCount} chunk(s) of up to ${chunkSizeBytes} bytes`);

    let input: fs.FileHandle;
    try {
      input = await fs.open(inputPath, 'r');
    } catch (error) {
      throw IoError.fromSystemError(error, `Cannot open input ${inputPath}`, { path: inputPath });
    }

    let completed = 0;
    let chunks: ChunkDescriptor[];
    try {
      chunks = await runWorkerPool(
        chunkCount,
        concurrency,
        async (index) => {
          const offset = index * chunkSizeBytes;
          const size = Math.min(chunkSizeBytes, totalSize - offset);
          const descriptor = await this.writeChunk(input, inputPath, outputDir, index, offset, size);

          completed++;
          options.onProgress?.(completed, chunkCount);
          logger.debug(`Created chunk ${index}: ${size} bytes, sha256 ${toHex(descriptor.digest).slice(0, 8)}...`);

          return descriptor;
        },
        options.signal,
        'Sharding'
      );
    } finally {
      await input.close();
    }

    // Barrier: the identifier covers the full ordered digest list
    const cid = buildIdentifier(
      originalFile,
      totalSize,
      chunks.map((chunk) => chunk.digest)
    );

    return {
      originalFile,
      totalSize,
      chunkSize: chunkSizeBytes,
      chunkCount,
      chunks,
      cid,
    };
  }

  /**
   * Calculate number of chunks
   */
  calculateChunkCount(fileSize: number, chunkSizeBytes: number): number {
    return Math.ceil(fileSize / chunkSizeBytes);
  }

  /**
   * Read one window of the input, hash it and write it to its chunk file
   */
  private async writeChunk(
    input: fs.FileHandle,
    inputPath: string,
    outputDir: string,
    index: number,
    offset: number,
    size: number
  ): Promise<ChunkDescriptor> {
    const buffer = Buffer.alloc(size);
    let filled = 0;

    try {
      while (filled < size) {
        const { bytesRead } = await input.read(buffer, filled, size - filled, offset + filled);
        if (bytesRead === 0) {
          throw new IoError(
            `Input ${inputPath} ended early while reading chunk ${index}`,
            { path: inputPath, chunkIndex: index, expected: size, actual: filled }
          );
        }
        filled += bytesRead;
      }
    } catch (error) {
      throw IoError.fromSystemError(error, `Failed to read chunk ${index} from ${inputPath}`, {
        path: inputPath,
        chunkIndex: index,
      });
    }

    const filename = chunkFileName(index);
    const chunkPath = path.join(outputDir, filename);
    try {
      await fs.writeFile(chunkPath, buffer);
    } catch (error) {
      throw IoError.fromSystemError(error, `Failed to write chunk ${index}`, { path: chunkPath, chunkIndex: index });
    }

    return {
      index,
      filename,
      size,
      digest: digestChunk(buffer),
    };
  }
}

/**
 * Shard a file with a fresh FileSharder
 */
export function shardFile(config: ShardConfig, options?: ShardOptions): Promise<ShardManifest> {
  return new FileSharder().shard(config, options);
}
