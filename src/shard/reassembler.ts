import * as fs from 'fs/promises';
import * as path from 'path';
import { randomBytes } from 'crypto';
import {
  AppError,
  IntegrityError,
  IoError,
  OperationCancelledError,
  SizeMismatchError,
} from '../errors/types';
import {
  ChunkDescriptor,
  ShardManifest,
  ReassembleOptions,
  ReassembleResult,
  VerifyResult,
  MAX_PARALLEL_CHUNKS,
} from '../types/shard';
import { ChunkSource } from '../storage/types';
import { validateConcurrency } from '../utils/validation';
import { logger } from '../utils/logger';
import { digestChunk, digestsEqual, toHex } from './hasher';
import { identifierFor } from './identifier';

type Verified = { ok: true; data: Buffer } | { ok: false; error: unknown };

/**
 * The part of a file handle `writeFully` needs
 */
export interface WritableHandle {
  write(buffer: Buffer, offset: number, length: number): Promise<{ bytesWritten: number }>;
}

/**
 * Write all of `data` at the handle's current position, resuming after
 * short writes. Returns the number of bytes written.
 */
export async function writeFully(handle: WritableHandle, data: Buffer): Promise<number> {
  let offset = 0;
  while (offset < data.length) {
    const { bytesWritten } = await handle.write(data, offset, data.length - offset);
    if (bytesWritten <= 0) {
      throw new IoError(`Write stalled after ${offset} of ${data.length} bytes`, {
        expected: data.length,
        actual: offset,
      });
    }
    offset += bytesWritten;
  }
  return offset;
}

/**
 * Rebuilds an original file from its manifest and chunk set
 */
export class Reassembler {
  constructor(private readonly source: ChunkSource) {}

  /**
   * Reassemble into `outputPath`.
   *
   * Chunks are verified ahead of the writer but written strictly in index
   * order into a temporary file beside `outputPath`, which is renamed into
   * place only after every chunk and the total size check out.
   */
  async reassemble(
    manifest: ShardManifest,
    outputPath: string,
    options: ReassembleOptions = {}
  ): Promise<ReassembleResult> {
    this.checkIdentifier(manifest);

    const outputDir = path.dirname(outputPath);
    const tempPath = path.join(
      outputDir,
      `.${path.basename(outputPath)}.${randomBytes(6).toString('hex')}.partial`
    );

    try {
      await fs.mkdir(outputDir, { recursive: true });
    } catch (error) {
      throw IoError.fromSystemError(error, `Cannot create output directory ${outputDir}`, { path: outputDir });
    }

    let output: fs.FileHandle;
    try {
      output = await fs.open(tempPath, 'wx');
    } catch (error) {
      throw IoError.fromSystemError(error, `Cannot create ${tempPath}`, { path: tempPath });
    }

    let written = 0;
    let finished = false;
    try {
      try {
        for await (const { chunk, data } of this.verifiedChunks(manifest, options)) {
          written += await writeFully(output, data);
          options.onProgress?.(written, manifest.totalSize);
          logger.debug(`Reassembled chunk ${chunk.index}: ${data.length} bytes`);
        }
      } finally {
        await output.close();
      }

      if (written !== manifest.totalSize) {
        throw new SizeMismatchError({
          message: `Reassembled ${written} bytes but the manifest declares ${manifest.totalSize}`,
          expected: manifest.totalSize,
          actual: written,
        });
      }

      await fs.rename(tempPath, outputPath);
      finished = true;
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      throw IoError.fromSystemError(error, `Failed to write ${outputPath}`, { path: outputPath });
    } finally {
      if (!finished) {
        await fs.rm(tempPath, { force: true });
      }
    }

    return {
      outputPath,
      size: written,
      chunksVerified: manifest.chunkCount,
    };
  }

  /**
   * Run every check reassembly would, without writing anything
   */
  async verify(manifest: ShardManifest, options: ReassembleOptions = {}): Promise<VerifyResult> {
    this.checkIdentifier(manifest);

    let chunksVerified = 0;
    let totalSize = 0;
    for await (const { data } of this.verifiedChunks(manifest, options)) {
      chunksVerified++;
      totalSize += data.length;
      options.onProgress?.(totalSize, manifest.totalSize);
    }

    if (totalSize !== manifest.totalSize) {
      throw new SizeMismatchError({
        message: `Chunks hold ${totalSize} bytes but the manifest declares ${manifest.totalSize}`,
        expected: manifest.totalSize,
        actual: totalSize,
      });
    }

    return { chunksVerified, totalSize };
  }

  /**
   * Yield verified chunks in index order. Up to `concurrency` chunks are
   * read and hashed ahead of the consumer; the first failing index stops
   * the sequence.
   */
  private async *verifiedChunks(
    manifest: ShardManifest,
    options: ReassembleOptions
  ): AsyncGenerator<{ chunk: ChunkDescriptor; data: Buffer }> {
    const concurrency = options.concurrency ?? MAX_PARALLEL_CHUNKS;
    validateConcurrency(concurrency);

    const ordered = [...manifest.chunks].sort((a, b) => a.index - b.index);
    const pending = new Map<number, Promise<Verified>>();
    let scheduled = 0;

    const schedule = (): void => {
      while (scheduled < ordered.length && pending.size < concurrency) {
        const chunk = ordered[scheduled++];
        pending.set(
          chunk.index,
          this.verifyChunk(chunk).then(
            (data): Verified => ({ ok: true, data }),
            (error: unknown): Verified => ({ ok: false, error })
          )
        );
      }
    };

    for (const chunk of ordered) {
      if (options.signal?.aborted) {
        throw new OperationCancelledError('Reassembly');
      }

      schedule();
      const result = await pending.get(chunk.index);
      pending.delete(chunk.index);

      if (!result) {
        throw new Error(`Chunk ${chunk.index} was never scheduled`);
      }
      if (!result.ok) {
        throw result.error;
      }

      yield { chunk, data: result.data };
    }

    if (options.signal?.aborted) {
      throw new OperationCancelledError('Reassembly');
    }
  }

  private async verifyChunk(chunk: ChunkDescriptor): Promise<Buffer> {
    const data = await this.source.readChunk(chunk);

    if (data.length !== chunk.size) {
      throw new SizeMismatchError({
        message: `Chunk ${chunk.index} (${chunk.filename}) is ${data.length} bytes, expected ${chunk.size}`,
        chunkIndex: chunk.index,
        expected: chunk.size,
        actual: data.length,
      });
    }

    const actual = digestChunk(data);
    if (!digestsEqual(actual, chunk.digest)) {
      throw new IntegrityError({
        message: `Chunk ${chunk.index} (${chunk.filename}) digest mismatch`,
        chunkIndex: chunk.index,
        expected: toHex(chunk.digest),
        actual: toHex(actual),
      });
    }

    return data;
  }

  private checkIdentifier(manifest: ShardManifest): void {
    const expected = identifierFor(manifest);
    if (expected !== manifest.cid) {
      throw new IntegrityError({
        message: `Manifest identifier ${manifest.cid} does not match its contents`,
        expected,
        actual: manifest.cid,
      });
    }
  }
}

/**
 * Reassemble a sharded file from a chunk source
 */
export function reassembleFile(
  manifest: ShardManifest,
  source: ChunkSource,
  outputPath: string,
  options?: ReassembleOptions
): Promise<ReassembleResult> {
  return new Reassembler(source).reassemble(manifest, outputPath, options);
}
