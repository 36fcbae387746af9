import * as fs from 'fs/promises';
import * as path from 'path';
import { IoError, SizeMismatchError } from '../errors/types';
import { ChunkDescriptor } from '../types/shard';
import { validateLocalName } from '../utils/validation';
import { BlobReceipt, ChunkSource, StorageBackend } from './types';

/**
 * Reads chunk files from a local directory
 */
export class DirectoryChunkSource implements ChunkSource {
  constructor(private readonly dir: string) {}

  /**
   * Read a chunk file. Its size is checked before any bytes are loaded.
   */
  async readChunk(chunk: ChunkDescriptor): Promise<Buffer> {
    const chunkPath = path.join(this.dir, chunk.filename);
    let size: number;
    try {
      size = (await fs.stat(chunkPath)).size;
    } catch (error) {
      throw IoError.fromSystemError(error, `Failed to read chunk ${chunk.index}`, {
        path: chunkPath,
        chunkIndex: chunk.index,
      });
    }

    if (size !== chunk.size) {
      throw new SizeMismatchError({
        message: `Chunk ${chunk.index} (${chunk.filename}) is ${size} bytes, expected ${chunk.size}`,
        chunkIndex: chunk.index,
        expected: chunk.size,
        actual: size,
      });
    }

    try {
      return await fs.readFile(chunkPath);
    } catch (error) {
      throw IoError.fromSystemError(error, `Failed to read chunk ${chunk.index}`, {
        path: chunkPath,
        chunkIndex: chunk.index,
      });
    }
  }
}

/**
 * Stores blobs as files in a local directory
 */
export class LocalDirectoryBackend implements StorageBackend {
  readonly name = 'local';

  constructor(private readonly dir: string) {}

  async putBlob(name: string, data: Uint8Array): Promise<BlobReceipt> {
    validateLocalName(name);
    const target = path.join(this.dir, name);

    try {
      await fs.mkdir(this.dir, { recursive: true });
      await fs.writeFile(target, data);
    } catch (error) {
      throw IoError.fromSystemError(error, `Failed to store ${name}`, { path: target });
    }

    return {
      name,
      size: data.length,
      location: path.resolve(target),
    };
  }
}
