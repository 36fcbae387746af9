import * as fs from 'fs/promises';
import * as path from 'path';
import { randomBytes } from 'crypto';
import { FormatError, IoError, errorMessage } from '../errors/types';
import { ChunkDescriptor, ShardManifest, MANIFEST_SUFFIX } from '../types/shard';
import { fromHex, toHex } from './hasher';
import { parseIdentifier } from './identifier';

const CHUNK_FILENAME_PATTERN = /^chunk_(\d{3,})\.part$/;

/**
 * On-disk shape of a manifest (snake_case, digests as hex)
 */
export interface SerializedChunk {
  filename: string;
  size: number;
  sha256: string;
}

export interface SerializedManifest {
  original_file: string;
  total_size: number;
  chunk_size: number;
  chunk_count: number;
  chunks: SerializedChunk[];
  cid: string;
}

/**
 * Chunk file name for an index, zero-padded to at least three digits
 */
export function chunkFileName(index: number): string {
  return `chunk_${String(index).padStart(3, '0')}.part`;
}

/**
 * Recover the chunk index from a chunk file name, or null if it does not match
 */
export function parseChunkFileName(filename: string): number | null {
  const match = CHUNK_FILENAME_PATTERN.exec(filename);
  if (!match) {
    return null;
  }
  const index = Number(match[1]);
  return Number.isSafeInteger(index) && chunkFileName(index) === filename ? index : null;
}

/**
 * Manifest file name for an original file: `<stem>_metadata.json`
 */
export function manifestFileName(originalFile: string): string {
  const stem = originalFile.split('.')[0];
  return `${stem || 'file'}${MANIFEST_SUFFIX}`;
}

export function toSerializedManifest(manifest: ShardManifest): SerializedManifest {
  return {
    original_file: manifest.originalFile,
    total_size: manifest.totalSize,
    chunk_size: manifest.chunkSize,
    chunk_count: manifest.chunkCount,
    chunks: manifest.chunks.map((chunk) => ({
      filename: chunk.filename,
      size: chunk.size,
      sha256: toHex(chunk.digest),
    })),
    cid: manifest.cid,
  };
}

export function serializeManifest(manifest: ShardManifest): Buffer {
  return Buffer.from(`${JSON.stringify(toSerializedManifest(manifest), null, 2)}\n`, 'utf8');
}

// ─── Parsing ─────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(record: Record<string, unknown>, keys: string[], where: string): string {
  for (const key of keys) {
    const value = record[key];
    if (value === undefined) continue;
    if (typeof value !== 'string' || value.length === 0) {
      throw new FormatError(`${where}: field "${key}" must be a non-empty string`, { field: key });
    }
    return value;
  }
  throw new FormatError(`${where}: missing required field "${keys[0]}"`, { field: keys[0] });
}

function requireCount(record: Record<string, unknown>, key: string, where: string): number {
  const value = record[key];
  if (value === undefined) {
    throw new FormatError(`${where}: missing required field "${key}"`, { field: key });
  }
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
    throw new FormatError(`${where}: field "${key}" must be a non-negative integer`, { field: key, value });
  }
  return value;
}

function parseChunk(entry: unknown, position: number): ChunkDescriptor {
  const where = `chunks[${position}]`;
  if (!isRecord(entry)) {
    throw new FormatError(`${where}: expected an object`, { position });
  }

  const filename = requireString(entry, ['filename'], where);
  const index = parseChunkFileName(filename);
  if (index === null) {
    throw new FormatError(`${where}: unrecognised chunk file name "${filename}"`, { position, filename });
  }
  if (entry.index !== undefined && entry.index !== index) {
    throw new FormatError(`${where}: index ${String(entry.index)} does not match file name "${filename}"`, {
      position,
      filename,
    });
  }

  const size = requireCount(entry, 'size', where);
  const hex = requireString(entry, ['sha256', 'digest'], where);
  const digest = fromHex(hex);
  if (!digest) {
    throw new FormatError(`${where}: digest must be 64 hex characters`, { position, digest: hex });
  }

  return { index, filename, size, digest };
}

/**
 * Check the ordered chunk list against the manifest's declared sizes
 */
function validateChunkSizes(chunks: ChunkDescriptor[], chunkSize: number, totalSize: number): void {
  let sum = 0;
  chunks.forEach((chunk, i) => {
    const isLast = i === chunks.length - 1;
    if (chunk.size === 0) {
      throw new FormatError(`Chunk ${chunk.index} is empty`, { chunkIndex: chunk.index });
    }
    if (!isLast && chunk.size !== chunkSize) {
      throw new FormatError(
        `Chunk ${chunk.index} has size ${chunk.size}, expected the chunk size ${chunkSize}`,
        { chunkIndex: chunk.index, size: chunk.size, chunkSize }
      );
    }
    if (isLast && chunk.size > chunkSize) {
      throw new FormatError(
        `Last chunk ${chunk.index} has size ${chunk.size}, larger than the chunk size ${chunkSize}`,
        { chunkIndex: chunk.index, size: chunk.size, chunkSize }
      );
    }
    sum += chunk.size;
  });

  if (sum !== totalSize) {
    throw new FormatError(`Chunk sizes add up to ${sum} bytes but total_size is ${totalSize}`, {
      sum,
      totalSize,
    });
  }
}

/**
 * Parse and fully validate a serialized manifest.
 *
 * Chunk order is taken from the index encoded in each file name; the array
 * order in the document is ignored.
 */
export function parseManifest(input: Uint8Array | string): ShardManifest {
  const text = typeof input === 'string' ? input : Buffer.from(input).toString('utf8');

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    const reason = errorMessage(error);
    throw new FormatError(`Manifest is not valid JSON: ${reason}`);
  }

  if (!isRecord(document)) {
    throw new FormatError('Manifest must be a JSON object');
  }

  const where = 'manifest';
  const originalFile = requireString(document, ['original_file'], where);
  const totalSize = requireCount(document, 'total_size', where);
  const chunkCount = requireCount(document, 'chunk_count', where);
  const cid = requireString(document, ['cid', 'identifier'], where);

  const rawChunks = document.chunks;
  if (!Array.isArray(rawChunks)) {
    throw new FormatError(`${where}: field "chunks" must be an array`, { field: 'chunks' });
  }
  if (rawChunks.length !== chunkCount) {
    throw new FormatError(
      `chunk_count is ${chunkCount} but the chunks list has ${rawChunks.length} entries`,
      { chunkCount, listed: rawChunks.length }
    );
  }

  const chunks = rawChunks
    .map((entry, position) => parseChunk(entry, position))
    .sort((a, b) => a.index - b.index);

  chunks.forEach((chunk, expected) => {
    if (chunk.index !== expected) {
      const duplicate = expected > 0 && chunks[expected - 1].index === chunk.index;
      throw new FormatError(
        duplicate
          ? `Duplicate chunk index ${chunk.index}`
          : `Chunk indices are not contiguous: expected ${expected}, found ${chunk.index}`,
        { expected, found: chunk.index }
      );
    }
  });

  let chunkSize: number;
  if (document.chunk_size !== undefined) {
    chunkSize = requireCount(document, 'chunk_size', where);
    if (chunkSize === 0) {
      throw new FormatError(`${where}: field "chunk_size" must be positive`, { field: 'chunk_size' });
    }
  } else {
    // Manifests without chunk_size: every chunk but the last has the configured size
    chunkSize = chunks.length > 0 ? chunks[0].size : 0;
  }

  if (chunks.length > 0) {
    validateChunkSizes(chunks, chunkSize, totalSize);
  } else if (totalSize !== 0) {
    throw new FormatError(`Manifest lists no chunks but total_size is ${totalSize}`, { totalSize });
  }

  parseIdentifier(cid);

  return { originalFile, totalSize, chunkSize, chunkCount, chunks, cid };
}

// ─── Persistence ─────────────────────────────────────────────────

/**
 * Write the manifest next to its chunks. The file only appears under its
 * final name once fully written.
 */
export async function saveManifest(manifest: ShardManifest, dir: string): Promise<string> {
  const manifestPath = path.join(dir, manifestFileName(manifest.originalFile));
  const tempPath = path.join(dir, `.${path.basename(manifestPath)}.${randomBytes(6).toString('hex')}.partial`);

  try {
    await fs.writeFile(tempPath, serializeManifest(manifest));
    await fs.rename(tempPath, manifestPath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw IoError.fromSystemError(error, `Failed to write manifest ${manifestPath}`, { path: manifestPath });
  }

  return manifestPath;
}

export async function loadManifest(manifestPath: string): Promise<ShardManifest> {
  let content: Buffer;
  try {
    content = await fs.readFile(manifestPath);
  } catch (error) {
    throw IoError.fromSystemError(error, `Failed to read manifest ${manifestPath}`, { path: manifestPath });
  }
  return parseManifest(content);
}
