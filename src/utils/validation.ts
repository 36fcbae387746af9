import * as fs from 'fs/promises';
import { Stats } from 'fs';
import { AppError, ConfigError, ErrorCode, IoError } from '../errors/types';
import { MAX_CHUNK_SIZE } from '../types/shard';

/**
 * Validate file path exists and is a file
 */
export async function validateFilePath(filePath: string): Promise<Stats> {
  let stats: Stats;
  try {
    stats = await fs.stat(filePath);
  } catch (error) {
    throw IoError.fromSystemError(error, `Cannot open input ${filePath}`, { path: filePath });
  }

  if (!stats.isFile()) {
    throw new IoError(`Not a file: ${filePath}`, { path: filePath });
  }

  return stats;
}

/**
 * Validate chunk size in bytes
 */
export function validateChunkSize(chunkSizeBytes: number): void {
  if (!Number.isSafeInteger(chunkSizeBytes) || chunkSizeBytes <= 0) {
    throw new ConfigError(
      `Chunk size must be a positive whole number of bytes, got ${chunkSizeBytes}`,
      { chunkSizeBytes }
    );
  }

  if (chunkSizeBytes > MAX_CHUNK_SIZE) {
    throw new ConfigError(
      `Chunk size ${chunkSizeBytes} exceeds the maximum of ${MAX_CHUNK_SIZE} bytes`,
      { chunkSizeBytes, maxSize: MAX_CHUNK_SIZE }
    );
  }
}

/**
 * Validate worker concurrency
 */
export function validateConcurrency(concurrency: number): void {
  if (!Number.isSafeInteger(concurrency) || concurrency < 1) {
    throw new ConfigError(`Concurrency must be a positive integer, got ${concurrency}`, { concurrency });
  }
}

/**
 * Validate a bare blob name: no separators, traversal or null bytes
 */
export function validateLocalName(name: string): void {
  if (!name || typeof name !== 'string') {
    throw new AppError('Blob name is required', ErrorCode.VALIDATION_ERROR, {}, false);
  }
  if (name.indexOf('\0') !== -1) {
    throw new AppError('Null bytes not allowed in blob name', ErrorCode.VALIDATION_ERROR, { name }, false);
  }
  if (/[/\\]/.test(name) || name === '.' || name === '..') {
    throw new AppError(`Invalid blob name: ${name}`, ErrorCode.VALIDATION_ERROR, { name }, false);
  }
}
