import * as path from 'path';
import { ConfigError } from './errors/types';
import {
  ReassembleConfig,
  ShardConfig,
  DEFAULT_CHUNK_SIZE_MB,
  DEFAULT_OUTPUT_DIR,
  MAX_PARALLEL_CHUNKS,
  MB,
} from './types/shard';
import { validateChunkSize, validateConcurrency } from './utils/validation';

export const ENV_OUTPUT_DIR = 'BLOB_SHARD_OUTPUT_DIR';
export const ENV_CHUNK_SIZE_MB = 'BLOB_SHARD_CHUNK_SIZE_MB';
export const ENV_CONCURRENCY = 'BLOB_SHARD_CONCURRENCY';

export type Env = Record<string, string | undefined>;

export interface ShardCommandOptions {
  outputDir?: string;
  chunkSize?: string;
  concurrency?: string;
}

export interface ReassembleCommandOptions {
  outputDir?: string;
  chunksDir?: string;
  name?: string;
  concurrency?: string;
}

/**
 * Parse a numeric flag or environment value
 */
function parseNumber(raw: string, label: string): number {
  const trimmed = raw.trim();
  const value = Number(trimmed);
  if (trimmed === '' || !Number.isFinite(value)) {
    throw new ConfigError(`${label} must be a number, got "${raw}"`, { [label]: raw });
  }
  return value;
}

/**
 * Convert a chunk size in megabytes to bytes
 */
export function megabytesToBytes(megabytes: number): number {
  if (!(megabytes > 0)) {
    throw new ConfigError(`Chunk size must be greater than 0 MB, got ${megabytes}`, { chunkSizeMb: megabytes });
  }
  return Math.floor(megabytes * MB);
}

function resolveConcurrency(flag: string | undefined, env: Env): number {
  const raw = flag ?? env[ENV_CONCURRENCY];
  const concurrency = raw === undefined ? MAX_PARALLEL_CHUNKS : parseNumber(raw, 'concurrency');
  validateConcurrency(concurrency);
  return concurrency;
}

/**
 * Build the sharding configuration. Flags win over environment variables,
 * which win over defaults.
 */
export function resolveShardConfig(
  inputPath: string,
  options: ShardCommandOptions = {},
  env: Env = process.env
): ShardConfig {
  if (!inputPath) {
    throw new ConfigError('An input file is required');
  }

  const rawChunkSize = options.chunkSize ?? env[ENV_CHUNK_SIZE_MB];
  const chunkSizeMb = rawChunkSize === undefined ? DEFAULT_CHUNK_SIZE_MB : parseNumber(rawChunkSize, 'chunk size');
  const chunkSizeBytes = megabytesToBytes(chunkSizeMb);
  validateChunkSize(chunkSizeBytes);

  return {
    inputPath,
    outputDir: options.outputDir ?? env[ENV_OUTPUT_DIR] ?? DEFAULT_OUTPUT_DIR,
    chunkSizeBytes,
    concurrency: resolveConcurrency(options.concurrency, env),
  };
}

/**
 * Build the reassembly configuration. Chunks are read from the manifest's
 * own directory unless `chunksDir` says otherwise.
 */
export function resolveReassembleConfig(
  manifestPath: string,
  options: ReassembleCommandOptions = {},
  env: Env = process.env
): ReassembleConfig {
  if (!manifestPath) {
    throw new ConfigError('A manifest path is required');
  }

  return {
    manifestPath,
    outputDir: options.outputDir ?? env[ENV_OUTPUT_DIR] ?? DEFAULT_OUTPUT_DIR,
    chunksDir: options.chunksDir ?? path.dirname(manifestPath),
    outputName: options.name,
    concurrency: resolveConcurrency(options.concurrency, env),
  };
}
