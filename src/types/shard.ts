export interface ChunkDescriptor {
  index: number;
  filename: string; // chunk_NNN.part
  size: number;
  digest: Uint8Array; // SHA-256, 32 bytes
}

export interface ShardManifest {
  originalFile: string;
  totalSize: number;
  chunkSize: number;
  chunkCount: number;
  chunks: ChunkDescriptor[];
  cid: string;
}

export interface ShardConfig {
  inputPath: string;
  outputDir: string;
  chunkSizeBytes: number;
  concurrency: number;
}

export interface ReassembleConfig {
  manifestPath: string;
  outputDir: string;
  chunksDir: string;
  outputName?: string;
  concurrency: number;
}

export interface ShardOptions {
  signal?: AbortSignal;
  onProgress?: (completedChunks: number, totalChunks: number) => void;
}

export interface ReassembleOptions {
  concurrency?: number;
  signal?: AbortSignal;
  onProgress?: (writtenBytes: number, totalBytes: number) => void;
}

export interface ReassembleResult {
  outputPath: string;
  size: number;
  chunksVerified: number;
}

export interface VerifyResult {
  chunksVerified: number;
  totalSize: number;
}

/**
 * Decoded fields of a content identifier token
 */
export interface IdentifierInfo {
  version: number;
  codec: number;
  hashCode: number;
  digest: Uint8Array;
}

// Constants
export const MB = 1024 * 1024;
export const DEFAULT_CHUNK_SIZE_MB = 256;
export const DEFAULT_OUTPUT_DIR = 'output';
export const MAX_PARALLEL_CHUNKS = 4;
export const MAX_CHUNK_SIZE = 2 ** 31 - 1; // largest single positional read
export const DIGEST_LENGTH = 32;
export const RAW_CODEC = 0x55;
export const SHA2_256_CODE = 0x12;
export const MANIFEST_SUFFIX = '_metadata.json';
