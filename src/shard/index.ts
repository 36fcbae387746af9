export { digestChunk, toHex, fromHex, digestsEqual } from './hasher';
export { buildIdentifier, compositeDigest, identifierFor, parseIdentifier } from './identifier';
export {
  chunkFileName,
  parseChunkFileName,
  manifestFileName,
  serializeManifest,
  parseManifest,
  saveManifest,
  loadManifest,
} from './manifest';
export { FileSharder, shardFile } from './sharder';
export { Reassembler, reassembleFile } from './reassembler';
export { runWorkerPool } from './pool';
export { merkleRoot } from './merkle';
export * from '../types/shard';
export * from '../errors/types';
export * from '../storage/types';
export { DirectoryChunkSource, LocalDirectoryBackend } from '../storage/local';
export { publishShardSet } from '../storage/publisher';
