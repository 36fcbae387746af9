import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  IntegrityError,
  IoError,
  OperationCancelledError,
  SizeMismatchError,
} from '../errors/types';
import { ChunkDescriptor, ShardManifest } from '../types/shard';
import { DirectoryChunkSource } from '../storage/local';
import { ChunkSource } from '../storage/types';
import { loadManifest, saveManifest } from './manifest';
import { Reassembler, reassembleFile, writeFully, WritableHandle } from './reassembler';
import { shardFile } from './sharder';

describe('Reassembler', () => {
  let tmpDir: string;
  let chunksDir: string;
  let restoreDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'reassembler-test-'));
    chunksDir = path.join(tmpDir, 'chunks');
    restoreDir = path.join(tmpDir, 'restored');
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function shardBytes(name: string, data: Buffer, chunkSizeBytes: number, dir = chunksDir): Promise<ShardManifest> {
    const inputPath = path.join(tmpDir, name);
    await fs.writeFile(inputPath, data);
    return shardFile({ inputPath, outputDir: dir, chunkSizeBytes, concurrency: 4 });
  }

  it('round-trips a 10-byte file sharded into chunks of 4', async () => {
    const data = Buffer.from('0123456789');
    const manifest = await shardBytes('ten.bin', data, 4);
    const outputPath = path.join(restoreDir, 'ten.bin');

    const result = await reassembleFile(manifest, new DirectoryChunkSource(chunksDir), outputPath);

    expect(result).toEqual({ outputPath, size: 10, chunksVerified: 3 });
    expect(await fs.readFile(outputPath)).toEqual(data);
  });

  it('round-trips through a saved manifest', async () => {
    const data = Buffer.from(Array.from({ length: 4099 }, (_, i) => (i * 7) % 256));
    const manifest = await shardBytes('scan.glb', data, 1024);
    const manifestPath = await saveManifest(manifest, chunksDir);
    const outputPath = path.join(restoreDir, 'scan.glb');

    await reassembleFile(await loadManifest(manifestPath), new DirectoryChunkSource(chunksDir), outputPath);

    expect(await fs.readFile(outputPath)).toEqual(data);
  });

  it.each([1, 3, 7, 64, 5000])('reproduces the same bytes with chunk size %p', async (chunkSize) => {
    const data = Buffer.from(Array.from({ length: 777 }, (_, i) => (i * 31 + 5) % 256));
    const dir = path.join(tmpDir, `chunks-${chunkSize}`);
    const manifest = await shardBytes('video.mp4', data, chunkSize, dir);
    const outputPath = path.join(restoreDir, `video-${chunkSize}.mp4`);

    await reassembleFile(manifest, new DirectoryChunkSource(dir), outputPath, { concurrency: 2 });

    expect(await fs.readFile(outputPath)).toEqual(data);
    expect(manifest.chunks.reduce((sum, chunk) => sum + chunk.size, 0)).toBe(manifest.totalSize);
  });

  it('reassembles a zero-byte file from an empty manifest', async () => {
    const manifest = await shardBytes('empty.bin', Buffer.alloc(0), 4);
    const outputPath = path.join(restoreDir, 'empty.bin');

    const result = await reassembleFile(manifest, new DirectoryChunkSource(chunksDir), outputPath);

    expect(result.size).toBe(0);
    expect(result.chunksVerified).toBe(0);
    expect((await fs.stat(outputPath)).size).toBe(0);
  });

  it('fails with IntegrityError naming chunk 1 when its first byte is tampered with', async () => {
    const manifest = await shardBytes('ten.bin', Buffer.from('0123456789'), 4);
    const chunkPath = path.join(chunksDir, 'chunk_001.part');
    const tampered = await fs.readFile(chunkPath);
    tampered[0] ^= 0xff;
    await fs.writeFile(chunkPath, tampered);
    const outputPath = path.join(restoreDir, 'ten.bin');

    const error = await reassembleFile(manifest, new DirectoryChunkSource(chunksDir), outputPath).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(IntegrityError);
    expect(error).toMatchObject({ chunkIndex: 1 });
    await expect(fs.access(outputPath)).rejects.toThrow();
    expect(await fs.readdir(restoreDir)).toEqual([]);
  });

  it('fails with SizeMismatchError when a chunk is truncated', async () => {
    const manifest = await shardBytes('ten.bin', Buffer.from('0123456789'), 4);
    await fs.writeFile(path.join(chunksDir, 'chunk_000.part'), Buffer.from('012'));
    const outputPath = path.join(restoreDir, 'ten.bin');

    const error = await reassembleFile(manifest, new DirectoryChunkSource(chunksDir), outputPath).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SizeMismatchError);
    expect(error).toMatchObject({ chunkIndex: 0, expected: 4, actual: 3 });
    expect(await fs.readdir(restoreDir)).toEqual([]);
  });

  it('reports the lowest failing chunk when several are corrupt', async () => {
    const manifest = await shardBytes('ten.bin', Buffer.from('0123456789'), 4);
    await fs.writeFile(path.join(chunksDir, 'chunk_002.part'), Buffer.from('xx'));
    await fs.writeFile(path.join(chunksDir, 'chunk_001.part'), Buffer.from('xxxx'));

    const error = await reassembleFile(
      manifest,
      new DirectoryChunkSource(chunksDir),
      path.join(restoreDir, 'ten.bin')
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(IntegrityError);
    expect(error).toMatchObject({ chunkIndex: 1 });
  });

  it('fails with IoError when a chunk file is missing', async () => {
    const manifest = await shardBytes('ten.bin', Buffer.from('0123456789'), 4);
    await fs.rm(path.join(chunksDir, 'chunk_002.part'));

    const error = await reassembleFile(
      manifest,
      new DirectoryChunkSource(chunksDir),
      path.join(restoreDir, 'ten.bin')
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(IoError);
    expect(error).toMatchObject({ details: expect.objectContaining({ chunkIndex: 2 }) });
    expect(await fs.readdir(restoreDir)).toEqual([]);
  });

  it('leaves an existing file at the output path untouched on failure', async () => {
    const manifest = await shardBytes('ten.bin', Buffer.from('0123456789'), 4);
    await fs.writeFile(path.join(chunksDir, 'chunk_001.part'), Buffer.from('zzzz'));
    await fs.mkdir(restoreDir, { recursive: true });
    const outputPath = path.join(restoreDir, 'ten.bin');
    await fs.writeFile(outputPath, 'previous contents');

    await expect(
      reassembleFile(manifest, new DirectoryChunkSource(chunksDir), outputPath)
    ).rejects.toThrow(IntegrityError);
    expect(await fs.readFile(outputPath, 'utf8')).toBe('previous contents');
    expect(await fs.readdir(restoreDir)).toEqual(['ten.bin']);
  });

  it('rejects a manifest whose identifier does not match its contents before reading chunks', async () => {
    const manifest = await shardBytes('ten.bin', Buffer.from('0123456789'), 4);
    const other = await shardBytes('other.bin', Buffer.from('abcdefghij'), 4, path.join(tmpDir, 'other'));
    const source: ChunkSource = { readChunk: jest.fn() };

    await expect(
      new Reassembler(source).reassemble({ ...manifest, cid: other.cid }, path.join(restoreDir, 'ten.bin'))
    ).rejects.toThrow(IntegrityError);
    expect(source.readChunk).not.toHaveBeenCalled();
  });

  it('writes chunks in index order even when reads finish out of order', async () => {
    const data = Buffer.from('abcdefghijkl');
    const manifest = await shardBytes('letters.txt', data, 3);
    const directory = new DirectoryChunkSource(chunksDir);
    const delays = [30, 0, 20, 0];
    const source: ChunkSource = {
      readChunk: async (chunk: ChunkDescriptor) => {
        await new Promise((resolve) => setTimeout(resolve, delays[chunk.index]));
        return directory.readChunk(chunk);
      },
    };
    const outputPath = path.join(restoreDir, 'letters.txt');

    await new Reassembler(source).reassemble(manifest, outputPath, { concurrency: 4 });

    expect(await fs.readFile(outputPath, 'utf8')).toBe('abcdefghijkl');
  });

  it('never reads more than the concurrency window ahead', async () => {
    const manifest = await shardBytes('pattern.bin', Buffer.alloc(40, 1), 4);
    const directory = new DirectoryChunkSource(chunksDir);
    let inFlight = 0;
    let maxInFlight = 0;
    const source: ChunkSource = {
      readChunk: async (chunk: ChunkDescriptor) => {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        inFlight--;
        return directory.readChunk(chunk);
      },
    };

    await new Reassembler(source).reassemble(manifest, path.join(restoreDir, 'pattern.bin'), { concurrency: 2 });

    expect(maxInFlight).toBeLessThanOrEqual(2);
  });

  it('stops with OperationCancelledError when aborted and leaves no output', async () => {
    const manifest = await shardBytes('ten.bin', Buffer.from('0123456789'), 4);
    const controller = new AbortController();
    controller.abort();
    const outputPath = path.join(restoreDir, 'ten.bin');

    await expect(
      reassembleFile(manifest, new DirectoryChunkSource(chunksDir), outputPath, { signal: controller.signal })
    ).rejects.toThrow(OperationCancelledError);
    expect(await fs.readdir(restoreDir)).toEqual([]);
  });

  describe('verify', () => {
    it('verifies an intact chunk set without writing', async () => {
      const manifest = await shardBytes('ten.bin', Buffer.from('0123456789'), 4);

      const result = await new Reassembler(new DirectoryChunkSource(chunksDir)).verify(manifest);

      expect(result).toEqual({ chunksVerified: 3, totalSize: 10 });
      await expect(fs.access(restoreDir)).rejects.toThrow();
    });

    it('reports a tampered chunk', async () => {
      const manifest = await shardBytes('ten.bin', Buffer.from('0123456789'), 4);
      await fs.writeFile(path.join(chunksDir, 'chunk_002.part'), Buffer.from('98'));

      await expect(
        new Reassembler(new DirectoryChunkSource(chunksDir)).verify(manifest)
      ).rejects.toMatchObject({ name: 'IntegrityError', chunkIndex: 2 });
    });
  });
});

describe('writeFully', () => {
  function shortWriter(maxPerCall: number, received: Buffer[]): WritableHandle {
    return {
      write: async (buffer, offset, length) => {
        const bytesWritten = Math.min(length, maxPerCall);
        received.push(Buffer.from(buffer.subarray(offset, offset + bytesWritten)));
        return { bytesWritten };
      },
    };
  }

  it('resumes after short writes', async () => {
    const received: Buffer[] = [];

    const written = await writeFully(shortWriter(3, received), Buffer.from('0123456789'));

    expect(written).toBe(10);
    expect(received.map((part) => part.toString())).toEqual(['012', '345', '678', '9']);
  });

  it('fails when the handle stops accepting bytes', async () => {
    let calls = 0;
    const handle: WritableHandle = {
      write: async (_buffer, _offset, length) => ({ bytesWritten: calls++ === 0 ? Math.min(length, 2) : 0 }),
    };

    await expect(writeFully(handle, Buffer.from('abcd'))).rejects.toThrow(
      new IoError('Write stalled after 2 of 4 bytes')
    );
  });
});
