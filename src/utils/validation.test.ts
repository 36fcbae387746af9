import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  validateChunkSize,
  validateConcurrency,
  validateFilePath,
  validateLocalName,
} from './validation';
import { AppError, ConfigError, ErrorCode, IoError } from '../errors/types';

describe('validateChunkSize', () => {
  it('accepts a positive size', () => {
    expect(() => validateChunkSize(4)).not.toThrow();
    expect(() => validateChunkSize(2 ** 31 - 1)).not.toThrow();
  });

  it.each([0, -4, 1.5, NaN, Infinity])('throws on %p', (size) => {
    expect(() => validateChunkSize(size)).toThrow(ConfigError);
  });

  it('throws above the maximum chunk size', () => {
    expect(() => validateChunkSize(2 ** 31)).toThrow('exceeds the maximum');
  });
});

describe('validateConcurrency', () => {
  it('accepts one and above', () => {
    expect(() => validateConcurrency(1)).not.toThrow();
    expect(() => validateConcurrency(16)).not.toThrow();
  });

  it.each([0, -1, 2.5])('throws on %p', (concurrency) => {
    expect(() => validateConcurrency(concurrency)).toThrow('Concurrency must be a positive integer');
  });
});

describe('validateLocalName', () => {
  it('accepts chunk and manifest names', () => {
    expect(() => validateLocalName('chunk_000.part')).not.toThrow();
    expect(() => validateLocalName('photo_metadata.json')).not.toThrow();
  });

  it('throws on empty string', () => {
    expect(() => validateLocalName('')).toThrow(AppError);
  });

  it('throws on separators', () => {
    expect(() => validateLocalName('../chunk_000.part')).toThrow(AppError);
    expect(() => validateLocalName('dir\\chunk_000.part')).toThrow(AppError);
  });

  it('throws on dot entries', () => {
    expect(() => validateLocalName('.')).toThrow(AppError);
    expect(() => validateLocalName('..')).toThrow(AppError);
  });

  it('throws on null bytes', () => {
    let caught: unknown;
    try {
      validateLocalName('chunk\x00.part');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(AppError);
    expect(caught).toHaveProperty('code', ErrorCode.VALIDATION_ERROR);
  });
});

describe('validateFilePath', () => {
  let tmpDir: string;

  beforeAll(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'validate-test-'));
    await fs.writeFile(path.join(tmpDir, 'input.bin'), 'abc');
  });

  afterAll(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('returns stats for an existing file', async () => {
    const stats = await validateFilePath(path.join(tmpDir, 'input.bin'));
    expect(stats.size).toBe(3);
  });

  it('throws FILE_NOT_FOUND for a missing file', async () => {
    await expect(validateFilePath(path.join(tmpDir, 'missing.bin'))).rejects.toMatchObject({
      code: ErrorCode.FILE_NOT_FOUND,
    });
  });

  it('throws IoError for a directory', async () => {
    await expect(validateFilePath(tmpDir)).rejects.toThrow(IoError);
    await expect(validateFilePath(tmpDir)).rejects.toThrow(`Not a file: ${tmpDir}`);
  });
});
