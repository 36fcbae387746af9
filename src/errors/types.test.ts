import * as vm from 'vm';
import {
  AppError,
  ConfigError,
  ErrorCode,
  FormatError,
  IntegrityError,
  IoError,
  OperationCancelledError,
  SizeMismatchError,
  errorMessage,
  isErrnoException,
} from './types';

function systemError(code: string, message: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(message);
  error.code = code;
  error.path = '/tmp/chunk_001.part';
  error.syscall = 'open';
  return error;
}

describe('AppError', () => {
  it('sets fields correctly via constructor', () => {
    const err = new AppError('test message', ErrorCode.IO_ERROR, { key: 'val' }, true);
    expect(err.message).toBe('test message');
    expect(err.code).toBe(ErrorCode.IO_ERROR);
    expect(err.details).toEqual({ key: 'val' });
    expect(err.isRecoverable).toBe(true);
    expect(err.name).toBe('AppError');
  });

  it('is an instance of Error', () => {
    const err = new AppError('msg', ErrorCode.UNKNOWN_ERROR);
    expect(err).toBeInstanceOf(Error);
  });

  it('defaults isRecoverable to false', () => {
    const err = new AppError('msg', ErrorCode.UNKNOWN_ERROR);
    expect(err.isRecoverable).toBe(false);
  });
});

describe('toUserMessage', () => {
  it('returns non-empty string for all ErrorCode values', () => {
    for (const code of Object.values(ErrorCode)) {
      const err = new AppError('fallback', code);
      const msg = err.toUserMessage();
      expect(typeof msg).toBe('string');
      expect(msg.length).toBeGreaterThan(0);
    }
  });

  it('names the chunk for integrity errors', () => {
    const err = new IntegrityError({ message: 'x', chunkIndex: 1, expected: 'aa', actual: 'bb' });
    expect(err.toUserMessage()).toBe('Chunk 1 failed integrity verification.');
  });

  it('gives expected and actual sizes for size mismatches', () => {
    const err = new SizeMismatchError({ message: 'x', chunkIndex: 0, expected: 4, actual: 3 });
    expect(err.toUserMessage()).toBe('Chunk 0 has the wrong size (expected 4, got 3).');
  });

  it('describes a total size mismatch without a chunk', () => {
    const err = new SizeMismatchError({ message: 'x', expected: 10, actual: 8 });
    expect(err.toUserMessage()).toBe('Reassembled size is wrong (expected 10, got 8).');
  });

  it('prefixes format errors', () => {
    expect(new FormatError('missing field').toUserMessage()).toBe('Malformed manifest: missing field');
  });
});

describe('getRecoverySuggestion', () => {
  it('returns suggestion for config errors', () => {
    expect(new ConfigError('bad').getRecoverySuggestion()).toContain('positive');
  });

  it('returns suggestion for integrity errors', () => {
    const err = new IntegrityError({ message: 'x', expected: 'a', actual: 'b' });
    expect(err.getRecoverySuggestion()).toContain('fresh copy');
  });

  it('returns null for unknown error codes', () => {
    const err = new AppError('x', ErrorCode.UNKNOWN_ERROR);
    expect(err.getRecoverySuggestion()).toBeNull();
  });
});

describe('subclasses', () => {
  it('carry their codes and names', () => {
    expect(new ConfigError('x').code).toBe(ErrorCode.CONFIG_ERROR);
    expect(new FormatError('x').code).toBe(ErrorCode.FORMAT_ERROR);
    expect(new OperationCancelledError('Sharding').code).toBe(ErrorCode.OPERATION_CANCELLED);
    expect(new OperationCancelledError('Sharding').message).toBe('Sharding was cancelled');

    const integrity = new IntegrityError({ message: 'x', chunkIndex: 3, expected: 'aa', actual: 'bb' });
    expect(integrity).toBeInstanceOf(AppError);
    expect(integrity.name).toBe('IntegrityError');
    expect(integrity.details).toEqual({ chunkIndex: 3, expected: 'aa', actual: 'bb' });
  });
});

describe('IoError.fromSystemError', () => {
  it('maps ENOENT to FILE_NOT_FOUND', () => {
    const err = IoError.fromSystemError(systemError('ENOENT', 'no such file'), 'Failed to read chunk 1', {
      chunkIndex: 1,
    });
    expect(err).toBeInstanceOf(IoError);
    expect(err.code).toBe(ErrorCode.FILE_NOT_FOUND);
    expect(err.message).toBe('Failed to read chunk 1: no such file or directory');
    expect(err.details).toEqual({ chunkIndex: 1, path: '/tmp/chunk_001.part', syscall: 'open' });
  });

  it('maps EACCES to PERMISSION_DENIED', () => {
    expect(IoError.fromSystemError(systemError('EACCES', 'denied'), 'ctx').code).toBe(ErrorCode.PERMISSION_DENIED);
  });

  it('maps ENOSPC to DISK_FULL', () => {
    expect(IoError.fromSystemError(systemError('ENOSPC', 'full'), 'ctx').code).toBe(ErrorCode.DISK_FULL);
  });

  it('keeps the original message for other codes', () => {
    const err = IoError.fromSystemError(systemError('EIO', 'i/o error'), 'Failed to write chunk 0');
    expect(err.code).toBe(ErrorCode.IO_ERROR);
    expect(err.message).toBe('Failed to write chunk 0: i/o error');
  });

  it('returns an existing IoError unchanged', () => {
    const original = new IoError('already wrapped');
    expect(IoError.fromSystemError(original, 'ctx')).toBe(original);
  });
});

describe('errors from another realm', () => {
  function foreignSystemError(code: string): unknown {
    return vm.runInNewContext(
      `Object.assign(new Error('${code}: from elsewhere'), { code: '${code}', syscall: 'open', path: '/tmp/x.part' })`
    );
  }

  it('are recognised as system errors', () => {
    const error = foreignSystemError('ENOENT');
    expect(error instanceof Error).toBe(false);
    expect(isErrnoException(error)).toBe(true);
  });

  it('keep their code when wrapped', () => {
    const err = IoError.fromSystemError(foreignSystemError('EACCES'), 'Failed to write chunk 1');
    expect(err.code).toBe(ErrorCode.PERMISSION_DENIED);
    expect(err.details).toEqual({ path: '/tmp/x.part', syscall: 'open' });
  });

  it('keep their message', () => {
    expect(errorMessage(foreignSystemError('EIO'))).toBe('EIO: from elsewhere');
    expect(errorMessage(42)).toBe('42');
  });

  it('ignore plain objects carrying a code', () => {
    expect(isErrnoException({ code: 'ENOENT' })).toBe(false);
  });
});
