import { types } from 'util';

const { isNativeError } = types;

/**
 * Error codes for different error scenarios
 */
export enum ErrorCode {
  // Configuration errors
  CONFIG_ERROR = 'CONFIG_ERROR',

  // File system errors
  IO_ERROR = 'IO_ERROR',
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  DISK_FULL = 'DISK_FULL',

  // Manifest errors
  FORMAT_ERROR = 'FORMAT_ERROR',

  // Verification errors
  INTEGRITY_ERROR = 'INTEGRITY_ERROR',
  SIZE_MISMATCH = 'SIZE_MISMATCH',

  // Storage backend errors
  PUBLISH_FAILED = 'PUBLISH_FAILED',

  // Generic
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  OPERATION_CANCELLED = 'OPERATION_CANCELLED',
}

/**
 * Narrow an unknown value to a Node.js system error
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return isNativeError(error) && typeof Reflect.get(error, 'code') === 'string';
}

/**
 * Message of any thrown value. Errors raised by Node internals may come
 * from another realm, so this does not rely on `instanceof Error`.
 */
export function errorMessage(error: unknown): string {
  return isNativeError(error) ? error.message : String(error);
}

/**
 * Custom application error class with error codes and recovery hints
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public details?: Record<string, unknown>,
    public isRecoverable: boolean = false
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to user-friendly message
   */
  toUserMessage(): string {
    switch (this.code) {
      case ErrorCode.CONFIG_ERROR:
        return `Invalid configuration: ${this.message}`;

      case ErrorCode.FILE_NOT_FOUND:
        return `File not found: ${this.details?.path ?? 'unknown'}`;

      case ErrorCode.PERMISSION_DENIED:
        return `Permission denied: ${this.details?.path ?? 'unknown'}`;

      case ErrorCode.DISK_FULL:
        return 'No space left on device. Please free up some space and try again.';

      case ErrorCode.FORMAT_ERROR:
        return `Malformed manifest: ${this.message}`;

      case ErrorCode.INTEGRITY_ERROR:
        return this.details?.chunkIndex !== undefined
          ? `Chunk ${this.details.chunkIndex} failed integrity verification.`
          : `Integrity verification failed: ${this.message}`;

      case ErrorCode.SIZE_MISMATCH:
        return this.details?.chunkIndex !== undefined
          ? `Chunk ${this.details.chunkIndex} has the wrong size (expected ${this.details.expected}, got ${this.details.actual}).`
          : `Reassembled size is wrong (expected ${this.details?.expected}, got ${this.details?.actual}).`;

      case ErrorCode.PUBLISH_FAILED:
        return this.message || 'Publishing the chunk set failed.';

      case ErrorCode.OPERATION_CANCELLED:
        return 'Operation cancelled by user.';

      case ErrorCode.VALIDATION_ERROR:
        return this.message || 'Validation error. Please check your input.';

      default:
        return this.message || 'An unknown error occurred.';
    }
  }

  /**
   * Get recovery suggestion for the error
   */
  getRecoverySuggestion(): string | null {
    switch (this.code) {
      case ErrorCode.CONFIG_ERROR:
        return 'Chunk size and concurrency must be positive numbers';

      case ErrorCode.FILE_NOT_FOUND:
        return 'Check that the file path is correct';

      case ErrorCode.PERMISSION_DENIED:
        return 'Check file permissions or try running with appropriate privileges';

      case ErrorCode.DISK_FULL:
        return 'Free up disk space on your local machine';

      case ErrorCode.INTEGRITY_ERROR:
      case ErrorCode.SIZE_MISMATCH:
        return 'Fetch a fresh copy of the chunk from its storage backend and try again';

      case ErrorCode.FORMAT_ERROR:
        return 'Regenerate the manifest with: blob-shard shard <file>';

      default:
        return null;
    }
  }
}

/**
 * Invalid chunk size, concurrency or other configuration value
 */
export class ConfigError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIG_ERROR, details, false);
    this.name = 'ConfigError';
  }
}

/**
 * Open, read or write failure on the input, a chunk file or a manifest
 */
export class IoError extends AppError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    code: ErrorCode = ErrorCode.IO_ERROR,
    isRecoverable: boolean = false
  ) {
    super(message, code, details, isRecoverable);
    this.name = 'IoError';
  }

  /**
   * Wrap a Node.js system error, keeping its path and syscall
   */
  static fromSystemError(error: unknown, context: string, details: Record<string, unknown> = {}): IoError {
    if (error instanceof IoError) {
      return error;
    }

    const errno: Partial<NodeJS.ErrnoException> = isErrnoException(error) ? error : {};
    const reason = errorMessage(error);
    const merged = { ...details, path: errno.path ?? details.path, syscall: errno.syscall };

    switch (errno.code) {
      case 'ENOENT':
        return new IoError(`${context}: no such file or directory`, merged, ErrorCode.FILE_NOT_FOUND);

      case 'EACCES':
      case 'EPERM':
        return new IoError(`${context}: permission denied`, merged, ErrorCode.PERMISSION_DENIED);

      case 'ENOSPC':
        return new IoError(`${context}: no space left on device`, merged, ErrorCode.DISK_FULL);

      default:
        return new IoError(`${context}: ${reason}`, { ...merged, originalCode: errno.code });
    }
  }
}

/**
 * Manifest missing or carrying a malformed required field
 */
export class FormatError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.FORMAT_ERROR, details, false);
    this.name = 'FormatError';
  }
}

/**
 * Digest mismatch between a chunk (or the identifier) and the manifest
 */
export class IntegrityError extends AppError {
  public readonly chunkIndex?: number;
  public readonly expected: string;
  public readonly actual: string;

  constructor(options: { message: string; expected: string; actual: string; chunkIndex?: number }) {
    super(options.message, ErrorCode.INTEGRITY_ERROR, {
      chunkIndex: options.chunkIndex,
      expected: options.expected,
      actual: options.actual,
    }, false);
    this.name = 'IntegrityError';
    this.chunkIndex = options.chunkIndex;
    this.expected = options.expected;
    this.actual = options.actual;
  }
}

/**
 * Chunk or total size differs from what the manifest declares
 */
export class SizeMismatchError extends AppError {
  public readonly chunkIndex?: number;
  public readonly expected: number;
  public readonly actual: number;

  constructor(options: { message: string; expected: number; actual: number; chunkIndex?: number }) {
    super(options.message, ErrorCode.SIZE_MISMATCH, {
      chunkIndex: options.chunkIndex,
      expected: options.expected,
      actual: options.actual,
    }, false);
    this.name = 'SizeMismatchError';
    this.chunkIndex = options.chunkIndex;
    this.expected = options.expected;
    this.actual = options.actual;
  }
}

export class OperationCancelledError extends AppError {
  constructor(operation: string) {
    super(`${operation} was cancelled`, ErrorCode.OPERATION_CANCELLED, { operation }, false);
    this.name = 'OperationCancelledError';
  }
}
