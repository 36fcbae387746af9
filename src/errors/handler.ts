import chalk from 'chalk';
import { types } from 'util';
import { AppError, ErrorCode, IoError, isErrnoException } from './types';

/**
 * Map Node.js system errors to app errors
 */
export function mapSystemError(error: NodeJS.ErrnoException): AppError {
  switch (error.code) {
    case 'ENOENT':
    case 'EACCES':
    case 'EPERM':
    case 'ENOSPC':
    case 'EISDIR':
    case 'ENOTDIR':
    case 'EMFILE':
      return IoError.fromSystemError(error, error.syscall ? `${error.syscall} failed` : 'File system error');

    default:
      return new AppError(
        error.message || 'System error',
        ErrorCode.UNKNOWN_ERROR,
        { originalCode: error.code, syscall: error.syscall },
        false
      );
  }
}

/**
 * Convert any error to AppError
 */
export function toAppError(error: unknown): AppError {
  // Already an AppError
  if (error instanceof AppError) {
    return error;
  }

  // Node.js system error
  if (isErrnoException(error)) {
    return mapSystemError(error);
  }

  // Generic Error
  if (types.isNativeError(error)) {
    return new AppError(
      error.message,
      ErrorCode.UNKNOWN_ERROR,
      { originalError: error.name },
      false
    );
  }

  // Unknown error type
  return new AppError(
    String(error),
    ErrorCode.UNKNOWN_ERROR,
    {},
    false
  );
}

/**
 * Handle and format error for CLI display
 */
export function handleError(error: unknown, debug: boolean = false): void {
  const appError = toAppError(error);

  // Display main error message
  console.error(chalk.red.bold('\n✗ Error:'), appError.toUserMessage());

  // Show recovery suggestion
  const suggestion = appError.getRecoverySuggestion();
  if (suggestion) {
    console.error(chalk.yellow('\n💡 Suggestion:'), suggestion);
  }

  // Show recovery hint for temporary errors
  if (appError.isRecoverable && !suggestion) {
    console.error(chalk.yellow('\n💡 This error may be temporary. Please try again.'));
  }

  // Show details in debug mode
  if (debug) {
    console.error(chalk.dim('\n📋 Debug Information:'));
    console.error(chalk.dim('  Error Code:'), appError.code);
    console.error(chalk.dim('  Technical Message:'), appError.message);
    console.error(chalk.dim('  Recoverable:'), appError.isRecoverable);

    if (appError.details && Object.keys(appError.details).length > 0) {
      console.error(chalk.dim('  Details:'));
      console.error(chalk.dim(JSON.stringify(appError.details, null, 4)));
    }

    if (appError.stack) {
      console.error(chalk.dim('\n📚 Stack Trace:'));
      console.error(chalk.dim(appError.stack));
    }
  } else {
    console.error(chalk.dim('\n💻 Run with --debug for detailed error information'));
  }
}
