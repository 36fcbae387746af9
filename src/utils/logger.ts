import chalk from 'chalk';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export const ENV_LOG_LEVEL = 'BLOB_SHARD_LOG_LEVEL';

const LEVEL_NAMES = new Map<string, LogLevel>([
  ['debug', LogLevel.DEBUG],
  ['info', LogLevel.INFO],
  ['warn', LogLevel.WARN],
  ['error', LogLevel.ERROR],
  ['silent', LogLevel.SILENT],
]);

/**
 * Resolve the starting log level from the environment.
 * DEBUG=true wins; otherwise BLOB_SHARD_LOG_LEVEL names a level.
 */
export function levelFromEnv(env: Record<string, string | undefined>): LogLevel {
  if (env.DEBUG === 'true') {
    return LogLevel.DEBUG;
  }
  const name = env[ENV_LOG_LEVEL]?.trim().toLowerCase() ?? '';
  return LEVEL_NAMES.get(name) ?? LogLevel.INFO;
}

class Logger {
  constructor(private level: LogLevel = LogLevel.INFO) {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return this.level <= level;
  }

  debug(...args: unknown[]): void {
    if (this.isEnabled(LogLevel.DEBUG)) {
      console.log(chalk.dim('[DEBUG]'), ...args);
    }
  }

  info(...args: unknown[]): void {
    if (this.isEnabled(LogLevel.INFO)) {
      console.log(chalk.blue('[INFO]'), ...args);
    }
  }

  warn(...args: unknown[]): void {
    if (this.isEnabled(LogLevel.WARN)) {
      console.warn(chalk.yellow('[WARN]'), ...args);
    }
  }

  error(...args: unknown[]): void {
    if (this.isEnabled(LogLevel.ERROR)) {
      console.error(chalk.red('[ERROR]'), ...args);
    }
  }
}

export const logger = new Logger(levelFromEnv(process.env));
