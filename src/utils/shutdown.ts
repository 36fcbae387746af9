import chalk from 'chalk';
import { logger } from './logger';
import { errorMessage } from '../errors/types';

let isShuttingDown = false;
const cleanupHandlers: Array<() => Promise<void> | void> = [];

/**
 * Register cleanup handler
 */
export function onShutdown(handler: () => Promise<void> | void): void {
  cleanupHandlers.push(handler);
}

/**
 * Let `operation` finish before the process exits on shutdown. Used for
 * steps that cannot be cancelled, such as renaming a manifest into place.
 */
export function waitOnShutdown(operation: Promise<unknown>): void {
  onShutdown(async () => {
    await Promise.allSettled([operation]);
  });
}

/**
 * Abort `controller` on shutdown and wait for `operation` to unwind, so
 * temporary files it owns are removed before the process exits.
 */
export function abortOnShutdown(controller: AbortController, operation: Promise<unknown>): void {
  onShutdown(() => controller.abort());
  waitOnShutdown(operation);
}

/**
 * Perform cleanup
 */
export async function runShutdownHandlers(): Promise<void> {
  if (isShuttingDown) {
    return;
  }

  isShuttingDown = true;

  console.log(chalk.yellow('\n\n🧹 Cleaning up...'));

  for (const handler of cleanupHandlers) {
    try {
      await handler();
    } catch (error) {
      logger.warn('Cleanup error:', errorMessage(error));
    }
  }

  console.log(chalk.dim('Cleanup complete'));
}

/**
 * Setup graceful shutdown handlers
 */
export function setupShutdownHandlers(): void {
  // Handle Ctrl+C
  process.on('SIGINT', () => {
    console.log(chalk.yellow('\n\n⚠️  Received interrupt signal (Ctrl+C)'));
    void runShutdownHandlers().finally(() => process.exit(130)); // Standard exit code for SIGINT
  });

  // Handle termination
  process.on('SIGTERM', () => {
    console.log(chalk.yellow('\n\n⚠️  Received termination signal'));
    void runShutdownHandlers().finally(() => process.exit(143)); // Standard exit code for SIGTERM
  });
}

/**
 * Check if shutting down
 */
export function isShuttingDownFlag(): boolean {
  return isShuttingDown;
}

/**
 * Clear all shutdown handlers and reset state
 */
export function clearShutdownHandlers(): void {
  cleanupHandlers.length = 0;
  isShuttingDown = false;
}
