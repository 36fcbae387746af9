/**
 * Check if verbose mode is enabled
 */
export function isVerbose(): boolean {
  return process.env.VERBOSE === 'true';
}

/**
 * Check if quiet mode is enabled
 */
export function isQuiet(): boolean {
  return process.env.QUIET === 'true';
}

/**
 * Print message only in verbose mode
 */
export function verboseLog(...args: unknown[]): void {
  if (!isQuiet() && isVerbose()) {
    console.log(...args);
  }
}

/**
 * Print minimal output for scripts (always shown, even in quiet for success)
 */
export function outputResult(data: string): void {
  console.log(data);
}

/**
 * Format bytes to human-readable size
 */
export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let size = bytes;
  let unitIndex = 0;

  while (size >= 1024 && unitIndex < units.length - 1) {
    size /= 1024;
    unitIndex++;
  }

  return `${size.toFixed(2)} ${units[unitIndex]}`;
}

export function formatTime(seconds: number): string {
  if (seconds < 60) {
    return `${Math.round(seconds)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);

  if (minutes < 60) {
    return `${minutes}m ${remainingSeconds}s`;
  }

  const hours = Math.floor(minutes / 60);
  const remainingMinutes = minutes % 60;

  return `${hours}h ${remainingMinutes}m ${remainingSeconds}s`;
}
