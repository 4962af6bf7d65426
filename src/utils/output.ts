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
 * Print message in normal and verbose mode (suppressed in quiet mode)
 */
export function normalLog(...args: unknown[]): void {
  if (!isQuiet()) {
    console.log(...args);
  }
}
