/**
 * Logger Utility
 * Scoped debug/warn/error output; debug lines only show under --debug
 */

let debugMode = false;

/**
 * Set the global debug mode
 */
export function setDebugMode(enabled: boolean): void {
  debugMode = enabled;
}

/**
 * Log a debug message (only shown when debug mode is enabled)
 */
export function debug(...args: unknown[]): void {
  if (debugMode) {
    console.log(...args);
  }
}

/**
 * Log a warning message (always shown)
 */
export function warn(...args: unknown[]): void {
  console.warn(...args);
}

/**
 * Log an error message (always shown)
 */
export function error(...args: unknown[]): void {
  console.error(...args);
}

export interface ScopedLogger {
  debug: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

/**
 * Create a scoped logger with a prefix
 */
export function createLogger(prefix: string): ScopedLogger {
  return {
    debug: (...args: unknown[]) => debug(`[${prefix}]`, ...args),
    warn: (...args: unknown[]) => warn(`[${prefix}]`, ...args),
    error: (...args: unknown[]) => error(`[${prefix}]`, ...args),
  };
}
