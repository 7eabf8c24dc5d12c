/**
 * Shared error handling utilities
 */

/**
 * Formats error message from unknown error type
 */
export function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Reads the errno code (ENOENT, EACCES, ...) off a Node.js system error
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Base class for every error raised by chunky itself
 */
export class ChunkyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Invalid invocation: bad chunk count, missing root, bad option value.
 * Raised before any traversal starts.
 */
export class UsageError extends ChunkyError {}

/**
 * Failure creating the output directory or writing one chunk file
 */
export class WriteError extends ChunkyError {
  readonly chunkIndex: number;
  readonly path: string;

  constructor(chunkIndex: number, path: string, cause: unknown) {
    super(`Failed to write chunk ${chunkIndex + 1} to ${path}: ${formatError(cause)}`);
    this.chunkIndex = chunkIndex;
    this.path = path;
  }
}

/**
 * A single ignore pattern line the matcher could not compile
 */
export class PatternError extends ChunkyError {
  readonly pattern: string;

  constructor(pattern: string, cause: unknown) {
    super(`Invalid ignore pattern "${pattern}": ${formatError(cause)}`);
    this.pattern = pattern;
  }
}
