/**
 * CLI Utility Functions
 * Shared helpers for CLI commands
 */

import { InvalidArgumentError } from 'commander';

// ============================================================================
// Constants
// ============================================================================

export const CLI_CONSTANTS = {
  // Display formatting
  FILENAME_MAX_LENGTH: 40,
  FILENAME_TRUNCATE_SUFFIX: 37,
  DIVIDER_LENGTH: 70,
  MAX_WARNINGS_SHOWN: 10,
} as const;

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format bytes to human-readable string
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return parseFloat((bytes / Math.pow(k, i)).toFixed(2)) + ' ' + sizes[i];
}

/**
 * Commander parser for --chunks: a positive integer, nothing else
 */
export function parseChunkCount(value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError('Chunk count must be a positive integer.');
  }
  const count = parseInt(trimmed, 10);
  if (count < 1) {
    throw new InvalidArgumentError('Chunk count must be at least 1.');
  }
  return count;
}

/**
 * Shorten long paths for table display, keeping the tail
 */
export function truncatePath(path: string): string {
  if (path.length <= CLI_CONSTANTS.FILENAME_MAX_LENGTH) {
    return path;
  }
  return '...' + path.slice(-CLI_CONSTANTS.FILENAME_TRUNCATE_SUFFIX);
}
