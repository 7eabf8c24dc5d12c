/**
 * Shared constants across the application
 */

// ============================================================================
// File Names
// ============================================================================

export const IGNORE_FILENAME = '.chunkyignore';
export const OUTPUT_DIR_NAME = 'chunkies';
export const CHUNK_FILE_EXTENSION = '.txt';

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_CHUNK_COUNT = 2;
export const DEFAULT_OUTPUT_PREFIX = 'chunk';
export const WRITE_BATCH_SIZE = 64; // Chunk files open at once

// ============================================================================
// Chunk File Framing
// ============================================================================

export const START_MARKER_OPEN = '<<<START: ';
export const END_MARKER_OPEN = '<<<END: ';
export const MARKER_CLOSE = '>>>';
export const READ_ERROR_PREFIX = '[Error reading file: ';

/** Source label of the implicit rule layer */
export const BUILTIN_RULE_SOURCE = '<built-in>';
