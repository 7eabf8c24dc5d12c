/**
 * Writing Types
 * Chunk file output and the per-chunk outcome
 */

import type { WriteError } from '../../utils/errors.js';

export interface WriteOptions {
  /** Directory receiving the chunk files (created if absent) */
  outputDir: string;
  /** File name prefix, e.g. "chunk" -> chunk_1.txt */
  prefix: string;
  /** Add each file's byte size to its start marker */
  includeSize?: boolean;
  /** Called as each chunk finishes, successfully or not */
  onChunkWritten?: (result: ChunkWriteResult) => void;
}

/**
 * Outcome of writing a single chunk file
 */
export interface ChunkWriteResult {
  /** 0-based chunk index */
  chunkIndex: number;
  outputPath: string;
  fileCount: number;
  bytesWritten: number;
  /** Relative paths whose content could not be read; an error marker stands in */
  unreadableFiles: string[];
  /** Set when the chunk file could not be written */
  error?: WriteError;
}

export interface WriteSummary {
  succeeded: ChunkWriteResult[];
  failed: ChunkWriteResult[];
  ok: boolean;
}

/**
 * A file recovered from a chunk file
 */
export interface EmbeddedFile {
  relativePath: string;
  /** Present when the chunk was written with sizes */
  size?: number;
  content: string;
}
