/**
 * Assignment Types
 * Partition of discovered files into output chunks
 */

import type { FileEntry } from '../traversal/index.js';

/**
 * One output unit receiving a subset of whole files
 */
export interface Chunk {
  /** 0-based chunk index */
  index: number;
  /** Files in walk order */
  files: FileEntry[];
  /** Sum of file sizes in bytes */
  totalSize: number;
}

/**
 * Final chunk-index -> files mapping handed to the writer
 */
export interface ChunkManifest {
  chunkCount: number;
  chunks: Chunk[];
  totalFiles: number;
  totalSize: number;
}
