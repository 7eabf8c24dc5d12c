/**
 * Orchestration Domain Types
 */

import type { ChunkManifest } from '../assignment/index.js';
import type { FileEntry, TraversalWarning } from '../traversal/index.js';
import type { ChunkWriteResult } from '../writing/index.js';

/**
 * Chunking run configuration
 */
export interface ChunkingConfig {
  /** Folder whose files are distributed */
  rootDir: string;
  /** Number of output chunks (N >= 1) */
  chunkCount: number;
  /** Output file prefix */
  outputPrefix?: string;
  /** Output directory name, created inside rootDir */
  outputDirName?: string;
  /** Per-directory ignore file name */
  ignoreFileName?: string;
  /** Extra ignore patterns applied from the root */
  extraPatterns?: readonly string[];
  /** Record file sizes in the start markers */
  includeSize?: boolean;
  /** Plan the chunks without writing anything */
  dryRun?: boolean;
}

/**
 * Chunking result
 */
export interface ChunkingResult {
  manifest: ChunkManifest;
  /** One entry per chunk; empty on a dry run */
  writeResults: ChunkWriteResult[];
  warnings: TraversalWarning[];
  /** Absolute output directory */
  outputDir: string;
  /** True when every chunk was written (always true on a dry run) */
  ok: boolean;
}

/**
 * Progress callbacks
 */
export interface ChunkingCallbacks {
  onWalkStart?: (rootDir: string) => void;
  onFileFound?: (file: FileEntry) => void;
  onWarning?: (warning: TraversalWarning) => void;
  onWalkComplete?: (fileCount: number, totalSize: number) => void;
  onAssignmentComplete?: (manifest: ChunkManifest) => void;
  onChunkWritten?: (result: ChunkWriteResult) => void;
}
