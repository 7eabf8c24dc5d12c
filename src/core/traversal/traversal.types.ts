/**
 * Traversal Types
 * Files discovered by the tree walker and the problems met along the way
 */

/**
 * A discovered, non-ignored file
 */
export interface FileEntry {
  /** Absolute path on filesystem */
  readonly absolutePath: string;
  /** Path relative to the walk root, always "/"-separated */
  readonly relativePath: string;
  /** File size in bytes at discovery time */
  readonly size: number;
  /** 0-based discovery order */
  readonly index: number;
}

export type TraversalWarningKind =
  | 'unreadable'
  | 'symlink-outside-root'
  | 'symlink-cycle'
  | 'broken-symlink';

/**
 * Non-fatal problem met during the walk; the entry is skipped
 */
export interface TraversalWarning {
  kind: TraversalWarningKind;
  path: string;
  reason: string;
}

export interface WalkOptions {
  /** Per-directory ignore file name (default: .chunkyignore) */
  ignoreFileName?: string;
  /** Output directory name, always excluded (default: chunkies) */
  outputDirName?: string;
  /** Extra patterns applied from the root */
  extraPatterns?: readonly string[];
  /** Receives each warning; when absent warnings are logged */
  onWarning?: (warning: TraversalWarning) => void;
}

export interface WalkResult {
  files: FileEntry[];
  warnings: TraversalWarning[];
  totalSize: number;
}
