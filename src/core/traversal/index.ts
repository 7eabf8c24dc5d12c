/**
 * Traversal Module
 * Deterministic, ignore-aware directory walking
 */

export { walkTree, collectFiles } from './walker.js';
export type {
  FileEntry,
  TraversalWarning,
  TraversalWarningKind,
  WalkOptions,
  WalkResult,
} from './traversal.types.js';
