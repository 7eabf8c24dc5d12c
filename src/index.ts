/**
 * chunky
 * Divide the files in a folder into chunks without splitting file contents
 */

export { parseIgnorePatterns, compilePatterns, compileIgnoreFile } from './core/matching/index.js';
export type { PatternMatcher, SkippedPattern } from './core/matching/index.js';
export {
  createBuiltinRuleSet,
  loadDirectoryRuleSet,
  isExcluded,
  extendChain,
} from './core/ignore/index.js';
export type { IgnoreRuleSet, IgnoreRuleChain } from './core/ignore/index.js';
export { walkTree, collectFiles } from './core/traversal/index.js';
export type {
  FileEntry,
  TraversalWarning,
  WalkOptions,
  WalkResult,
} from './core/traversal/index.js';
export { assignChunks, chunkSpread } from './core/assignment/index.js';
export type { Chunk, ChunkManifest } from './core/assignment/index.js';
export {
  writeChunks,
  summarizeWrites,
  chunkFileName,
  parseChunkContent,
} from './core/writing/index.js';
export type { ChunkWriteResult, EmbeddedFile, WriteOptions } from './core/writing/index.js';
export { runChunking } from './core/orchestration/index.js';
export type {
  ChunkingConfig,
  ChunkingResult,
  ChunkingCallbacks,
} from './core/orchestration/index.js';
export { ChunkyError, UsageError, WriteError, PatternError } from './utils/errors.js';
