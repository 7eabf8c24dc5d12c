/**
 * Chunking Orchestrator
 *
 * Walk -> assign -> write, as a single call with progress callbacks.
 */

import { stat } from 'fs/promises';
import { join, resolve, basename } from 'path';
import { assignChunks, validateChunkCount } from '../assignment/index.js';
import { walkTree } from '../traversal/index.js';
import type { FileEntry, TraversalWarning } from '../traversal/index.js';
import { summarizeWrites, writeChunks } from '../writing/index.js';
import { UsageError, errorCode, formatError } from '../../utils/errors.js';
import {
  DEFAULT_OUTPUT_PREFIX,
  IGNORE_FILENAME,
  OUTPUT_DIR_NAME,
} from '../../utils/constants.js';
import { createLogger } from '../../utils/logger.js';
import type {
  ChunkingCallbacks,
  ChunkingConfig,
  ChunkingResult,
} from './orchestration.types.js';

const log = createLogger('chunky');

// ============================================================================
// Validation
// ============================================================================

async function validateRootDir(rootDir: string): Promise<void> {
  try {
    const info = await stat(rootDir);
    if (!info.isDirectory()) {
      throw new UsageError(`The folder path '${rootDir}' is not a directory.`);
    }
  } catch (err) {
    if (err instanceof UsageError) {
      throw err;
    }
    if (errorCode(err) === 'ENOENT') {
      throw new UsageError(`The folder path '${rootDir}' does not exist.`);
    }
    throw new UsageError(`The folder path '${rootDir}' cannot be read: ${formatError(err)}`);
  }
}

function validateName(label: string, value: string): void {
  if (value === '' || value === '.' || value === '..' || value !== basename(value)) {
    throw new UsageError(`${label} must be a plain name, got '${value}'`);
  }
}

/**
 * Checks everything that can be checked before touching the tree
 */
export async function validateConfig(config: ChunkingConfig): Promise<void> {
  validateChunkCount(config.chunkCount);
  validateName('Output directory', config.outputDirName ?? OUTPUT_DIR_NAME);
  validateName('Ignore file', config.ignoreFileName ?? IGNORE_FILENAME);
  validateName('Output prefix', config.outputPrefix ?? DEFAULT_OUTPUT_PREFIX);
  await validateRootDir(config.rootDir);
}

// ============================================================================
// Main Entry
// ============================================================================

/**
 * Distribute the files under `config.rootDir` across `config.chunkCount`
 * chunk files without splitting any file.
 *
 * @throws UsageError when the configuration is invalid; no traversal happens
 */
export async function runChunking(
  config: ChunkingConfig,
  callbacks: ChunkingCallbacks = {}
): Promise<ChunkingResult> {
  await validateConfig(config);

  const rootDir = resolve(config.rootDir);
  const outputDirName = config.outputDirName ?? OUTPUT_DIR_NAME;
  const outputDir = join(rootDir, outputDirName);

  // Phase 1: Walk
  callbacks.onWalkStart?.(rootDir);
  const files: FileEntry[] = [];
  const warnings: TraversalWarning[] = [];
  let totalSize = 0;

  for await (const file of walkTree(rootDir, {
    ignoreFileName: config.ignoreFileName ?? IGNORE_FILENAME,
    outputDirName,
    extraPatterns: config.extraPatterns,
    onWarning: (warning) => {
      warnings.push(warning);
      if (callbacks.onWarning) {
        callbacks.onWarning(warning);
      } else {
        log.warn(`${warning.kind}: ${warning.path} (${warning.reason})`);
      }
    },
  })) {
    files.push(file);
    totalSize += file.size;
    callbacks.onFileFound?.(file);
  }
  callbacks.onWalkComplete?.(files.length, totalSize);
  log.debug(`Found ${files.length} files (${totalSize} bytes)`);

  // Phase 2: Assign
  const manifest = assignChunks(files, config.chunkCount);
  callbacks.onAssignmentComplete?.(manifest);

  if (config.dryRun) {
    return { manifest, writeResults: [], warnings, outputDir, ok: true };
  }

  // Phase 3: Write
  const writeResults = await writeChunks(manifest, {
    outputDir,
    prefix: config.outputPrefix ?? DEFAULT_OUTPUT_PREFIX,
    includeSize: config.includeSize,
    onChunkWritten: callbacks.onChunkWritten,
  });

  return {
    manifest,
    writeResults,
    warnings,
    outputDir,
    ok: summarizeWrites(writeResults).ok,
  };
}
