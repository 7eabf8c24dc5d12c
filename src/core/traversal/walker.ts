import { readdir, realpath, stat } from 'fs/promises';
import type { Dirent } from 'fs';
import { join, resolve } from 'path';
import {
  createBuiltinRuleSet,
  extendChain,
  isExcluded,
  loadDirectoryRuleSet,
  toRuleRelativePath,
} from '../ignore/index.js';
import type { IgnoreRuleChain } from '../ignore/index.js';
import { IGNORE_FILENAME, OUTPUT_DIR_NAME } from '../../utils/constants.js';
import { formatError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import type {
  FileEntry,
  TraversalWarning,
  TraversalWarningKind,
  WalkOptions,
  WalkResult,
} from './traversal.types.js';

const log = createLogger('walker');

interface WalkState {
  root: string;
  realRoot: string;
  /** Real path of the output directory, which is never walked */
  realOutputDir: string;
  ignoreFileName: string;
  nextIndex: number;
  report: (kind: TraversalWarningKind, path: string, cause: unknown) => void;
}

type EntryKind = 'file' | 'directory';

interface ResolvedEntry {
  kind: EntryKind;
  /** Real path with symlinks resolved */
  realPath: string;
}

function isInsideOutput(realPath: string, state: WalkState): boolean {
  return (
    realPath === state.realOutputDir || toRuleRelativePath(state.realOutputDir, realPath) !== null
  );
}

/**
 * Real path of the output directory; it may not exist before the first run
 */
async function resolveOutputDir(realRoot: string, outputDirName: string): Promise<string> {
  const outputDir = join(realRoot, outputDirName);
  try {
    return await realpath(outputDir);
  } catch (err) {
    log.debug(`Output directory not resolved (${formatError(err)}), using`, outputDir);
    return outputDir;
  }
}

function logWarning(warning: TraversalWarning): void {
  log.warn(`${warning.kind}: ${warning.path} (${warning.reason})`);
}

/**
 * Byte-order name comparison, independent of locale
 */
function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Works out what a directory entry is, following symlinks that stay inside
 * the root. Returns null for entries that are skipped.
 */
async function resolveEntry(
  entry: Dirent,
  fullPath: string,
  parentReal: string,
  state: WalkState
): Promise<ResolvedEntry | null> {
  if (entry.isDirectory()) {
    return { kind: 'directory', realPath: join(parentReal, entry.name) };
  }
  if (entry.isFile()) {
    return { kind: 'file', realPath: join(parentReal, entry.name) };
  }
  if (!entry.isSymbolicLink()) {
    log.debug('Skipping special file', fullPath);
    return null;
  }

  let target: string;
  try {
    target = await realpath(fullPath);
  } catch (err) {
    state.report('broken-symlink', fullPath, err);
    return null;
  }

  if (target !== state.realRoot && toRuleRelativePath(state.realRoot, target) === null) {
    state.report('symlink-outside-root', fullPath, `points to ${target}`);
    return null;
  }

  try {
    const info = await stat(target);
    if (info.isDirectory()) return { kind: 'directory', realPath: target };
    if (info.isFile()) return { kind: 'file', realPath: target };
  } catch (err) {
    state.report('unreadable', fullPath, err);
    return null;
  }

  log.debug('Skipping special file', fullPath);
  return null;
}

async function* walkDirectory(
  dir: string,
  dirReal: string,
  chain: IgnoreRuleChain,
  ancestors: ReadonlySet<string>,
  state: WalkState
): AsyncGenerator<FileEntry, void, undefined> {
  let activeChain = chain;
  try {
    activeChain = extendChain(chain, await loadDirectoryRuleSet(dir, state.ignoreFileName));
  } catch (err) {
    state.report('unreadable', join(dir, state.ignoreFileName), err);
  }

  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (err) {
    state.report('unreadable', dir, err);
    return;
  }
  entries.sort((a, b) => compareNames(a.name, b.name));

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    const resolved = await resolveEntry(entry, fullPath, dirReal, state);
    if (!resolved) {
      continue;
    }

    const isDirectory = resolved.kind === 'directory';
    if (isExcluded(activeChain, fullPath, isDirectory)) {
      log.debug('Ignored', fullPath);
      continue;
    }
    if (isInsideOutput(resolved.realPath, state)) {
      log.debug('Skipping link into the output directory', fullPath);
      continue;
    }

    if (isDirectory) {
      if (ancestors.has(resolved.realPath)) {
        state.report('symlink-cycle', fullPath, `leads back to ${resolved.realPath}`);
        continue;
      }
      yield* walkDirectory(
        fullPath,
        resolved.realPath,
        activeChain,
        new Set([...ancestors, resolved.realPath]),
        state
      );
      continue;
    }

    let size: number;
    try {
      size = (await stat(fullPath)).size;
    } catch (err) {
      state.report('unreadable', fullPath, err);
      continue;
    }

    const relativePath = toRuleRelativePath(state.root, fullPath) ?? entry.name;
    yield { absolutePath: fullPath, relativePath, size, index: state.nextIndex++ };
  }
}

/**
 * Lazily walks `root` depth-first, yielding every file not excluded by the
 * layered ignore rules. Entries are visited in name order so the sequence is
 * reproducible on an unchanged tree.
 */
export async function* walkTree(
  root: string,
  options: WalkOptions = {}
): AsyncGenerator<FileEntry, void, undefined> {
  const rootPath = resolve(root);
  const realRoot = await realpath(rootPath);
  const ignoreFileName = options.ignoreFileName ?? IGNORE_FILENAME;
  const outputDirName = options.outputDirName ?? OUTPUT_DIR_NAME;

  const builtin = createBuiltinRuleSet(rootPath, {
    outputDirName,
    ignoreFileName,
    extraPatterns: options.extraPatterns,
  });

  const state: WalkState = {
    root: rootPath,
    realRoot,
    realOutputDir: await resolveOutputDir(realRoot, outputDirName),
    ignoreFileName,
    nextIndex: 0,
    report: (kind, path, cause) => {
      const warning: TraversalWarning = { kind, path, reason: formatError(cause) };
      (options.onWarning ?? logWarning)(warning);
    },
  };

  yield* walkDirectory(rootPath, realRoot, [builtin], new Set([realRoot]), state);
}

/**
 * Drains walkTree into an ordered list
 */
export async function collectFiles(root: string, options: WalkOptions = {}): Promise<WalkResult> {
  const files: FileEntry[] = [];
  const warnings: TraversalWarning[] = [];
  let totalSize = 0;

  const walk = walkTree(root, {
    ...options,
    onWarning: (warning) => {
      warnings.push(warning);
      (options.onWarning ?? logWarning)(warning);
    },
  });

  for await (const file of walk) {
    files.push(file);
    totalSize += file.size;
  }

  return { files, warnings, totalSize };
}
