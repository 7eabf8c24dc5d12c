import { mkdir, open, readdir, readFile, unlink } from 'fs/promises';
import { join } from 'path';
import type { FileHandle } from 'fs/promises';
import type { Chunk, ChunkManifest } from '../assignment/index.js';
import type { FileEntry } from '../traversal/index.js';
import {
  CHUNK_FILE_EXTENSION,
  END_MARKER_OPEN,
  MARKER_CLOSE,
  READ_ERROR_PREFIX,
  START_MARKER_OPEN,
  WRITE_BATCH_SIZE,
} from '../../utils/constants.js';
import { WriteError, formatError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import type { ChunkWriteResult, WriteOptions, WriteSummary } from './writing.types.js';

const log = createLogger('writer');

/**
 * Output file name for a 0-based chunk index; numbering on disk starts at 1
 */
export function chunkFileName(prefix: string, index: number): string {
  return `${prefix}_${index + 1}${CHUNK_FILE_EXTENSION}`;
}

/**
 * Marker line opening an embedded file
 */
export function formatStartMarker(file: FileEntry, includeSize: boolean): string {
  const label = includeSize ? `${file.relativePath} (${file.size} bytes)` : file.relativePath;
  return `${START_MARKER_OPEN}${label}${MARKER_CLOSE}\n`;
}

/**
 * Marker closing an embedded file, including the blank separator line
 */
export function formatEndMarker(file: FileEntry): string {
  return `\n${END_MARKER_OPEN}${file.relativePath}${MARKER_CLOSE}\n\n`;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Deletes `<prefix>_<n>.txt` files numbered above `chunkCount`, left over
 * from an earlier run with more chunks.
 */
export async function removeStaleChunkFiles(
  outputDir: string,
  prefix: string,
  chunkCount: number
): Promise<string[]> {
  const pattern = new RegExp(
    `^${escapeRegExp(prefix)}_(\\d+)${escapeRegExp(CHUNK_FILE_EXTENSION)}$`
  );
  const removed: string[] = [];

  for (const name of await readdir(outputDir)) {
    const match = pattern.exec(name);
    if (!match || Number(match[1]) <= chunkCount) {
      continue;
    }
    const stalePath = join(outputDir, name);
    try {
      await unlink(stalePath);
      removed.push(stalePath);
    } catch (err) {
      log.warn(`Could not remove stale chunk file ${stalePath}: ${formatError(err)}`);
    }
  }

  return removed;
}

async function writeText(handle: FileHandle, text: string): Promise<number> {
  const buffer = Buffer.from(text, 'utf-8');
  await handle.appendFile(buffer);
  return buffer.length;
}

/**
 * Writes one chunk file. Source files are copied byte for byte; a file that
 * can no longer be read is replaced by an error marker and reported.
 */
async function writeChunk(
  chunk: Chunk,
  outputPath: string,
  includeSize: boolean
): Promise<ChunkWriteResult> {
  const result: ChunkWriteResult = {
    chunkIndex: chunk.index,
    outputPath,
    fileCount: chunk.files.length,
    bytesWritten: 0,
    unreadableFiles: [],
  };

  const handle = await open(outputPath, 'w');
  try {
    for (const file of chunk.files) {
      result.bytesWritten += await writeText(handle, formatStartMarker(file, includeSize));

      let content: Buffer | undefined;
      try {
        content = await readFile(file.absolutePath);
      } catch (err) {
        log.warn(`Could not read ${file.relativePath}: ${formatError(err)}`);
        result.unreadableFiles.push(file.relativePath);
        result.bytesWritten += await writeText(
          handle,
          `${READ_ERROR_PREFIX}${formatError(err)}]\n`
        );
      }
      if (content) {
        await handle.appendFile(content);
        result.bytesWritten += content.length;
      }

      result.bytesWritten += await writeText(handle, formatEndMarker(file));
    }
  } finally {
    await handle.close();
  }

  return result;
}

/**
 * Materializes every chunk of the manifest into `outputDir`.
 *
 * Chunks are written concurrently in batches of WRITE_BATCH_SIZE, each
 * through its own file handle. A failing chunk is recorded with a WriteError
 * in its result; the others still write. Re-running with the same manifest overwrites the same files.
 */
export async function writeChunks(
  manifest: ChunkManifest,
  options: WriteOptions
): Promise<ChunkWriteResult[]> {
  const includeSize = options.includeSize ?? false;
  const outputPathFor = (index: number): string =>
    join(options.outputDir, chunkFileName(options.prefix, index));

  const settle = (result: ChunkWriteResult): ChunkWriteResult => {
    options.onChunkWritten?.(result);
    return result;
  };

  try {
    await mkdir(options.outputDir, { recursive: true });
    const removed = await removeStaleChunkFiles(
      options.outputDir,
      options.prefix,
      manifest.chunkCount
    );
    removed.forEach((path) => log.debug('Removed stale chunk file', path));
  } catch (err) {
    return manifest.chunks.map((chunk) =>
      settle({
        chunkIndex: chunk.index,
        outputPath: outputPathFor(chunk.index),
        fileCount: chunk.files.length,
        bytesWritten: 0,
        unreadableFiles: [],
        error: new WriteError(chunk.index, options.outputDir, err),
      })
    );
  }

  const writeOne = async (chunk: Chunk): Promise<ChunkWriteResult> => {
    const outputPath = outputPathFor(chunk.index);
    try {
      return settle(await writeChunk(chunk, outputPath, includeSize));
    } catch (err) {
      const error = new WriteError(chunk.index, outputPath, err);
      log.error(error.message);
      return settle({
        chunkIndex: chunk.index,
        outputPath,
        fileCount: chunk.files.length,
        bytesWritten: 0,
        unreadableFiles: [],
        error,
      });
    }
  };

  const results: ChunkWriteResult[] = [];
  const batchCount = Math.ceil(manifest.chunks.length / WRITE_BATCH_SIZE);
  for (let batchIndex = 0; batchIndex < batchCount; batchIndex++) {
    const batch = manifest.chunks.slice(
      batchIndex * WRITE_BATCH_SIZE,
      (batchIndex + 1) * WRITE_BATCH_SIZE
    );
    const batchResults = await Promise.all(batch.map(writeOne));
    results.push(...batchResults);
    log.debug(`Batch ${batchIndex + 1}/${batchCount} written`);
  }

  return results;
}

/**
 * Splits write results into successes and failures
 */
export function summarizeWrites(results: readonly ChunkWriteResult[]): WriteSummary {
  const succeeded = results.filter((r) => !r.error);
  const failed = results.filter((r) => r.error);
  return { succeeded, failed, ok: failed.length === 0 };
}
