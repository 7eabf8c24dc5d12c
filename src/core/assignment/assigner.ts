import { UsageError } from '../../utils/errors.js';
import type { FileEntry } from '../traversal/index.js';
import type { Chunk, ChunkManifest } from './assignment.types.js';

/**
 * Throws UsageError unless `chunkCount` is a positive integer
 */
export function validateChunkCount(chunkCount: number): void {
  if (!Number.isInteger(chunkCount) || chunkCount < 1) {
    throw new UsageError(`Chunk count must be a positive integer, got ${chunkCount}`);
  }
}

/**
 * Index of the chunk holding the fewest bytes; ties go to the lowest index
 */
function leastLoaded(chunks: readonly Chunk[]): Chunk {
  let best = chunks[0];
  for (const chunk of chunks) {
    if (chunk.totalSize < best.totalSize) {
      best = chunk;
    }
  }
  return best;
}

/**
 * Greedy balanced assignment.
 *
 * Each file, in walk order, goes whole to the chunk currently holding the
 * fewest bytes. Identical input always yields identical chunks, and the gap
 * between the fullest and emptiest chunk never exceeds the largest file.
 *
 * @param files - Files in discovery order
 * @param chunkCount - Number of chunks (N >= 1); extra chunks stay empty
 */
export function assignChunks(files: Iterable<FileEntry>, chunkCount: number): ChunkManifest {
  validateChunkCount(chunkCount);

  const chunks: Chunk[] = Array.from({ length: chunkCount }, (_, index) => ({
    index,
    files: [],
    totalSize: 0,
  }));

  let totalFiles = 0;
  let totalSize = 0;
  for (const file of files) {
    const target = leastLoaded(chunks);
    target.files.push(file);
    target.totalSize += file.size;
    totalFiles++;
    totalSize += file.size;
  }

  return { chunkCount, chunks, totalFiles, totalSize };
}

/**
 * Difference in bytes between the largest and smallest chunk
 */
export function chunkSpread(manifest: ChunkManifest): number {
  const sizes = manifest.chunks.map((chunk) => chunk.totalSize);
  return Math.max(...sizes) - Math.min(...sizes);
}
