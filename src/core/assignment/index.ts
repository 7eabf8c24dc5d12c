/**
 * Assignment Module
 * Size-balanced partition of files into chunks
 */

export { assignChunks, chunkSpread, validateChunkCount } from './assigner.js';
export type { Chunk, ChunkManifest } from './assignment.types.js';
