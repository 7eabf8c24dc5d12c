/**
 * Writing Module
 * Chunk file output and parsing
 */

export {
  writeChunks,
  summarizeWrites,
  chunkFileName,
  formatStartMarker,
  formatEndMarker,
  removeStaleChunkFiles,
} from './writer.js';
export { parseChunkContent } from './reader.js';
export type {
  WriteOptions,
  ChunkWriteResult,
  WriteSummary,
  EmbeddedFile,
} from './writing.types.js';
