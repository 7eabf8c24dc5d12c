/**
 * Orchestration Module
 * End-to-end chunking run
 */

export { runChunking, validateConfig } from './orchestrator.js';
export type {
  ChunkingConfig,
  ChunkingResult,
  ChunkingCallbacks,
} from './orchestration.types.js';
