/**
 * Progress Tracking
 * Handles chunking progress callbacks and spinner state
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { ChunkManifest } from '../../../core/assignment/index.js';
import type { ChunkingCallbacks } from '../../../core/orchestration/index.js';
import type { FileEntry, TraversalWarning } from '../../../core/traversal/index.js';
import type { ChunkWriteResult } from '../../../core/writing/index.js';
import { formatBytes } from '../../utils.js';
import { debug } from '../../../utils/logger.js';

/**
 * Chunking progress handler with stateful spinner and counters
 */
export class ChunkingProgressHandler {
  private spinner: Ora;
  private filesFound: number = 0;
  private warningCount: number = 0;
  private chunkCount: number = 0;
  private chunksDone: number = 0;
  private dryRun: boolean;

  constructor(dryRun: boolean) {
    this.dryRun = dryRun;
    this.spinner = ora({ text: 'Scanning folder...', color: 'cyan' });
  }

  /**
   * Get callbacks object for runChunking
   */
  public getCallbacks(): ChunkingCallbacks {
    return {
      onWalkStart: this.onWalkStart.bind(this),
      onFileFound: this.onFileFound.bind(this),
      onWarning: this.onWarning.bind(this),
      onWalkComplete: this.onWalkComplete.bind(this),
      onAssignmentComplete: this.onAssignmentComplete.bind(this),
      onChunkWritten: this.onChunkWritten.bind(this),
    };
  }

  /**
   * Stop the spinner after an error
   */
  public fail(message: string): void {
    if (this.spinner.isSpinning) {
      this.spinner.fail(chalk.red(message));
    }
  }

  private onWalkStart(rootDir: string): void {
    this.spinner.start(`🔍 Scanning ${rootDir}...`);
  }

  private onFileFound(file: FileEntry): void {
    this.filesFound++;
    this.spinner.text = `🔍 Scanning... ${chalk.white(this.filesFound)} files`;
    debug(`  + ${file.relativePath} (${file.size} B)`);
  }

  private onWarning(warning: TraversalWarning): void {
    this.warningCount++;
    debug(`  ! ${warning.kind}: ${warning.path} (${warning.reason})`);
  }

  private onWalkComplete(fileCount: number, totalSize: number): void {
    const skipped = this.warningCount > 0 ? chalk.yellow(`, ${this.warningCount} skipped`) : '';
    this.spinner.succeed(
      chalk.bold.green(`Found ${chalk.white(fileCount)} files`) +
        chalk.gray(` (${formatBytes(totalSize)})`) +
        skipped
    );
  }

  private onAssignmentComplete(manifest: ChunkManifest): void {
    this.chunkCount = manifest.chunkCount;
    if (this.dryRun) {
      return;
    }
    this.spinner.start(`✍️  Writing chunks... 0/${this.chunkCount}`);
  }

  private onChunkWritten(result: ChunkWriteResult): void {
    this.chunksDone++;
    if (result.error) {
      this.spinner.warn(chalk.red(`Chunk ${result.chunkIndex + 1} failed`));
    }
    if (this.chunksDone < this.chunkCount) {
      this.spinner.start(`✍️  Writing chunks... ${this.chunksDone}/${this.chunkCount}`);
    } else {
      this.spinner.succeed(chalk.bold.green(`Wrote ${chalk.white(this.chunkCount)} chunks`));
    }
  }
}
