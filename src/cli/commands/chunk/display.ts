/**
 * Display Functions
 * Handles all UI output for the chunk command
 */

import { relative } from 'path';
import chalk from 'chalk';
import { CLI_CONSTANTS, formatBytes, truncatePath } from '../../utils.js';
import { chunkSpread } from '../../../core/assignment/index.js';
import type { ChunkingResult } from '../../../core/orchestration/index.js';
import type { TraversalWarning } from '../../../core/traversal/index.js';

function divider(): string {
  return chalk.gray('─'.repeat(CLI_CONSTANTS.DIVIDER_LENGTH));
}

/**
 * Display configuration summary
 */
export function displayConfiguration(config: {
  rootDir: string;
  chunkCount: number;
  outputDir: string;
  outputPrefix: string;
  ignoreFileName: string;
  dryRun: boolean;
}): void {
  console.log();
  console.log(chalk.bold.white('📋 Configuration'));
  console.log(divider());
  console.log(chalk.gray('  Folder:       ') + chalk.cyan(config.rootDir));
  console.log(chalk.gray('  Chunks:       ') + chalk.magenta(config.chunkCount));
  console.log(chalk.gray('  Output:       ') + chalk.cyan(config.outputDir));
  console.log(chalk.gray('  Prefix:       ') + chalk.white(config.outputPrefix));
  console.log(chalk.gray('  Ignore file:  ') + chalk.white(config.ignoreFileName));
  console.log(divider());
  console.log();

  if (config.dryRun) {
    console.log(chalk.yellow.bold('⚠️  DRY RUN MODE') + chalk.yellow(' - No files will be written\n'));
  }
}

/**
 * Display skipped entries from the walk
 */
export function displayWarnings(warnings: readonly TraversalWarning[]): void {
  if (warnings.length === 0) {
    return;
  }

  console.log(chalk.yellow.bold(`⚠️  Skipped ${warnings.length} entries`));
  for (const warning of warnings.slice(0, CLI_CONSTANTS.MAX_WARNINGS_SHOWN)) {
    console.log(
      chalk.gray('  ') + chalk.yellow(warning.kind.padEnd(22)) + chalk.gray(warning.path)
    );
  }
  if (warnings.length > CLI_CONSTANTS.MAX_WARNINGS_SHOWN) {
    console.log(
      chalk.gray(`  ... and ${warnings.length - CLI_CONSTANTS.MAX_WARNINGS_SHOWN} more`)
    );
  }
  console.log();
}

/**
 * Display per-chunk file counts and sizes
 */
export function displayChunkTable(result: ChunkingResult, outputPrefix: string): void {
  const { manifest } = result;

  console.log(chalk.bold.white('📦 Chunks'));
  console.log(divider());
  for (const chunk of manifest.chunks) {
    const written = result.writeResults.find((r) => r.chunkIndex === chunk.index);
    const name = written
      ? truncatePath(relative(process.cwd(), written.outputPath) || written.outputPath)
      : `${outputPrefix}_${chunk.index + 1}`;
    const status = written?.error ? chalk.red(' ✗') : written ? chalk.green(' ✓') : '';

    console.log(
      chalk.gray('  ') +
        chalk.white(name.padEnd(CLI_CONSTANTS.FILENAME_MAX_LENGTH)) +
        chalk.cyan(`${chunk.files.length} files`.padStart(12)) +
        chalk.gray(` (${formatBytes(chunk.totalSize)})`) +
        status
    );
  }
  console.log(divider());
  console.log(
    chalk.gray('  Total:  ') +
      chalk.white(`${manifest.totalFiles} files`) +
      chalk.gray(` (${formatBytes(manifest.totalSize)})`)
  );
  console.log(chalk.gray('  Spread: ') + chalk.white(formatBytes(chunkSpread(manifest))));
  console.log();
}

/**
 * Display the outcome of the write phase
 */
export function displayFinalMessage(result: ChunkingResult, dryRun: boolean): void {
  if (dryRun) {
    console.log(chalk.yellow('Dry run complete. Nothing was written.\n'));
    return;
  }

  const failed = result.writeResults.filter((r) => r.error);
  const unreadable = result.writeResults.flatMap((r) => r.unreadableFiles);

  if (unreadable.length > 0) {
    console.log(
      chalk.yellow(`⚠️  ${unreadable.length} file(s) could not be read and were marked in place:`)
    );
    unreadable.forEach((path) => console.log(chalk.gray('  ') + chalk.yellow(path)));
    console.log();
  }

  if (failed.length > 0) {
    console.error(
      chalk.red.bold(`❌ ${failed.length} of ${result.writeResults.length} chunks failed:`)
    );
    failed.forEach((r) => console.error(chalk.red(`  ${r.error?.message ?? r.outputPath}`)));
    console.error();
    return;
  }

  console.log(chalk.green.bold('✅ Done! ') + chalk.gray('Chunks written to ') + chalk.cyan(result.outputDir));
  console.log();
}
