/**
 * Chunk Command
 * Distributes a folder's files across N chunk files
 */

import { join, resolve } from 'path';
import chalk from 'chalk';
import type { Command } from 'commander';
import { runChunking } from '../../../core/orchestration/index.js';
import type { ChunkingConfig } from '../../../core/orchestration/index.js';
import { config as envConfig } from '../../../lib/config.js';
import { UsageError, formatError } from '../../../utils/errors.js';
import { setDebugMode } from '../../../utils/logger.js';
import { parseChunkCount } from '../../utils.js';
import {
  displayChunkTable,
  displayConfiguration,
  displayFinalMessage,
  displayWarnings,
} from './display.js';
import { ChunkingProgressHandler } from './progress.js';

export interface ChunkCommandOptions {
  chunks: number;
  outputPrefix: string;
  outputDir: string;
  ignoreFile: string;
  ignore?: string[];
  includeSize: boolean;
  dryRun: boolean;
  debug: boolean;
}

/**
 * Attach the chunking arguments, options and action to the program
 */
export function registerChunkCommand(program: Command): void {
  program
    .argument('<folder>', 'Path to the folder to be chunked')
    .option(
      '-c, --chunks <number>',
      'Number of output text files',
      parseChunkCount,
      envConfig.chunks
    )
    .option('--output-prefix <prefix>', 'Prefix for output files', envConfig.outputPrefix)
    .option('-o, --output-dir <name>', 'Output folder name inside <folder>', envConfig.outputDir)
    .option('--ignore-file <name>', 'Per-directory ignore file name', envConfig.ignoreFile)
    .option('-i, --ignore <pattern...>', 'Extra ignore patterns applied from the folder root')
    .option('--include-size', 'Record each file size in its start marker', envConfig.includeSize)
    .option('--no-include-size', 'Leave file sizes out of start markers')
    .option('--dry-run', 'Plan the chunks without writing anything', false)
    .option('--debug', 'Enable debug logging for verbose output', envConfig.debug)
    .action(async (folder: string, options: ChunkCommandOptions) => {
      if (options.debug) {
        setDebugMode(true);
      }

      const rootDir = resolve(folder);
      const config: ChunkingConfig = {
        rootDir,
        chunkCount: options.chunks,
        outputPrefix: options.outputPrefix,
        outputDirName: options.outputDir,
        ignoreFileName: options.ignoreFile,
        extraPatterns: options.ignore,
        includeSize: options.includeSize,
        dryRun: options.dryRun,
      };

      displayConfiguration({
        rootDir,
        chunkCount: options.chunks,
        outputDir: join(rootDir, options.outputDir),
        outputPrefix: options.outputPrefix,
        ignoreFileName: options.ignoreFile,
        dryRun: options.dryRun,
      });

      const progressHandler = new ChunkingProgressHandler(options.dryRun);
      try {
        const result = await runChunking(config, progressHandler.getCallbacks());

        displayWarnings(result.warnings);
        displayChunkTable(result, options.outputPrefix);
        displayFinalMessage(result, options.dryRun);

        if (!result.ok) {
          process.exit(1);
        }
      } catch (error) {
        progressHandler.fail('Chunking failed');
        const label = error instanceof UsageError ? 'Error:' : '❌ Chunking failed:';
        console.error(chalk.red(`\n${label} ${formatError(error)}`));
        process.exit(1);
      }
    });
}
