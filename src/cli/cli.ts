#!/usr/bin/env node

import { Command } from 'commander';
import { registerChunkCommand } from './commands/chunk/index.js';
import packageJson from '../../package.json' with { type: 'json' };

const program = new Command();

program
  .name('chunky')
  .description('Divide the files in a folder into chunks without splitting file contents')
  .version(packageJson.version, '-v, --version', 'Show the version number and exit');

registerChunkCommand(program);

await program.parseAsync();
