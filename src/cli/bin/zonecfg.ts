#!/usr/bin/env node
import { Command, CommanderError } from 'commander';
import { exitCodeForCommanderError, registerCommands } from '../commands/index.js';
import { loadCliConfig } from '../config.js';
import { readDocumentFile } from '../io.js';
import { createCliLogger } from '../logger.js';

const config = loadCliConfig();
const logger = createCliLogger(config.logLevel);

const program = new Command();

// Set before the commands are registered so they inherit it.
program
  .name('zonecfg')
  .description('Read, normalize and merge zone configuration documents')
  .version('0.1.0')
  .exitOverride();

registerCommands(program, () => ({
  logger,
  write: (text) => {
    process.stdout.write(text);
  },
  readFile: readDocumentFile,
  outputFormat: config.outputFormat,
}));

try {
  program.parse();
} catch (error) {
  if (!(error instanceof CommanderError)) {
    throw error;
  }
  process.exitCode = exitCodeForCommanderError(error);
}
