import type { Command } from 'commander';
import type { DocumentFormat } from '../../kernel/types.js';
import { parseFormatOption } from '../config.js';
import { mergeCommand, type MergeSeed } from './merge.js';
import { normalizeCommand } from './normalize.js';
import { ExitCodes, type CommandContext, type ExitCode } from './shared.js';

export { mergeCommand, type MergeCommandOptions, type MergeSeed } from './merge.js';
export { normalizeCommand } from './normalize.js';
export * from './shared.js';

interface RawDecodeOptions {
  readonly format?: DocumentFormat;
  readonly strict?: boolean;
}

interface RawMergeOptions extends RawDecodeOptions {
  readonly existing?: string;
  readonly defaults?: boolean;
}

export function registerCommands(program: Command, createContext: () => CommandContext): void {
  const report = (code: ExitCode): void => {
    process.exitCode = code;
  };

  program
    .command('normalize')
    .description('Decode a zone config document and print it in the current document shape')
    .argument('<file>', 'zone config document (.yaml, .yml or .json)')
    .option('-f, --format <format>', 'output format: yaml or json', parseFormatOption)
    .option('--strict', 'reject fields that are not zone config fields')
    .action((file: string, options: RawDecodeOptions) => {
      report(
        normalizeCommand(
          file,
          {
            ...(options.format !== undefined ? { format: options.format } : {}),
            strict: options.strict === true,
          },
          createContext(),
        ),
      );
    });

  program
    .command('merge')
    .description('Apply a partial zone config document on top of a stored config')
    .argument('<file>', 'partial zone config document (.yaml, .yml or .json)')
    .option('-e, --existing <file>', 'stored zone config to merge into')
    .option('--defaults', 'merge into the default zone config')
    .option('-f, --format <format>', 'output format: yaml or json', parseFormatOption)
    .option('--strict', 'reject fields that are not zone config fields')
    .action((file: string, options: RawMergeOptions, command: Command) => {
      const seed = mergeSeedFromOptions(options, command);
      report(
        mergeCommand(
          file,
          {
            ...(options.format !== undefined ? { format: options.format } : {}),
            seed,
            strict: options.strict === true,
          },
          createContext(),
        ),
      );
    });
}

function mergeSeedFromOptions(options: RawMergeOptions, command: Command): MergeSeed {
  const defaults = options.defaults === true;
  if (options.existing !== undefined && defaults) {
    command.error('error: --existing and --defaults cannot be used together', {
      exitCode: ExitCodes.USAGE_ERROR,
      code: 'zonecfg.mergeSeed',
    });
  }
  if (options.existing !== undefined) {
    return { kind: 'existing', file: options.existing };
  }
  if (!defaults) {
    command.error('error: merge needs a seed: pass --existing <file> or --defaults', {
      exitCode: ExitCodes.USAGE_ERROR,
      code: 'zonecfg.mergeSeed',
    });
  }
  return { kind: 'defaults' };
}
