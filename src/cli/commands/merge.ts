import type { ZoneConfig } from '../../kernel/types.js';
import { createDefaultZoneConfig, createEmptyZoneConfig } from '../../kernel/zone-config.js';
import {
  decodeDocumentFile,
  exitCodeForError,
  ExitCodes,
  renderZoneConfig,
  type CommandContext,
  type DecodeCommandOptions,
  type ExitCode,
} from './shared.js';

/** Config the patch is applied to. Only the JSON form of a stored file carries subzones. */
export type MergeSeed =
  | { readonly kind: 'existing'; readonly file: string }
  | { readonly kind: 'defaults' };

export interface MergeCommandOptions extends DecodeCommandOptions {
  readonly seed: MergeSeed;
}

/**
 * Applies a partial zone config document on top of a stored config. Fields
 * the document leaves out keep their stored values.
 */
export function mergeCommand(filePath: string, options: MergeCommandOptions, context: CommandContext): ExitCode {
  const format = options.format ?? context.outputFormat;
  try {
    const seed = loadSeed(options.seed, context);
    const file = context.readFile(filePath);
    const seedName = options.seed.kind === 'existing' ? options.seed.file : 'defaults';
    context.logger.debug(
      { file: file.path, seed: seedName, inputFormat: file.format, outputFormat: format },
      'merging zone config',
    );
    const merged = decodeDocumentFile(file, seed, options.strict ?? false);
    context.write(renderZoneConfig(merged, format));
    return ExitCodes.SUCCESS;
  } catch (error) {
    return exitCodeForError(error, context.logger);
  }
}

function loadSeed(seed: MergeSeed, context: CommandContext): ZoneConfig {
  if (seed.kind === 'defaults') {
    return createDefaultZoneConfig();
  }
  const stored = context.readFile(seed.file);
  return decodeDocumentFile(stored, createEmptyZoneConfig(), false);
}
