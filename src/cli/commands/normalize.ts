import { createEmptyZoneConfig } from '../../kernel/zone-config.js';
import {
  decodeDocumentFile,
  exitCodeForError,
  ExitCodes,
  renderZoneConfig,
  type CommandContext,
  type DecodeCommandOptions,
  type ExitCode,
} from './shared.js';

/**
 * Decodes a zone config document over the empty config and prints it in the
 * current document shape. Legacy shapes and field names are rewritten.
 */
export function normalizeCommand(
  filePath: string,
  options: DecodeCommandOptions,
  context: CommandContext,
): ExitCode {
  const format = options.format ?? context.outputFormat;
  try {
    const file = context.readFile(filePath);
    context.logger.debug({ file: file.path, inputFormat: file.format, outputFormat: format }, 'normalizing zone config');
    const config = decodeDocumentFile(file, createEmptyZoneConfig(), options.strict ?? false);
    context.write(renderZoneConfig(config, format));
    return ExitCodes.SUCCESS;
  } catch (error) {
    return exitCodeForError(error, context.logger);
  }
}
