import type { CommanderError } from 'commander';
import type { Logger } from 'pino';
import { formatZoneConfigJson, parseZoneConfigJson } from '../../codec/zone-config-json.js';
import { formatZoneConfigYaml, parseZoneConfigYaml } from '../../codec/zone-config-yaml.js';
import { isParseError } from '../../kernel/codec-error.js';
import type { DocumentFormat, ZoneConfig } from '../../kernel/types.js';
import { isDocumentFileError, type DocumentFile } from '../io.js';

export const ExitCodes = {
  SUCCESS: 0,
  PARSE_ERROR: 1,
  IO_ERROR: 2,
  USAGE_ERROR: 64,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

export interface CommandContext {
  readonly logger: Logger;
  readonly write: (text: string) => void;
  readonly readFile: (filePath: string) => DocumentFile;
  readonly outputFormat: DocumentFormat;
}

export interface DecodeCommandOptions {
  readonly format?: DocumentFormat;
  readonly strict?: boolean;
}

export function decodeDocumentFile(file: DocumentFile, existing: ZoneConfig, strict: boolean): ZoneConfig {
  const options = { existing, strict };
  return file.format === 'json' ? parseZoneConfigJson(file.text, options) : parseZoneConfigYaml(file.text, options);
}

export function renderZoneConfig(config: ZoneConfig, format: DocumentFormat): string {
  return format === 'json' ? formatZoneConfigJson(config) : formatZoneConfigYaml(config);
}

/** Maps known failures to exit codes; anything else is a bug and is rethrown. */
export function exitCodeForError(error: unknown, logger: Logger): ExitCode {
  if (isParseError(error)) {
    logger.error({ code: error.code, context: error.context }, error.message);
    return ExitCodes.PARSE_ERROR;
  }
  if (isDocumentFileError(error)) {
    logger.error({ code: error.code, file: error.filePath }, error.message);
    return ExitCodes.IO_ERROR;
  }
  throw error;
}

/** Commander exits 0 after help or version output; every other commander exit is a usage error. */
export function exitCodeForCommanderError(error: CommanderError): ExitCode {
  return error.exitCode === 0 ? ExitCodes.SUCCESS : ExitCodes.USAGE_ERROR;
}
