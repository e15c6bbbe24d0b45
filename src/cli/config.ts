import { InvalidArgumentError } from 'commander';
import { z } from 'zod';
import type { DocumentFormat } from '../kernel/types.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const DocumentFormatSchema = z.enum(['yaml', 'json']);

const CliEnvSchema = z.object({
  ZONECFG_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  ZONECFG_OUTPUT_FORMAT: DocumentFormatSchema.default('yaml'),
});

export interface CliConfig {
  readonly logLevel: LogLevel;
  readonly outputFormat: DocumentFormat;
}

/**
 * Reads CLI settings from the environment.
 *
 * - `ZONECFG_LOG_LEVEL`: pino level, default `info`
 * - `ZONECFG_OUTPUT_FORMAT`: `yaml` or `json`, default `yaml`
 *
 * @throws Error if a variable is set to an unsupported value
 */
export function loadCliConfig(env: Readonly<Record<string, string | undefined>> = process.env): CliConfig {
  const result = CliEnvSchema.safeParse({
    ZONECFG_LOG_LEVEL: emptyToUndefined(env.ZONECFG_LOG_LEVEL),
    ZONECFG_OUTPUT_FORMAT: emptyToUndefined(env.ZONECFG_OUTPUT_FORMAT),
  });
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid zonecfg environment: ${details}`);
  }
  return {
    logLevel: result.data.ZONECFG_LOG_LEVEL,
    outputFormat: result.data.ZONECFG_OUTPUT_FORMAT,
  };
}

/** Option parser for `--format`; commander reports the rejection as a usage error. */
export function parseFormatOption(value: string): DocumentFormat {
  const result = DocumentFormatSchema.safeParse(value.toLowerCase());
  if (!result.success) {
    throw new InvalidArgumentError(`Unsupported output format "${value}". Use "yaml" or "json".`);
  }
  return result.data;
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}
