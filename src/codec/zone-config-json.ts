import { parseError } from '../kernel/codec-error.js';
import type { ZoneConfig } from '../kernel/types.js';
import { createEmptyZoneConfig } from '../kernel/zone-config.js';
import { applyZoneConfigDocument, encodeZoneConfigDocument } from './zone-config-document.js';
import type { ParseZoneConfigOptions } from './zone-config-yaml.js';

export function parseZoneConfigJson(text: string, options: ParseZoneConfigOptions = {}): ZoneConfig {
  let root: unknown;
  try {
    root = JSON.parse(text);
  } catch (error) {
    throw parseError(
      'DOCUMENT_SYNTAX_INVALID',
      `JSON parse error: ${error instanceof Error ? error.message : String(error)}`,
      { format: 'json' },
      error,
    );
  }

  return applyZoneConfigDocument(options.existing ?? createEmptyZoneConfig(), root, {
    format: 'json',
    ...(options.strict !== undefined ? { strict: options.strict } : {}),
  });
}

export function formatZoneConfigJson(config: ZoneConfig): string {
  return `${JSON.stringify(encodeZoneConfigDocument(config, 'json'), null, 2)}\n`;
}
