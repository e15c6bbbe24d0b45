import { Document, isAlias, isCollection, isMap, isScalar, isSeq, parseDocument, Scalar } from 'yaml';
import { documentShapeInvalidError, parseError } from '../kernel/codec-error.js';
import type { ZoneConfig } from '../kernel/types.js';
import { createEmptyZoneConfig } from '../kernel/zone-config.js';
import { isDocumentMapping } from './document-codec.js';
import { applyZoneConfigDocument, encodeZoneConfigDocument, ZONE_CONFIG_FIELDS } from './zone-config-document.js';

export interface ParseZoneConfigOptions {
  /** Stored config the document is applied on top of. Defaults to the empty config. */
  readonly existing?: ZoneConfig;
  readonly strict?: boolean;
}

const FLOW_FIELDS = [ZONE_CONFIG_FIELDS.constraints, ZONE_CONFIG_FIELDS.leasePreferences] as const;

// Constraint tokens are read as written: `+1` is the constraint "+1", not the integer 1.
const CONSTRAINT_FIELDS = [
  ZONE_CONFIG_FIELDS.constraints,
  ZONE_CONFIG_FIELDS.leasePreferences,
  ZONE_CONFIG_FIELDS.experimentalLeasePreferences,
] as const;

export function parseZoneConfigYaml(text: string, options: ParseZoneConfigOptions = {}): ZoneConfig {
  const yamlDoc = parseDocument(text, {
    schema: 'core',
    strict: true,
    uniqueKeys: true,
  });

  const [error] = yamlDoc.errors;
  if (error !== undefined) {
    const line = error.linePos?.[0]?.line;
    const col = error.linePos?.[0]?.col;
    throw parseError(
      'DOCUMENT_SYNTAX_INVALID',
      line !== undefined
        ? `YAML parse error at line ${line}${col !== undefined ? `, col ${col}` : ''}: ${error.message}`
        : error.message,
      {
        format: 'yaml',
        ...(line !== undefined ? { line } : {}),
        ...(col !== undefined ? { col } : {}),
      },
      error,
    );
  }

  // An empty document is an empty patch.
  const root = withConstraintText(yamlDoc, text, yamlDoc.toJSON() ?? {});
  return applyZoneConfigDocument(options.existing ?? createEmptyZoneConfig(), root, {
    format: 'yaml',
    ...(options.strict !== undefined ? { strict: options.strict } : {}),
  });
}

function withConstraintText(yamlDoc: Document.Parsed, text: string, root: unknown): unknown {
  if (!isMap(yamlDoc.contents) || !isDocumentMapping(root)) {
    return root;
  }
  const replaced: Record<string, unknown> = { ...root };
  for (const field of CONSTRAINT_FIELDS) {
    const node = yamlDoc.get(field, true);
    if (isCollection(node)) {
      replaced[field] = constraintNodeValue(yamlDoc, text, node, `zone.${field}`);
    }
  }
  return replaced;
}

/**
 * Converts a constraints or lease-preference subtree. Mapping keys and list
 * items keep their source text; mapping values (replica counts) keep their
 * resolved YAML type.
 */
function constraintNodeValue(yamlDoc: Document.Parsed, text: string, node: unknown, path: string): unknown {
  const resolved = isAlias(node) ? node.resolve(yamlDoc) : node;
  if (isMap(resolved)) {
    return Object.fromEntries(
      resolved.items.map((pair) => {
        const key = scalarText(pair.key, text);
        if (typeof key !== 'string') {
          throw documentShapeInvalidError(path, 'constraint keys to be plain strings');
        }
        return [key, constraintValue(yamlDoc, pair.value)] as const;
      }),
    );
  }
  if (isSeq(resolved)) {
    return resolved.items.map((item, index) =>
      isCollection(item) || isAlias(item)
        ? constraintNodeValue(yamlDoc, text, item, `${path}[${index}]`)
        : scalarText(item, text),
    );
  }
  return scalarText(resolved, text);
}

function constraintValue(yamlDoc: Document.Parsed, node: unknown): unknown {
  const resolved = isAlias(node) ? node.resolve(yamlDoc) : node;
  return isScalar(resolved) ? resolved.value : resolved;
}

function scalarText(node: unknown, text: string): unknown {
  if (!isScalar(node)) {
    return node ?? null;
  }
  if (typeof node.value === 'string' || node.value === null) {
    return node.value;
  }
  const range = node.range;
  if (node.type === Scalar.PLAIN && range) {
    return text.slice(range[0], range[1]);
  }
  return node.value;
}

export function formatZoneConfigYaml(config: ZoneConfig): string {
  const yamlDoc = new Document(encodeZoneConfigDocument(config, 'yaml'), { aliasDuplicateObjects: false });

  for (const field of FLOW_FIELDS) {
    const node = yamlDoc.get(field, true);
    if (isCollection(node)) {
      node.flow = true;
    }
  }
  sortMappingKeys(yamlDoc.get(ZONE_CONFIG_FIELDS.constraints, true));

  return yamlDoc.toString({ lineWidth: 0, flowCollectionPadding: false });
}

function sortMappingKeys(node: unknown): void {
  if (!isMap(node)) {
    return;
  }
  node.items.sort((left, right) => {
    const leftKey = keyText(left.key);
    const rightKey = keyText(right.key);
    if (leftKey < rightKey) {
      return -1;
    }
    return leftKey > rightKey ? 1 : 0;
  });
}

function keyText(key: unknown): string {
  return isScalar(key) ? String(key.value) : String(key);
}
