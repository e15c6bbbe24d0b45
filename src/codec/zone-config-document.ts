import type { ZodType } from 'zod';
import { documentShapeInvalidError, unknownFieldError } from '../kernel/codec-error.js';
import type { DocumentFormat, GCPolicy, Subzone, SubzoneSpan, ZoneConfig } from '../kernel/types.js';
import { createEmptyZoneConfig } from '../kernel/zone-config.js';
import { constraintsListStrategy } from './constraints-list-codec.js';
import { createUnmarshal, isDocumentMapping, type DocumentValue } from './document-codec.js';
import {
  DocumentListSchema,
  GCPolicyDocumentFields,
  GCPolicyDocumentSchema,
  Int32Schema,
  Int64Schema,
  SubzoneDocumentSchema,
  SubzoneSpanDocumentSchema,
} from './document-schemas.js';
import { leasePreferencesStrategy } from './lease-preference-codec.js';
import {
  ABSENT,
  present,
  zoneConfigFromMarshalable,
  zoneConfigToMarshalable,
  type MarshalableZoneConfigDraft,
} from './marshalable-zone-config.js';

export const ZONE_CONFIG_FIELDS = {
  rangeMinBytes: 'range_min_bytes',
  rangeMaxBytes: 'range_max_bytes',
  gc: 'gc',
  numReplicas: 'num_replicas',
  constraints: 'constraints',
  leasePreferences: 'lease_preferences',
  experimentalLeasePreferences: 'experimental_lease_preferences',
  subzones: 'subzones',
  subzoneSpans: 'subzone_spans',
} as const;

export type ZoneConfigDocumentField = (typeof ZONE_CONFIG_FIELDS)[keyof typeof ZONE_CONFIG_FIELDS];

const SHARED_FIELDS: readonly ZoneConfigDocumentField[] = [
  ZONE_CONFIG_FIELDS.rangeMinBytes,
  ZONE_CONFIG_FIELDS.rangeMaxBytes,
  ZONE_CONFIG_FIELDS.gc,
  ZONE_CONFIG_FIELDS.numReplicas,
  ZONE_CONFIG_FIELDS.constraints,
  ZONE_CONFIG_FIELDS.leasePreferences,
  ZONE_CONFIG_FIELDS.experimentalLeasePreferences,
];

// Subzones are opaque to the YAML form and only travel in JSON.
const DOCUMENT_FIELDS_BY_FORMAT: Readonly<Record<DocumentFormat, ReadonlySet<string>>> = {
  yaml: new Set(SHARED_FIELDS),
  json: new Set([...SHARED_FIELDS, ZONE_CONFIG_FIELDS.subzones, ZONE_CONFIG_FIELDS.subzoneSpans]),
};

export interface ApplyZoneConfigDocumentOptions {
  readonly format: DocumentFormat;
  /** Reject keys that are not zone configuration fields instead of ignoring them. */
  readonly strict?: boolean;
  readonly path?: string;
}

/**
 * Applies a decoded document on top of `seed`. Keys the document omits keep
 * their seeded values; a `null` value resets the field to its zero value.
 * Returns a new config and never modifies `seed`.
 */
export function applyZoneConfigDocument(
  seed: ZoneConfig,
  document: unknown,
  options: ApplyZoneConfigDocumentOptions,
): ZoneConfig {
  const path = options.path ?? 'zone';
  const strict = options.strict ?? false;
  if (!isDocumentMapping(document)) {
    throw documentShapeInvalidError(path, 'a mapping of zone configuration fields');
  }
  const mapping = document;

  const fields = DOCUMENT_FIELDS_BY_FORMAT[options.format];
  if (strict) {
    rejectUnknownFields(mapping, fields, path);
  }

  const draft: MarshalableZoneConfigDraft = { ...zoneConfigToMarshalable(seed) };
  const has = (field: ZoneConfigDocumentField): boolean => fields.has(field) && Object.hasOwn(mapping, field);
  const fieldPath = (field: ZoneConfigDocumentField): string => `${path}.${field}`;

  if (has(ZONE_CONFIG_FIELDS.rangeMinBytes)) {
    const field = ZONE_CONFIG_FIELDS.rangeMinBytes;
    draft.rangeMinBytes = decodeInteger(mapping[field], Int64Schema, fieldPath(field), 'a 64-bit integer');
  }
  if (has(ZONE_CONFIG_FIELDS.rangeMaxBytes)) {
    const field = ZONE_CONFIG_FIELDS.rangeMaxBytes;
    draft.rangeMaxBytes = decodeInteger(mapping[field], Int64Schema, fieldPath(field), 'a 64-bit integer');
  }
  if (has(ZONE_CONFIG_FIELDS.gc)) {
    const field = ZONE_CONFIG_FIELDS.gc;
    draft.gc = decodeGCPolicy(draft.gc, mapping[field], fieldPath(field), strict);
  }
  if (has(ZONE_CONFIG_FIELDS.numReplicas)) {
    const field = ZONE_CONFIG_FIELDS.numReplicas;
    draft.numReplicas = decodeInteger(mapping[field], Int32Schema, fieldPath(field), 'a 32-bit integer');
  }
  if (has(ZONE_CONFIG_FIELDS.constraints)) {
    const field = ZONE_CONFIG_FIELDS.constraints;
    const node = mapping[field];
    draft.constraints = node === null ? [] : constraintsListStrategy.unmarshal(createUnmarshal(node), fieldPath(field));
  }
  if (has(ZONE_CONFIG_FIELDS.leasePreferences)) {
    const field = ZONE_CONFIG_FIELDS.leasePreferences;
    const node = mapping[field];
    draft.leasePreferences =
      node === null ? [] : leasePreferencesStrategy.unmarshal(createUnmarshal(node), fieldPath(field));
  }
  if (has(ZONE_CONFIG_FIELDS.experimentalLeasePreferences)) {
    const field = ZONE_CONFIG_FIELDS.experimentalLeasePreferences;
    const node = mapping[field];
    draft.experimentalLeasePreferences =
      node === null ? ABSENT : present(leasePreferencesStrategy.unmarshal(createUnmarshal(node), fieldPath(field)));
  }
  if (has(ZONE_CONFIG_FIELDS.subzones)) {
    const field = ZONE_CONFIG_FIELDS.subzones;
    draft.subzones = decodeSubzones(mapping[field], fieldPath(field), strict);
  }
  if (has(ZONE_CONFIG_FIELDS.subzoneSpans)) {
    const field = ZONE_CONFIG_FIELDS.subzoneSpans;
    draft.subzoneSpans = decodeSubzoneSpans(mapping[field], fieldPath(field));
  }

  return zoneConfigFromMarshalable(draft);
}

/** Renders the current document shape. The deprecated lease-preference field is never written. */
export function encodeZoneConfigDocument(
  config: ZoneConfig,
  format: DocumentFormat,
): { readonly [key: string]: DocumentValue } {
  const marshalable = zoneConfigToMarshalable(config);
  const shared = {
    [ZONE_CONFIG_FIELDS.rangeMinBytes]: marshalable.rangeMinBytes,
    [ZONE_CONFIG_FIELDS.rangeMaxBytes]: marshalable.rangeMaxBytes,
    [ZONE_CONFIG_FIELDS.gc]: { ttlseconds: marshalable.gc.ttlSeconds },
    [ZONE_CONFIG_FIELDS.numReplicas]: marshalable.numReplicas,
    [ZONE_CONFIG_FIELDS.constraints]: constraintsListStrategy.marshal(marshalable.constraints),
    [ZONE_CONFIG_FIELDS.leasePreferences]: leasePreferencesStrategy.marshal(marshalable.leasePreferences),
  };
  if (format === 'yaml') {
    return shared;
  }
  return {
    ...shared,
    [ZONE_CONFIG_FIELDS.subzones]: marshalable.subzones.map(encodeSubzone),
    [ZONE_CONFIG_FIELDS.subzoneSpans]: marshalable.subzoneSpans.map(encodeSubzoneSpan),
  };
}

function rejectUnknownFields(
  document: Readonly<Record<string, unknown>>,
  allowed: ReadonlySet<string>,
  path: string,
): void {
  for (const key of Object.keys(document)) {
    if (!allowed.has(key)) {
      throw unknownFieldError(path, key);
    }
  }
}

function decodeInteger(node: unknown, shape: ZodType<number>, path: string, expected: string): number {
  if (node === null) {
    return 0;
  }
  const result = createUnmarshal(node)(shape);
  if (!result.success) {
    throw documentShapeInvalidError(path, expected, result.issues);
  }
  return result.data;
}

function decodeGCPolicy(seed: GCPolicy, node: unknown, path: string, strict: boolean): GCPolicy {
  if (node === null) {
    return { ttlSeconds: 0 };
  }
  if (strict && isDocumentMapping(node)) {
    rejectUnknownFields(node, new Set(GCPolicyDocumentFields), path);
  }
  const result = createUnmarshal(node)(GCPolicyDocumentSchema);
  if (!result.success) {
    throw documentShapeInvalidError(path, 'a GC policy mapping', result.issues);
  }
  const { ttlseconds } = result.data;
  if (ttlseconds === undefined) {
    return seed;
  }
  return { ttlSeconds: ttlseconds ?? 0 };
}

function decodeSubzones(node: unknown, path: string, strict: boolean): readonly Subzone[] {
  if (node === null) {
    return [];
  }
  const entries = createUnmarshal(node)(DocumentListSchema);
  if (!entries.success) {
    throw documentShapeInvalidError(path, 'a list of subzones', entries.issues);
  }
  return entries.data.map((entry, index) => {
    const entryPath = `${path}[${index}]`;
    const subzone = createUnmarshal(entry)(SubzoneDocumentSchema);
    if (!subzone.success) {
      throw documentShapeInvalidError(entryPath, 'a subzone mapping', subzone.issues);
    }
    const { index_id: indexId, partition_name: partitionName, config } = subzone.data;
    return {
      indexId,
      partitionName: partitionName ?? '',
      config: applyZoneConfigDocument(createEmptyZoneConfig(), config ?? {}, {
        format: 'json',
        strict,
        path: `${entryPath}.config`,
      }),
    };
  });
}

function decodeSubzoneSpans(node: unknown, path: string): readonly SubzoneSpan[] {
  if (node === null) {
    return [];
  }
  const entries = createUnmarshal(node)(DocumentListSchema);
  if (!entries.success) {
    throw documentShapeInvalidError(path, 'a list of subzone spans', entries.issues);
  }
  return entries.data.map((entry, index) => {
    const span = createUnmarshal(entry)(SubzoneSpanDocumentSchema);
    if (!span.success) {
      throw documentShapeInvalidError(`${path}[${index}]`, 'a subzone span mapping', span.issues);
    }
    return {
      key: span.data.key.toLowerCase(),
      endKey: (span.data.end_key ?? '').toLowerCase(),
      subzoneIndex: span.data.subzone_index,
    };
  });
}

function encodeSubzone(subzone: Subzone): DocumentValue {
  return {
    index_id: subzone.indexId,
    partition_name: subzone.partitionName,
    config: encodeZoneConfigDocument(subzone.config, 'json'),
  };
}

function encodeSubzoneSpan(span: SubzoneSpan): DocumentValue {
  return {
    key: span.key,
    end_key: span.endKey,
    subzone_index: span.subzoneIndex,
  };
}
