import { z } from 'zod';
import { isDocumentMapping } from './document-codec.js';

export const INT32_MIN = -(2 ** 31);
export const INT32_MAX = 2 ** 31 - 1;

export const StringSchema = z.string();
export const Int32Schema = z.number().int().min(INT32_MIN).max(INT32_MAX);
export const Int64Schema = z.number().int().min(Number.MIN_SAFE_INTEGER).max(Number.MAX_SAFE_INTEGER);
export const ReplicaCountSchema = Int32Schema.min(0);

export const ShortConstraintListSchema = z.array(StringSchema);
// Checked without z.record, which drops a "__proto__" key that is a valid constraint.
export const DocumentMappingSchema = z.custom<Readonly<Record<string, unknown>>>(
  isDocumentMapping,
  'Expected a mapping',
);

export const GCPolicyDocumentFields = ['ttlseconds'] as const;

export const GCPolicyDocumentSchema = z.object({
  ttlseconds: z.union([Int32Schema, z.null()]).optional(),
});

const HexKeySchema = StringSchema.regex(/^(?:[0-9a-fA-F]{2})*$/, 'expected an even-length hex string');

export const SubzoneSpanDocumentSchema = z
  .object({
    key: HexKeySchema,
    end_key: HexKeySchema.optional(),
    subzone_index: Int32Schema.min(0),
  })
  .strict();

export const SubzoneDocumentSchema = z
  .object({
    index_id: z.number().int().min(0).max(2 ** 32 - 1),
    partition_name: StringSchema.optional(),
    config: z.unknown(),
  })
  .strict();

export const DocumentListSchema = z.array(z.unknown());
