import { documentShapeInvalidError } from '../kernel/codec-error.js';
import { constraintToString, parseConstraint } from '../kernel/constraint.js';
import type { LeasePreference } from '../kernel/types.js';
import { createUnmarshal, type DocumentStrategy, type Unmarshal } from './document-codec.js';
import { DocumentListSchema, ShortConstraintListSchema } from './document-schemas.js';

export function encodeLeasePreference(preference: LeasePreference): readonly string[] {
  return preference.constraints.map(constraintToString);
}

export function decodeLeasePreference(unmarshal: Unmarshal, path: string): LeasePreference {
  const shorts = unmarshal(ShortConstraintListSchema);
  if (!shorts.success) {
    throw documentShapeInvalidError(path, 'a list of constraint strings', shorts.issues);
  }
  return {
    constraints: shorts.data.map((short, index) => parseConstraint(short, `${path}[${index}]`)),
  };
}

export function encodeLeasePreferences(preferences: readonly LeasePreference[]): readonly (readonly string[])[] {
  return preferences.map(encodeLeasePreference);
}

export function decodeLeasePreferences(unmarshal: Unmarshal, path: string): readonly LeasePreference[] {
  const entries = unmarshal(DocumentListSchema);
  if (!entries.success) {
    throw documentShapeInvalidError(path, 'a list of lease preferences', entries.issues);
  }
  return entries.data.map((entry, index) => decodeLeasePreference(createUnmarshal(entry), `${path}[${index}]`));
}

export const leasePreferenceStrategy: DocumentStrategy<LeasePreference> = {
  marshal: encodeLeasePreference,
  unmarshal: decodeLeasePreference,
};

export const leasePreferencesStrategy: DocumentStrategy<readonly LeasePreference[]> = {
  marshal: encodeLeasePreferences,
  unmarshal: decodeLeasePreferences,
};
