import { misuseError } from '../kernel/codec-error.js';
import { constraintToString, parseConstraint } from '../kernel/constraint.js';
import type { ConstraintGroup } from '../kernel/types.js';
import type { DocumentStrategy } from './document-codec.js';

export const CONSTRAINT_KEY_SEPARATOR = ',';

export function encodeConstraintShortForms(group: ConstraintGroup): readonly string[] {
  return group.constraints.map(constraintToString);
}

export function encodeConstraintGroupKey(group: ConstraintGroup): string {
  return encodeConstraintShortForms(group).join(CONSTRAINT_KEY_SEPARATOR);
}

export function decodeConstraintGroupKey(key: string, numReplicas: number, path?: string): ConstraintGroup {
  const tokens = key.split(CONSTRAINT_KEY_SEPARATOR);
  return {
    constraints: tokens.map((token) => parseConstraint(token, path)),
    numReplicas,
  };
}

/**
 * A lone group has no document shape: a group with replicas set only exists
 * as one entry of the per-replica mapping. Both directions go through the
 * list strategy instead.
 */
export const constraintGroupStrategy: DocumentStrategy<ConstraintGroup> = {
  marshal: (group) => {
    throw misuseError(
      'DIRECT_GROUP_MARSHAL',
      'marshal must never be called directly on a constraint group; marshal the enclosing constraint list',
      { group: encodeConstraintGroupKey(group) },
    );
  },
  unmarshal: (_unmarshal, path) => {
    throw misuseError(
      'DIRECT_GROUP_UNMARSHAL',
      'unmarshal must never be called directly on a constraint group; unmarshal the enclosing constraint list',
      { path },
    );
  },
};
