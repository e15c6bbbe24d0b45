import { documentShapeInvalidError } from '../kernel/codec-error.js';
import { constraintToString, parseConstraint } from '../kernel/constraint.js';
import type { ConstraintGroup, ConstraintGroupList } from '../kernel/types.js';
import {
  decodeConstraintGroupKey,
  encodeConstraintGroupKey,
  encodeConstraintShortForms,
} from './constraint-group-codec.js';
import { createUnmarshal, type DocumentStrategy, type DocumentValue, type Unmarshal } from './document-codec.js';
import { DocumentMappingSchema, ReplicaCountSchema, ShortConstraintListSchema } from './document-schemas.js';

export type LegacyConstraintsDocument = readonly string[];
export type PerReplicaConstraintsDocument = Readonly<Record<string, number>>;
export type ConstraintsDocument = LegacyConstraintsDocument | PerReplicaConstraintsDocument;

/**
 * Two shapes are written:
 *
 * - legacy, when there are no groups or a single group with no replica count:
 *   `[c1, c2, c3]`
 * - per-replica otherwise: `{"c1,c2,c3": n1, "c4,c5": n2}`
 *
 * Groups whose joined keys collide collapse to the last one in the mapping.
 */
export function encodeConstraintsList(list: ConstraintGroupList): ConstraintsDocument {
  if (list.length === 0) {
    return [];
  }

  const [only] = list;
  if (list.length === 1 && only !== undefined && only.numReplicas === 0) {
    return encodeConstraintShortForms(only);
  }

  const byKey = new Map<string, number>();
  for (const group of list) {
    byKey.set(encodeConstraintGroupKey(group), group.numReplicas);
  }
  return Object.fromEntries(byKey);
}

export function decodeConstraintsList(unmarshal: Unmarshal, path: string): ConstraintGroupList {
  // The legacy shape wins whenever the node is a list. Token errors inside it
  // are fatal and never fall through to the mapping shape.
  const legacy = unmarshal(ShortConstraintListSchema);
  if (legacy.success) {
    return decodeLegacyConstraints(legacy.data, path);
  }

  const perReplica = unmarshal(DocumentMappingSchema);
  if (!perReplica.success) {
    throw documentShapeInvalidError(
      path,
      'a list of constraint strings or a mapping of comma-separated constraints to replica counts',
      perReplica.issues,
    );
  }

  return decodePerReplicaConstraints(perReplica.data, path);
}

function decodeLegacyConstraints(shorts: readonly string[], path: string): ConstraintGroupList {
  const constraints = shorts.map((short, index) => parseConstraint(short, `${path}[${index}]`));
  if (constraints.length === 0) {
    return [];
  }
  return [{ constraints, numReplicas: 0 }];
}

function decodePerReplicaConstraints(
  document: Readonly<Record<string, unknown>>,
  path: string,
): ConstraintGroupList {
  const groups = Object.entries(document).map(([key, node]) => {
    const keyPath = `${path}.${key}`;
    const numReplicas = createUnmarshal(node)(ReplicaCountSchema);
    if (!numReplicas.success) {
      throw documentShapeInvalidError(keyPath, 'a non-negative replica count', numReplicas.issues);
    }
    return decodeConstraintGroupKey(key, numReplicas.data, keyPath);
  });
  return sortConstraintGroups(groups);
}

export function sortConstraintGroups(groups: readonly ConstraintGroup[]): ConstraintGroupList {
  return [...groups].sort(compareConstraintGroups);
}

export function compareConstraintGroups(left: ConstraintGroup, right: ConstraintGroup): number {
  if (constraintGroupLess(left, right)) {
    return -1;
  }
  if (constraintGroupLess(right, left)) {
    return 1;
  }
  return 0;
}

/**
 * Orders by per-index canonical strings, then by length, then by replica
 * count. Running past the end of `right` while `left` still has entries is
 * never "less".
 */
export function constraintGroupLess(left: ConstraintGroup, right: ConstraintGroup): boolean {
  for (const [index, leftConstraint] of left.constraints.entries()) {
    const rightConstraint = right.constraints[index];
    if (rightConstraint === undefined) {
      return false;
    }
    const leftShort = constraintToString(leftConstraint);
    const rightShort = constraintToString(rightConstraint);
    if (leftShort < rightShort) {
      return true;
    }
    if (leftShort > rightShort) {
      return false;
    }
  }
  if (left.constraints.length < right.constraints.length) {
    return true;
  }
  return left.numReplicas < right.numReplicas;
}

export const constraintsListStrategy: DocumentStrategy<ConstraintGroupList> = {
  marshal: (list): DocumentValue => encodeConstraintsList(list),
  unmarshal: decodeConstraintsList,
};
