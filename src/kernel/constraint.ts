import { constraintInvalidError } from './codec-error.js';
import type { Constraint, ConstraintType } from './types.js';

const CONSTRAINT_ATOM_PATTERN = /^[A-Za-z0-9_.:/-]+$/;

const PREFIX_BY_TYPE: Readonly<Record<ConstraintType, string>> = {
  DEPRECATED_POSITIVE: '',
  REQUIRED: '+',
  PROHIBITED: '-',
};

export function constraintToString(constraint: Constraint): string {
  const prefix = PREFIX_BY_TYPE[constraint.type];
  return constraint.key.length > 0 ? `${prefix}${constraint.key}=${constraint.value}` : `${prefix}${constraint.value}`;
}

/**
 * Parses the short form `[+|-][key=]value`. A missing prefix yields a
 * deprecated positive constraint.
 */
export function parseConstraint(short: string, path?: string): Constraint {
  if (short.length === 0) {
    throw constraintInvalidError(short, 'the empty string is not a valid constraint', path);
  }

  let type: ConstraintType = 'DEPRECATED_POSITIVE';
  let body = short;
  if (short.startsWith('+')) {
    type = 'REQUIRED';
    body = short.slice(1);
  } else if (short.startsWith('-')) {
    type = 'PROHIBITED';
    body = short.slice(1);
  }

  const parts = body.split('=');
  if (parts.length > 2) {
    throw constraintInvalidError(short, `constraint needs to be in the form "(key=)value", not ${JSON.stringify(short)}`, path);
  }

  const [first = '', second] = parts;
  const key = second === undefined ? '' : first;
  const value = second === undefined ? first : second;

  if (second !== undefined && !CONSTRAINT_ATOM_PATTERN.test(key)) {
    throw constraintInvalidError(short, `constraint key ${JSON.stringify(key)} in ${JSON.stringify(short)} is not valid`, path);
  }
  if (!CONSTRAINT_ATOM_PATTERN.test(value)) {
    throw constraintInvalidError(short, `constraint value ${JSON.stringify(value)} in ${JSON.stringify(short)} is not valid`, path);
  }

  return { type, key, value };
}

export function constraintsEqual(left: Constraint, right: Constraint): boolean {
  return constraintToString(left) === constraintToString(right);
}
