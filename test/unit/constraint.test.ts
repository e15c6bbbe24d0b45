import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  constraintToString,
  constraintsEqual,
  isParseError,
  isZoneConfigCodecErrorCode,
  parseConstraint,
} from '../../src/kernel/index.js';

describe('constraint short form', () => {
  it('renders each constraint type with its prefix', () => {
    assert.equal(constraintToString({ type: 'REQUIRED', key: 'region', value: 'us' }), '+region=us');
    assert.equal(constraintToString({ type: 'PROHIBITED', key: '', value: 'ssd' }), '-ssd');
    assert.equal(constraintToString({ type: 'DEPRECATED_POSITIVE', key: '', value: 'ssd' }), 'ssd');
  });

  it('parses prefixed and unprefixed tokens', () => {
    assert.deepEqual(parseConstraint('+region=us'), { type: 'REQUIRED', key: 'region', value: 'us' });
    assert.deepEqual(parseConstraint('-ssd'), { type: 'PROHIBITED', key: '', value: 'ssd' });
    assert.deepEqual(parseConstraint('ssd'), { type: 'DEPRECATED_POSITIVE', key: '', value: 'ssd' });
    assert.deepEqual(parseConstraint('+zone=us-east-1a'), { type: 'REQUIRED', key: 'zone', value: 'us-east-1a' });
  });

  it('round-trips canonical strings', () => {
    for (const short of ['+region=us', '-rack=12', 'ssd', '-dc:1', '+node.attr/x=y_z']) {
      assert.equal(constraintToString(parseConstraint(short)), short);
    }
  });

  it('rejects malformed tokens with a parse error', () => {
    for (const short of ['', '+', 'region=', '=us', 'a=b=c', 'not-a-valid-constraint!!', ' ssd', 'a,b']) {
      assert.throws(
        () => parseConstraint(short),
        (error: unknown) => isParseError(error) && isZoneConfigCodecErrorCode(error, 'CONSTRAINT_INVALID'),
        `expected ${JSON.stringify(short)} to be rejected`,
      );
    }
  });

  it('carries the token and document path in the error context', () => {
    assert.throws(
      () => parseConstraint('bad!', 'zone.constraints[2]'),
      (error: unknown) =>
        isZoneConfigCodecErrorCode(error, 'CONSTRAINT_INVALID') &&
        error.context?.token === 'bad!' &&
        error.context.path === 'zone.constraints[2]',
    );
  });

  it('compares constraints by canonical string', () => {
    assert.equal(constraintsEqual(parseConstraint('+region=us'), { type: 'REQUIRED', key: 'region', value: 'us' }), true);
    assert.equal(constraintsEqual(parseConstraint('+ssd'), parseConstraint('-ssd')), false);
  });
});
