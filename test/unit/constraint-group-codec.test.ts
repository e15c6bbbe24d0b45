import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  constraintGroupStrategy,
  createUnmarshal,
  decodeConstraintGroupKey,
  encodeConstraintGroupKey,
} from '../../src/codec/index.js';
import { isMisuseError, isZoneConfigCodecErrorCode } from '../../src/kernel/index.js';
import { group } from '../helpers/zone-config-fixtures.js';

describe('constraint group codec', () => {
  it('joins canonical constraint strings with commas', () => {
    assert.equal(encodeConstraintGroupKey(group(['+ssd', '-region=eu'], 2)), '+ssd,-region=eu');
    assert.equal(encodeConstraintGroupKey(group(['ssd'])), 'ssd');
  });

  it('splits a key back into a group with the supplied replica count', () => {
    assert.deepEqual(decodeConstraintGroupKey('+ssd,-region=eu', 2), {
      constraints: [
        { type: 'REQUIRED', key: '', value: 'ssd' },
        { type: 'PROHIBITED', key: 'region', value: 'eu' },
      ],
      numReplicas: 2,
    });
  });

  it('fails on the first invalid token', () => {
    for (const key of ['a,,b', 'a, b', '', '+ssd,bad!']) {
      assert.throws(
        () => decodeConstraintGroupKey(key, 1, 'zone.constraints'),
        (error: unknown) => isZoneConfigCodecErrorCode(error, 'CONSTRAINT_INVALID'),
      );
    }
  });

  it('refuses to marshal a bare group', () => {
    assert.throws(
      () => constraintGroupStrategy.marshal(group(['+ssd'], 1)),
      (error: unknown) =>
        isMisuseError(error) && error.code === 'DIRECT_GROUP_MARSHAL' && /never be called directly/.test(error.message),
    );
  });

  it('refuses to unmarshal a bare group even from a well-formed document', () => {
    assert.throws(
      () => constraintGroupStrategy.unmarshal(createUnmarshal(['+ssd']), 'zone.constraints'),
      (error: unknown) => isMisuseError(error) && error.code === 'DIRECT_GROUP_UNMARSHAL',
    );
    assert.throws(
      () => constraintGroupStrategy.unmarshal(createUnmarshal({ '+ssd': 1 }), 'zone.constraints'),
      (error: unknown) => isMisuseError(error) && error.code === 'DIRECT_GROUP_UNMARSHAL',
    );
  });
});
