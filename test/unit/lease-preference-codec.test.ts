import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  createUnmarshal,
  decodeLeasePreference,
  decodeLeasePreferences,
  encodeLeasePreference,
  leasePreferencesStrategy,
} from '../../src/codec/index.js';
import { isZoneConfigCodecErrorCode } from '../../src/kernel/index.js';
import { preference } from '../helpers/zone-config-fixtures.js';

describe('lease preference codec', () => {
  it('encodes constraints in their given order', () => {
    assert.deepEqual(encodeLeasePreference(preference(['+zone=b', '+zone=a', '-ssd'])), ['+zone=b', '+zone=a', '-ssd']);
    assert.deepEqual(encodeLeasePreference(preference([])), []);
  });

  it('keeps duplicates', () => {
    assert.deepEqual(encodeLeasePreference(preference(['+ssd', '+ssd'])), ['+ssd', '+ssd']);
  });

  it('decodes constraints in document order', () => {
    assert.deepEqual(
      decodeLeasePreference(createUnmarshal(['+zone=b', '+zone=a']), 'lease_preferences[0]'),
      preference(['+zone=b', '+zone=a']),
    );
  });

  it('fails on a malformed token', () => {
    assert.throws(
      () => decodeLeasePreference(createUnmarshal(['+zone=a', 'not-a-valid-constraint!!']), 'pref'),
      (error: unknown) => isZoneConfigCodecErrorCode(error, 'CONSTRAINT_INVALID') && error.context?.path === 'pref[1]',
    );
  });

  it('rejects a preference that is not a list of strings', () => {
    assert.throws(
      () => decodeLeasePreference(createUnmarshal('+zone=a'), 'pref'),
      (error: unknown) => isZoneConfigCodecErrorCode(error, 'DOCUMENT_SHAPE_INVALID') && error.context?.path === 'pref',
    );
  });

  it('encodes and decodes a list of preferences', () => {
    const preferences = [preference(['+region=us']), preference(['+region=eu', '-ssd'])];
    const encoded = leasePreferencesStrategy.marshal(preferences);

    assert.deepEqual(encoded, [['+region=us'], ['+region=eu', '-ssd']]);
    assert.deepEqual(leasePreferencesStrategy.unmarshal(createUnmarshal(encoded), 'lease_preferences'), preferences);
  });

  it('reports the failing element of a preference list', () => {
    assert.throws(
      () => decodeLeasePreferences(createUnmarshal([['+a'], ['+b', 'bad!']]), 'lease_preferences'),
      (error: unknown) =>
        isZoneConfigCodecErrorCode(error, 'CONSTRAINT_INVALID') && error.context?.path === 'lease_preferences[1][1]',
    );
    assert.throws(
      () => decodeLeasePreferences(createUnmarshal(['+a']), 'lease_preferences'),
      (error: unknown) =>
        isZoneConfigCodecErrorCode(error, 'DOCUMENT_SHAPE_INVALID') && error.context?.path === 'lease_preferences[0]',
    );
    assert.throws(
      () => decodeLeasePreferences(createUnmarshal({ a: ['+a'] }), 'lease_preferences'),
      (error: unknown) =>
        isZoneConfigCodecErrorCode(error, 'DOCUMENT_SHAPE_INVALID') && error.context?.path === 'lease_preferences',
    );
  });
});
