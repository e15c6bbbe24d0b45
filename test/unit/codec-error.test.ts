import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  MisuseError,
  ParseError,
  ZoneConfigCodecError,
  constraintInvalidError,
  documentShapeInvalidError,
  isMisuseError,
  isParseError,
  isZoneConfigCodecError,
  isZoneConfigCodecErrorCode,
  misuseError,
  unknownFieldError,
} from '../../src/kernel/index.js';

describe('zone config codec error surface', () => {
  it('factories set .code and the error class', () => {
    assert.equal(constraintInvalidError('x!', 'bad').code, 'CONSTRAINT_INVALID');
    assert.equal(documentShapeInvalidError('zone', 'a mapping').code, 'DOCUMENT_SHAPE_INVALID');
    assert.equal(unknownFieldError('zone', 'replicas').code, 'UNKNOWN_FIELD');
    assert.equal(misuseError('DIRECT_GROUP_MARSHAL', 'no').code, 'DIRECT_GROUP_MARSHAL');

    assert.ok(constraintInvalidError('x!', 'bad') instanceof ParseError);
    assert.ok(misuseError('DIRECT_GROUP_UNMARSHAL', 'no') instanceof MisuseError);
  });

  it('message includes structured context payload when provided', () => {
    const err = unknownFieldError('zone', 'replicas');

    assert.equal(err.message, 'zone: field "replicas" is not a zone configuration field context={"path":"zone","field":"replicas"}');
    assert.equal(err.name, 'ParseError');
  });

  it('omits empty issue lists from shape errors', () => {
    assert.deepEqual(documentShapeInvalidError('zone.gc', 'a GC policy mapping', []).context, {
      path: 'zone.gc',
      expected: 'a GC policy mapping',
    });
    assert.deepEqual(documentShapeInvalidError('zone.gc', 'a GC policy mapping', ['ttlseconds: Expected number']).context, {
      path: 'zone.gc',
      expected: 'a GC policy mapping',
      issues: ['ttlseconds: Expected number'],
    });
  });

  it('guards tell parse errors from misuse errors', () => {
    const parse = new ParseError('DOCUMENT_SYNTAX_INVALID', 'broken', { format: 'yaml', line: 1 });
    const misuse = new MisuseError('DIRECT_GROUP_MARSHAL', 'no');

    assert.equal(isZoneConfigCodecError(parse), true);
    assert.equal(isParseError(parse), true);
    assert.equal(isMisuseError(parse), false);
    assert.equal(isMisuseError(misuse), true);
    assert.equal(isParseError(misuse), false);
    assert.equal(isZoneConfigCodecErrorCode(parse, 'DOCUMENT_SYNTAX_INVALID'), true);
    assert.equal(isZoneConfigCodecErrorCode(parse, 'UNKNOWN_FIELD'), false);
    assert.equal(isZoneConfigCodecError(new Error('plain')), false);
  });

  it('keeps the underlying cause', () => {
    const cause = new SyntaxError('Unexpected token');
    const err = new ZoneConfigCodecError('DOCUMENT_SYNTAX_INVALID', 'broken', { format: 'json' }, cause);

    assert.equal(err.cause, cause);
  });
});
