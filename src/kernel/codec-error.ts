export type ParseErrorCode =
  | 'CONSTRAINT_INVALID'
  | 'DOCUMENT_SHAPE_INVALID'
  | 'DOCUMENT_SYNTAX_INVALID'
  | 'UNKNOWN_FIELD';

export type MisuseErrorCode = 'DIRECT_GROUP_MARSHAL' | 'DIRECT_GROUP_UNMARSHAL';

export type ZoneConfigCodecErrorCode = ParseErrorCode | MisuseErrorCode;

export interface ZoneConfigCodecErrorContextByCode {
  readonly CONSTRAINT_INVALID: Readonly<{
    readonly token: string;
    readonly path?: string;
  }>;
  readonly DOCUMENT_SHAPE_INVALID: Readonly<{
    readonly path: string;
    readonly expected: string;
    readonly issues?: readonly string[];
  }>;
  readonly DOCUMENT_SYNTAX_INVALID: Readonly<{
    readonly format: 'yaml' | 'json';
    readonly line?: number;
    readonly col?: number;
  }>;
  readonly UNKNOWN_FIELD: Readonly<{
    readonly path: string;
    readonly field: string;
  }>;
  readonly DIRECT_GROUP_MARSHAL: Readonly<{
    readonly group: string;
  }>;
  readonly DIRECT_GROUP_UNMARSHAL: Readonly<{
    readonly path: string;
  }>;
}

export type ZoneConfigCodecErrorContext<C extends ZoneConfigCodecErrorCode = ZoneConfigCodecErrorCode> =
  ZoneConfigCodecErrorContextByCode[C];

function formatMessage<C extends ZoneConfigCodecErrorCode>(
  message: string,
  context?: ZoneConfigCodecErrorContext<C>,
): string {
  if (context === undefined) {
    return message;
  }
  return `${message} context=${JSON.stringify(context)}`;
}

export class ZoneConfigCodecError<C extends ZoneConfigCodecErrorCode = ZoneConfigCodecErrorCode> extends Error {
  readonly code: C;
  readonly context?: ZoneConfigCodecErrorContext<C>;

  constructor(code: C, message: string, context?: ZoneConfigCodecErrorContext<C>, cause?: unknown) {
    super(formatMessage(message, context));
    this.name = 'ZoneConfigCodecError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
    if (cause !== undefined) {
      (this as Error & { cause?: unknown }).cause = cause;
    }
  }
}

/** A token or document shape could not be interpreted. Always fatal to the decode call. */
export class ParseError<C extends ParseErrorCode = ParseErrorCode> extends ZoneConfigCodecError<C> {
  constructor(code: C, message: string, context?: ZoneConfigCodecErrorContext<C>, cause?: unknown) {
    super(code, message, context, cause);
    this.name = 'ParseError';
  }
}

/** Programmer error: an operation was invoked on a value that has no document shape of its own. */
export class MisuseError<C extends MisuseErrorCode = MisuseErrorCode> extends ZoneConfigCodecError<C> {
  constructor(code: C, message: string, context?: ZoneConfigCodecErrorContext<C>) {
    super(code, message, context);
    this.name = 'MisuseError';
  }
}

export const parseError = <C extends ParseErrorCode>(
  code: C,
  message: string,
  context?: ZoneConfigCodecErrorContext<C>,
  cause?: unknown,
): ParseError<C> => new ParseError(code, message, context, cause);

export const constraintInvalidError = (
  token: string,
  message: string,
  path?: string,
): ParseError<'CONSTRAINT_INVALID'> =>
  parseError('CONSTRAINT_INVALID', message, path === undefined ? { token } : { token, path });

export const documentShapeInvalidError = (
  path: string,
  expected: string,
  issues?: readonly string[],
): ParseError<'DOCUMENT_SHAPE_INVALID'> =>
  parseError(
    'DOCUMENT_SHAPE_INVALID',
    `${path}: expected ${expected}`,
    issues === undefined || issues.length === 0 ? { path, expected } : { path, expected, issues },
  );

export const unknownFieldError = (path: string, field: string): ParseError<'UNKNOWN_FIELD'> =>
  parseError('UNKNOWN_FIELD', `${path}: field "${field}" is not a zone configuration field`, { path, field });

export const misuseError = <C extends MisuseErrorCode>(
  code: C,
  message: string,
  context?: ZoneConfigCodecErrorContext<C>,
): MisuseError<C> => new MisuseError(code, message, context);

export function isZoneConfigCodecError(error: unknown): error is ZoneConfigCodecError {
  return error instanceof ZoneConfigCodecError;
}

export function isParseError(error: unknown): error is ParseError {
  return error instanceof ParseError;
}

export function isMisuseError(error: unknown): error is MisuseError {
  return error instanceof MisuseError;
}

export function isZoneConfigCodecErrorCode<C extends ZoneConfigCodecErrorCode>(
  error: unknown,
  code: C,
): error is ZoneConfigCodecError<C> {
  return isZoneConfigCodecError(error) && error.code === code;
}
