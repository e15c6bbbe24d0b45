import type { ZodIssue, ZodType } from 'zod';

export type DocumentValue =
  | null
  | boolean
  | number
  | string
  | readonly DocumentValue[]
  | { readonly [key: string]: DocumentValue };

export type ShapeResult<T> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly issues: readonly string[] };

/**
 * Decodes the bound document node into the given shape. A mismatch is
 * reported in the result rather than thrown, so callers can try another
 * shape.
 */
export type Unmarshal = <T>(shape: ZodType<T>) => ShapeResult<T>;

/**
 * Type-specific strategy plugged into the document codec. `marshal` produces
 * the plain document value; `unmarshal` reads one through the bound
 * {@link Unmarshal} and throws a ParseError on failure.
 */
export interface DocumentStrategy<T> {
  readonly marshal: (value: T) => DocumentValue;
  readonly unmarshal: (unmarshal: Unmarshal, path: string) => T;
}

export function createUnmarshal(node: unknown): Unmarshal {
  return <T>(shape: ZodType<T>): ShapeResult<T> => {
    const result = shape.safeParse(node);
    if (result.success) {
      return { success: true, data: result.data };
    }
    return { success: false, issues: result.error.issues.map(formatIssue) };
  };
}

function formatIssue(issue: ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

export function isDocumentMapping(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
