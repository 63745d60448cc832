import { err, ok, type Result } from 'neverthrow';
import { z, type ZodType, type ZodTypeDef } from 'zod';

import { ResponseValidationError } from '../types.js';

export type ValueKind = 'bytes' | 'text' | 'json';

/**
 * Runtime description of the type a body is encoded from or decoded into.
 * Stands in for generic type arguments, which do not exist at run time.
 */
export interface ValueType<T> {
  readonly kind: ValueKind;
  readonly name: string;
  /** A top-level JSON array is decoded element by element */
  readonly elementwise: boolean;
  validate(value: unknown): Result<T, ResponseValidationError>;
}

export interface JsonTypeOptions {
  name?: string | undefined;
  elementwise?: boolean | undefined;
}

const mismatch = (expected: string, value: unknown): ResponseValidationError =>
  new ResponseValidationError(
    `Expected ${expected} but decoded ${describeValue(value)}`,
    expected,
    [{ message: `Expected ${expected}`, path: '' }],
    truncatePayload(value)
  );

const describeValue = (value: unknown): string => {
  if (value === null) return 'null';
  if (value instanceof Uint8Array) return 'bytes';
  if (Array.isArray(value)) return 'array';
  return typeof value;
};

const truncatePayload = (value: unknown): string => {
  if (value instanceof Uint8Array) {
    return `<${value.byteLength} bytes>`;
  }
  try {
    return (JSON.stringify(value) ?? String(value)).slice(0, 500);
  } catch {
    return String(value).slice(0, 500);
  }
};

const BYTES: ValueType<Uint8Array> = Object.freeze({
  kind: 'bytes' as const,
  name: 'Uint8Array',
  elementwise: false,
  validate: (value: unknown) => (value instanceof Uint8Array ? ok(value) : err(mismatch('Uint8Array', value))),
});

const TEXT: ValueType<string> = Object.freeze({
  kind: 'text' as const,
  name: 'string',
  elementwise: false,
  validate: (value: unknown) => (typeof value === 'string' ? ok(value) : err(mismatch('string', value))),
});

const ANY_JSON: ValueType<unknown> = Object.freeze({
  kind: 'json' as const,
  name: 'unknown',
  elementwise: false,
  validate: (value: unknown) => ok(value),
});

function schemaType<T>(schema: ZodType<T, ZodTypeDef, unknown>, options: JsonTypeOptions): ValueType<T> {
  const name = options.name ?? schema.description ?? 'json';
  return Object.freeze({
    kind: 'json' as const,
    name,
    elementwise: options.elementwise ?? !(schema instanceof z.ZodArray),
    validate: (value: unknown): Result<T, ResponseValidationError> => {
      const parseResult = schema.safeParse(value);
      if (parseResult.success) {
        return ok(parseResult.data);
      }

      const allIssues = parseResult.error.issues.map((issue) => ({
        message: issue.message,
        path: issue.path.join('.'),
      }));
      const firstFiveErrors = allIssues
        .slice(0, 5)
        .map((issue) => `${issue.path}: ${issue.message}`)
        .join('; ');

      return err(
        new ResponseValidationError(
          `Response validation failed for ${name}: ${firstFiveErrors}`,
          name,
          allIssues,
          truncatePayload(value)
        )
      );
    },
  });
}

function json(): ValueType<unknown>;
function json<T>(schema: ZodType<T, ZodTypeDef, unknown>, options?: JsonTypeOptions): ValueType<T>;
function json<T>(schema?: ZodType<T, ZodTypeDef, unknown>, options: JsonTypeOptions = {}): ValueType<T> | ValueType<unknown> {
  return schema ? schemaType(schema, options) : ANY_JSON;
}

export const Types = {
  bytes: (): ValueType<Uint8Array> => BYTES,
  text: (): ValueType<string> => TEXT,
  /**
   * Structured JSON value. With a schema every decoded element is validated
   * against it; an array schema decodes a top-level array as one value.
   */
  json,
} as const;

/**
 * Runtime type of outbound content.
 */
export function typeOfValue(value: unknown): ValueType<unknown> {
  if (value instanceof Uint8Array) {
    return BYTES;
  }
  if (typeof value === 'string') {
    return TEXT;
  }
  const name =
    value !== null && typeof value === 'object' && value.constructor !== Object && value.constructor?.name
      ? value.constructor.name
      : describeValue(value);
  return { ...ANY_JSON, name };
}
