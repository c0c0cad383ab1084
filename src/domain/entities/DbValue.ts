/**
 * DbValue — Tagged Column Value
 * Layer: Domain
 *
 * Every value crossing the database boundary is wrapped in one of these
 * variants, so callers switch on `type` instead of probing `typeof` on an
 * untyped array cell. The variants follow what mysql2 can hand back:
 *
 *   integer  — TINYINT..BIGINT, YEAR. `bigint` only outside the safe range.
 *   float    — FLOAT, DOUBLE.
 *   decimal  — DECIMAL, kept as exact decimal text.
 *   text     — CHAR, VARCHAR, TEXT, ENUM, SET, TIME, JSON (serialised).
 *   bytes    — BINARY, BLOB, BIT.
 *   datetime — DATE, DATETIME, TIMESTAMP.
 *   boolean  — only produced from caller input; MySQL itself has no boolean type.
 */
export type DbValue =
  | { readonly type: 'null' }
  | { readonly type: 'integer'; readonly value: number | bigint }
  | { readonly type: 'float'; readonly value: number }
  | { readonly type: 'decimal'; readonly value: string }
  | { readonly type: 'text'; readonly value: string }
  | { readonly type: 'bytes'; readonly value: Buffer }
  | { readonly type: 'datetime'; readonly value: Date }
  | { readonly type: 'boolean'; readonly value: boolean };

export type DbValueType = DbValue['type'];

/** Plain JavaScript values accepted as parameter input and returned by `unwrap`. */
export type ScalarInput = null | number | bigint | string | boolean | Date | Buffer;

export const NULL_VALUE: DbValue = Object.freeze({ type: 'null' });

export function fromScalar(input: ScalarInput): DbValue {
  if (input === null) return NULL_VALUE;
  if (typeof input === 'bigint') return { type: 'integer', value: input };
  if (typeof input === 'number') {
    return Number.isInteger(input) ? { type: 'integer', value: input } : { type: 'float', value: input };
  }
  if (typeof input === 'string') return { type: 'text', value: input };
  if (typeof input === 'boolean') return { type: 'boolean', value: input };
  if (input instanceof Date) return { type: 'datetime', value: input };
  return { type: 'bytes', value: input };
}

export function unwrap(value: DbValue): ScalarInput {
  return value.type === 'null' ? null : value.value;
}

export function isNull(value: DbValue): boolean {
  return value.type === 'null';
}
