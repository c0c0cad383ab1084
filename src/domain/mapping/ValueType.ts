/**
 * Value Types — Explicit Coercion Descriptors
 * Layer: Domain
 *
 * A ValueType<T> tells the adapter how to turn one DbValue into a T and what
 * T's "default" is when the database hands back nothing (no row, or NULL).
 * getScalar() and every RecordShape field go through one of these, so the
 * conversion rules live in exactly one place.
 *
 * The built-ins reject NULL in `fromDb`; callers substitute `defaultValue()`
 * for NULL, and `nullable()` turns NULL into `null`.
 *
 * Usage:
 *   const count = await db.getScalar('sp_count_items', ValueTypes.integer);
 *   const email = ValueTypes.nullable(ValueTypes.text);
 */
import type { DbValue } from '@domain/entities/DbValue';
import { CoercionError } from '@shared/errors/DataAccessError';

export interface ValueType<T> {
  readonly name: string;
  defaultValue(): T;
  fromDb(value: DbValue): T;
}

type NonNull = Exclude<DbValue, { type: 'null' }>;

const INTEGER_LITERAL = /^[+-]?\d+$/;
const NUMERIC_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function fail(value: DbValue, target: string, detail?: string): never {
  throw new CoercionError(value.type, target, detail);
}

function define<T>(
  name: string,
  defaultValue: () => T,
  convert: (value: NonNull) => T,
): ValueType<T> {
  return {
    name,
    defaultValue,
    fromDb(value: DbValue): T {
      if (value.type === 'null') return fail(value, name, 'value is NULL');
      return convert(value);
    },
  };
}

function toBigInt(value: NonNull, target: string): bigint {
  switch (value.type) {
    case 'integer':
      return BigInt(value.value);
    case 'float':
      if (Number.isInteger(value.value)) return BigInt(value.value);
      return fail(value, target, `${value.value} is not integral`);
    case 'decimal':
    case 'text': {
      const trimmed = value.value.trim();
      if (INTEGER_LITERAL.test(trimmed)) return BigInt(trimmed);
      return fail(value, target, `"${value.value}" is not an integer literal`);
    }
    case 'boolean':
      return value.value ? 1n : 0n;
    default:
      return fail(value, target);
  }
}

const integerType = define<number>('integer', () => 0, (value) => {
  const big = toBigInt(value, 'integer');
  if (big > BigInt(Number.MAX_SAFE_INTEGER) || big < BigInt(Number.MIN_SAFE_INTEGER)) {
    return fail(value, 'integer', `${big} is outside the safe integer range`);
  }
  return Number(big);
});

const bigintType = define<bigint>('bigint', () => 0n, (value) => toBigInt(value, 'bigint'));

const floatType = define<number>('float', () => 0, (value) => {
  switch (value.type) {
    case 'integer':
    case 'float':
      return Number(value.value);
    case 'decimal':
    case 'text': {
      const trimmed = value.value.trim();
      if (NUMERIC_LITERAL.test(trimmed)) return Number(trimmed);
      return fail(value, 'float', `"${value.value}" is not numeric`);
    }
    default:
      return fail(value, 'float');
  }
});

const decimalType = define<string>('decimal', () => '0', (value) => {
  switch (value.type) {
    case 'integer':
    case 'float':
    case 'decimal':
      return String(value.value);
    case 'text': {
      const trimmed = value.value.trim();
      if (NUMERIC_LITERAL.test(trimmed)) return trimmed;
      return fail(value, 'decimal', `"${value.value}" is not numeric`);
    }
    default:
      return fail(value, 'decimal');
  }
});

const textType = define<string>('text', () => '', (value) => {
  switch (value.type) {
    case 'datetime':
      return value.value.toISOString();
    case 'bytes':
      return value.value.toString('utf8');
    default:
      return String(value.value);
  }
});

const booleanType = define<boolean>('boolean', () => false, (value) => {
  switch (value.type) {
    case 'boolean':
      return value.value;
    case 'integer':
      if (value.value === 0 || value.value === 0n) return false;
      if (value.value === 1 || value.value === 1n) return true;
      return fail(value, 'boolean', `${value.value} is neither 0 nor 1`);
    case 'bytes':
      // BIT(1) arrives as a one-byte buffer
      if (value.value.length === 1 && value.value[0] <= 1) return value.value[0] === 1;
      return fail(value, 'boolean', 'only single-byte 0/1 buffers convert');
    case 'text': {
      const lowered = value.value.trim().toLowerCase();
      if (lowered === 'true' || lowered === '1') return true;
      if (lowered === 'false' || lowered === '0') return false;
      return fail(value, 'boolean', `"${value.value}" is not a boolean literal`);
    }
    default:
      return fail(value, 'boolean');
  }
});

const datetimeType = define<Date>('datetime', () => new Date(0), (value) => {
  switch (value.type) {
    case 'datetime':
      return value.value;
    case 'text': {
      const parsed = new Date(value.value);
      if (Number.isNaN(parsed.getTime())) {
        return fail(value, 'datetime', `"${value.value}" is not a date`);
      }
      return parsed;
    }
    default:
      return fail(value, 'datetime');
  }
});

const bytesType = define<Buffer>('bytes', () => Buffer.alloc(0), (value) => {
  switch (value.type) {
    case 'bytes':
      return value.value;
    case 'text':
      return Buffer.from(value.value, 'utf8');
    default:
      return fail(value, 'bytes');
  }
});

/** Wraps a type so NULL (and an absent result) becomes `null` instead of the inner default. */
function nullable<T>(inner: ValueType<T>): ValueType<T | null> {
  return {
    name: `${inner.name} | null`,
    defaultValue: () => null,
    fromDb: (value) => (value.type === 'null' ? null : inner.fromDb(value)),
  };
}

export const ValueTypes = {
  integer: integerType,
  bigint: bigintType,
  float: floatType,
  decimal: decimalType,
  text: textType,
  boolean: booleanType,
  datetime: datetimeType,
  bytes: bytesType,
  nullable,
} as const;
