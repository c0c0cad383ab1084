/**
 * Unit Tests — ValueTypes
 *
 * Each built-in gets its default, the conversions it accepts, and at least one
 * conversion it refuses with a CoercionError.
 */
import type { DbValue } from '@domain/entities/DbValue';
import { NULL_VALUE } from '@domain/entities/DbValue';
import { ValueTypes } from '@domain/mapping/ValueType';
import { CoercionError } from '@shared/errors/DataAccessError';

const int = (value: number | bigint): DbValue => ({ type: 'integer', value });
const flt = (value: number): DbValue => ({ type: 'float', value });
const dec = (value: string): DbValue => ({ type: 'decimal', value });
const txt = (value: string): DbValue => ({ type: 'text', value });
const bin = (value: Buffer): DbValue => ({ type: 'bytes', value });
const dt = (value: Date): DbValue => ({ type: 'datetime', value });
const bool = (value: boolean): DbValue => ({ type: 'boolean', value });

describe('ValueTypes', () => {
  describe('defaults', () => {
    it('should expose the zero value of each type', () => {
      expect(ValueTypes.integer.defaultValue()).toBe(0);
      expect(ValueTypes.bigint.defaultValue()).toBe(0n);
      expect(ValueTypes.float.defaultValue()).toBe(0);
      expect(ValueTypes.decimal.defaultValue()).toBe('0');
      expect(ValueTypes.text.defaultValue()).toBe('');
      expect(ValueTypes.boolean.defaultValue()).toBe(false);
      expect(ValueTypes.datetime.defaultValue().getTime()).toBe(0);
      expect(ValueTypes.bytes.defaultValue()).toHaveLength(0);
      expect(ValueTypes.nullable(ValueTypes.integer).defaultValue()).toBeNull();
    });

    it('should hand out a fresh default object on every call', () => {
      expect(ValueTypes.datetime.defaultValue()).not.toBe(ValueTypes.datetime.defaultValue());
    });
  });

  describe('integer', () => {
    it('should accept integers, integral floats, integer literals and booleans', () => {
      expect(ValueTypes.integer.fromDb(int(42))).toBe(42);
      expect(ValueTypes.integer.fromDb(int(42n))).toBe(42);
      expect(ValueTypes.integer.fromDb(flt(3))).toBe(3);
      expect(ValueTypes.integer.fromDb(dec('12'))).toBe(12);
      expect(ValueTypes.integer.fromDb(txt(' -7 '))).toBe(-7);
      expect(ValueTypes.integer.fromDb(bool(true))).toBe(1);
    });

    it('should refuse fractional values', () => {
      expect(() => ValueTypes.integer.fromDb(flt(3.5))).toThrow(
        'Cannot convert float value to integer: 3.5 is not integral',
      );
    });

    it('should refuse non-numeric text', () => {
      expect(() => ValueTypes.integer.fromDb(txt('abc'))).toThrow(
        'Cannot convert text value to integer: "abc" is not an integer literal',
      );
    });

    it('should refuse values outside the safe integer range', () => {
      expect(() => ValueTypes.integer.fromDb(int(2n ** 60n))).toThrow(CoercionError);
    });

    it('should refuse NULL', () => {
      expect(() => ValueTypes.integer.fromDb(NULL_VALUE)).toThrow(
        'Cannot convert null value to integer: value is NULL',
      );
    });

    it('should refuse dates', () => {
      expect(() => ValueTypes.integer.fromDb(dt(new Date(0)))).toThrow(CoercionError);
    });
  });

  describe('bigint', () => {
    it('should keep integers beyond the safe range exact', () => {
      expect(ValueTypes.bigint.fromDb(int(2n ** 60n))).toBe(2n ** 60n);
      expect(ValueTypes.bigint.fromDb(dec('9007199254740993'))).toBe(9007199254740993n);
      expect(ValueTypes.bigint.fromDb(int(5))).toBe(5n);
    });
  });

  describe('float', () => {
    it('should accept integers, floats and numeric text', () => {
      expect(ValueTypes.float.fromDb(int(2))).toBe(2);
      expect(ValueTypes.float.fromDb(flt(2.25))).toBe(2.25);
      expect(ValueTypes.float.fromDb(dec('12.50'))).toBe(12.5);
      expect(ValueTypes.float.fromDb(txt('1e3'))).toBe(1000);
    });

    it('should refuse non-numeric text and booleans', () => {
      expect(() => ValueTypes.float.fromDb(txt('twelve'))).toThrow(CoercionError);
      expect(() => ValueTypes.float.fromDb(bool(true))).toThrow(CoercionError);
    });
  });

  describe('decimal', () => {
    it('should keep the decimal text exact', () => {
      expect(ValueTypes.decimal.fromDb(dec('0.10'))).toBe('0.10');
      expect(ValueTypes.decimal.fromDb(flt(1.5))).toBe('1.5');
      expect(ValueTypes.decimal.fromDb(int(3))).toBe('3');
    });

    it('should refuse non-numeric text', () => {
      expect(() => ValueTypes.decimal.fromDb(txt('n/a'))).toThrow(CoercionError);
    });
  });

  describe('text', () => {
    it('should stringify scalars, dates and UTF-8 bytes', () => {
      expect(ValueTypes.text.fromDb(txt('hello'))).toBe('hello');
      expect(ValueTypes.text.fromDb(int(5))).toBe('5');
      expect(ValueTypes.text.fromDb(dec('1.20'))).toBe('1.20');
      expect(ValueTypes.text.fromDb(bool(false))).toBe('false');
      expect(ValueTypes.text.fromDb(dt(new Date('2024-01-02T03:04:05.000Z')))).toBe(
        '2024-01-02T03:04:05.000Z',
      );
      expect(ValueTypes.text.fromDb(bin(Buffer.from('hi', 'utf8')))).toBe('hi');
    });
  });

  describe('boolean', () => {
    it('should accept 0/1 integers, BIT(1) buffers and boolean literals', () => {
      expect(ValueTypes.boolean.fromDb(bool(true))).toBe(true);
      expect(ValueTypes.boolean.fromDb(int(0))).toBe(false);
      expect(ValueTypes.boolean.fromDb(int(1))).toBe(true);
      expect(ValueTypes.boolean.fromDb(bin(Buffer.from([1])))).toBe(true);
      expect(ValueTypes.boolean.fromDb(bin(Buffer.from([0])))).toBe(false);
      expect(ValueTypes.boolean.fromDb(txt('FALSE'))).toBe(false);
      expect(ValueTypes.boolean.fromDb(txt('1'))).toBe(true);
    });

    it('should refuse other integers and multi-byte buffers', () => {
      expect(() => ValueTypes.boolean.fromDb(int(2))).toThrow(
        'Cannot convert integer value to boolean: 2 is neither 0 nor 1',
      );
      expect(() => ValueTypes.boolean.fromDb(bin(Buffer.from([0, 1])))).toThrow(CoercionError);
    });
  });

  describe('datetime', () => {
    it('should accept dates and parseable text', () => {
      const when = new Date('2024-06-05T10:00:00.000Z');

      expect(ValueTypes.datetime.fromDb(dt(when))).toBe(when);
      expect(ValueTypes.datetime.fromDb(txt('2024-06-05T10:00:00.000Z'))).toEqual(when);
    });

    it('should refuse unparseable text and numbers', () => {
      expect(() => ValueTypes.datetime.fromDb(txt('not a date'))).toThrow(
        'Cannot convert text value to datetime: "not a date" is not a date',
      );
      expect(() => ValueTypes.datetime.fromDb(int(1))).toThrow(CoercionError);
    });
  });

  describe('bytes', () => {
    it('should accept buffers and encode text as UTF-8', () => {
      const blob = Buffer.from([9, 8, 7]);

      expect(ValueTypes.bytes.fromDb(bin(blob))).toBe(blob);
      expect(ValueTypes.bytes.fromDb(txt('ab'))).toEqual(Buffer.from('ab', 'utf8'));
    });

    it('should refuse numbers', () => {
      expect(() => ValueTypes.bytes.fromDb(int(1))).toThrow(CoercionError);
    });
  });

  describe('nullable()', () => {
    it('should turn NULL into null and delegate everything else', () => {
      const type = ValueTypes.nullable(ValueTypes.integer);

      expect(type.name).toBe('integer | null');
      expect(type.fromDb(NULL_VALUE)).toBeNull();
      expect(type.fromDb(int(3))).toBe(3);
      expect(() => type.fromDb(txt('x'))).toThrow(CoercionError);
    });
  });
});
