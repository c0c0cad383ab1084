/**
 * mysql2 Response Normalizer
 * Layer: Infrastructure
 *
 * knex hands raw mysql2 results back untouched as `[rows, fields]`. With
 * `rowsAsArray` the shapes are:
 *
 *   CALL with no SELECT  → [ResultSetHeader, undefined]
 *   CALL with N SELECTs  → [[rows1, …, rowsN, ResultSetHeader], [fields1, …, fieldsN, undefined]]
 *   plain SELECT         → [rows, fields]
 *   SET                  → [ResultSetHeader, undefined]
 *
 * This module folds all of them into a CallResult of tagged DbValues. The
 * MySQL column type code on each field decides between float/integer and
 * decimal/text where the JavaScript value alone is ambiguous.
 */
import type { DbValue } from '@domain/entities/DbValue';
import { NULL_VALUE } from '@domain/entities/DbValue';
import type { CallResult, Column, ResultSet, Row } from '@domain/entities/ResultSet';
import { DriverResponseError } from '@shared/errors/DataAccessError';

/** MySQL protocol column type codes that change how a JavaScript value is read. */
export const MYSQL_TYPES = {
  DECIMAL: 0x00,
  FLOAT: 0x04,
  DOUBLE: 0x05,
  LONGLONG: 0x08,
  NEWDECIMAL: 0xf6,
} as const;

interface FieldInfo {
  name: string;
  type: number | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isHeader(value: unknown): value is { affectedRows: number } {
  return isRecord(value) && typeof value.affectedRows === 'number';
}

function toFieldInfo(value: unknown): FieldInfo {
  if (!isRecord(value) || typeof value.name !== 'string') {
    throw new DriverResponseError('field metadata without a column name');
  }
  return { name: value.name, type: typeof value.type === 'number' ? value.type : null };
}

export function toDbValue(raw: unknown, type: number | null): DbValue {
  if (raw === null || raw === undefined) return NULL_VALUE;
  if (typeof raw === 'boolean') return { type: 'boolean', value: raw };
  if (typeof raw === 'bigint') return { type: 'integer', value: raw };
  if (typeof raw === 'number') {
    if (type === MYSQL_TYPES.FLOAT || type === MYSQL_TYPES.DOUBLE || !Number.isInteger(raw)) {
      return { type: 'float', value: raw };
    }
    return { type: 'integer', value: raw };
  }
  if (typeof raw === 'string') {
    if (type === MYSQL_TYPES.DECIMAL || type === MYSQL_TYPES.NEWDECIMAL) {
      return { type: 'decimal', value: raw };
    }
    // supportBigNumbers: BIGINTs beyond 2^53 arrive as digit strings
    if (type === MYSQL_TYPES.LONGLONG && /^-?\d+$/.test(raw)) {
      return { type: 'integer', value: BigInt(raw) };
    }
    return { type: 'text', value: raw };
  }
  if (raw instanceof Date) return { type: 'datetime', value: raw };
  if (Buffer.isBuffer(raw)) return { type: 'bytes', value: raw };
  // JSON columns are parsed by mysql2; hand them back as their text form
  return { type: 'text', value: JSON.stringify(raw) };
}

function toResultSet(rows: unknown, fields: unknown): ResultSet {
  if (!Array.isArray(rows) || !Array.isArray(fields)) {
    throw new DriverResponseError('result set without rows or field metadata');
  }
  const infos = fields.map(toFieldInfo);
  const columns: Column[] = infos.map((f) => ({ name: f.name }));

  const converted: Row[] = rows.map((row, rowIndex) => {
    if (!Array.isArray(row)) {
      throw new DriverResponseError(`row ${rowIndex} is not an array (was rowsAsArray set?)`);
    }
    if (row.length !== infos.length) {
      throw new DriverResponseError(
        `row ${rowIndex} has ${row.length} values for ${infos.length} columns`,
      );
    }
    return row.map((cell, i) => toDbValue(cell, infos[i].type));
  });

  return { columns, rows: converted };
}

export function normalizeMysqlResponse(response: unknown): CallResult {
  if (!Array.isArray(response) || response.length < 1) {
    throw new DriverResponseError('expected a [rows, fields] pair');
  }
  const rows: unknown = response[0];
  const fields: unknown = response[1];

  if (isHeader(rows)) {
    return { resultSets: [], affectedRows: rows.affectedRows };
  }
  if (!Array.isArray(rows) || !Array.isArray(fields)) {
    throw new DriverResponseError('expected a header or an array of rows');
  }

  // Multiple statements: field metadata is one array per result set
  const isMulti = fields.length > 0 && (Array.isArray(fields[0]) || fields[0] === undefined);
  if (!isMulti) {
    return { resultSets: [toResultSet(rows, fields)], affectedRows: 0 };
  }

  const resultSets: ResultSet[] = [];
  let affectedRows = 0;
  rows.forEach((entry: unknown, i: number) => {
    if (isHeader(entry)) {
      affectedRows = entry.affectedRows;
      return;
    }
    resultSets.push(toResultSet(entry, fields[i]));
  });
  return { resultSets, affectedRows };
}
