/**
 * Test Fixtures — Reusable Sample Data
 * Layer: Test Helpers
 *
 * Result sets are built from plain JavaScript values through fromScalar(), so
 * a fixture reads like the table it stands for. Record shapes used by more
 * than one test file live here too.
 */
import type { Logger } from '@core/logger';
import { fromScalar, type ScalarInput } from '@domain/entities/DbValue';
import type { CallResult, ResultSet } from '@domain/entities/ResultSet';
import { defineRecord } from '@domain/mapping/RecordShape';
import { ValueTypes } from '@domain/mapping/ValueType';
import pino from 'pino';

export const silentLogger: Logger = pino({ level: 'silent' });

export const TEST_CONNECTION_STRING = 'Server=db.test;Database=shop;Uid=app;Pwd=test-secret';

export function resultSet(columns: string[], rows: ScalarInput[][]): ResultSet {
  return {
    columns: columns.map((name) => ({ name })),
    rows: rows.map((row) => row.map(fromScalar)),
  };
}

export function callResult(resultSets: ResultSet[] = [], affectedRows = 0): CallResult {
  return { resultSets, affectedRows };
}

export interface User {
  id: number;
  name: string;
  email: string | null;
}

/** Positional shape: id, name, email in column order. */
export const UserShape = defineRecord<User>('User', () => ({ id: 0, name: '', email: null }))
  .field('id', ValueTypes.integer)
  .field('name', ValueTypes.text)
  .field('email', ValueTypes.nullable(ValueTypes.text))
  .build();

/** The two-row, three-column listing returned by sp_list_users. */
export const usersResultSet = resultSet(
  ['id', 'name', 'email'],
  [
    [1, 'ann', 'ann@example.test'],
    [2, 'bob', null],
  ],
);
