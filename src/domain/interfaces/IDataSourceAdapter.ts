/**
 * Data Source Adapter Interface
 * Layer: Domain
 * Pattern: Adapter Pattern
 *
 * Turns "procedure name + parameters" into one database round trip and hands
 * the answer back in the shape the caller asks for: an affected-row count, a
 * scalar, raw rows, typed records, or every result set.
 *
 * Every call opens its own connection and closes it before the promise
 * settles; the only state an adapter keeps is its connection string.
 *
 * Absent results are not errors: `getScalar` resolves the type's default and
 * `getRecord` a freshly created record. Use `findScalar` / `findRecord` to
 * tell "no row" apart from "a row of defaults".
 */
import type { ScalarInput } from '@domain/entities/DbValue';
import type { ProcedureParameter } from '@domain/entities/ProcedureParameter';
import type { ResultSet, Row } from '@domain/entities/ResultSet';
import type { RecordShape } from '@domain/mapping/RecordShape';
import type { ValueType } from '@domain/mapping/ValueType';

export interface IDataSourceAdapter {
  /** Input parameter; the value is passed through unchanged. */
  input(name: string, value: ScalarInput): ProcedureParameter;

  /** Input-output parameter; `value` holds the procedure's assignment after the call. */
  inputOutput(name: string, value: ScalarInput): ProcedureParameter;

  /** Output parameter, NULL until the call assigns it. */
  output(name: string): ProcedureParameter;

  /** Runs the procedure and resolves the driver-reported affected-row count. */
  execute(procedure: string, ...parameters: ProcedureParameter[]): Promise<number>;

  /** First column of the first row of the first result set, or the type's default. */
  getScalar<T>(procedure: string, type: ValueType<T>, ...parameters: ProcedureParameter[]): Promise<T>;

  /** Like getScalar, but `null` when there is no row at all. */
  findScalar<T>(
    procedure: string,
    type: ValueType<T>,
    ...parameters: ProcedureParameter[]
  ): Promise<T | null>;

  /** Rows of the first result set. */
  getTable(procedure: string, ...parameters: ProcedureParameter[]): Promise<Row[]>;

  /** Rows of the first result set, each mapped onto a new record. */
  getRecords<T>(
    procedure: string,
    shape: RecordShape<T>,
    ...parameters: ProcedureParameter[]
  ): Promise<T[]>;

  /** First row mapped onto a record; a fresh record when there is no row. */
  getRecord<T>(procedure: string, shape: RecordShape<T>, ...parameters: ProcedureParameter[]): Promise<T>;

  /** Like getRecord, but `null` when there is no row. */
  findRecord<T>(
    procedure: string,
    shape: RecordShape<T>,
    ...parameters: ProcedureParameter[]
  ): Promise<T | null>;

  /** Rows of every result set, in the order the procedure produced them. */
  getData(procedure: string, ...parameters: ProcedureParameter[]): Promise<Row[][]>;

  /** Every result set with its column names. */
  getResultSets(procedure: string, ...parameters: ProcedureParameter[]): Promise<ResultSet[]>;
}
