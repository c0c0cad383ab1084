/**
 * MySQL Data Source Adapter — Stored Procedures In, Rows and Records Out
 * Layer: Infrastructure
 * Pattern: Adapter Pattern (implements IDataSourceAdapter)
 *
 * Every public operation funnels through `call()`:
 *
 *   1. planCall() turns the procedure name and parameters into the SET / CALL /
 *      SELECT statements the call needs.
 *   2. The connector opens a session (one connection), the statements run in
 *      order, output parameters receive their values.
 *   3. The session is closed on every path. When the call itself failed, a
 *      failure to close is logged and the call's error is the one thrown.
 *
 * Shaping the result (first row, scalar coercion, record mapping) happens only
 * after the connection is released. Driver errors are not caught here; they
 * leave `call()` unchanged once the session is closed.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { ScalarInput } from '@domain/entities/DbValue';
import {
  inputOutputParameter,
  inputParameter,
  outputParameter,
  type ProcedureParameter,
} from '@domain/entities/ProcedureParameter';
import type { CallResult, ResultSet, Row } from '@domain/entities/ResultSet';
import type { IDataSourceAdapter } from '@domain/interfaces/IDataSourceAdapter';
import type { IDbConnector, IDbSession } from '@domain/interfaces/IDbConnector';
import { createRowMapper, mapRow, type RecordShape } from '@domain/mapping/RecordShape';
import type { ValueType } from '@domain/mapping/ValueType';
import { planCall, type CallPlan } from '@infrastructure/database/callPlan';
import { inject, injectable } from 'tsyringe';

@injectable()
export class MySqlDataSourceAdapter implements IDataSourceAdapter {
  constructor(
    @inject(TOKENS.ConnectionString) private readonly connectionString: string,
    @inject(TOKENS.DbConnector) private readonly connector: IDbConnector,
    @inject(TOKENS.Logger) private readonly log: Logger,
  ) {}

  input(name: string, value: ScalarInput): ProcedureParameter {
    return inputParameter(name, value);
  }

  inputOutput(name: string, value: ScalarInput): ProcedureParameter {
    return inputOutputParameter(name, value);
  }

  output(name: string): ProcedureParameter {
    return outputParameter(name);
  }

  async execute(procedure: string, ...parameters: ProcedureParameter[]): Promise<number> {
    const result = await this.call(procedure, parameters);
    return result.affectedRows;
  }

  async getScalar<T>(
    procedure: string,
    type: ValueType<T>,
    ...parameters: ProcedureParameter[]
  ): Promise<T> {
    const value = (await this.firstRow(procedure, parameters))?.row[0];
    if (value === undefined || value.type === 'null') return type.defaultValue();
    return type.fromDb(value);
  }

  async findScalar<T>(
    procedure: string,
    type: ValueType<T>,
    ...parameters: ProcedureParameter[]
  ): Promise<T | null> {
    const value = (await this.firstRow(procedure, parameters))?.row[0];
    if (value === undefined) return null;
    return value.type === 'null' ? type.defaultValue() : type.fromDb(value);
  }

  async getTable(procedure: string, ...parameters: ProcedureParameter[]): Promise<Row[]> {
    const result = await this.call(procedure, parameters);
    return result.resultSets[0]?.rows ?? [];
  }

  async getRecords<T>(
    procedure: string,
    shape: RecordShape<T>,
    ...parameters: ProcedureParameter[]
  ): Promise<T[]> {
    const result = await this.call(procedure, parameters);
    const first = result.resultSets[0];
    if (!first) return [];
    const map = createRowMapper(shape, first.columns);
    return first.rows.map((row, index) => map(row, index));
  }

  async getRecord<T>(
    procedure: string,
    shape: RecordShape<T>,
    ...parameters: ProcedureParameter[]
  ): Promise<T> {
    const first = await this.firstRow(procedure, parameters);
    return first ? mapRow(shape, first.row, first.resultSet.columns) : shape.create();
  }

  async findRecord<T>(
    procedure: string,
    shape: RecordShape<T>,
    ...parameters: ProcedureParameter[]
  ): Promise<T | null> {
    const first = await this.firstRow(procedure, parameters);
    return first ? mapRow(shape, first.row, first.resultSet.columns) : null;
  }

  async getData(procedure: string, ...parameters: ProcedureParameter[]): Promise<Row[][]> {
    const result = await this.call(procedure, parameters);
    return result.resultSets.map((set) => set.rows);
  }

  async getResultSets(procedure: string, ...parameters: ProcedureParameter[]): Promise<ResultSet[]> {
    const result = await this.call(procedure, parameters);
    return result.resultSets;
  }

  private async firstRow(
    procedure: string,
    parameters: ProcedureParameter[],
  ): Promise<{ row: Row; resultSet: ResultSet } | null> {
    const result = await this.call(procedure, parameters);
    const resultSet = result.resultSets[0];
    const row = resultSet?.rows[0];
    return resultSet && row ? { row, resultSet } : null;
  }

  /** One connection, one CALL (plus output-variable statements), always released. */
  private async call(procedure: string, parameters: ProcedureParameter[]): Promise<CallResult> {
    const plan = planCall(procedure, parameters);
    const startMs = Date.now();
    const session = await this.connector.open(this.connectionString);

    let result: CallResult;
    try {
      result = await this.run(session, plan);
    } catch (err) {
      // the call's own error wins over a failure to release the session
      await session.close().catch((closeErr: unknown) => {
        this.log.warn({ err: closeErr, procedure }, 'Failed to close session after a failed call');
      });
      throw err;
    }
    await session.close();

    this.log.debug(
      {
        procedure,
        parameters: parameters.length,
        resultSets: result.resultSets.length,
        affectedRows: result.affectedRows,
        durationMs: Date.now() - startMs,
      },
      'Stored procedure executed',
    );
    return result;
  }

  private async run(session: IDbSession, plan: CallPlan): Promise<CallResult> {
    for (const statement of plan.prepare) {
      await session.execute(statement);
    }
    const result = await session.execute(plan.call);

    if (plan.collect) {
      const collected = await session.execute(plan.collect);
      const values = collected.resultSets[0]?.rows[0] ?? [];
      plan.outputs.forEach((parameter, i) => {
        const value = values[i];
        if (value) parameter.receive(value);
      });
    }
    return result;
  }
}
