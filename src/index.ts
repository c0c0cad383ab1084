/**
 * Public entry point.
 *
 * Two ways in:
 *
 *   - `createDataSource(connectionString)` for plain callers.
 *   - `container.resolve<IDataSourceAdapter>(TOKENS.DataSourceAdapter)` for
 *     callers already wired through tsyringe (see core/container).
 */
import 'reflect-metadata';

import { logger as defaultLogger, type Logger } from '@core/logger';
import type { IDataSourceAdapter } from '@domain/interfaces/IDataSourceAdapter';
import { MySqlDataSourceAdapter } from '@infrastructure/adapters/MySqlDataSourceAdapter';
import { KnexConnector } from '@infrastructure/database/KnexConnector';

export function createDataSource(
  connectionString: string,
  logger: Logger = defaultLogger,
): IDataSourceAdapter {
  return new MySqlDataSourceAdapter(connectionString, new KnexConnector(logger), logger);
}

export { container } from '@core/container';
export { TOKENS } from '@core/types';
export { createLogger, type Logger, type LoggerOptions, type LogLevel } from '@core/logger';

export type { DbValue, DbValueType, ScalarInput } from '@domain/entities/DbValue';
export { fromScalar, isNull, NULL_VALUE, unwrap } from '@domain/entities/DbValue';
export {
  inputOutputParameter,
  inputParameter,
  outputParameter,
  ProcedureParameter,
  type ParameterDirection,
} from '@domain/entities/ProcedureParameter';
export type { CallResult, Column, ResultSet, Row } from '@domain/entities/ResultSet';
export type { IDataSourceAdapter } from '@domain/interfaces/IDataSourceAdapter';
export type { DriverValue, IDbConnector, IDbSession, SqlStatement } from '@domain/interfaces/IDbConnector';
export {
  createRowMapper,
  defineRecord,
  mapRow,
  RecordShapeBuilder,
  type FieldMapping,
  type MapBy,
  type RecordShape,
} from '@domain/mapping/RecordShape';
export { ValueTypes, type ValueType } from '@domain/mapping/ValueType';
export { MySqlDataSourceAdapter } from '@infrastructure/adapters/MySqlDataSourceAdapter';
export { KnexConnector } from '@infrastructure/database/KnexConnector';
export { parseConnectionString, type MySqlConnectionSettings } from '@infrastructure/database/connectionString';
export {
  CoercionError,
  ConnectionStringError,
  DataAccessError,
  DriverResponseError,
  MappingError,
  type DataAccessErrorCode,
} from '@shared/errors/DataAccessError';
