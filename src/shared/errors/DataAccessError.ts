/**
 * Custom Error Hierarchy
 * Layer: Shared
 *
 * Driver failures (connection refused, access denied, a SIGNAL raised inside a
 * procedure) are never wrapped: they reach the caller exactly as mysql2 threw
 * them. The classes below cover only what this library itself decides is wrong:
 *
 *   - CoercionError        — a value cannot become the requested ValueType.
 *   - MappingError         — a row cannot populate a RecordShape.
 *   - ConnectionStringError — the descriptor could not be parsed.
 *   - DriverResponseError  — mysql2 answered with a shape we do not know.
 *
 * Each carries a stable `code` so callers can branch without string matching.
 *
 * `Object.setPrototypeOf(this, new.target.prototype)` keeps `instanceof`
 * working for subclasses whatever the compilation target.
 */
export type DataAccessErrorCode =
  | 'TYPE_MISMATCH'
  | 'MAPPING_FAILED'
  | 'INVALID_CONNECTION_STRING'
  | 'UNEXPECTED_RESPONSE';

export class DataAccessError extends Error {
  public readonly code: DataAccessErrorCode;

  constructor(message: string, code: DataAccessErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class CoercionError extends DataAccessError {
  public readonly sourceType: string;
  public readonly targetType: string;

  constructor(sourceType: string, targetType: string, detail?: string) {
    super(
      `Cannot convert ${sourceType} value to ${targetType}${detail ? `: ${detail}` : ''}`,
      'TYPE_MISMATCH',
    );
    this.sourceType = sourceType;
    this.targetType = targetType;
  }
}

export class MappingError extends DataAccessError {
  public readonly record: string;
  public readonly field: string;
  public readonly rowIndex: number;

  constructor(record: string, field: string, rowIndex: number, reason: string, cause?: unknown) {
    super(`Cannot map row ${rowIndex} onto ${record}.${field}: ${reason}`, 'MAPPING_FAILED', {
      cause,
    });
    this.record = record;
    this.field = field;
    this.rowIndex = rowIndex;
  }
}

export class ConnectionStringError extends DataAccessError {
  constructor(message: string) {
    super(`Invalid connection string: ${message}`, 'INVALID_CONNECTION_STRING');
  }
}

export class DriverResponseError extends DataAccessError {
  constructor(message: string) {
    super(`Unexpected driver response: ${message}`, 'UNEXPECTED_RESPONSE');
  }
}
