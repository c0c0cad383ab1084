/**
 * Stored-Procedure Parameter
 * Layer: Domain
 *
 * MySQL binds CALL arguments by position, so the name is only used in logs
 * and error messages; the order in which parameters are passed is the order
 * they are bound.
 *
 * `output` and `inputOutput` parameters are written back after the call:
 * the adapter reads the session variables they were bound to and assigns
 * the result to `value`, so callers keep a reference and read it afterwards.
 */
import { fromScalar, NULL_VALUE, type DbValue, type ScalarInput } from './DbValue';

export type ParameterDirection = 'input' | 'output' | 'inputOutput';

export class ProcedureParameter {
  private current: DbValue;

  constructor(
    public readonly name: string,
    value: DbValue,
    public readonly direction: ParameterDirection,
  ) {
    this.current = value;
  }

  get value(): DbValue {
    return this.current;
  }

  /** True for the directions the procedure can write to. */
  get returnsValue(): boolean {
    return this.direction !== 'input';
  }

  /** Stores the value the procedure assigned. Input parameters never change. */
  receive(value: DbValue): void {
    if (!this.returnsValue) return;
    this.current = value;
  }
}

export function inputParameter(name: string, value: ScalarInput): ProcedureParameter {
  return new ProcedureParameter(name, fromScalar(value), 'input');
}

export function inputOutputParameter(name: string, value: ScalarInput): ProcedureParameter {
  return new ProcedureParameter(name, fromScalar(value), 'inputOutput');
}

export function outputParameter(name: string): ProcedureParameter {
  return new ProcedureParameter(name, NULL_VALUE, 'output');
}
