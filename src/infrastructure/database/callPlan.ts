/**
 * Stored-Procedure Call Planner
 * Layer: Infrastructure
 *
 * MySQL has no protocol-level output parameters: a procedure writes its OUT
 * and INOUT arguments into whatever user variables it was called with. So one
 * logical call becomes up to three kinds of statement on the same connection:
 *
 *   SET @_p2 = ?                      -- INOUT seeds (and OUT resets to NULL)
 *   CALL ??(?, @_p2, ?)               -- `??` lets knex quote the procedure name
 *   SELECT @_p2                       -- read back what the procedure assigned
 *
 * Parameters are bound positionally in the order the caller passed them.
 * Variable names carry the 1-based position, so duplicate parameter names
 * never collide.
 */
import type { DbValue } from '@domain/entities/DbValue';
import type { ProcedureParameter } from '@domain/entities/ProcedureParameter';
import type { DriverValue, SqlStatement } from '@domain/interfaces/IDbConnector';

export interface CallPlan {
  prepare: SqlStatement[];
  call: SqlStatement;
  /** Reads output variables back; null when no parameter returns a value. */
  collect: SqlStatement | null;
  /** Parameters receiving the columns of `collect`, in column order. */
  outputs: ProcedureParameter[];
}

export function toBinding(value: DbValue): DriverValue {
  switch (value.type) {
    case 'null':
      return null;
    case 'integer':
      // knex has no bigint binding; MySQL converts the digits back on arrival
      return typeof value.value === 'bigint' ? value.value.toString() : value.value;
    default:
      return value.value;
  }
}

export function planCall(procedure: string, parameters: readonly ProcedureParameter[]): CallPlan {
  const prepare: SqlStatement[] = [];
  const placeholders: string[] = [];
  const bindings: DriverValue[] = [procedure];
  const variables: string[] = [];
  const outputs: ProcedureParameter[] = [];

  parameters.forEach((parameter, i) => {
    if (parameter.direction === 'input') {
      placeholders.push('?');
      bindings.push(toBinding(parameter.value));
      return;
    }

    const variable = `@_p${i + 1}`;
    if (parameter.direction === 'inputOutput') {
      prepare.push({ sql: `SET ${variable} = ?`, bindings: [toBinding(parameter.value)] });
    } else {
      prepare.push({ sql: `SET ${variable} = NULL`, bindings: [] });
    }
    placeholders.push(variable);
    variables.push(variable);
    outputs.push(parameter);
  });

  return {
    prepare,
    call: { sql: `CALL ??(${placeholders.join(', ')})`, bindings },
    collect: variables.length > 0 ? { sql: `SELECT ${variables.join(', ')}`, bindings: [] } : null,
    outputs,
  };
}
