/**
 * Result Set Containers
 * Layer: Domain
 *
 * Row       — one DbValue per column, in the order the driver reported them.
 * ResultSet — the rows of one SELECT executed by a procedure, plus the column
 *             names (name-based record mapping needs them).
 * CallResult — everything one CALL produced: its result sets in order and the
 *             affected-row count from the trailing OK packet.
 */
import type { DbValue } from './DbValue';

export type Row = readonly DbValue[];

export interface Column {
  name: string;
}

export interface ResultSet {
  columns: Column[];
  rows: Row[];
}

export interface CallResult {
  resultSets: ResultSet[];
  affectedRows: number;
}
