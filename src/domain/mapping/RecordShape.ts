/**
 * Record Shapes — Declared Row → Record Mapping
 * Layer: Domain
 *
 * A RecordShape is the static description of how one result-set row becomes
 * one typed record:
 *
 *   - `create()` builds an empty record (the zero-argument initializer).
 *   - `fields` is an ordered table of (column → field setter) entries, each
 *     carrying the ValueType that converts the cell.
 *
 * Shapes are built once, usually at module level, and reused for every call:
 *
 *   const UserShape = defineRecord('User', () => ({ id: 0, name: '', email: null as string | null }))
 *     .field('id', ValueTypes.integer)
 *     .field('name', ValueTypes.text)
 *     .field('email', ValueTypes.nullable(ValueTypes.text))
 *     .build();
 *
 * With `mapBy: 'position'` (the default) a field reads the column at its own
 * declaration index; with `mapBy: 'name'` it reads the column whose name
 * matches the field key, ignoring case. An explicit column (index or name)
 * passed to `.field()` wins over both.
 *
 * NULL cells assign the field type's default, the same rule getScalar() uses.
 */
import type { DbValue } from '@domain/entities/DbValue';
import type { Column, Row } from '@domain/entities/ResultSet';
import type { ValueType } from '@domain/mapping/ValueType';
import { CoercionError, MappingError } from '@shared/errors/DataAccessError';

export type MapBy = 'position' | 'name';

export interface FieldMapping<T> {
  readonly field: string;
  readonly column: number | string;
  assign(target: T, value: DbValue): void;
}

export interface RecordShape<T> {
  readonly name: string;
  readonly fields: readonly FieldMapping<T>[];
  create(): T;
}

export class RecordShapeBuilder<T extends object> {
  private readonly mappings: FieldMapping<T>[] = [];

  constructor(
    private readonly name: string,
    private readonly factory: () => T,
    private readonly mapBy: MapBy,
  ) {}

  field<K extends keyof T & string>(key: K, type: ValueType<T[K]>, column?: number | string): this {
    const position = this.mappings.length;
    this.mappings.push({
      field: key,
      column: column ?? (this.mapBy === 'position' ? position : key),
      assign(target: T, value: DbValue): void {
        target[key] = value.type === 'null' ? type.defaultValue() : type.fromDb(value);
      },
    });
    return this;
  }

  build(): RecordShape<T> {
    return Object.freeze({
      name: this.name,
      fields: Object.freeze([...this.mappings]),
      create: this.factory,
    });
  }
}

export function defineRecord<T extends object>(
  name: string,
  create: () => T,
  options: { mapBy?: MapBy } = {},
): RecordShapeBuilder<T> {
  return new RecordShapeBuilder(name, create, options.mapBy ?? 'position');
}

function resolveColumn(column: number | string, columns: readonly Column[]): number {
  if (typeof column === 'number') return column;
  const exact = columns.findIndex((c) => c.name === column);
  if (exact !== -1) return exact;
  const lowered = column.toLowerCase();
  return columns.findIndex((c) => c.name.toLowerCase() === lowered);
}

/**
 * Resolves the shape's columns against one result set's metadata and returns
 * a function mapping that result set's rows. Unresolved columns only fail when
 * a row is actually mapped, so an empty result set never raises.
 */
export function createRowMapper<T>(
  shape: RecordShape<T>,
  columns: readonly Column[],
): (row: Row, rowIndex: number) => T {
  const indexes = shape.fields.map((f) => resolveColumn(f.column, columns));

  return (row, rowIndex) => {
    const record = shape.create();
    shape.fields.forEach((mapping, i) => {
      const index = indexes[i];
      if (index < 0 || index >= row.length) {
        throw new MappingError(
          shape.name,
          mapping.field,
          rowIndex,
          `column ${typeof mapping.column === 'number' ? `#${mapping.column}` : `"${mapping.column}"`} is missing`,
        );
      }
      try {
        mapping.assign(record, row[index]);
      } catch (err) {
        if (err instanceof CoercionError) {
          throw new MappingError(shape.name, mapping.field, rowIndex, err.message, err);
        }
        throw err;
      }
    });
    return record;
  };
}

/** Maps a single row; see createRowMapper for the column rules. */
export function mapRow<T>(shape: RecordShape<T>, row: Row, columns: readonly Column[]): T {
  return createRowMapper(shape, columns)(row, 0);
}
