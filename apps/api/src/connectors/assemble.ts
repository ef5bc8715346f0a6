import type { RawSchema, RawTable } from '../schema/model';
import type { ColumnRow, ForeignKeyRow, KeyRow } from './types';

const isNullable = (value: boolean | string) =>
  typeof value === 'boolean' ? value : value.trim().toUpperCase() === 'YES';

/**
 * Folds catalog rows into the raw schema shape. Column rows must arrive in
 * table and ordinal order; table order follows first appearance.
 */
export const assembleRawSchema = (
  database: string,
  columns: ColumnRow[],
  primaryKeys: KeyRow[],
  foreignKeys: ForeignKeyRow[]
): RawSchema => {
  const tables = new Map<string, RawTable & { columns: NonNullable<RawTable['columns']> }>();
  const pkSet = new Set(primaryKeys.map(pk => `${pk.table_name}.${pk.column_name}`));

  for (const row of columns) {
    let table = tables.get(row.table_name);
    if (!table) {
      table = { name: row.table_name, columns: [], primary_key: null, foreign_keys: [] };
      tables.set(row.table_name, table);
    }
    const isPk = pkSet.has(`${row.table_name}.${row.column_name}`);
    table.columns.push({
      name: row.column_name,
      type: row.data_type,
      nullable: isNullable(row.is_nullable),
      is_primary_key: isPk
    });
    if (isPk && !table.primary_key) table.primary_key = row.column_name;
  }

  for (const fk of foreignKeys) {
    const table = tables.get(fk.table_name);
    if (!table) continue;
    table.foreign_keys = [
      ...(table.foreign_keys ?? []),
      { column: fk.column_name, references_table: fk.references_table, references_column: fk.references_column }
    ];
  }

  return { database, tables: Array.from(tables.values()) };
};
