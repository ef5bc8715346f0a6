import mysql, { type RowDataPacket } from 'mysql2/promise';
import type { RawSchema } from '../schema/model';
import { assembleRawSchema } from './assemble';
import type { ColumnRow, ForeignKeyRow, KeyRow, SchemaConnector } from './types';

// Aliased to lower case: MySQL 8 returns information_schema names upper-cased.
const COLUMNS_SQL = `
  SELECT c.TABLE_NAME AS table_name, c.COLUMN_NAME AS column_name,
         c.DATA_TYPE AS data_type, c.IS_NULLABLE AS is_nullable
  FROM information_schema.columns c
  JOIN information_schema.tables t
    ON t.TABLE_SCHEMA = c.TABLE_SCHEMA AND t.TABLE_NAME = c.TABLE_NAME
  WHERE c.TABLE_SCHEMA = DATABASE() AND t.TABLE_TYPE = 'BASE TABLE'
  ORDER BY c.TABLE_NAME, c.ORDINAL_POSITION;`;

const PRIMARY_KEYS_SQL = `
  SELECT TABLE_NAME AS table_name, COLUMN_NAME AS column_name
  FROM information_schema.key_column_usage
  WHERE TABLE_SCHEMA = DATABASE() AND CONSTRAINT_NAME = 'PRIMARY'
  ORDER BY TABLE_NAME, ORDINAL_POSITION;`;

const FOREIGN_KEYS_SQL = `
  SELECT TABLE_NAME AS table_name, COLUMN_NAME AS column_name,
         REFERENCED_TABLE_NAME AS references_table, REFERENCED_COLUMN_NAME AS references_column
  FROM information_schema.key_column_usage
  WHERE TABLE_SCHEMA = DATABASE() AND REFERENCED_TABLE_NAME IS NOT NULL
  ORDER BY TABLE_NAME, COLUMN_NAME;`;

type Row<T> = T & RowDataPacket;

export class MySqlConnector implements SchemaConnector {
  readonly dialect = 'mysql' as const;

  async extract(connectionString: string): Promise<RawSchema> {
    const conn = await mysql.createConnection(connectionString);

    try {
      const [db] = await conn.query<Row<{ name: string | null }>[]>('SELECT DATABASE() AS name');
      const [columns] = await conn.query<Row<ColumnRow>[]>(COLUMNS_SQL);
      const [primaryKeys] = await conn.query<Row<KeyRow>[]>(PRIMARY_KEYS_SQL);
      const [foreignKeys] = await conn.query<Row<ForeignKeyRow>[]>(FOREIGN_KEYS_SQL);

      return assembleRawSchema(db[0]?.name ?? '', columns, primaryKeys, foreignKeys);
    } finally {
      await conn.end();
    }
  }
}
