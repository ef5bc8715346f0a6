import pg from 'pg';
import type { RawSchema } from '../schema/model';
import { assembleRawSchema } from './assemble';
import type { ColumnRow, ForeignKeyRow, KeyRow, SchemaConnector } from './types';

const COLUMNS_SQL = `
  SELECT c.table_name, c.column_name, c.data_type, c.is_nullable
  FROM information_schema.columns c
  JOIN information_schema.tables t
    ON t.table_schema = c.table_schema AND t.table_name = c.table_name
  WHERE c.table_schema = $1 AND t.table_type = 'BASE TABLE'
  ORDER BY c.table_name, c.ordinal_position;`;

const PRIMARY_KEYS_SQL = `
  SELECT kcu.table_name, kcu.column_name
  FROM information_schema.table_constraints tc
  JOIN information_schema.key_column_usage kcu
    ON kcu.constraint_name = tc.constraint_name
   AND kcu.table_schema = tc.table_schema
   AND kcu.table_name = tc.table_name
  WHERE tc.table_schema = $1 AND tc.constraint_type = 'PRIMARY KEY'
  ORDER BY kcu.table_name, kcu.ordinal_position;`;

// Read from pg_constraint: constraint names are only unique per table, and
// composite keys pair source and target columns by position.
const FOREIGN_KEYS_SQL = `
  SELECT src.relname AS table_name, sa.attname AS column_name,
         tgt.relname AS references_table, ta.attname AS references_column
  FROM pg_constraint con
  JOIN pg_class src ON src.oid = con.conrelid
  JOIN pg_namespace ns ON ns.oid = src.relnamespace
  JOIN pg_class tgt ON tgt.oid = con.confrelid
  CROSS JOIN LATERAL unnest(con.conkey, con.confkey) WITH ORDINALITY AS k(src_attnum, tgt_attnum, position)
  JOIN pg_attribute sa ON sa.attrelid = con.conrelid AND sa.attnum = k.src_attnum
  JOIN pg_attribute ta ON ta.attrelid = con.confrelid AND ta.attnum = k.tgt_attnum
  WHERE con.contype = 'f' AND ns.nspname = $1
  ORDER BY src.relname, con.conname, k.position;`;

export class PostgresConnector implements SchemaConnector {
  readonly dialect = 'postgres' as const;

  constructor(private readonly schemaName = 'public') {}

  async extract(connectionString: string): Promise<RawSchema> {
    const client = new pg.Client({ connectionString });
    await client.connect();

    try {
      const db = await client.query<{ name: string }>('SELECT current_database() AS name');
      const columns = await client.query<ColumnRow>(COLUMNS_SQL, [this.schemaName]);
      const primaryKeys = await client.query<KeyRow>(PRIMARY_KEYS_SQL, [this.schemaName]);
      const foreignKeys = await client.query<ForeignKeyRow>(FOREIGN_KEYS_SQL, [this.schemaName]);

      return assembleRawSchema(db.rows[0]?.name ?? '', columns.rows, primaryKeys.rows, foreignKeys.rows);
    } finally {
      await client.end();
    }
  }
}
