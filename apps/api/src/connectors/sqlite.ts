import path from 'path';
import Database from 'better-sqlite3';
import type { RawSchema } from '../schema/model';
import { assembleRawSchema } from './assemble';
import type { ColumnRow, ForeignKeyRow, KeyRow, SchemaConnector } from './types';

type TableInfoRow = {
  name: string;
  type: string;
  notnull: number;
  pk: number; // 1-based position in the primary key, 0 when not part of it
};

type ForeignKeyListRow = {
  from: string;
  table: string;
  to: string | null;
};

const quoteIdent = (name: string) => `"${name.replace(/"/g, '""')}"`;

const tableInfo = (db: Database.Database, table: string) =>
  db.prepare<[], TableInfoRow>(`PRAGMA table_info(${quoteIdent(table)})`).all();

export class SqliteConnector implements SchemaConnector {
  readonly dialect = 'sqlite' as const;

  async extract(filePath: string): Promise<RawSchema> {
    const db = new Database(filePath, { readonly: true, fileMustExist: true });

    try {
      const tables = db
        .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%'")
        .all();

      const columns: ColumnRow[] = [];
      const primaryKeys: KeyRow[] = [];
      const foreignKeys: ForeignKeyRow[] = [];

      for (const { name: tableName } of tables) {
        const info = tableInfo(db, tableName);
        const pkColumns = info.filter(col => col.pk > 0).sort((a, b) => a.pk - b.pk);

        for (const col of info) {
          columns.push({
            table_name: tableName,
            column_name: col.name,
            // Untyped columns report '' and take BLOB affinity.
            data_type: col.type || 'BLOB',
            is_nullable: col.notnull === 0 && col.pk === 0
          });
        }
        for (const col of pkColumns) primaryKeys.push({ table_name: tableName, column_name: col.name });

        const fks = db.prepare<[], ForeignKeyListRow>(`PRAGMA foreign_key_list(${quoteIdent(tableName)})`).all();
        for (const fk of fks) {
          // `to` is null when the reference names no column: it then means the target's primary key.
          const target = fk.to ?? tableInfo(db, fk.table).find(col => col.pk === 1)?.name;
          if (!target) continue;
          foreignKeys.push({
            table_name: tableName,
            column_name: fk.from,
            references_table: fk.table,
            references_column: target
          });
        }
      }

      return assembleRawSchema(path.basename(filePath, path.extname(filePath)), columns, primaryKeys, foreignKeys);
    } finally {
      db.close();
    }
  }
}
