import type { RawSchema } from '../schema/model';

export type ConnectorDialect = 'postgres' | 'mysql' | 'sqlite';

/**
 * Capability implemented once per database engine. The connection string is
 * a URL for network databases and a file path for SQLite.
 */
export interface SchemaConnector {
  readonly dialect: ConnectorDialect;
  extract(connectionString: string): Promise<RawSchema>;
}

export type ColumnRow = {
  table_name: string;
  column_name: string;
  data_type: string;
  is_nullable: boolean | string;
};

export type KeyRow = {
  table_name: string;
  column_name: string;
};

export type ForeignKeyRow = KeyRow & {
  references_table: string;
  references_column: string;
};
