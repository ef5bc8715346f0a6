import { UnsupportedDialectError } from '../errors';
import { MySqlConnector } from './mysql';
import { PostgresConnector } from './postgres';
import { SqliteConnector } from './sqlite';
import type { SchemaConnector } from './types';

/** Explicit lookup table from dialect names and aliases to connectors. */
export class ConnectorRegistry {
  private readonly connectors = new Map<string, SchemaConnector>();

  register(connector: SchemaConnector, aliases: string[] = []) {
    for (const name of [connector.dialect, ...aliases]) {
      this.connectors.set(name.toLowerCase(), connector);
    }
    return this;
  }

  has(dialect: string) {
    return this.connectors.has(dialect.trim().toLowerCase());
  }

  get(dialect: string): SchemaConnector {
    const connector = this.connectors.get(dialect.trim().toLowerCase());
    if (!connector) throw new UnsupportedDialectError(dialect, this.names());
    return connector;
  }

  names() {
    return Array.from(this.connectors.keys()).sort();
  }
}

export type RegistryOptions = {
  pgSchema?: string;
};

export const createDefaultRegistry = (options: RegistryOptions = {}) =>
  new ConnectorRegistry()
    .register(new PostgresConnector(options.pgSchema), ['postgresql', 'supabase', 'redshift'])
    .register(new MySqlConnector(), ['mariadb'])
    .register(new SqliteConnector(), ['sqlite3']);
