import { z } from 'zod';
import { InvalidSchemaError } from '../errors';
import type {
  ColumnModel,
  DanglingReferenceWarning,
  DeclaredForeignKey,
  SchemaModel,
  TableModel
} from '../types/schema';
import { classifyType } from '../utils/type-class';

const rawColumnSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1),
  nullable: z.boolean().default(true),
  is_primary_key: z.boolean().default(false)
});

const rawForeignKeySchema = z.object({
  column: z.string().min(1),
  references_table: z.string().min(1),
  references_column: z.string().min(1)
});

const rawTableSchema = z.object({
  name: z.string().min(1),
  columns: z.array(rawColumnSchema).default([]),
  primary_key: z.string().min(1).nullable().optional(),
  foreign_keys: z.array(rawForeignKeySchema).default([])
});

export const rawSchemaSchema = z.object({
  database: z.string().default(''),
  tables: z.array(rawTableSchema)
});

/** Connector-agnostic schema description, as handed over by an extractor. */
export type RawSchema = z.input<typeof rawSchemaSchema>;
export type RawTable = z.input<typeof rawTableSchema>;
export type RawColumn = z.input<typeof rawColumnSchema>;
export type RawForeignKey = z.input<typeof rawForeignKeySchema>;

type ParsedSchema = z.output<typeof rawSchemaSchema>;

const formatIssues = (error: z.ZodError) =>
  error.issues.map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message));

const findDuplicates = (names: string[]) => {
  const seen = new Set<string>();
  const dupes = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) dupes.add(name);
    seen.add(name);
  }
  return Array.from(dupes);
};

const checkInvariants = (parsed: ParsedSchema): string[] => {
  const issues: string[] = [];

  for (const dupe of findDuplicates(parsed.tables.map(t => t.name))) {
    issues.push(`duplicate table name "${dupe}"`);
  }

  for (const table of parsed.tables) {
    const columnNames = table.columns.map(c => c.name);
    for (const dupe of findDuplicates(columnNames)) {
      issues.push(`table "${table.name}": duplicate column name "${dupe}"`);
    }
    if (table.primary_key && !columnNames.includes(table.primary_key)) {
      issues.push(`table "${table.name}": primary key "${table.primary_key}" is not a column`);
    }
    for (const fk of table.foreign_keys) {
      if (!columnNames.includes(fk.column)) {
        issues.push(`table "${table.name}": foreign key column "${fk.column}" is not a column`);
      }
    }
  }

  return issues;
};

const findDanglingReferences = (tables: readonly TableModel[]): DanglingReferenceWarning[] => {
  const byName = new Map(tables.map(t => [t.name, t]));
  const warnings: DanglingReferenceWarning[] = [];

  for (const table of tables) {
    for (const fk of table.foreignKeys) {
      const target = byName.get(fk.referencesTable);
      const missing = !target
        ? `table "${fk.referencesTable}" does not exist`
        : !target.columns.some(c => c.name === fk.referencesColumn)
          ? `column "${fk.referencesTable}.${fk.referencesColumn}" does not exist`
          : null;
      if (!missing) continue;

      warnings.push({
        code: 'DANGLING_REFERENCE',
        table: table.name,
        column: fk.column,
        referencesTable: fk.referencesTable,
        referencesColumn: fk.referencesColumn,
        message: `${table.name}.${fk.column} references ${fk.referencesTable}.${fk.referencesColumn}, but ${missing}`
      });
    }
  }

  return warnings;
};

const toTableModel = (table: ParsedSchema['tables'][number]): TableModel => {
  const primaryKey = table.primary_key ?? table.columns.find(c => c.is_primary_key)?.name ?? null;

  const columns: ColumnModel[] = table.columns.map(col =>
    Object.freeze({
      name: col.name,
      dataType: col.type,
      typeClass: classifyType(col.type),
      nullable: col.nullable,
      isPrimaryKey: col.is_primary_key || col.name === primaryKey
    })
  );

  const foreignKeys: DeclaredForeignKey[] = table.foreign_keys.map(fk =>
    Object.freeze({
      column: fk.column,
      referencesTable: fk.references_table,
      referencesColumn: fk.references_column
    })
  );

  return Object.freeze({
    name: table.name,
    columns: Object.freeze(columns),
    primaryKey,
    foreignKeys: Object.freeze(foreignKeys)
  });
};

/**
 * Validates a raw extracted schema and turns it into the frozen model that
 * inference and graph building read from.
 *
 * @throws InvalidSchemaError listing every problem found
 */
export const buildSchemaModel = (input: unknown): SchemaModel => {
  const result = rawSchemaSchema.safeParse(input);
  if (!result.success) throw new InvalidSchemaError(formatIssues(result.error));

  const issues = checkInvariants(result.data);
  if (issues.length) throw new InvalidSchemaError(issues);

  const tables = Object.freeze(result.data.tables.map(toTableModel));
  return Object.freeze({
    database: result.data.database,
    tables,
    warnings: Object.freeze(findDanglingReferences(tables))
  });
};

export const findTable = (schema: SchemaModel, name: string) => schema.tables.find(t => t.name === name);

export const findColumn = (table: TableModel, name: string) => table.columns.find(c => c.name === name);
