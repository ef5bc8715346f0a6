import pkg from 'node-sql-parser';
import { DdlParseError, errorMessage } from '../errors';
import type { RawColumn, RawForeignKey, RawSchema, RawTable } from '../schema/model';

const { Parser } = pkg;

type Node = Record<string, unknown>;

const isNode = (value: unknown): value is Node => typeof value === 'object' && value !== null && !Array.isArray(value);

const asNodes = (value: unknown): Node[] => (Array.isArray(value) ? value.filter(isNode) : isNode(value) ? [value] : []);

/** Identifier out of the parser's column/table reference shapes, which vary by version. */
const identifierOf = (value: unknown): string | null => {
  if (typeof value === 'string') return value;
  if (!isNode(value)) return null;
  return (
    identifierOf(value.column) ??
    identifierOf(value.expr) ??
    (typeof value.value === 'string' ? value.value : null) ??
    (typeof value.table === 'string' ? value.table : null)
  );
};

const identifiersOf = (value: unknown): string[] =>
  (Array.isArray(value) ? value : [value]).map(identifierOf).filter((c): c is string => c !== null);

const normalizeDialect = (dialect: string) => {
  const d = dialect.toLowerCase();
  if (d === 'postgres' || d === 'postgresql') return 'postgresql';
  if (d === 'mysql' || d === 'mariadb') return 'mysql';
  if (d === 'sqlite') return 'sqlite';
  return 'postgresql';
};

const columnType = (definition: unknown) => {
  if (!isNode(definition)) return 'unknown';
  const dataType = definition.dataType ?? definition.data_type;
  if (typeof dataType !== 'string') return 'unknown';
  return typeof definition.length === 'number' ? `${dataType}(${definition.length})` : dataType;
};

const isNotNull = (nullable: unknown) => isNode(nullable) && String(nullable.type).toLowerCase() === 'not null';

const referenceOf = (node: unknown) => {
  if (!isNode(node)) return null;
  const table = identifiersOf(node.table)[0];
  const columns = identifiersOf(node.definition);
  if (!table) return null;
  return { table, columns };
};

const parseCreateTable = (node: Node): RawTable | null => {
  const tableName = identifiersOf(node.table)[0];
  if (!tableName) return null;

  const columns: RawColumn[] = [];
  const foreignKeys: RawForeignKey[] = [];
  let primaryKey: string | null = null;

  for (const def of asNodes(node.create_definitions)) {
    if (def.resource === 'column') {
      const name = identifierOf(def.column);
      if (!name) continue;
      const isPk = typeof def.primary_key === 'string' && def.primary_key.toLowerCase().includes('primary');
      columns.push({
        name,
        type: columnType(def.definition),
        nullable: !isPk && !isNotNull(def.nullable),
        is_primary_key: isPk
      });
      if (isPk && !primaryKey) primaryKey = name;

      const ref = referenceOf(def.reference_definition);
      if (ref?.columns[0]) {
        foreignKeys.push({ column: name, references_table: ref.table, references_column: ref.columns[0] });
      }
      continue;
    }

    if (def.resource !== 'constraint') continue;
    const constraintType = String(def.constraint_type).toLowerCase();
    const keyColumns = identifiersOf(def.definition);

    if (constraintType === 'primary key') {
      for (const col of columns) {
        if (keyColumns.includes(col.name)) col.is_primary_key = true;
      }
      primaryKey = primaryKey ?? keyColumns[0] ?? null;
    }

    if (constraintType === 'foreign key') {
      const ref = referenceOf(def.reference_definition);
      if (!ref) continue;
      keyColumns.forEach((column, i) => {
        const target = ref.columns[i];
        if (target) foreignKeys.push({ column, references_table: ref.table, references_column: target });
      });
    }
  }

  for (const col of columns) {
    if (col.is_primary_key) col.nullable = false;
  }

  return { name: tableName, columns, primary_key: primaryKey, foreign_keys: foreignKeys };
};

/** `CREATE TABLE` statements to a raw schema. Other statements are skipped. */
export const ingestDDL = (ddl: string, dialect: string, database = ''): RawSchema => {
  const parser = new Parser();
  let ast: unknown;
  try {
    ast = parser.astify(ddl, { database: normalizeDialect(dialect) });
  } catch (err) {
    throw new DdlParseError(errorMessage(err, 'unknown parser error'));
  }

  const tables: RawTable[] = [];
  for (const node of asNodes(ast)) {
    if (node.type !== 'create' || node.keyword !== 'table') continue;
    const table = parseCreateTable(node);
    if (table) tables.push(table);
  }

  return { database, tables };
};
