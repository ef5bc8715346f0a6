import type { ColumnModel, Relationship, SchemaModel, TableModel } from '../types/schema';
import { type CandidateScore, scoreCandidate } from './scorer';

type Target = {
  table: TableModel;
  key: ColumnModel;
};

type ScoredCandidate = Target & { score: CandidateScore };

// Code-unit comparison, independent of the process locale.
const compareText = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

export const compareRelationships = (a: Relationship, b: Relationship) =>
  compareText(a.sourceColumn, b.sourceColumn) ||
  compareText(a.targetTable, b.targetTable) ||
  compareText(a.targetColumn, b.targetColumn);

/** Better candidate first: higher score, then shorter table name, then name order. */
const compareCandidates = (a: ScoredCandidate, b: ScoredCandidate) =>
  b.score.confidence - a.score.confidence ||
  a.table.name.length - b.table.name.length ||
  compareText(a.table.name, b.table.name);

const keyedTargets = (schema: SchemaModel): Target[] => {
  const targets: Target[] = [];
  for (const table of schema.tables) {
    if (!table.primaryKey) continue;
    const key = table.columns.find(c => c.name === table.primaryKey);
    if (key) targets.push({ table, key });
  }
  return targets;
};

export const declaredRelationships = (schema: SchemaModel): Relationship[] => {
  const dangling = new Set(schema.warnings.map(w => `${w.table}.${w.column}->${w.referencesTable}.${w.referencesColumn}`));

  return schema.tables.flatMap(table =>
    table.foreignKeys.map(fk => {
      const relationship: Relationship = {
        sourceTable: table.name,
        sourceColumn: fk.column,
        targetTable: fk.referencesTable,
        targetColumn: fk.referencesColumn,
        confidence: 1,
        basis: 'DECLARED'
      };
      if (dangling.has(`${table.name}.${fk.column}->${fk.referencesTable}.${fk.referencesColumn}`)) {
        relationship.inconsistent = true;
      }
      return relationship;
    })
  );
};

export const bestCandidate = (
  column: ColumnModel,
  table: TableModel,
  targets: readonly Target[]
): ScoredCandidate | null => {
  const scored: ScoredCandidate[] = [];
  for (const target of targets) {
    const score = scoreCandidate(column, table, target.table, target.key);
    if (score) scored.push({ ...target, score });
  }
  if (!scored.length) return null;
  return scored.sort(compareCandidates)[0];
};

/**
 * One inferred relationship at most per column that is neither the table's
 * own primary key nor already covered by a declared foreign key.
 */
export const inferRelationshipsHeuristic = (schema: SchemaModel): Relationship[] => {
  const targets = keyedTargets(schema);
  const relationships: Relationship[] = [];

  for (const table of schema.tables) {
    const declared = new Set(table.foreignKeys.map(fk => fk.column));

    for (const column of table.columns) {
      if (column.name === table.primaryKey || declared.has(column.name)) continue;

      const best = bestCandidate(column, table, targets);
      if (!best) continue;

      relationships.push({
        sourceTable: table.name,
        sourceColumn: column.name,
        targetTable: best.table.name,
        targetColumn: best.key.name,
        confidence: best.score.confidence,
        basis: best.score.basis
      });
    }
  }

  return relationships;
};

/**
 * Merges inferred relationships into the declared ones. A declared
 * relationship always keeps its source column.
 */
export const mergeRelationships = (declared: Relationship[], inferred: Relationship[]) => {
  const sourceKey = (r: Relationship) => `${r.sourceTable}.${r.sourceColumn}`;
  const taken = new Set(declared.map(sourceKey));
  return [...declared, ...inferred.filter(r => !taken.has(sourceKey(r)))];
};
