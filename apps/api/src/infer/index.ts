import type { Relationship, RelationshipMap, SchemaModel, TableRelationships } from '../types/schema';
import { compareRelationships, declaredRelationships, inferRelationshipsHeuristic, mergeRelationships } from './heuristics';

/**
 * Declared foreign keys plus the best inferred reference for every other
 * column, keyed by table name in schema order. Deterministic for a given
 * model.
 */
export const inferRelationships = (schema: SchemaModel): RelationshipMap => {
  const merged = mergeRelationships(declaredRelationships(schema), inferRelationshipsHeuristic(schema));

  const bySource = new Map<string, Relationship[]>();
  for (const relationship of merged) {
    const list = bySource.get(relationship.sourceTable) ?? [];
    list.push(relationship);
    bySource.set(relationship.sourceTable, list);
  }

  const result = new Map<string, TableRelationships>();
  for (const table of schema.tables) {
    const foreignKeys = (bySource.get(table.name) ?? []).sort(compareRelationships);
    result.set(table.name, { primaryKey: table.primaryKey, foreignKeys });
  }
  return result;
};

export const countRelationships = (relationships: RelationshipMap) => {
  let count = 0;
  relationships.forEach(entry => {
    count += entry.foreignKeys.length;
  });
  return count;
};
