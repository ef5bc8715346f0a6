import type { GraphEdge, GraphNode, Relationship, RelationshipMap, SchemaGraph, SchemaModel } from '../types/schema';

const edgeKey = (r: Relationship) => `${r.sourceTable}\u0000${r.sourceColumn}\u0000${r.targetTable}\u0000${r.targetColumn}`;

const allowsSelfEdge = (r: Relationship) => r.basis === 'HIERARCHICAL' || r.basis === 'DECLARED';

const toEdge = (r: Relationship): GraphEdge => {
  const edge: GraphEdge = {
    source: r.sourceTable,
    target: r.targetTable,
    sourceColumn: r.sourceColumn,
    targetColumn: r.targetColumn,
    confidence: r.confidence,
    basis: r.basis
  };
  if (r.inconsistent) edge.inconsistent = true;
  return Object.freeze(edge);
};

/**
 * Tables become nodes, relationships become edges. At most one edge exists per
 * (source table, source column, target table, target column); a declared edge
 * displaces an inferred one on the same key. The graph is assembled locally and
 * only returned once complete.
 */
export const buildSchemaGraph = (schema: SchemaModel, relationships: RelationshipMap): SchemaGraph => {
  const nodes = new Map<string, GraphNode>();
  for (const table of schema.tables) {
    nodes.set(table.name, {
      id: table.name,
      attributes: { columnCount: table.columns.length, primaryKey: table.primaryKey }
    });
  }

  const edges = new Map<string, GraphEdge>();
  relationships.forEach(entry => {
    for (const r of entry.foreignKeys) {
      if (!nodes.has(r.sourceTable)) continue;
      if (r.sourceTable === r.targetTable && !allowsSelfEdge(r)) continue;

      const key = edgeKey(r);
      const existing = edges.get(key);
      if (existing && (existing.basis === 'DECLARED' || r.basis !== 'DECLARED')) continue;
      edges.set(key, toEdge(r));

      if (!nodes.has(r.targetTable)) {
        nodes.set(r.targetTable, {
          id: r.targetTable,
          attributes: { columnCount: 0, primaryKey: null, external: true }
        });
      }
    }
  });

  return Object.freeze({
    nodes: Object.freeze(Array.from(nodes.values(), node => Object.freeze(node))),
    edges: Object.freeze(Array.from(edges.values()))
  });
};
