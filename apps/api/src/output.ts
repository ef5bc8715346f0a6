import * as XLSX from 'xlsx';
import type {
  AnalysisResult,
  GraphStats,
  RelationshipBasis,
  RelationshipMap,
  SchemaGraph,
  SchemaWarning
} from './types/schema';

export type RelationshipDocument = Record<
  string,
  {
    primary_key: string | null;
    foreign_keys: Array<{ column: string; references: string; confidence: number }>;
  }
>;

export type GraphDocument = {
  nodes: Array<{ id: string; attributes: { column_count: number; primary_key: string | null; external?: boolean } }>;
  edges: Array<{
    source: string;
    target: string;
    source_column: string;
    target_column: string;
    confidence: number;
    basis: RelationshipBasis;
    inconsistent?: boolean;
  }>;
};

export type SchemaSnapshot = {
  database: string;
  relationships: RelationshipDocument;
  graph: GraphDocument;
  stats: GraphStats;
  warnings: SchemaWarning[];
};

export const toRelationshipDocument = (relationships: RelationshipMap): RelationshipDocument => {
  const doc: RelationshipDocument = {};
  relationships.forEach((entry, table) => {
    doc[table] = {
      primary_key: entry.primaryKey,
      foreign_keys: entry.foreignKeys.map(fk => ({
        column: fk.sourceColumn,
        references: `${fk.targetTable}.${fk.targetColumn}`,
        confidence: fk.confidence
      }))
    };
  });
  return doc;
};

export const toGraphDocument = (graph: SchemaGraph): GraphDocument => ({
  nodes: graph.nodes.map(node => ({
    id: node.id,
    attributes: {
      column_count: node.attributes.columnCount,
      primary_key: node.attributes.primaryKey,
      ...(node.attributes.external ? { external: true } : {})
    }
  })),
  edges: graph.edges.map(edge => ({
    source: edge.source,
    target: edge.target,
    source_column: edge.sourceColumn,
    target_column: edge.targetColumn,
    confidence: edge.confidence,
    basis: edge.basis,
    ...(edge.inconsistent ? { inconsistent: true } : {})
  }))
});

export const toSnapshot = (result: AnalysisResult): SchemaSnapshot => ({
  database: result.database,
  relationships: toRelationshipDocument(result.relationships),
  graph: toGraphDocument(result.graph),
  stats: result.stats,
  warnings: [...result.warnings]
});

export const buildAnalysisWorkbook = (result: AnalysisResult): Buffer => {
  const workbook = XLSX.utils.book_new();

  const tableRows = result.schema.tables.map(table => ({
    table: table.name,
    primary_key: table.primaryKey ?? '',
    columns: table.columns.length,
    declared_foreign_keys: table.foreignKeys.length
  }));
  XLSX.utils.book_append_sheet(
    workbook,
    XLSX.utils.json_to_sheet(tableRows, { header: ['table', 'primary_key', 'columns', 'declared_foreign_keys'] }),
    'Tables'
  );

  const relationshipRows = result.graph.edges.map(edge => ({
    source_table: edge.source,
    source_column: edge.sourceColumn,
    target_table: edge.target,
    target_column: edge.targetColumn,
    confidence: edge.confidence,
    basis: edge.basis
  }));
  const relationshipHeader = ['source_table', 'source_column', 'target_table', 'target_column', 'confidence', 'basis'];
  XLSX.utils.book_append_sheet(
    workbook,
    XLSX.utils.json_to_sheet(relationshipRows, { header: relationshipHeader }),
    'Relationships'
  );

  if (result.warnings.length) {
    const sheet = XLSX.utils.aoa_to_sheet([['code', 'message'], ...result.warnings.map(w => [w.code, w.message])]);
    XLSX.utils.book_append_sheet(workbook, sheet, 'Warnings');
  }

  return XLSX.write(workbook, { bookType: 'xlsx', type: 'buffer' });
};
