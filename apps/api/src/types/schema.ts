export type TypeClass = 'integer' | 'string' | 'uuid' | 'temporal' | 'other';

export type ColumnModel = {
  name: string;
  dataType: string; // as declared by the source database
  typeClass: TypeClass;
  nullable: boolean;
  isPrimaryKey: boolean;
};

export type DeclaredForeignKey = {
  column: string;
  referencesTable: string;
  referencesColumn: string;
};

export type TableModel = {
  name: string;
  columns: readonly ColumnModel[];
  primaryKey: string | null;
  foreignKeys: readonly DeclaredForeignKey[];
};

export type DanglingReferenceWarning = {
  code: 'DANGLING_REFERENCE';
  table: string;
  column: string;
  referencesTable: string;
  referencesColumn: string;
  message: string;
};

export type SchemaWarning = DanglingReferenceWarning;

export type SchemaModel = {
  database: string;
  tables: readonly TableModel[];
  warnings: readonly SchemaWarning[];
};

export type RelationshipBasis = 'DECLARED' | 'EXACT_MATCH' | 'PATTERN_MATCH' | 'HIERARCHICAL';

export type InferredBasis = Exclude<RelationshipBasis, 'DECLARED'>;

export type Relationship = {
  sourceTable: string;
  sourceColumn: string;
  targetTable: string;
  targetColumn: string;
  confidence: number; // 0..1, exactly 1 for DECLARED
  basis: RelationshipBasis;
  inconsistent?: boolean; // declared, but the target is missing from the schema
};

export type TableRelationships = {
  primaryKey: string | null;
  foreignKeys: readonly Relationship[];
};

export type RelationshipMap = ReadonlyMap<string, TableRelationships>;

export type GraphNode = {
  id: string;
  attributes: {
    columnCount: number;
    primaryKey: string | null;
    external?: boolean;
  };
};

export type GraphEdge = {
  source: string;
  target: string;
  sourceColumn: string;
  targetColumn: string;
  confidence: number;
  basis: RelationshipBasis;
  inconsistent?: boolean;
};

export type SchemaGraph = {
  nodes: readonly GraphNode[];
  edges: readonly GraphEdge[];
};

export type GraphStats = {
  nodeCount: number;
  edgeCount: number;
  isolatedNodes: string[];
  hasCycle: boolean;
  edgesByBasis: Record<RelationshipBasis, number>;
};

export type AnalysisResult = {
  database: string;
  schema: SchemaModel;
  relationships: RelationshipMap;
  graph: SchemaGraph;
  stats: GraphStats;
  warnings: readonly SchemaWarning[];
};
