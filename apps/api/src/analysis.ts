import { ConnectorRegistry, createDefaultRegistry } from './connectors/registry';
import { MissingAnalysisStateError } from './errors';
import { buildSchemaGraph } from './graph/builder';
import { graphStats } from './graph/stats';
import { inferRelationships } from './infer';
import { buildSchemaModel } from './schema/model';
import type { AnalysisResult, RelationshipMap, SchemaGraph, SchemaModel } from './types/schema';

/** Raw schema in, finished analysis out. Holds no state between calls. */
export const analyzeSchema = (raw: unknown): AnalysisResult => {
  const schema = buildSchemaModel(raw);
  const relationships = inferRelationships(schema);
  const graph = buildSchemaGraph(schema, relationships);
  return {
    database: schema.database,
    schema,
    relationships,
    graph,
    stats: graphStats(graph),
    warnings: schema.warnings
  };
};

export const extractAndAnalyze = async (
  dialect: string,
  connectionString: string,
  registry: ConnectorRegistry = createDefaultRegistry()
): Promise<AnalysisResult> => {
  const connector = registry.get(dialect);
  const raw = await connector.extract(connectionString);
  return analyzeSchema(raw);
};

/**
 * Chaining convenience over the pure functions. Each instance remembers its
 * own last schema, relationships and graph; instances share nothing.
 */
export class SchemaAnalyzer {
  private lastSchema: SchemaModel | null = null;
  private lastRelationships: RelationshipMap | null = null;
  private lastGraph: SchemaGraph | null = null;

  get schema() {
    return this.lastSchema;
  }

  get relationships() {
    return this.lastRelationships;
  }

  get graph() {
    return this.lastGraph;
  }

  analyze(raw: unknown): AnalysisResult {
    const result = analyzeSchema(raw);
    this.lastSchema = result.schema;
    this.lastRelationships = result.relationships;
    this.lastGraph = result.graph;
    return result;
  }

  loadSchema(raw: unknown): SchemaModel {
    const schema = buildSchemaModel(raw);
    this.lastSchema = schema;
    this.lastRelationships = null;
    this.lastGraph = null;
    return schema;
  }

  inferRelationships(schema?: SchemaModel): RelationshipMap {
    const source = schema ?? this.lastSchema;
    if (!source) throw new MissingAnalysisStateError('schema');

    const relationships = inferRelationships(source);
    this.lastSchema = source;
    this.lastRelationships = relationships;
    this.lastGraph = null;
    return relationships;
  }

  buildGraph(schema?: SchemaModel, relationships?: RelationshipMap): SchemaGraph {
    const source = schema ?? this.lastSchema;
    if (!source) throw new MissingAnalysisStateError('schema');
    // Remembered relationships belong to the remembered schema only.
    const rels = relationships ?? (source === this.lastSchema ? this.lastRelationships : null);
    if (!rels) throw new MissingAnalysisStateError('relationships');

    const graph = buildSchemaGraph(source, rels);
    this.lastSchema = source;
    this.lastRelationships = rels;
    this.lastGraph = graph;
    return graph;
  }
}
