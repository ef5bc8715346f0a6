import { describe, it, expect } from 'vitest';
import { analyzeSchema, extractAndAnalyze, SchemaAnalyzer } from '../analysis';
import { ConnectorRegistry } from '../connectors/registry';
import type { SchemaConnector } from '../connectors/types';
import { InvalidSchemaError, MissingAnalysisStateError, UnsupportedDialectError } from '../errors';
import { countRelationships } from '../infer';
import { buildSchemaModel } from '../schema/model';
import { col, pk, schemaOf, shopSchema, table } from './fixtures';

describe('analyzeSchema', () => {
  it('runs the full pipeline', () => {
    const result = analyzeSchema(shopSchema());

    expect(result.database).toBe('shop');
    expect(countRelationships(result.relationships)).toBe(3);
    expect(result.stats).toMatchObject({ nodeCount: 4, edgeCount: 3, hasCycle: false });
    expect(result.warnings).toEqual([]);
  });

  it('rejects an invalid schema', () => {
    expect(() => analyzeSchema({ tables: 'nope' })).toThrow(InvalidSchemaError);
  });
});

describe('SchemaAnalyzer', () => {
  it('chains from its own last schema and relationships', () => {
    const analyzer = new SchemaAnalyzer();
    analyzer.loadSchema(shopSchema());

    const relationships = analyzer.inferRelationships();
    const graph = analyzer.buildGraph();

    expect(countRelationships(relationships)).toBe(3);
    expect(graph.edges).toHaveLength(3);
    expect(analyzer.graph).toBe(graph);
  });

  it('does not share state between instances', () => {
    const shop = new SchemaAnalyzer();
    const other = new SchemaAnalyzer();
    shop.analyze(shopSchema());
    other.analyze(schemaOf(table('customers', [pk('customer_id')])));

    expect(shop.schema?.tables).toHaveLength(4);
    expect(other.schema?.tables).toHaveLength(1);
    expect(shop.buildGraph().nodes).toHaveLength(4);
  });

  it('prefers explicit arguments over remembered state', () => {
    const analyzer = new SchemaAnalyzer();
    analyzer.analyze(shopSchema());
    const single = buildSchemaModel(schemaOf(table('customers', [pk('customer_id')])));

    const relationships = analyzer.inferRelationships(single);

    expect(Array.from(relationships.keys())).toEqual(['customers']);
    expect(analyzer.schema).toBe(single);
  });

  it('does not pair a new schema with relationships inferred for another', () => {
    const analyzer = new SchemaAnalyzer();
    analyzer.analyze(shopSchema());
    const retyped = buildSchemaModel(
      schemaOf(
        table('customers', [pk('customer_id')]),
        table('orders', [pk('order_id'), col('customer_id', 'varchar(36)')])
      )
    );

    expect(() => analyzer.buildGraph(retyped)).toThrow(MissingAnalysisStateError);

    const graph = analyzer.buildGraph(retyped, analyzer.inferRelationships(retyped));
    expect(graph.edges).toEqual([]);
    expect(analyzer.schema).toBe(retyped);
  });

  it('drops the remembered graph when relationships are re-inferred', () => {
    const analyzer = new SchemaAnalyzer();
    analyzer.analyze(shopSchema());
    const single = buildSchemaModel(schemaOf(table('customers', [pk('customer_id')])));

    analyzer.inferRelationships(single);

    expect(analyzer.graph).toBeNull();
    expect(analyzer.buildGraph().nodes.map(n => n.id)).toEqual(['customers']);
  });

  it('fails when there is nothing to chain from', () => {
    const analyzer = new SchemaAnalyzer();
    expect(() => analyzer.inferRelationships()).toThrow(MissingAnalysisStateError);
    expect(() => analyzer.buildGraph()).toThrow(MissingAnalysisStateError);

    analyzer.loadSchema(shopSchema());
    expect(() => analyzer.buildGraph()).toThrow('No relationships provided and no previous analysis available');
  });
});

describe('extractAndAnalyze', () => {
  const stubConnector: SchemaConnector = {
    dialect: 'postgres',
    extract: async () => shopSchema()
  };

  it('extracts through the registered connector', async () => {
    const registry = new ConnectorRegistry().register(stubConnector, ['postgresql']);
    const result = await extractAndAnalyze('PostgreSQL', 'postgres://localhost/shop', registry);

    expect(result.stats.edgeCount).toBe(3);
  });

  it('rejects an unknown dialect', async () => {
    const registry = new ConnectorRegistry().register(stubConnector);
    await expect(extractAndAnalyze('oracle', 'x', registry)).rejects.toThrow(UnsupportedDialectError);
  });
});
