import { describe, it, expect } from 'vitest';
import * as XLSX from 'xlsx';
import { analyzeSchema } from '../analysis';
import { buildAnalysisWorkbook, toGraphDocument, toRelationshipDocument, toSnapshot } from '../output';
import { col, fk, pk, schemaOf, shopSchema, table } from './fixtures';

const danglingSchema = () =>
  schemaOf(table('orders', [pk('order_id'), col('warehouse_id')], [fk('warehouse_id', 'warehouses', 'warehouse_id')]));

describe('toRelationshipDocument', () => {
  it('lists every table with its sorted foreign keys', () => {
    const doc = toRelationshipDocument(analyzeSchema(shopSchema()).relationships);

    expect(doc).toEqual({
      customers: { primary_key: 'customer_id', foreign_keys: [] },
      orders: {
        primary_key: 'order_id',
        foreign_keys: [{ column: 'customer_id', references: 'customers.customer_id', confidence: 0.98 }]
      },
      products: { primary_key: 'product_id', foreign_keys: [] },
      order_items: {
        primary_key: 'item_id',
        foreign_keys: [
          { column: 'order_id', references: 'orders.order_id', confidence: 0.98 },
          { column: 'product_id', references: 'products.product_id', confidence: 0.98 }
        ]
      }
    });
  });
});

describe('toGraphDocument', () => {
  it('uses snake_case attributes', () => {
    const doc = toGraphDocument(analyzeSchema(shopSchema()).graph);

    expect(doc.nodes[1]).toEqual({ id: 'orders', attributes: { column_count: 3, primary_key: 'order_id' } });
    expect(doc.edges[0]).toEqual({
      source: 'orders',
      target: 'customers',
      source_column: 'customer_id',
      target_column: 'customer_id',
      confidence: 0.98,
      basis: 'EXACT_MATCH'
    });
  });

  it('flags external nodes and inconsistent edges', () => {
    const doc = toGraphDocument(analyzeSchema(danglingSchema()).graph);

    expect(doc.nodes[1]).toEqual({ id: 'warehouses', attributes: { column_count: 0, primary_key: null, external: true } });
    expect(doc.edges[0]).toMatchObject({ basis: 'DECLARED', confidence: 1, inconsistent: true });
  });
});

describe('toSnapshot', () => {
  it('carries stats and warnings', () => {
    const snapshot = toSnapshot(analyzeSchema(danglingSchema()));

    expect(snapshot.database).toBe('shop');
    expect(snapshot.stats).toMatchObject({ nodeCount: 2, edgeCount: 1 });
    expect(snapshot.warnings.map(w => w.code)).toEqual(['DANGLING_REFERENCE']);
  });
});

describe('buildAnalysisWorkbook', () => {
  it('writes table and relationship sheets', () => {
    const workbook = XLSX.read(buildAnalysisWorkbook(analyzeSchema(shopSchema())), { type: 'buffer' });

    expect(workbook.SheetNames).toEqual(['Tables', 'Relationships']);
    const relationships = XLSX.utils.sheet_to_json(workbook.Sheets.Relationships);
    expect(relationships).toHaveLength(3);
    expect(relationships[0]).toEqual({
      source_table: 'orders',
      source_column: 'customer_id',
      target_table: 'customers',
      target_column: 'customer_id',
      confidence: 0.98,
      basis: 'EXACT_MATCH'
    });
    expect(XLSX.utils.sheet_to_json(workbook.Sheets.Tables)[3]).toEqual({
      table: 'order_items',
      primary_key: 'item_id',
      columns: 4,
      declared_foreign_keys: 0
    });
  });

  it('adds a warnings sheet when there are warnings', () => {
    const workbook = XLSX.read(buildAnalysisWorkbook(analyzeSchema(danglingSchema())), { type: 'buffer' });

    expect(workbook.SheetNames).toEqual(['Tables', 'Relationships', 'Warnings']);
    expect(XLSX.utils.sheet_to_json(workbook.Sheets.Warnings)).toEqual([
      {
        code: 'DANGLING_REFERENCE',
        message: 'orders.warehouse_id references warehouses.warehouse_id, but table "warehouses" does not exist'
      }
    ]);
  });
});
