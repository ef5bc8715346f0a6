import { describe, it, expect } from 'vitest';
import { InvalidSchemaError } from '../errors';
import { buildSchemaModel } from '../schema/model';
import { col, fk, pk, schemaOf, shopSchema, table } from './fixtures';

const captureIssues = (input: unknown): string[] => {
  try {
    buildSchemaModel(input);
  } catch (err) {
    if (err instanceof InvalidSchemaError) return err.issues;
    throw err;
  }
  throw new Error('expected InvalidSchemaError');
};

describe('buildSchemaModel', () => {
  it('normalizes tables, columns and type classes', () => {
    const schema = buildSchemaModel(shopSchema());

    expect(schema.database).toBe('shop');
    expect(schema.tables.map(t => t.name)).toEqual(['customers', 'orders', 'products', 'order_items']);
    expect(schema.tables[1]).toEqual({
      name: 'orders',
      primaryKey: 'order_id',
      foreignKeys: [],
      columns: [
        { name: 'order_id', dataType: 'int', typeClass: 'integer', nullable: false, isPrimaryKey: true },
        { name: 'customer_id', dataType: 'int', typeClass: 'integer', nullable: true, isPrimaryKey: false },
        { name: 'status', dataType: 'varchar(20)', typeClass: 'string', nullable: true, isPrimaryKey: false }
      ]
    });
    expect(schema.warnings).toEqual([]);
  });

  it('applies defaults for optional fields', () => {
    const schema = buildSchemaModel({
      tables: [{ name: 'events', columns: [{ name: 'event_id', type: 'uuid' }] }]
    });

    expect(schema.database).toBe('');
    expect(schema.tables[0]).toEqual({
      name: 'events',
      primaryKey: null,
      foreignKeys: [],
      columns: [{ name: 'event_id', dataType: 'uuid', typeClass: 'uuid', nullable: true, isPrimaryKey: false }]
    });
  });

  it('takes the primary key from the column flag when none is named', () => {
    const schema = buildSchemaModel({
      tables: [{ name: 'users', columns: [{ name: 'email', type: 'text' }, { name: 'user_id', type: 'int', is_primary_key: true }] }]
    });
    expect(schema.tables[0].primaryKey).toBe('user_id');
  });

  it('marks the named primary key column', () => {
    const schema = buildSchemaModel({
      tables: [{ name: 'users', primary_key: 'user_id', columns: [{ name: 'user_id', type: 'int' }] }]
    });
    expect(schema.tables[0].columns[0].isPrimaryKey).toBe(true);
  });

  it('freezes the model', () => {
    const schema = buildSchemaModel(shopSchema());
    expect(Object.isFrozen(schema)).toBe(true);
    expect(Object.isFrozen(schema.tables)).toBe(true);
    expect(Object.isFrozen(schema.tables[0].columns)).toBe(true);
    expect(Object.isFrozen(schema.tables[0].columns[0])).toBe(true);
  });

  it('accepts a table with no columns', () => {
    const schema = buildSchemaModel(schemaOf(table('empty', [])));
    expect(schema.tables[0]).toEqual({ name: 'empty', columns: [], primaryKey: null, foreignKeys: [] });
  });

  it('rejects duplicate table names', () => {
    const issues = captureIssues(schemaOf(table('users', [pk('user_id')]), table('users', [pk('id')])));
    expect(issues).toEqual(['duplicate table name "users"']);
  });

  it('rejects duplicate column names', () => {
    const issues = captureIssues(schemaOf(table('users', [pk('user_id'), col('email', 'text'), col('email', 'text')])));
    expect(issues).toEqual(['table "users": duplicate column name "email"']);
  });

  it('rejects a column without a type', () => {
    const issues = captureIssues({ tables: [{ name: 'users', columns: [{ name: 'user_id', type: 'int' }, { name: 'email' }] }] });
    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith('tables.0.columns.1.type: ')).toBe(true);
  });

  it('rejects a column without a name', () => {
    const issues = captureIssues({ tables: [{ name: 'users', columns: [{ name: '', type: 'int' }] }] });
    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith('tables.0.columns.0.name: ')).toBe(true);
  });

  it('rejects a primary key that is not a column', () => {
    const issues = captureIssues({ tables: [{ name: 'users', primary_key: 'id', columns: [{ name: 'user_id', type: 'int' }] }] });
    expect(issues).toEqual(['table "users": primary key "id" is not a column']);
  });

  it('rejects a declared foreign key on a missing column', () => {
    const issues = captureIssues(schemaOf(table('orders', [pk('order_id')], [fk('customer_id', 'customers', 'customer_id')])));
    expect(issues).toEqual(['table "orders": foreign key column "customer_id" is not a column']);
  });

  it('reports every issue at once', () => {
    const issues = captureIssues(
      schemaOf(table('a', [pk('a_id'), col('x'), col('x')]), table('a', [pk('a_id')]))
    );
    expect(issues).toEqual(['duplicate table name "a"', 'table "a": duplicate column name "x"']);
  });

  it('warns about declared references to missing tables or columns', () => {
    const schema = buildSchemaModel(
      schemaOf(
        table('customers', [pk('customer_id')]),
        table(
          'orders',
          [pk('order_id'), col('customer_id'), col('warehouse_id')],
          [fk('customer_id', 'customers', 'id'), fk('warehouse_id', 'warehouses', 'warehouse_id')]
        )
      )
    );

    expect(schema.warnings).toEqual([
      {
        code: 'DANGLING_REFERENCE',
        table: 'orders',
        column: 'customer_id',
        referencesTable: 'customers',
        referencesColumn: 'id',
        message: 'orders.customer_id references customers.id, but column "customers.id" does not exist'
      },
      {
        code: 'DANGLING_REFERENCE',
        table: 'orders',
        column: 'warehouse_id',
        referencesTable: 'warehouses',
        referencesColumn: 'warehouse_id',
        message: 'orders.warehouse_id references warehouses.warehouse_id, but table "warehouses" does not exist'
      }
    ]);
  });
});
