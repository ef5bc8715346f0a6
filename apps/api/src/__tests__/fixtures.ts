import type { RawColumn, RawForeignKey, RawSchema, RawTable } from '../schema/model';

export const pk = (name: string, type = 'int'): RawColumn => ({ name, type, nullable: false, is_primary_key: true });

export const col = (name: string, type = 'int'): RawColumn => ({ name, type, nullable: true, is_primary_key: false });

export const fk = (column: string, table: string, target: string): RawForeignKey => ({
  column,
  references_table: table,
  references_column: target
});

export const table = (name: string, columns: RawColumn[], foreignKeys: RawForeignKey[] = []): RawTable => ({
  name,
  columns,
  primary_key: columns.find(c => c.is_primary_key)?.name ?? null,
  foreign_keys: foreignKeys
});

export const schemaOf = (...tables: RawTable[]): RawSchema => ({ database: 'shop', tables });

/** customers / orders / products / order_items, no declared keys. */
export const shopSchema = (): RawSchema =>
  schemaOf(
    table('customers', [pk('customer_id'), col('name', 'text')]),
    table('orders', [pk('order_id'), col('customer_id'), col('status', 'varchar(20)')]),
    table('products', [pk('product_id'), col('name', 'text')]),
    table('order_items', [pk('item_id'), col('order_id'), col('product_id'), col('quantity')])
  );
