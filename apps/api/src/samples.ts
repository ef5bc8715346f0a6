import type { RawColumn, RawSchema } from './schema/model';

const pk = (name: string, type = 'varchar(16)'): RawColumn => ({ name, type, nullable: false, is_primary_key: true });
const col = (name: string, type: string, nullable = true): RawColumn => ({ name, type, nullable });

/** A small fundraising schema with one declared foreign key; the rest is left to inference. */
export const sampleSchema: RawSchema = {
  database: 'fundraising',
  tables: [
    {
      name: 'donors',
      columns: [pk('donor_id'), col('donor_name', 'text'), col('donor_email', 'text'), col('join_date', 'date')],
      primary_key: 'donor_id'
    },
    {
      name: 'donor_touchpoints',
      columns: [
        pk('touchpoint_id'),
        col('donor_id', 'varchar(16)', false),
        col('channel', 'text'),
        col('touchpoint_date', 'date')
      ],
      primary_key: 'touchpoint_id'
    },
    {
      name: 'donations',
      columns: [
        pk('donation_id'),
        col('donor_id', 'varchar(16)', false),
        col('program_id', 'varchar(16)'),
        col('campaign_id', 'varchar(16)'),
        col('amount', 'numeric(12,2)', false),
        col('donation_date', 'date')
      ],
      primary_key: 'donation_id'
    },
    {
      name: 'payments',
      columns: [
        pk('payment_id'),
        col('donation_id', 'varchar(16)', false),
        col('net_amount', 'numeric(12,2)'),
        col('settlement_date', 'timestamp')
      ],
      primary_key: 'payment_id',
      foreign_keys: [{ column: 'donation_id', references_table: 'donations', references_column: 'donation_id' }]
    },
    {
      name: 'programs',
      columns: [pk('program_id'), col('parent_program_id', 'varchar(16)'), col('program_name', 'text')],
      primary_key: 'program_id'
    },
    {
      name: 'allocations',
      columns: [pk('allocation_id'), col('program_id', 'varchar(16)', false), col('fiscal_year', 'integer')],
      primary_key: 'allocation_id'
    },
    {
      name: 'campaigns',
      columns: [pk('campaign_id'), col('campaign_name', 'text'), col('status', 'varchar(16)')],
      primary_key: 'campaign_id'
    }
  ]
};
