import { Kysely, sql } from 'kysely';

// Migrations run against an untyped instance; the schema is what they define.
export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('items')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('kind', 'text', (col) => col.notNull())
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('base_unit', 'text', (col) => col.notNull())
    .addColumn('costing_model', 'text', (col) => col.notNull().defaultTo('fifo'))
    .addColumn('density_g_per_ml', sql`numeric(12, 6)`)
    .addColumn('preferred_supplier_id', 'integer')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addCheckConstraint('items_kind_check', sql`kind in ('ingredient', 'inventory_item', 'material')`)
    .addCheckConstraint('items_costing_model_check', sql`costing_model in ('fifo', 'weighted_average')`)
    .execute();

  await db.schema
    .createTable('lots')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('item_id', 'integer', (col) => col.notNull().references('items.id').onDelete('restrict'))
    .addColumn('supplier_id', 'integer')
    .addColumn('acquisition_date', 'date', (col) => col.notNull())
    .addColumn('quantity_original', sql`numeric(14, 3)`, (col) => col.notNull())
    .addColumn('quantity_remaining', sql`numeric(14, 3)`, (col) => col.notNull())
    .addColumn('unit_cost', sql`numeric(18, 6)`, (col) => col.notNull().defaultTo(0))
    .addColumn('expiration_date', 'date')
    .addColumn('location', 'text')
    .addColumn('notes', 'text')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addCheckConstraint(
      'lots_remaining_bounds_check',
      sql`quantity_remaining >= 0 and quantity_remaining <= quantity_original`,
    )
    .addCheckConstraint('lots_unit_cost_check', sql`unit_cost >= 0`)
    .execute();

  await db.schema
    .createIndex('lots_fifo_idx')
    .on('lots')
    .columns(['item_id', 'acquisition_date', 'id'])
    .execute();

  await db.schema
    .createTable('inventory_adjustments')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('lot_id', 'integer', (col) => col.notNull().references('lots.id').onDelete('restrict'))
    .addColumn('adjustment_type', 'text', (col) => col.notNull())
    .addColumn('value_applied', sql`numeric(14, 3)`, (col) => col.notNull())
    .addColumn('quantity_before', sql`numeric(14, 3)`, (col) => col.notNull())
    .addColumn('quantity_after', sql`numeric(14, 3)`, (col) => col.notNull())
    .addColumn('cost_impact', sql`numeric(14, 4)`, (col) => col.notNull())
    .addColumn('reason_code', 'text', (col) => col.notNull())
    .addColumn('notes', 'text')
    .addColumn('created_by', 'text', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema
    .createIndex('inventory_adjustments_lot_idx')
    .on('inventory_adjustments')
    .columns(['lot_id', 'created_at'])
    .execute();

  await db.schema
    .createTable('bulk_inventory')
    .addColumn('item_id', 'integer', (col) => col.primaryKey().references('items.id').onDelete('restrict'))
    .addColumn('current_quantity', sql`numeric(14, 3)`, (col) => col.notNull().defaultTo(0))
    .addColumn('weighted_average_cost', sql`numeric(18, 4)`, (col) => col.notNull().defaultTo(0))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addCheckConstraint('bulk_inventory_quantity_check', sql`current_quantity >= 0`)
    .execute();

  await db.schema
    .createTable('production_runs')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('context_id', 'text', (col) => col.notNull())
    .addColumn('description', 'text')
    .addColumn('total_cost', sql`numeric(14, 4)`, (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema
    .createTable('production_consumptions')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('production_run_id', 'integer', (col) =>
      col.notNull().references('production_runs.id').onDelete('restrict'),
    )
    .addColumn('item_id', 'integer', (col) => col.notNull().references('items.id'))
    .addColumn('lot_id', 'integer', (col) => col.notNull().references('lots.id'))
    .addColumn('quantity_consumed', sql`numeric(14, 3)`, (col) => col.notNull())
    .addColumn('unit_cost', sql`numeric(18, 6)`, (col) => col.notNull())
    .addColumn('cost', sql`numeric(14, 4)`, (col) => col.notNull())
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('production_consumptions').execute();
  await db.schema.dropTable('production_runs').execute();
  await db.schema.dropTable('bulk_inventory').execute();
  await db.schema.dropTable('inventory_adjustments').execute();
  await db.schema.dropTable('lots').execute();
  await db.schema.dropTable('items').execute();
}
