import { ColumnType, Generated, Insertable, Kysely, Selectable } from 'kysely';
import { CostingModel, ItemKind } from '../items/interfaces/item.interface';
import { AdjustmentType, ReasonCode } from '../adjustments/interfaces/adjustment.interface';

/** PostgreSQL `numeric` travels as a string in both directions. */
type Numeric = ColumnType<string, string, string>;
type NullableNumeric = ColumnType<string | null, string | null | undefined, string | null>;
/** `date` columns are parsed as `YYYY-MM-DD` strings (see database.service.ts). */
type IsoDate = ColumnType<string, string, string>;
type NullableIsoDate = ColumnType<string | null, string | null | undefined, string | null>;
type CreatedAt = ColumnType<Date, Date | undefined, never>;

export interface ItemsTable {
  id: Generated<number>;
  kind: ItemKind;
  name: string;
  base_unit: string;
  costing_model: CostingModel;
  density_g_per_ml: NullableNumeric;
  preferred_supplier_id: number | null;
  created_at: CreatedAt;
}

export interface LotsTable {
  id: Generated<number>;
  item_id: number;
  supplier_id: number | null;
  acquisition_date: IsoDate;
  quantity_original: ColumnType<string, string, never>;
  quantity_remaining: Numeric;
  unit_cost: ColumnType<string, string, never>;
  expiration_date: NullableIsoDate;
  location: string | null;
  notes: string | null;
  created_at: CreatedAt;
}

export interface InventoryAdjustmentsTable {
  id: Generated<number>;
  lot_id: number;
  adjustment_type: AdjustmentType;
  value_applied: Numeric;
  quantity_before: Numeric;
  quantity_after: Numeric;
  cost_impact: Numeric;
  reason_code: ReasonCode;
  notes: string | null;
  created_by: string;
  created_at: CreatedAt;
}

export interface BulkInventoryTable {
  item_id: number;
  current_quantity: Numeric;
  weighted_average_cost: Numeric;
  updated_at: ColumnType<Date, Date | undefined, Date>;
}

export interface ProductionRunsTable {
  id: Generated<number>;
  context_id: string;
  description: string | null;
  total_cost: Numeric;
  created_at: CreatedAt;
}

export interface ProductionConsumptionsTable {
  id: Generated<number>;
  production_run_id: number;
  item_id: number;
  lot_id: number;
  quantity_consumed: Numeric;
  unit_cost: Numeric;
  cost: Numeric;
}

export interface Database {
  items: ItemsTable;
  lots: LotsTable;
  inventory_adjustments: InventoryAdjustmentsTable;
  bulk_inventory: BulkInventoryTable;
  production_runs: ProductionRunsTable;
  production_consumptions: ProductionConsumptionsTable;
}

/**
 * Anything repository methods can run against: the root instance or an open
 * transaction. Passing the transaction lets a caller compose several
 * repository calls into one atomic unit.
 */
export type DbExecutor = Kysely<Database>;

export type ItemRow = Selectable<ItemsTable>;
export type LotRow = Selectable<LotsTable>;
export type NewLotRow = Insertable<LotsTable>;
export type AdjustmentRow = Selectable<InventoryAdjustmentsTable>;
export type NewAdjustmentRow = Insertable<InventoryAdjustmentsTable>;
export type BulkInventoryRow = Selectable<BulkInventoryTable>;
export type ProductionRunRow = Selectable<ProductionRunsTable>;
export type ProductionConsumptionRow = Selectable<ProductionConsumptionsTable>;
