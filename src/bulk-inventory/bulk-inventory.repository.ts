import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../database/database.service';
import { BulkInventoryRow, DbExecutor } from '../database/database.types';
import { Decimal, toDecimal, toNumeric } from '../common/decimal';
import { LockOptions } from '../lots/interfaces/lot.interface';
import { WeightedAverageState } from './interfaces/weighted-average.interface';

@Injectable()
export class BulkInventoryRepository {
  constructor(private readonly database: DatabaseService) {}

  async findByItem(
    itemId: number,
    options: LockOptions = {},
    db: DbExecutor = this.database.db,
  ): Promise<WeightedAverageState | null> {
    let query = db.selectFrom('bulk_inventory').selectAll().where('item_id', '=', itemId);

    if (options.forUpdate) {
      query = query.forUpdate();
    }

    const row = await query.executeTakeFirst();
    return row ? toWeightedAverageState(row) : null;
  }

  /**
   * Create the state row on first use, overwrite it afterwards
   */
  async save(
    itemId: number,
    currentQuantity: Decimal,
    weightedAverageCost: Decimal,
    db: DbExecutor = this.database.db,
  ): Promise<WeightedAverageState> {
    const values = {
      current_quantity: toNumeric(currentQuantity),
      weighted_average_cost: toNumeric(weightedAverageCost),
      updated_at: new Date(),
    };

    const row = await db
      .insertInto('bulk_inventory')
      .values({ item_id: itemId, ...values })
      .onConflict((oc) => oc.column('item_id').doUpdateSet(values))
      .returningAll()
      .executeTakeFirstOrThrow();

    return toWeightedAverageState(row);
  }
}

export function toWeightedAverageState(row: BulkInventoryRow): WeightedAverageState {
  return {
    itemId: row.item_id,
    currentQuantity: toDecimal(row.current_quantity),
    weightedAverageCost: toDecimal(row.weighted_average_cost),
    updatedAt: row.updated_at,
  };
}
