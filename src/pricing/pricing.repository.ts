import { Injectable } from '@nestjs/common';
import { sql } from 'kysely';
import { DatabaseService } from '../database/database.service';
import { DbExecutor } from '../database/database.types';
import { Decimal, toDecimal } from '../common/decimal';
import { LatestLotPrice } from './interfaces/pricing.interface';

@Injectable()
export class PricingRepository {
  constructor(private readonly database: DatabaseService) {}

  /**
   * Most recently acquired lot of an item, optionally from one supplier only
   */
  async findLatestLotPrice(
    itemId: number,
    supplierId?: number,
    db: DbExecutor = this.database.db,
  ): Promise<LatestLotPrice | null> {
    let query = db
      .selectFrom('lots')
      .select(['id', 'unit_cost', 'acquisition_date'])
      .where('item_id', '=', itemId);

    if (supplierId !== undefined) {
      query = query.where('supplier_id', '=', supplierId);
    }

    const row = await query
      .orderBy('acquisition_date', 'desc')
      .orderBy('id', 'desc')
      .limit(1)
      .executeTakeFirst();

    return row
      ? { lotId: row.id, unitCost: toDecimal(row.unit_cost), acquisitionDate: row.acquisition_date }
      : null;
  }

  /**
   * Mean lot unit cost for lots acquired on or after `since`, `null` when none
   */
  async averageUnitCostSince(
    itemId: number,
    since: string,
    excludeLotId?: number,
    db: DbExecutor = this.database.db,
  ): Promise<Decimal | null> {
    let query = db
      .selectFrom('lots')
      .select(sql<string | null>`avg(unit_cost)`.as('average'))
      .where('item_id', '=', itemId)
      .where('acquisition_date', '>=', since);

    if (excludeLotId !== undefined) {
      query = query.where('id', '!=', excludeLotId);
    }

    const row = await query.executeTakeFirst();
    return row?.average ? toDecimal(row.average) : null;
  }
}
