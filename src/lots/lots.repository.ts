import { Injectable } from '@nestjs/common';
import { sql } from 'kysely';
import { DatabaseService } from '../database/database.service';
import { DbExecutor, LotRow } from '../database/database.types';
import { Decimal, toDecimal, toNumeric, ZERO } from '../common/decimal';
import { LockOptions, Lot, NewLot } from './interfaces/lot.interface';

@Injectable()
export class LotsRepository {
  constructor(private readonly database: DatabaseService) {}

  /**
   * Lots of an item that still hold more than `epsilon`, oldest acquisition
   * first. Same-day lots keep their creation order (serial id); cost and
   * remaining quantity never influence the order.
   */
  async findAvailableByItem(
    itemId: number,
    epsilon: Decimal,
    options: LockOptions = {},
    db: DbExecutor = this.database.db,
  ): Promise<Lot[]> {
    let query = db
      .selectFrom('lots')
      .selectAll()
      .where('item_id', '=', itemId)
      .where('quantity_remaining', '>', toNumeric(epsilon))
      .orderBy('acquisition_date', 'asc')
      .orderBy('id', 'asc');

    if (options.forUpdate) {
      query = query.forUpdate();
    }

    const rows = await query.execute();
    return rows.map(toLot);
  }

  /**
   * Every lot of an item, depleted ones included, in FIFO order
   */
  async findByItem(itemId: number, db: DbExecutor = this.database.db): Promise<Lot[]> {
    const rows = await db
      .selectFrom('lots')
      .selectAll()
      .where('item_id', '=', itemId)
      .orderBy('acquisition_date', 'asc')
      .orderBy('id', 'asc')
      .execute();

    return rows.map(toLot);
  }

  async findById(
    id: number,
    options: LockOptions = {},
    db: DbExecutor = this.database.db,
  ): Promise<Lot | null> {
    let query = db.selectFrom('lots').selectAll().where('id', '=', id);

    if (options.forUpdate) {
      query = query.forUpdate();
    }

    const row = await query.executeTakeFirst();
    return row ? toLot(row) : null;
  }

  async create(data: NewLot, db: DbExecutor = this.database.db): Promise<Lot> {
    const row = await db
      .insertInto('lots')
      .values({
        item_id: data.itemId,
        supplier_id: data.supplierId,
        acquisition_date: data.acquisitionDate,
        quantity_original: toNumeric(data.quantity),
        quantity_remaining: toNumeric(data.quantity),
        unit_cost: toNumeric(data.unitCost),
        expiration_date: data.expirationDate,
        location: data.location,
        notes: data.notes,
      })
      .returningAll()
      .executeTakeFirstOrThrow();

    return toLot(row);
  }

  async updateRemaining(
    id: number,
    quantityRemaining: Decimal,
    db: DbExecutor = this.database.db,
  ): Promise<void> {
    const result = await db
      .updateTable('lots')
      .set({ quantity_remaining: toNumeric(quantityRemaining) })
      .where('id', '=', id)
      .executeTakeFirst();

    if (result.numUpdatedRows === BigInt(0)) {
      throw new Error(`Lot ${id} disappeared while updating its remaining quantity`);
    }
  }

  async updateRemainingAndNotes(
    id: number,
    quantityRemaining: Decimal,
    notes: string,
    db: DbExecutor = this.database.db,
  ): Promise<Lot> {
    const row = await db
      .updateTable('lots')
      .set({ quantity_remaining: toNumeric(quantityRemaining), notes })
      .where('id', '=', id)
      .returningAll()
      .executeTakeFirstOrThrow();

    return toLot(row);
  }

  /**
   * Lots with stock left whose expiration date falls on or before `until`
   */
  async findExpiringBy(until: string, db: DbExecutor = this.database.db): Promise<Lot[]> {
    const rows = await db
      .selectFrom('lots')
      .selectAll()
      .where('expiration_date', 'is not', null)
      .where('expiration_date', '<=', until)
      .where('quantity_remaining', '>', '0')
      .orderBy('expiration_date', 'asc')
      .orderBy('id', 'asc')
      .execute();

    return rows.map(toLot);
  }

  /**
   * Value of remaining stock (remaining quantity x unit cost), optionally for one item
   */
  async sumValue(itemId?: number, db: DbExecutor = this.database.db): Promise<Decimal> {
    let query = db
      .selectFrom('lots')
      .select(sql<string | null>`sum(quantity_remaining * unit_cost)`.as('value'));

    if (itemId !== undefined) {
      query = query.where('item_id', '=', itemId);
    }

    const row = await query.executeTakeFirst();
    return row?.value ? toDecimal(row.value) : ZERO;
  }
}

export function toLot(row: LotRow): Lot {
  return {
    id: row.id,
    itemId: row.item_id,
    supplierId: row.supplier_id,
    acquisitionDate: row.acquisition_date,
    quantityOriginal: toDecimal(row.quantity_original),
    quantityRemaining: toDecimal(row.quantity_remaining),
    unitCost: toDecimal(row.unit_cost),
    expirationDate: row.expiration_date,
    location: row.location,
    notes: row.notes,
    createdAt: row.created_at,
  };
}
