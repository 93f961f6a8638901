import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../database/database.service';
import { AdjustmentRow, DbExecutor } from '../database/database.types';
import { toDecimal, toNumeric } from '../common/decimal';
import { AdjustmentRecord, NewAdjustment } from './interfaces/adjustment.interface';

/**
 * Append-only: adjustment records are never updated or deleted.
 */
@Injectable()
export class AdjustmentsRepository {
  constructor(private readonly database: DatabaseService) {}

  async insert(data: NewAdjustment, db: DbExecutor = this.database.db): Promise<AdjustmentRecord> {
    const row = await db
      .insertInto('inventory_adjustments')
      .values({
        lot_id: data.lotId,
        adjustment_type: data.adjustmentType,
        value_applied: toNumeric(data.valueApplied),
        quantity_before: toNumeric(data.quantityBefore),
        quantity_after: toNumeric(data.quantityAfter),
        cost_impact: toNumeric(data.costImpact),
        reason_code: data.reasonCode,
        notes: data.notes,
        created_by: data.createdBy,
      })
      .returningAll()
      .executeTakeFirstOrThrow();

    return toAdjustmentRecord(row);
  }

  async findByLot(lotId: number, db: DbExecutor = this.database.db): Promise<AdjustmentRecord[]> {
    const rows = await db
      .selectFrom('inventory_adjustments')
      .selectAll()
      .where('lot_id', '=', lotId)
      .orderBy('created_at', 'desc')
      .orderBy('id', 'desc')
      .execute();

    return rows.map(toAdjustmentRecord);
  }
}

export function toAdjustmentRecord(row: AdjustmentRow): AdjustmentRecord {
  return {
    id: row.id,
    lotId: row.lot_id,
    adjustmentType: row.adjustment_type,
    valueApplied: toDecimal(row.value_applied),
    quantityBefore: toDecimal(row.quantity_before),
    quantityAfter: toDecimal(row.quantity_after),
    costImpact: toDecimal(row.cost_impact),
    reasonCode: row.reason_code,
    notes: row.notes,
    createdBy: row.created_by,
    createdAt: row.created_at,
  };
}
