import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../database/database.service';
import {
  DbExecutor,
  ProductionConsumptionRow,
  ProductionRunRow,
} from '../database/database.types';
import { Decimal, toDecimal, toNumeric } from '../common/decimal';
import {
  NewProductionConsumption,
  ProductionConsumption,
  ProductionRun,
} from './interfaces/production.interface';

@Injectable()
export class ProductionRepository {
  constructor(private readonly database: DatabaseService) {}

  async createRun(
    data: { contextId: string; description: string | null; totalCost: Decimal },
    consumptions: NewProductionConsumption[],
    db: DbExecutor = this.database.db,
  ): Promise<ProductionRun> {
    const run = await db
      .insertInto('production_runs')
      .values({
        context_id: data.contextId,
        description: data.description,
        total_cost: toNumeric(data.totalCost),
      })
      .returningAll()
      .executeTakeFirstOrThrow();

    const rows =
      consumptions.length === 0
        ? []
        : await db
            .insertInto('production_consumptions')
            .values(
              consumptions.map((consumption) => ({
                production_run_id: run.id,
                item_id: consumption.itemId,
                lot_id: consumption.lotId,
                quantity_consumed: toNumeric(consumption.quantityConsumed),
                unit_cost: toNumeric(consumption.unitCost),
                cost: toNumeric(consumption.cost),
              })),
            )
            .returningAll()
            .execute();

    return toProductionRun(run, rows);
  }

  async findById(id: number, db: DbExecutor = this.database.db): Promise<ProductionRun | null> {
    const run = await db
      .selectFrom('production_runs')
      .selectAll()
      .where('id', '=', id)
      .executeTakeFirst();

    if (!run) {
      return null;
    }

    const rows = await db
      .selectFrom('production_consumptions')
      .selectAll()
      .where('production_run_id', '=', id)
      .orderBy('id', 'asc')
      .execute();

    return toProductionRun(run, rows);
  }
}

function toProductionRun(run: ProductionRunRow, rows: ProductionConsumptionRow[]): ProductionRun {
  return {
    id: run.id,
    contextId: run.context_id,
    description: run.description,
    totalCost: toDecimal(run.total_cost),
    createdAt: run.created_at,
    consumptions: rows.map(
      (row): ProductionConsumption => ({
        id: row.id,
        productionRunId: row.production_run_id,
        itemId: row.item_id,
        lotId: row.lot_id,
        quantityConsumed: toDecimal(row.quantity_consumed),
        unitCost: toDecimal(row.unit_cost),
        cost: toDecimal(row.cost),
      }),
    ),
  };
}
