import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../database/database.service';
import { DbExecutor, ItemRow } from '../database/database.types';
import { toDecimal } from '../common/decimal';
import { Item } from './interfaces/item.interface';

@Injectable()
export class ItemsRepository {
  constructor(private readonly database: DatabaseService) {}

  async findById(id: number, db: DbExecutor = this.database.db): Promise<Item | null> {
    const row = await db
      .selectFrom('items')
      .selectAll()
      .where('id', '=', id)
      .executeTakeFirst();

    return row ? toItem(row) : null;
  }
}

export function toItem(row: ItemRow): Item {
  return {
    id: row.id,
    kind: row.kind,
    name: row.name,
    baseUnit: row.base_unit,
    costingModel: row.costing_model,
    densityGramsPerMl: row.density_g_per_ml === null ? null : toDecimal(row.density_g_per_ml),
    preferredSupplierId: row.preferred_supplier_id,
  };
}
