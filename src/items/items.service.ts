import { Injectable } from '@nestjs/common';
import { ItemsRepository } from './items.repository';
import { DbExecutor } from '../database/database.types';
import { CostingModelMismatchException, ItemNotFoundException } from '../common/exceptions';
import { CostingModel, Item } from './interfaces/item.interface';

@Injectable()
export class ItemsService {
  constructor(private readonly itemsRepository: ItemsRepository) {}

  /**
   * Resolve a tracked item (ingredient, inventory item or material)
   */
  async getItem(itemId: number, db?: DbExecutor): Promise<Item> {
    const item = await this.itemsRepository.findById(itemId, db);
    if (!item) {
      throw new ItemNotFoundException(itemId);
    }
    return item;
  }

  requireCostingModel(item: Item, expected: CostingModel): void {
    if (item.costingModel !== expected) {
      throw new CostingModelMismatchException(item.name, expected, item.costingModel);
    }
  }
}
