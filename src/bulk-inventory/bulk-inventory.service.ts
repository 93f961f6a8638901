import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { BulkInventoryRepository } from './bulk-inventory.repository';
import { ItemsService } from '../items/items.service';
import { DatabaseService } from '../database/database.service';
import {
  InvalidAdjustmentException,
  InvalidQuantityException,
} from '../common/exceptions';
import {
  COST_SCALE,
  Decimal,
  DecimalInput,
  HUNDRED,
  PERCENTAGE_RESULT_SCALE,
  QUANTITY_SCALE,
  ZERO,
  decimalMin,
  roundHalfUp,
  toDecimal,
  toNumeric,
} from '../common/decimal';
import {
  BulkAdjustment,
  BulkInventoryEvent,
  WeightedAverageState,
} from './interfaces/weighted-average.interface';

/**
 * `(q * avg + aq * ac) / (q + aq)`, rounded half-up to COST_SCALE.
 * With nothing on hand the added cost becomes the average.
 */
export function calculateWeightedAverage(
  currentQuantity: DecimalInput,
  currentAverage: DecimalInput,
  addedQuantity: DecimalInput,
  addedUnitCost: DecimalInput,
): Decimal {
  const quantity = toDecimal(currentQuantity);
  const added = toDecimal(addedQuantity);
  const cost = toDecimal(addedUnitCost);

  if (quantity.lessThanOrEqualTo(0)) {
    return roundHalfUp(cost, COST_SCALE);
  }

  const totalValue = quantity.times(currentAverage).plus(added.times(cost));
  return roundHalfUp(totalValue.dividedBy(quantity.plus(added)), COST_SCALE);
}

/**
 * Weighted-average costing for items that are not tracked by lot
 * (packaging, bulk supplies)
 */
@Injectable()
export class BulkInventoryService {
  private readonly logger = new Logger(BulkInventoryService.name);

  constructor(
    private readonly bulkInventoryRepository: BulkInventoryRepository,
    private readonly itemsService: ItemsService,
    private readonly database: DatabaseService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  async recordAcquisition(
    itemId: number,
    addedQuantity: DecimalInput,
    addedUnitCost: DecimalInput,
  ): Promise<WeightedAverageState> {
    const quantity = roundHalfUp(addedQuantity, QUANTITY_SCALE);
    const unitCost = toDecimal(addedUnitCost);

    if (!quantity.isFinite() || !unitCost.isFinite()) {
      throw new InvalidQuantityException(
        `Acquired quantity and unit cost must be finite numbers (received ${quantity.toFixed()} at ${unitCost.toFixed()})`,
      );
    }
    if (quantity.lessThanOrEqualTo(0)) {
      throw new InvalidQuantityException(
        `Acquired quantity must be greater than 0 (received ${toDecimal(addedQuantity).toFixed()})`,
      );
    }
    if (unitCost.lessThan(0)) {
      throw new InvalidQuantityException(
        `Unit cost cannot be negative (received ${unitCost.toFixed()})`,
      );
    }

    const item = await this.itemsService.getItem(itemId);
    this.itemsService.requireCostingModel(item, 'weighted_average');

    const state = await this.database.transaction('bulk acquisition', async (trx) => {
      const current = await this.bulkInventoryRepository.findByItem(
        item.id,
        { forUpdate: true },
        trx,
      );
      const currentQuantity = current?.currentQuantity ?? ZERO;
      const currentAverage = current?.weightedAverageCost ?? ZERO;

      return this.bulkInventoryRepository.save(
        item.id,
        currentQuantity.plus(quantity),
        calculateWeightedAverage(currentQuantity, currentAverage, quantity, unitCost),
        trx,
      );
    });

    this.logger.log(
      `Acquired ${quantity.toFixed()} ${item.baseUnit} of item ${item.id} at ${unitCost.toFixed()}; average now ${state.weightedAverageCost.toFixed()}`,
    );
    this.eventEmitter.emit('bulk.acquired', toEvent(state));

    return state;
  }

  /**
   * Set the on-hand quantity directly or as a percentage of what is on
   * hand. The weighted average cost is left untouched.
   */
  async adjustInventory(
    itemId: number,
    adjustment: BulkAdjustment,
    notes?: string,
  ): Promise<WeightedAverageState> {
    const { newQuantity, percentage } = adjustment;

    if ((newQuantity === undefined) === (percentage === undefined)) {
      throw new InvalidAdjustmentException(
        'Provide exactly one of newQuantity or percentage',
      );
    }
    if (percentage !== undefined && !percentage.isFinite()) {
      throw new InvalidAdjustmentException(
        `Percentage must be a finite number (received ${percentage.toFixed()})`,
      );
    }
    if (newQuantity !== undefined && !newQuantity.isFinite()) {
      throw new InvalidQuantityException(
        `Quantity must be a finite number (received ${newQuantity.toFixed()})`,
      );
    }
    if (percentage !== undefined && (percentage.lessThan(0) || percentage.greaterThan(HUNDRED))) {
      throw new InvalidAdjustmentException(
        `Percentage must be between 0 and 100 (received ${percentage.toFixed()})`,
      );
    }
    if (newQuantity !== undefined && newQuantity.lessThan(0)) {
      throw new InvalidQuantityException(
        `Quantity cannot be negative (received ${newQuantity.toFixed()})`,
      );
    }

    const item = await this.itemsService.getItem(itemId);
    this.itemsService.requireCostingModel(item, 'weighted_average');

    const { before, state } = await this.database.transaction('bulk adjustment', async (trx) => {
      const current = await this.bulkInventoryRepository.findByItem(
        item.id,
        { forUpdate: true },
        trx,
      );
      const before = current?.currentQuantity ?? ZERO;
      const after =
        percentage !== undefined
          ? decimalMin(
              roundHalfUp(before.times(percentage).dividedBy(HUNDRED), PERCENTAGE_RESULT_SCALE),
              before,
            )
          : roundHalfUp(newQuantity ?? ZERO, QUANTITY_SCALE);

      const state = await this.bulkInventoryRepository.save(
        item.id,
        after,
        current?.weightedAverageCost ?? ZERO,
        trx,
      );
      return { before, state };
    });

    this.logger.log(
      `Adjusted item ${item.id}: ${before.toFixed()} -> ${state.currentQuantity.toFixed()} ${item.baseUnit}${notes ? ` (${notes})` : ''}`,
    );
    this.eventEmitter.emit('bulk.adjusted', toEvent(state));

    return state;
  }

  /**
   * Current state; an item never acquired reports zero quantity and cost
   */
  async getState(itemId: number): Promise<WeightedAverageState> {
    const item = await this.itemsService.getItem(itemId);
    this.itemsService.requireCostingModel(item, 'weighted_average');

    const state = await this.bulkInventoryRepository.findByItem(item.id);
    return (
      state ?? {
        itemId: item.id,
        currentQuantity: ZERO,
        weightedAverageCost: ZERO,
        updatedAt: null,
      }
    );
  }
}

function toEvent(state: WeightedAverageState): BulkInventoryEvent {
  return {
    itemId: state.itemId,
    currentQuantity: toNumeric(state.currentQuantity),
    weightedAverageCost: toNumeric(state.weightedAverageCost),
  };
}
