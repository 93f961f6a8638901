import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { LotsRepository } from '../lots/lots.repository';
import { ItemsService } from '../items/items.service';
import { UnitsService } from '../units/units.service';
import { DatabaseService } from '../database/database.service';
import { DbExecutor } from '../database/database.types';
import { CostingConfig } from '../config/configuration';
import { InvalidQuantityException, UnitConversionException } from '../common/exceptions';
import {
  Decimal,
  DecimalInput,
  QUANTITY_QUANTUM,
  QUANTITY_SCALE,
  ZERO,
  decimalMin,
  decimalSum,
  roundHalfUp,
  toDecimal,
  toNumeric,
} from '../common/decimal';
import { Item } from '../items/interfaces/item.interface';
import {
  ConsumptionRequest,
  ConsumptionResult,
  InventoryConsumedEvent,
  ItemAvailability,
  LotConsumption,
} from './interfaces/consumption.interface';

/**
 * FIFO consumption engine shared by every lot-tracked item kind
 * (ingredients, inventory items, materials).
 *
 * Committed runs write each lot as soon as it is drawn, inside one
 * transaction with the item's available lots locked FOR UPDATE.
 */
@Injectable()
export class ConsumptionService {
  private readonly logger = new Logger(ConsumptionService.name);
  private readonly epsilon: Decimal;

  constructor(
    private readonly lotsRepository: LotsRepository,
    private readonly itemsService: ItemsService,
    private readonly unitsService: UnitsService,
    private readonly database: DatabaseService,
    private readonly eventEmitter: EventEmitter2,
    configService: ConfigService,
  ) {
    this.epsilon = toDecimal(configService.getOrThrow<CostingConfig>('costing').epsilon);
    // Lots holding a single quantum must stay selectable
    if (
      !this.epsilon.isFinite() ||
      this.epsilon.lessThan(0) ||
      this.epsilon.greaterThanOrEqualTo(QUANTITY_QUANTUM)
    ) {
      throw new Error(
        `costing.epsilon must be at least 0 and below ${QUANTITY_QUANTUM.toFixed()} (received ${this.epsilon.toFixed()})`,
      );
    }
  }

  /**
   * Draw `quantityNeeded` from the item's lots, oldest first.
   * With an `executor` the caller owns the transaction; otherwise a commit
   * opens its own. A shortfall is reported in the result, never thrown.
   */
  async consume(request: ConsumptionRequest, executor?: DbExecutor): Promise<ConsumptionResult> {
    const quantityNeeded = toDecimal(request.quantityNeeded);
    if (!quantityNeeded.isFinite()) {
      throw new InvalidQuantityException(
        `Quantity needed must be a finite number (received ${quantityNeeded.toFixed()} ${request.requestUnit})`,
      );
    }
    if (quantityNeeded.lessThanOrEqualTo(0)) {
      throw new InvalidQuantityException(
        `Quantity needed must be greater than 0 (received ${quantityNeeded.toFixed()} ${request.requestUnit})`,
      );
    }

    if (request.mode === 'preview' || executor) {
      return this.walkLots(request, quantityNeeded, executor);
    }

    const result = await this.database.transaction('FIFO consumption', (trx) =>
      this.walkLots(request, quantityNeeded, trx),
    );

    const event: InventoryConsumedEvent = {
      itemId: result.itemId,
      contextId: result.contextId,
      consumedBaseQuantity: toNumeric(result.consumedBaseQuantity),
      totalCost: toNumeric(result.totalCost),
      satisfied: result.satisfied,
      lotIds: result.breakdown.map((entry) => entry.lotId),
    };
    this.eventEmitter.emit('inventory.consumed', event);

    return result;
  }

  preview(itemId: number, quantity: DecimalInput, unit: string): Promise<ConsumptionResult> {
    return this.consume({ itemId, quantityNeeded: quantity, requestUnit: unit, mode: 'preview' });
  }

  commit(
    itemId: number,
    quantity: DecimalInput,
    unit: string,
    contextId?: string,
  ): Promise<ConsumptionResult> {
    return this.consume({
      itemId,
      quantityNeeded: quantity,
      requestUnit: unit,
      mode: 'commit',
      contextId,
    });
  }

  /**
   * Total stock left across an item's lots, in its base unit
   */
  async getAvailable(itemId: number): Promise<ItemAvailability> {
    const item = await this.itemsService.getItem(itemId);
    this.itemsService.requireCostingModel(item, 'fifo');

    const lots = await this.lotsRepository.findAvailableByItem(item.id, this.epsilon);

    return {
      itemId: item.id,
      baseUnit: item.baseUnit,
      available: decimalSum(lots.map((lot) => lot.quantityRemaining)),
      lotCount: lots.length,
    };
  }

  private async walkLots(
    request: ConsumptionRequest,
    quantityNeeded: Decimal,
    db?: DbExecutor,
  ): Promise<ConsumptionResult> {
    const item = await this.itemsService.getItem(request.itemId, db);
    this.itemsService.requireCostingModel(item, 'fifo');

    const forward = this.unitsService.convert(quantityNeeded, request.requestUnit, item.baseUnit, {
      densityGramsPerMl: item.densityGramsPerMl,
    });
    if (!forward.ok) {
      throw new UnitConversionException(request.requestUnit, item.baseUnit, forward.error);
    }

    // Lots are stored at QUANTITY_SCALE, so the walk works at that scale too
    const baseNeeded = roundHalfUp(forward.quantity, QUANTITY_SCALE);
    if (baseNeeded.isZero()) {
      throw new InvalidQuantityException(
        `${quantityNeeded.toFixed()} ${request.requestUnit} rounds to zero ${item.baseUnit}`,
      );
    }
    const commit = request.mode === 'commit';

    const lots = await this.lotsRepository.findAvailableByItem(
      item.id,
      this.epsilon,
      { forUpdate: commit },
      db,
    );

    const breakdown: LotConsumption[] = [];
    let remainingNeeded = baseNeeded;
    let totalCost = ZERO;

    for (const lot of lots) {
      if (remainingNeeded.lessThanOrEqualTo(0)) break;

      const toConsume = decimalMin(lot.quantityRemaining, remainingNeeded);
      const remainingInLot = lot.quantityRemaining.minus(toConsume);
      const cost = toConsume.times(lot.unitCost);

      if (commit) {
        await this.lotsRepository.updateRemaining(lot.id, remainingInLot, db);
      }

      totalCost = totalCost.plus(cost);
      remainingNeeded = remainingNeeded.minus(toConsume);

      breakdown.push({
        lotId: lot.id,
        acquisitionDate: lot.acquisitionDate,
        quantityConsumed: toConsume,
        unitCost: lot.unitCost,
        cost,
        remainingInLot,
      });
    }

    const consumedBase = decimalSum(breakdown.map((entry) => entry.quantityConsumed));
    const shortfallBase = baseNeeded.minus(consumedBase);

    const result: ConsumptionResult = {
      itemId: item.id,
      mode: request.mode,
      contextId: request.contextId ?? null,
      requestUnit: request.requestUnit,
      baseUnit: item.baseUnit,
      quantityNeeded,
      consumedQuantity: this.toRequestUnit(consumedBase, item, request.requestUnit),
      shortfall: this.toRequestUnit(shortfallBase, item, request.requestUnit),
      consumedBaseQuantity: consumedBase,
      shortfallBaseQuantity: shortfallBase,
      satisfied: shortfallBase.isZero(),
      totalCost,
      breakdown,
    };

    this.logResult(result);
    return result;
  }

  /**
   * The forward conversion already succeeded, so a failed reverse conversion
   * falls back to the base-unit value instead of failing the call.
   */
  private toRequestUnit(baseQuantity: Decimal, item: Item, requestUnit: string): Decimal {
    if (baseQuantity.isZero()) {
      return ZERO;
    }

    const reverse = this.unitsService.convert(baseQuantity, item.baseUnit, requestUnit, {
      densityGramsPerMl: item.densityGramsPerMl,
    });
    if (!reverse.ok) {
      this.logger.warn(
        `Reporting ${baseQuantity.toFixed()} ${item.baseUnit} for item ${item.id} in base units: ${reverse.error}`,
      );
      return baseQuantity;
    }
    return reverse.quantity;
  }

  private logResult(result: ConsumptionResult): void {
    const summary =
      `item ${result.itemId}: ${result.consumedBaseQuantity.toFixed()} ${result.baseUnit} ` +
      `from ${result.breakdown.length} lot(s), cost ${result.totalCost.toFixed()}`;

    if (result.mode === 'preview') {
      this.logger.debug(`Preview ${summary}`);
    } else {
      this.logger.log(`Consumed ${summary}`);
    }

    if (!result.satisfied) {
      this.logger.warn(
        `Shortfall of ${result.shortfallBaseQuantity.toFixed()} ${result.baseUnit} for item ${result.itemId}`,
      );
    }
  }
}
