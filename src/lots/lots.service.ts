import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { LotsRepository } from './lots.repository';
import { ItemsService } from '../items/items.service';
import { UnitsService } from '../units/units.service';
import { DatabaseService } from '../database/database.service';
import { CostingConfig } from '../config/configuration';
import { ReceiveLotDto } from './dto';
import { InvalidQuantityException, LotNotFoundException, UnitConversionException } from '../common/exceptions';
import {
  COST_SCALE,
  Decimal,
  QUANTITY_SCALE,
  UNIT_COST_SCALE,
  roundHalfUp,
  toDecimal,
  toNumeric,
} from '../common/decimal';
import { Lot, LotReceivedEvent } from './interfaces/lot.interface';

const DAY_MS = 24 * 60 * 60 * 1000;

@Injectable()
export class LotsService {
  private readonly logger = new Logger(LotsService.name);
  private readonly costing: CostingConfig;

  constructor(
    private readonly lotsRepository: LotsRepository,
    private readonly itemsService: ItemsService,
    private readonly unitsService: UnitsService,
    private readonly database: DatabaseService,
    private readonly eventEmitter: EventEmitter2,
    configService: ConfigService,
  ) {
    this.costing = configService.getOrThrow<CostingConfig>('costing');
  }

  /**
   * Record an acquisition as a new lot, stored in the item's base unit
   */
  async receive(dto: ReceiveLotDto): Promise<Lot> {
    const item = await this.itemsService.getItem(dto.itemId);
    this.itemsService.requireCostingModel(item, 'fifo');

    const quantity = toDecimal(dto.quantity);
    if (!quantity.isFinite()) {
      throw new InvalidQuantityException(`Quantity must be a finite number (received ${dto.quantity})`);
    }
    if (quantity.lessThanOrEqualTo(0)) {
      throw new InvalidQuantityException(
        `Quantity must be greater than 0 (received ${dto.quantity})`,
      );
    }

    const unitCost = toDecimal(dto.unitCost);
    if (!unitCost.isFinite()) {
      throw new BadRequestException(`Unit cost must be a finite number (received ${dto.unitCost})`);
    }
    if (unitCost.lessThan(0)) {
      throw new BadRequestException(`Unit cost cannot be negative (received ${dto.unitCost})`);
    }

    if (dto.expirationDate && dto.expirationDate < dto.acquisitionDate) {
      throw new BadRequestException(
        `Expiration date ${dto.expirationDate} is before acquisition date ${dto.acquisitionDate}`,
      );
    }

    const converted = this.unitsService.convert(quantity, dto.unit, item.baseUnit, {
      densityGramsPerMl: item.densityGramsPerMl,
    });
    if (!converted.ok) {
      throw new UnitConversionException(dto.unit, item.baseUnit, converted.error);
    }

    const baseQuantity = roundHalfUp(converted.quantity, QUANTITY_SCALE);
    if (baseQuantity.isZero()) {
      throw new InvalidQuantityException(
        `${dto.quantity} ${dto.unit} rounds to zero ${item.baseUnit}`,
      );
    }

    // Cost is always stored per base unit
    const totalCost = dto.costBasis === 'total' ? unitCost : unitCost.times(quantity);
    const baseUnitCost = roundHalfUp(totalCost.dividedBy(baseQuantity), UNIT_COST_SCALE);

    const lot = await this.database.transaction('lot receipt', (trx) =>
      this.lotsRepository.create(
        {
          itemId: item.id,
          supplierId: dto.supplierId ?? null,
          acquisitionDate: dto.acquisitionDate,
          quantity: baseQuantity,
          unitCost: baseUnitCost,
          expirationDate: dto.expirationDate ?? null,
          location: dto.location ?? null,
          notes: dto.notes ?? null,
        },
        trx,
      ),
    );

    this.logger.log(
      `Received lot ${lot.id} for item ${item.id}: ${baseQuantity.toFixed()} ${item.baseUnit} at ${baseUnitCost.toFixed()} per ${item.baseUnit}`,
    );

    const event: LotReceivedEvent = {
      lotId: lot.id,
      itemId: item.id,
      unitCost: toNumeric(lot.unitCost),
      acquisitionDate: lot.acquisitionDate,
    };
    this.eventEmitter.emit('lot.received', event);

    return lot;
  }

  async getLot(lotId: number): Promise<Lot> {
    const lot = await this.lotsRepository.findById(lotId);
    if (!lot) {
      throw new LotNotFoundException(lotId);
    }
    return lot;
  }

  /**
   * All lots of an item, including depleted ones kept for audit
   */
  async listForItem(itemId: number): Promise<Lot[]> {
    await this.itemsService.getItem(itemId);
    return this.lotsRepository.findByItem(itemId);
  }

  /**
   * Lots with stock left that expire within `days` from `today`
   */
  async getExpiringSoon(days?: number, today: Date = new Date()): Promise<Lot[]> {
    const window = days ?? this.costing.expiringSoonDays;
    if (window < 0) {
      throw new BadRequestException(`Days must not be negative (received ${window})`);
    }
    const until = new Date(today.getTime() + window * DAY_MS).toISOString().slice(0, 10);
    return this.lotsRepository.findExpiringBy(until);
  }

  async getInventoryValue(itemId?: number): Promise<Decimal> {
    if (itemId !== undefined) {
      await this.itemsService.getItem(itemId);
    }
    const value = await this.lotsRepository.sumValue(itemId);
    return roundHalfUp(value, COST_SCALE);
  }
}
