import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OnEvent } from '@nestjs/event-emitter';
import { PricingRepository } from './pricing.repository';
import { BulkInventoryRepository } from '../bulk-inventory/bulk-inventory.repository';
import { ItemsService } from '../items/items.service';
import { CostingConfig } from '../config/configuration';
import { Decimal, DecimalInput, HUNDRED, roundHalfUp, toDecimal } from '../common/decimal';
import { LotReceivedEvent } from '../lots/interfaces/lot.interface';
import {
  AverageWindowOptions,
  PriceAlertLevel,
  PriceChange,
  PriceLookup,
} from './interfaces/pricing.interface';

const DAY_MS = 24 * 60 * 60 * 1000;

@Injectable()
export class PricingService {
  private readonly logger = new Logger(PricingService.name);
  private readonly costing: CostingConfig;

  constructor(
    private readonly pricingRepository: PricingRepository,
    private readonly bulkInventoryRepository: BulkInventoryRepository,
    private readonly itemsService: ItemsService,
    configService: ConfigService,
  ) {
    this.costing = configService.getOrThrow<CostingConfig>('costing');
  }

  /**
   * Best known per-base-unit price for an item. Looks at the preferred
   * supplier's latest lot, then the latest lot from anyone, then (for
   * weighted-average items) the current average cost when above zero.
   */
  async mostRecentPrice(itemId: number): Promise<PriceLookup> {
    const item = await this.itemsService.getItem(itemId);

    if (item.preferredSupplierId !== null) {
      const preferred = await this.pricingRepository.findLatestLotPrice(
        item.id,
        item.preferredSupplierId,
      );
      if (preferred) {
        return {
          found: true,
          price: preferred.unitCost,
          source: 'preferred_supplier',
          lotId: preferred.lotId,
          acquisitionDate: preferred.acquisitionDate,
        };
      }
    }

    const latest = await this.pricingRepository.findLatestLotPrice(item.id);
    if (latest) {
      return {
        found: true,
        price: latest.unitCost,
        source: 'any_supplier',
        lotId: latest.lotId,
        acquisitionDate: latest.acquisitionDate,
      };
    }

    if (item.costingModel === 'weighted_average') {
      const state = await this.bulkInventoryRepository.findByItem(item.id);
      if (state && state.weightedAverageCost.greaterThan(0)) {
        return {
          found: true,
          price: state.weightedAverageCost,
          source: 'weighted_average',
          lotId: null,
          acquisitionDate: null,
        };
      }
    }

    return { found: false };
  }

  /**
   * Mean lot unit cost over the last `days` days
   */
  async averagePrice(itemId: number, options: AverageWindowOptions = {}): Promise<Decimal | null> {
    const item = await this.itemsService.getItem(itemId);
    const days = options.days ?? this.costing.averagePriceWindowDays;
    const today = options.today ?? new Date();
    const since = new Date(today.getTime() - days * DAY_MS).toISOString().slice(0, 10);

    return this.pricingRepository.averageUnitCostSince(item.id, since, options.excludeLotId);
  }

  /**
   * Compare a new unit cost with the recent average and grade the change
   */
  async detectPriceChange(
    itemId: number,
    newUnitCost: DecimalInput,
    options: AverageWindowOptions = {},
  ): Promise<PriceChange> {
    const newPrice = toDecimal(newUnitCost);
    const averagePrice = await this.averagePrice(itemId, options);

    if (averagePrice === null || averagePrice.isZero()) {
      return {
        itemId,
        averagePrice,
        newPrice,
        changeAmount: null,
        changePercent: null,
        alertLevel: 'none',
        message: 'No historical data for comparison',
      };
    }

    const changeAmount = newPrice.minus(averagePrice);
    const changePercent = roundHalfUp(changeAmount.dividedBy(averagePrice).times(HUNDRED), 1);
    const alertLevel = this.alertLevelFor(changePercent.abs());

    const direction = changeAmount.greaterThan(0) ? 'increased' : 'decreased';
    const suffix = alertLevel === 'none' ? '' : ` (${alertLevel.toUpperCase()})`;

    return {
      itemId,
      averagePrice,
      newPrice,
      changeAmount,
      changePercent,
      alertLevel,
      message: `Price ${direction} by ${changePercent.abs().toFixed(1)}%${suffix}`,
    };
  }

  @OnEvent('lot.received')
  async handleLotReceived(event: LotReceivedEvent) {
    try {
      const change = await this.detectPriceChange(event.itemId, event.unitCost, {
        excludeLotId: event.lotId,
      });
      if (change.alertLevel !== 'none') {
        this.logger.warn(`Item ${event.itemId}, lot ${event.lotId}: ${change.message}`);
      }
    } catch (error) {
      this.logger.error(
        `Error checking price change for lot ${event.lotId}`,
        error instanceof Error ? error.stack : String(error),
      );
    }
  }

  private alertLevelFor(absoluteChangePercent: Decimal): PriceAlertLevel {
    if (absoluteChangePercent.greaterThanOrEqualTo(this.costing.priceAlertCriticalPercent)) {
      return 'critical';
    }
    if (absoluteChangePercent.greaterThanOrEqualTo(this.costing.priceAlertWarningPercent)) {
      return 'warning';
    }
    return 'none';
  }
}
