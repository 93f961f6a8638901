import { Injectable, Logger } from '@nestjs/common';
import { ConsumptionService } from '../consumption/consumption.service';
import { PricingService } from '../pricing/pricing.service';
import { ItemsService } from '../items/items.service';
import { NoPricingHistoryException } from '../common/exceptions';
import { Decimal, ZERO, decimalSum } from '../common/decimal';
import { CostEstimate, CostLine, CostRequirement } from './interfaces/costing.interface';

/**
 * Blended cost: FIFO cost for what is on hand, the most recent known price
 * for the rest. Only previews are run, so inventory is never touched.
 */
@Injectable()
export class CostingService {
  private readonly logger = new Logger(CostingService.name);

  constructor(
    private readonly consumptionService: ConsumptionService,
    private readonly pricingService: PricingService,
    private readonly itemsService: ItemsService,
  ) {}

  async estimateCost(requirements: CostRequirement[]): Promise<Decimal> {
    const estimate = await this.estimateCostDetailed(requirements);
    return estimate.totalCost;
  }

  async estimateCostDetailed(requirements: CostRequirement[]): Promise<CostEstimate> {
    const lines: CostLine[] = [];

    for (const requirement of requirements) {
      lines.push(await this.estimateLine(requirement));
    }

    return {
      totalCost: decimalSum(lines.map((line) => line.totalCost)),
      lines,
    };
  }

  private async estimateLine(requirement: CostRequirement): Promise<CostLine> {
    const preview = await this.consumptionService.preview(
      requirement.itemId,
      requirement.quantity,
      requirement.unit,
    );

    const line: CostLine = {
      itemId: preview.itemId,
      quantity: preview.quantityNeeded,
      unit: preview.requestUnit,
      satisfied: preview.satisfied,
      fifoCost: preview.totalCost,
      shortfallBaseQuantity: preview.shortfallBaseQuantity,
      fallbackPrice: null,
      fallbackSource: null,
      fallbackCost: ZERO,
      totalCost: preview.totalCost,
      breakdown: preview.breakdown,
    };

    if (preview.satisfied) {
      return line;
    }

    const price = await this.pricingService.mostRecentPrice(preview.itemId);
    if (!price.found) {
      const item = await this.itemsService.getItem(preview.itemId);
      throw new NoPricingHistoryException(item.id, item.name);
    }

    const fallbackCost = preview.shortfallBaseQuantity.times(price.price);
    this.logger.debug(
      `Item ${preview.itemId}: ${preview.shortfallBaseQuantity.toFixed()} ${preview.baseUnit} short, priced at ${price.price.toFixed()} (${price.source})`,
    );

    return {
      ...line,
      fallbackPrice: price.price,
      fallbackSource: price.source,
      fallbackCost,
      totalCost: preview.totalCost.plus(fallbackCost),
    };
  }
}
