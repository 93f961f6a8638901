import { BadRequestException, Controller, Get, Param, ParseIntPipe, Query } from '@nestjs/common';
import { PricingService } from './pricing.service';
import { toDecimal } from '../common/decimal';

const NUMERIC = /^\d+(\.\d+)?$/;

@Controller('items/:itemId/prices')
export class PricingController {
  constructor(private readonly pricingService: PricingService) {}

  @Get('recent')
  mostRecent(@Param('itemId', ParseIntPipe) itemId: number) {
    return this.pricingService.mostRecentPrice(itemId);
  }

  /**
   * How a candidate unit cost compares with the recent average
   */
  @Get('change')
  detectChange(
    @Param('itemId', ParseIntPipe) itemId: number,
    @Query('unitCost') unitCost?: string,
    @Query('days', new ParseIntPipe({ optional: true })) days?: number,
  ) {
    if (!unitCost || !NUMERIC.test(unitCost)) {
      throw new BadRequestException(`unitCost must be a non-negative number (received ${unitCost})`);
    }
    return this.pricingService.detectPriceChange(itemId, toDecimal(unitCost), { days });
  }
}
