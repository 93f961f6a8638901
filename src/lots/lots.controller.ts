import { Body, Controller, Get, Param, ParseIntPipe, Post, Query } from '@nestjs/common';
import { LotsService } from './lots.service';
import { ReceiveLotDto } from './dto';

@Controller()
export class LotsController {
  constructor(private readonly lotsService: LotsService) {}

  /**
   * Record a new acquisition lot
   */
  @Post('lots')
  receive(@Body() dto: ReceiveLotDto) {
    return this.lotsService.receive(dto);
  }

  /**
   * Lots with stock left that expire soon
   */
  @Get('lots/expiring')
  findExpiring(@Query('days', new ParseIntPipe({ optional: true })) days?: number) {
    return this.lotsService.getExpiringSoon(days);
  }

  @Get('lots/:lotId')
  findOne(@Param('lotId', ParseIntPipe) lotId: number) {
    return this.lotsService.getLot(lotId);
  }

  /**
   * All lots for an item in FIFO order
   */
  @Get('items/:itemId/lots')
  findAllByItem(@Param('itemId', ParseIntPipe) itemId: number) {
    return this.lotsService.listForItem(itemId);
  }

  /**
   * Value of remaining lot stock, for one item or the whole inventory
   */
  @Get('inventory/value')
  async getInventoryValue(
    @Query('itemId', new ParseIntPipe({ optional: true })) itemId?: number,
  ) {
    const value = await this.lotsService.getInventoryValue(itemId);
    return { itemId: itemId ?? null, value };
  }
}
