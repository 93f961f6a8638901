import { Body, Controller, Get, Param, ParseIntPipe, Post } from '@nestjs/common';
import { ConsumptionService } from './consumption.service';
import { ConsumeDto } from './dto';

@Controller('items/:itemId')
export class ConsumptionController {
  constructor(private readonly consumptionService: ConsumptionService) {}

  /**
   * Preview or commit a FIFO draw against the item's lots
   */
  @Post('consumption')
  consume(@Param('itemId', ParseIntPipe) itemId: number, @Body() dto: ConsumeDto) {
    return this.consumptionService.consume({
      itemId,
      quantityNeeded: dto.quantity,
      requestUnit: dto.unit,
      mode: dto.mode,
      contextId: dto.contextId,
    });
  }

  @Get('availability')
  getAvailable(@Param('itemId', ParseIntPipe) itemId: number) {
    return this.consumptionService.getAvailable(itemId);
  }
}
