import { Body, Controller, Get, Param, ParseIntPipe, Post } from '@nestjs/common';
import { AdjustmentsService } from './adjustments.service';
import { AdjustLotDto } from './dto';

@Controller('lots/:lotId/adjustments')
export class AdjustmentsController {
  constructor(private readonly adjustmentsService: AdjustmentsService) {}

  @Post()
  adjust(@Param('lotId', ParseIntPipe) lotId: number, @Body() dto: AdjustLotDto) {
    return this.adjustmentsService.adjust(
      lotId,
      dto.adjustmentType,
      dto.value,
      dto.reasonCode,
      dto.notes,
      dto.createdBy,
    );
  }

  @Get()
  history(@Param('lotId', ParseIntPipe) lotId: number) {
    return this.adjustmentsService.historyForLot(lotId);
  }
}
