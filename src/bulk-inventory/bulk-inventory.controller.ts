import { Body, Controller, Get, Param, ParseIntPipe, Post } from '@nestjs/common';
import { BulkInventoryService } from './bulk-inventory.service';
import { AdjustBulkDto, RecordAcquisitionDto } from './dto';
import { toDecimal } from '../common/decimal';

@Controller('items/:itemId/bulk')
export class BulkInventoryController {
  constructor(private readonly bulkInventoryService: BulkInventoryService) {}

  @Post('acquisitions')
  recordAcquisition(
    @Param('itemId', ParseIntPipe) itemId: number,
    @Body() dto: RecordAcquisitionDto,
  ) {
    return this.bulkInventoryService.recordAcquisition(itemId, dto.quantity, dto.unitCost);
  }

  @Post('adjustments')
  adjust(@Param('itemId', ParseIntPipe) itemId: number, @Body() dto: AdjustBulkDto) {
    return this.bulkInventoryService.adjustInventory(
      itemId,
      {
        newQuantity: dto.newQuantity === undefined ? undefined : toDecimal(dto.newQuantity),
        percentage: dto.percentage === undefined ? undefined : toDecimal(dto.percentage),
      },
      dto.notes,
    );
  }

  @Get()
  getState(@Param('itemId', ParseIntPipe) itemId: number) {
    return this.bulkInventoryService.getState(itemId);
  }
}
