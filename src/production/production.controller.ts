import { Body, Controller, Get, Param, ParseIntPipe, Post } from '@nestjs/common';
import { ProductionService } from './production.service';
import { RecordProductionDto } from './dto';

@Controller('production-runs')
export class ProductionController {
  constructor(private readonly productionService: ProductionService) {}

  @Post()
  record(@Body() dto: RecordProductionDto) {
    return this.productionService.recordProduction(dto);
  }

  @Get(':id')
  findOne(@Param('id', ParseIntPipe) id: number) {
    return this.productionService.getRun(id);
  }
}
