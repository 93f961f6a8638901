import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { CostingService } from './costing.service';
import { EstimateCostDto } from './dto';

@Controller('costing')
export class CostingController {
  constructor(private readonly costingService: CostingService) {}

  /**
   * Blended cost of a list of requirements; nothing is consumed
   */
  @Post('estimate')
  @HttpCode(HttpStatus.OK)
  estimate(@Body() dto: EstimateCostDto) {
    return this.costingService.estimateCostDetailed(dto.requirements);
  }
}
