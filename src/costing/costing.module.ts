import { Module } from '@nestjs/common';
import { CostingController } from './costing.controller';
import { CostingService } from './costing.service';
import { ConsumptionModule } from '../consumption/consumption.module';
import { PricingModule } from '../pricing/pricing.module';
import { ItemsModule } from '../items/items.module';

@Module({
  imports: [ConsumptionModule, PricingModule, ItemsModule],
  controllers: [CostingController],
  providers: [CostingService],
  exports: [CostingService],
})
export class CostingModule {}
