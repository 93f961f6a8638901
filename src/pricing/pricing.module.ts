import { Module } from '@nestjs/common';
import { PricingController } from './pricing.controller';
import { PricingService } from './pricing.service';
import { PricingRepository } from './pricing.repository';
import { ItemsModule } from '../items/items.module';
import { BulkInventoryModule } from '../bulk-inventory/bulk-inventory.module';

@Module({
  imports: [ItemsModule, BulkInventoryModule],
  controllers: [PricingController],
  providers: [PricingService, PricingRepository],
  exports: [PricingService],
})
export class PricingModule {}
