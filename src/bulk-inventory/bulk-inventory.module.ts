import { Module } from '@nestjs/common';
import { BulkInventoryController } from './bulk-inventory.controller';
import { BulkInventoryService } from './bulk-inventory.service';
import { BulkInventoryRepository } from './bulk-inventory.repository';
import { ItemsModule } from '../items/items.module';

@Module({
  imports: [ItemsModule],
  controllers: [BulkInventoryController],
  providers: [BulkInventoryService, BulkInventoryRepository],
  exports: [BulkInventoryService, BulkInventoryRepository],
})
export class BulkInventoryModule {}
