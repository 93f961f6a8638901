import { Module } from '@nestjs/common';
import { ConsumptionController } from './consumption.controller';
import { ConsumptionService } from './consumption.service';
import { LotsModule } from '../lots/lots.module';
import { ItemsModule } from '../items/items.module';
import { UnitsModule } from '../units/units.module';

@Module({
  imports: [LotsModule, ItemsModule, UnitsModule],
  controllers: [ConsumptionController],
  providers: [ConsumptionService],
  exports: [ConsumptionService],
})
export class ConsumptionModule {}
