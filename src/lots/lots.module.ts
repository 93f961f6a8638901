import { Module } from '@nestjs/common';
import { LotsController } from './lots.controller';
import { LotsService } from './lots.service';
import { LotsRepository } from './lots.repository';
import { ItemsModule } from '../items/items.module';
import { UnitsModule } from '../units/units.module';

@Module({
  imports: [ItemsModule, UnitsModule],
  controllers: [LotsController],
  providers: [LotsService, LotsRepository],
  exports: [LotsService, LotsRepository],
})
export class LotsModule {}
