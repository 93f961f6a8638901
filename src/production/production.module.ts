import { Module } from '@nestjs/common';
import { ProductionController } from './production.controller';
import { ProductionService } from './production.service';
import { ProductionRepository } from './production.repository';
import { ConsumptionModule } from '../consumption/consumption.module';

@Module({
  imports: [ConsumptionModule],
  controllers: [ProductionController],
  providers: [ProductionService, ProductionRepository],
})
export class ProductionModule {}
