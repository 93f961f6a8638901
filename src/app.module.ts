import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import configuration from './config/configuration';
import { DatabaseModule } from './database/database.module';
import { UnitsModule } from './units/units.module';
import { ItemsModule } from './items/items.module';
import { LotsModule } from './lots/lots.module';
import { ConsumptionModule } from './consumption/consumption.module';
import { BulkInventoryModule } from './bulk-inventory/bulk-inventory.module';
import { AdjustmentsModule } from './adjustments/adjustments.module';
import { PricingModule } from './pricing/pricing.module';
import { CostingModule } from './costing/costing.module';
import { ProductionModule } from './production/production.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
    }),
    EventEmitterModule.forRoot(),
    DatabaseModule,
    UnitsModule,
    ItemsModule,
    LotsModule,
    ConsumptionModule,
    BulkInventoryModule,
    AdjustmentsModule,
    PricingModule,
    CostingModule,
    ProductionModule,
  ],
})
export class AppModule {}
