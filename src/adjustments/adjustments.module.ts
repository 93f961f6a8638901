import { Module } from '@nestjs/common';
import { AdjustmentsController } from './adjustments.controller';
import { AdjustmentsService } from './adjustments.service';
import { AdjustmentsRepository } from './adjustments.repository';
import { LotsModule } from '../lots/lots.module';

@Module({
  imports: [LotsModule],
  controllers: [AdjustmentsController],
  providers: [AdjustmentsService, AdjustmentsRepository],
  exports: [AdjustmentsService],
})
export class AdjustmentsModule {}
