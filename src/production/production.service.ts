import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { ProductionRepository } from './production.repository';
import { ConsumptionService } from '../consumption/consumption.service';
import { DatabaseService } from '../database/database.service';
import { InsufficientStockException } from '../common/exceptions';
import { COST_SCALE, decimalSum, roundHalfUp, toNumeric } from '../common/decimal';
import {
  NewProductionConsumption,
  ProductionRecordedEvent,
  ProductionRun,
  RecordProductionInput,
} from './interfaces/production.interface';

@Injectable()
export class ProductionService {
  private readonly logger = new Logger(ProductionService.name);

  constructor(
    private readonly productionRepository: ProductionRepository,
    private readonly consumptionService: ConsumptionService,
    private readonly database: DatabaseService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /**
   * Consume every requirement FIFO and record what was drawn, all or nothing.
   * A requirement the lots cannot fully cover aborts the whole run.
   */
  async recordProduction(input: RecordProductionInput): Promise<ProductionRun> {
    if (input.requirements.length === 0) {
      throw new BadRequestException('A production run needs at least one requirement');
    }

    const run = await this.database.transaction('production run', async (trx) => {
      const consumptions: NewProductionConsumption[] = [];

      for (const requirement of input.requirements) {
        const result = await this.consumptionService.consume(
          {
            itemId: requirement.itemId,
            quantityNeeded: requirement.quantity,
            requestUnit: requirement.unit,
            mode: 'commit',
            contextId: input.contextId,
          },
          trx,
        );

        if (!result.satisfied) {
          throw new InsufficientStockException(
            result.itemId,
            result.quantityNeeded.toFixed(),
            result.consumedQuantity.toFixed(),
            result.requestUnit,
          );
        }

        for (const entry of result.breakdown) {
          consumptions.push({
            itemId: result.itemId,
            lotId: entry.lotId,
            quantityConsumed: entry.quantityConsumed,
            unitCost: entry.unitCost,
            cost: roundHalfUp(entry.cost, COST_SCALE),
          });
        }
      }

      return this.productionRepository.createRun(
        {
          contextId: input.contextId,
          description: input.description ?? null,
          totalCost: decimalSum(consumptions.map((consumption) => consumption.cost)),
        },
        consumptions,
        trx,
      );
    });

    this.logger.log(
      `Recorded production run ${run.id} (${run.contextId}): ${run.consumptions.length} lot draw(s), cost ${run.totalCost.toFixed()}`,
    );

    const event: ProductionRecordedEvent = {
      productionRunId: run.id,
      contextId: run.contextId,
      totalCost: toNumeric(run.totalCost),
      itemIds: [...new Set(run.consumptions.map((consumption) => consumption.itemId))],
    };
    this.eventEmitter.emit('production.recorded', event);

    return run;
  }

  async getRun(id: number): Promise<ProductionRun> {
    const run = await this.productionRepository.findById(id);
    if (!run) {
      throw new NotFoundException(`Production run with ID ${id} not found`);
    }
    return run;
  }
}
