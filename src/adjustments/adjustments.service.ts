import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { AdjustmentsRepository } from './adjustments.repository';
import { LotsRepository } from '../lots/lots.repository';
import { DatabaseService } from '../database/database.service';
import { CostingConfig } from '../config/configuration';
import {
  InvalidAdjustmentException,
  InvalidQuantityException,
  LotNotFoundException,
} from '../common/exceptions';
import {
  COST_SCALE,
  Decimal,
  DecimalInput,
  HUNDRED,
  PERCENTAGE_RESULT_SCALE,
  QUANTITY_SCALE,
  decimalMin,
  roundHalfUp,
  toDecimal,
  toNumeric,
} from '../common/decimal';
import {
  AdjustmentRecord,
  AdjustmentType,
  InventoryAdjustedEvent,
  ReasonCode,
} from './interfaces/adjustment.interface';

@Injectable()
export class AdjustmentsService {
  private readonly logger = new Logger(AdjustmentsService.name);
  private readonly defaultActor: string;

  constructor(
    private readonly adjustmentsRepository: AdjustmentsRepository,
    private readonly lotsRepository: LotsRepository,
    private readonly database: DatabaseService,
    private readonly eventEmitter: EventEmitter2,
    configService: ConfigService,
  ) {
    this.defaultActor = configService.getOrThrow<CostingConfig>('costing').defaultActor;
  }

  /**
   * Manually change a lot's remaining quantity and record why.
   *
   * The lot row stays locked from the read to the audit insert, so the
   * recorded `quantityBefore` is the value the change was applied to.
   */
  async adjust(
    lotId: number,
    adjustmentType: AdjustmentType,
    value: DecimalInput,
    reasonCode: ReasonCode,
    notes?: string | null,
    createdBy?: string,
  ): Promise<AdjustmentRecord> {
    const amount = toDecimal(value);
    const trimmedNotes = notes?.trim() || null;

    const { lot, record } = await this.database.transaction('lot adjustment', async (trx) => {
      const lot = await this.lotsRepository.findById(lotId, { forUpdate: true }, trx);
      if (!lot) {
        throw new LotNotFoundException(lotId);
      }

      validateValue(adjustmentType, amount);

      const before = lot.quantityRemaining;
      const after = applyAdjustment(before, adjustmentType, amount);

      if (after.lessThan(0)) {
        throw new InvalidQuantityException(
          `Adjustment would leave lot ${lot.id} at ${after.toFixed()} (current ${before.toFixed()}, ${adjustmentType} ${amount.toFixed()})`,
        );
      }
      if (after.greaterThan(lot.quantityOriginal)) {
        throw new InvalidQuantityException(
          `Adjustment would raise lot ${lot.id} to ${after.toFixed()}, above its original quantity ${lot.quantityOriginal.toFixed()}`,
        );
      }
      if (reasonCode === 'OTHER' && !trimmedNotes) {
        throw new InvalidAdjustmentException('Notes are required when the reason is OTHER');
      }

      const noteLine = `[${new Date().toISOString()}] ${adjustmentType.toUpperCase()} ${amount.toFixed()} (${reasonCode})${trimmedNotes ? `: ${trimmedNotes}` : ''}`;
      await this.lotsRepository.updateRemainingAndNotes(
        lot.id,
        after,
        lot.notes ? `${lot.notes}\n${noteLine}` : noteLine,
        trx,
      );

      const record = await this.adjustmentsRepository.insert(
        {
          lotId: lot.id,
          adjustmentType,
          valueApplied: amount,
          quantityBefore: before,
          quantityAfter: after,
          costImpact: roundHalfUp(after.minus(before).abs().times(lot.unitCost), COST_SCALE),
          reasonCode,
          notes: trimmedNotes,
          createdBy: createdBy ?? this.defaultActor,
        },
        trx,
      );

      return { lot, record };
    });

    this.logger.log(
      `Adjusted lot ${lot.id} (${reasonCode}): ${record.quantityBefore.toFixed()} -> ${record.quantityAfter.toFixed()} by ${record.createdBy}`,
    );

    const event: InventoryAdjustedEvent = {
      adjustmentId: record.id,
      lotId: lot.id,
      itemId: lot.itemId,
      adjustmentType,
      quantityBefore: toNumeric(record.quantityBefore),
      quantityAfter: toNumeric(record.quantityAfter),
      reasonCode,
    };
    this.eventEmitter.emit('inventory.adjusted', event);

    return record;
  }

  /**
   * Audit trail of a lot, newest first
   */
  async historyForLot(lotId: number): Promise<AdjustmentRecord[]> {
    const lot = await this.lotsRepository.findById(lotId);
    if (!lot) {
      throw new LotNotFoundException(lotId);
    }
    return this.adjustmentsRepository.findByLot(lot.id);
  }
}

function validateValue(adjustmentType: AdjustmentType, value: Decimal): void {
  if (!value.isFinite()) {
    throw new InvalidAdjustmentException(
      `Adjustment value for ${adjustmentType} must be a finite number (received ${value.toFixed()})`,
    );
  }
  if (adjustmentType === 'percentage') {
    if (value.lessThan(0) || value.greaterThan(HUNDRED)) {
      throw new InvalidAdjustmentException(
        `Percentage must be between 0 and 100 (received ${value.toFixed()})`,
      );
    }
    return;
  }
  if (value.lessThan(0)) {
    throw new InvalidAdjustmentException(
      `Adjustment value for ${adjustmentType} cannot be negative (received ${value.toFixed()})`,
    );
  }
}

export function applyAdjustment(
  current: Decimal,
  adjustmentType: AdjustmentType,
  value: Decimal,
): Decimal {
  switch (adjustmentType) {
    case 'add':
      return roundHalfUp(current.plus(value), QUANTITY_SCALE);
    case 'subtract':
      return roundHalfUp(current.minus(value), QUANTITY_SCALE);
    case 'set':
      return roundHalfUp(value, QUANTITY_SCALE);
    case 'percentage':
      // Rounding to 2 places never lifts the lot above what it held
      return decimalMin(
        roundHalfUp(current.times(value).dividedBy(HUNDRED), PERCENTAGE_RESULT_SCALE),
        current,
      );
  }
}
