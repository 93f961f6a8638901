import { Decimal } from '../../common/decimal';

export interface WeightedAverageState {
  itemId: number;
  currentQuantity: Decimal;
  weightedAverageCost: Decimal;
  /** `null` until the first acquisition. */
  updatedAt: Date | null;
}

/** Exactly one of the two forms. */
export interface BulkAdjustment {
  newQuantity?: Decimal;
  percentage?: Decimal;
}

export interface BulkInventoryEvent {
  itemId: number;
  currentQuantity: string;
  weightedAverageCost: string;
}
