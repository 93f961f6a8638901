import { Decimal } from '../../common/decimal';

export const ADJUSTMENT_TYPES = ['add', 'subtract', 'set', 'percentage'] as const;
export type AdjustmentType = (typeof ADJUSTMENT_TYPES)[number];

export const REASON_CODES = [
  'SPOILAGE',
  'GIFT',
  'CORRECTION',
  'AD_HOC_USAGE',
  'PHYSICAL_COUNT',
  'OTHER',
] as const;
export type ReasonCode = (typeof REASON_CODES)[number];

/**
 * Immutable audit entry for one manual change to a lot
 */
export interface AdjustmentRecord {
  id: number;
  lotId: number;
  adjustmentType: AdjustmentType;
  valueApplied: Decimal;
  quantityBefore: Decimal;
  quantityAfter: Decimal;
  /** |after - before| x lot unit cost */
  costImpact: Decimal;
  reasonCode: ReasonCode;
  notes: string | null;
  createdBy: string;
  createdAt: Date;
}

export interface NewAdjustment {
  lotId: number;
  adjustmentType: AdjustmentType;
  valueApplied: Decimal;
  quantityBefore: Decimal;
  quantityAfter: Decimal;
  costImpact: Decimal;
  reasonCode: ReasonCode;
  notes: string | null;
  createdBy: string;
}

export interface InventoryAdjustedEvent {
  adjustmentId: number;
  lotId: number;
  itemId: number;
  adjustmentType: AdjustmentType;
  quantityBefore: string;
  quantityAfter: string;
  reasonCode: ReasonCode;
}
