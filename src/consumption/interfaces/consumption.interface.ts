import { Decimal, DecimalInput } from '../../common/decimal';

/** `preview` computes the outcome without touching any lot. */
export type ConsumptionMode = 'preview' | 'commit';

export interface ConsumptionRequest {
  itemId: number;
  quantityNeeded: DecimalInput;
  requestUnit: string;
  mode: ConsumptionMode;
  /** Traceability reference, e.g. a production run. */
  contextId?: string;
}

export interface LotConsumption {
  lotId: number;
  acquisitionDate: string;
  /** Base units. */
  quantityConsumed: Decimal;
  unitCost: Decimal;
  cost: Decimal;
  /** What the lot holds after this draw (would hold, for a preview). */
  remainingInLot: Decimal;
}

export interface ConsumptionResult {
  itemId: number;
  mode: ConsumptionMode;
  contextId: string | null;
  requestUnit: string;
  baseUnit: string;
  quantityNeeded: Decimal;
  consumedQuantity: Decimal;
  shortfall: Decimal;
  consumedBaseQuantity: Decimal;
  shortfallBaseQuantity: Decimal;
  satisfied: boolean;
  totalCost: Decimal;
  breakdown: LotConsumption[];
}

export interface InventoryConsumedEvent {
  itemId: number;
  contextId: string | null;
  consumedBaseQuantity: string;
  totalCost: string;
  satisfied: boolean;
  lotIds: number[];
}

export interface ItemAvailability {
  itemId: number;
  baseUnit: string;
  available: Decimal;
  lotCount: number;
}
