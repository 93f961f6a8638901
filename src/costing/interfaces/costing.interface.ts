import { Decimal, DecimalInput } from '../../common/decimal';
import { LotConsumption } from '../../consumption/interfaces/consumption.interface';
import { PriceSource } from '../../pricing/interfaces/pricing.interface';

export interface CostRequirement {
  itemId: number;
  quantity: DecimalInput;
  unit: string;
}

export interface CostLine {
  itemId: number;
  quantity: Decimal;
  unit: string;
  satisfied: boolean;
  /** Cost of what the lots on hand cover. */
  fifoCost: Decimal;
  shortfallBaseQuantity: Decimal;
  fallbackPrice: Decimal | null;
  fallbackSource: PriceSource | null;
  fallbackCost: Decimal;
  totalCost: Decimal;
  breakdown: LotConsumption[];
}

export interface CostEstimate {
  totalCost: Decimal;
  lines: CostLine[];
}
