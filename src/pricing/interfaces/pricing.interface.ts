import { Decimal } from '../../common/decimal';

export type PriceSource = 'preferred_supplier' | 'any_supplier' | 'weighted_average';

export type PriceLookup =
  | {
      found: true;
      price: Decimal;
      source: PriceSource;
      lotId: number | null;
      acquisitionDate: string | null;
    }
  | { found: false };

export type PriceAlertLevel = 'none' | 'warning' | 'critical';

export interface PriceChange {
  itemId: number;
  averagePrice: Decimal | null;
  newPrice: Decimal;
  changeAmount: Decimal | null;
  /** Rounded to one decimal place. */
  changePercent: Decimal | null;
  alertLevel: PriceAlertLevel;
  message: string;
}

export interface LatestLotPrice {
  lotId: number;
  unitCost: Decimal;
  acquisitionDate: string;
}

export interface AverageWindowOptions {
  days?: number;
  /** Leave one lot out of the average, e.g. the one being compared. */
  excludeLotId?: number;
  today?: Date;
}
