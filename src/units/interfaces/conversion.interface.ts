import { Decimal } from '../../common/decimal';

export type UnitFamily = 'weight' | 'volume' | 'count';

export interface ConversionContext {
  /** Needed to cross between weight and volume. */
  densityGramsPerMl?: Decimal | null;
}

export type ConversionResult =
  | { ok: true; quantity: Decimal }
  | { ok: false; error: string };
