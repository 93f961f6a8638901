import { Injectable } from '@nestjs/common';
import { Decimal } from '../common/decimal';
import {
  ConversionContext,
  ConversionResult,
  UnitFamily,
} from './interfaces/conversion.interface';
import { UNIT_FACTORS, UNIT_FAMILIES } from './units.constants';

interface ResolvedUnit {
  unit: string;
  family: UnitFamily;
  factor: Decimal;
}

@Injectable()
export class UnitsService {
  /**
   * Convert a quantity between two units.
   * Units of the same family convert by factor; weight and volume convert
   * through the item's density when the context carries one.
   */
  convert(
    quantity: Decimal,
    fromUnit: string,
    toUnit: string,
    context: ConversionContext = {},
  ): ConversionResult {
    const from = this.resolve(fromUnit);
    if (!from) {
      return { ok: false, error: `Unknown unit "${fromUnit}"` };
    }
    const to = this.resolve(toUnit);
    if (!to) {
      return { ok: false, error: `Unknown unit "${toUnit}"` };
    }

    if (from.unit === to.unit) {
      return { ok: true, quantity };
    }

    const canonical = quantity.times(from.factor);

    if (from.family === to.family) {
      return { ok: true, quantity: canonical.dividedBy(to.factor) };
    }

    const density = context.densityGramsPerMl;
    const crossesWeightAndVolume =
      (from.family === 'weight' && to.family === 'volume') ||
      (from.family === 'volume' && to.family === 'weight');

    if (!crossesWeightAndVolume) {
      return {
        ok: false,
        error: `"${fromUnit}" (${from.family}) and "${toUnit}" (${to.family}) are incompatible`,
      };
    }
    if (!density || density.lessThanOrEqualTo(0)) {
      return {
        ok: false,
        error: `Converting ${from.family} to ${to.family} requires a density`,
      };
    }

    // grams = millilitres * density
    const crossed =
      from.family === 'weight' ? canonical.dividedBy(density) : canonical.times(density);
    return { ok: true, quantity: crossed.dividedBy(to.factor) };
  }

  unitFamily(unit: string): UnitFamily | null {
    return this.resolve(unit)?.family ?? null;
  }

  areCompatible(a: string, b: string, context: ConversionContext = {}): boolean {
    return this.convert(new Decimal(1), a, b, context).ok;
  }

  private resolve(unit: string): ResolvedUnit | null {
    const normalized = unit.trim().toLowerCase();
    for (const family of UNIT_FAMILIES) {
      const factor = UNIT_FACTORS[family][normalized];
      if (factor !== undefined) {
        return { unit: normalized, family, factor: new Decimal(factor) };
      }
    }
    return null;
  }
}
