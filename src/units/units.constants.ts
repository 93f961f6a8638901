import { UnitFamily } from './interfaces/conversion.interface';

export const UNIT_FAMILIES: UnitFamily[] = ['weight', 'volume', 'count'];

/** Factors to each family's canonical unit: grams, millilitres, items. */
export const UNIT_FACTORS: Record<UnitFamily, Record<string, string>> = {
  weight: {
    g: '1',
    kg: '1000',
    oz: '28.3495',
    lb: '453.592',
  },
  volume: {
    ml: '1',
    l: '1000',
    tsp: '4.92892',
    tbsp: '14.7868',
    'fl oz': '29.5735',
    cup: '236.588',
    pt: '473.176',
    qt: '946.353',
    gal: '3785.41',
  },
  count: {
    each: '1',
    count: '1',
    piece: '1',
    dozen: '12',
  },
};
