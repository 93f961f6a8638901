import { Decimal } from '../../common/decimal';

export type ItemKind = 'ingredient' | 'inventory_item' | 'material';

/**
 * `fifo` items are costed lot by lot; `weighted_average` items keep one
 * running average over the whole on-hand quantity. An item uses exactly one.
 */
export type CostingModel = 'fifo' | 'weighted_average';

export interface Item {
  id: number;
  kind: ItemKind;
  name: string;
  baseUnit: string;
  costingModel: CostingModel;
  densityGramsPerMl: Decimal | null;
  preferredSupplierId: number | null;
}
