import { Decimal } from '../common/decimal';
import { Item } from '../items/interfaces/item.interface';
import { Lot } from '../lots/interfaces/lot.interface';

export function buildItem(overrides: Partial<Item> = {}): Item {
  return {
    id: 1,
    kind: 'ingredient',
    name: 'All-purpose flour',
    baseUnit: 'g',
    costingModel: 'fifo',
    densityGramsPerMl: null,
    preferredSupplierId: null,
    ...overrides,
  };
}

export function buildLot(overrides: Partial<Lot> = {}): Lot {
  const quantity = overrides.quantityOriginal ?? new Decimal(10);
  return {
    id: 1,
    itemId: 1,
    supplierId: null,
    acquisitionDate: '2025-01-01',
    quantityOriginal: quantity,
    quantityRemaining: quantity,
    unitCost: new Decimal('0.5'),
    expirationDate: null,
    location: null,
    notes: null,
    createdAt: new Date('2025-01-01T09:00:00.000Z'),
    ...overrides,
  };
}
