import { Decimal } from '../../common/decimal';

/**
 * One acquisition of a tracked item. Quantities and cost are in the item's
 * base unit. Lots are never deleted, even once fully depleted.
 */
export interface Lot {
  id: number;
  itemId: number;
  supplierId: number | null;
  /** `YYYY-MM-DD`; the primary FIFO ordering key. */
  acquisitionDate: string;
  quantityOriginal: Decimal;
  quantityRemaining: Decimal;
  unitCost: Decimal;
  expirationDate: string | null;
  location: string | null;
  notes: string | null;
  createdAt: Date;
}

export interface NewLot {
  itemId: number;
  supplierId: number | null;
  acquisitionDate: string;
  quantity: Decimal;
  unitCost: Decimal;
  expirationDate: string | null;
  location: string | null;
  notes: string | null;
}

export interface LockOptions {
  /** Take a row lock (`SELECT ... FOR UPDATE`) for the rest of the transaction. */
  forUpdate?: boolean;
}

export interface LotReceivedEvent {
  lotId: number;
  itemId: number;
  unitCost: string;
  acquisitionDate: string;
}
