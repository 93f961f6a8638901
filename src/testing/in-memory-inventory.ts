import { HttpException } from '@nestjs/common';
import {
  CompiledQuery,
  DummyDriver,
  Kysely,
  PostgresAdapter,
  PostgresIntrospector,
  PostgresQueryCompiler,
} from 'kysely';
import { Database, DbExecutor } from '../database/database.types';
import { DatabaseService } from '../database/database.service';
import { TransactionFailedException } from '../common/exceptions';
import { Decimal, ZERO } from '../common/decimal';
import { Item } from '../items/interfaces/item.interface';
import { LockOptions, Lot, NewLot } from '../lots/interfaces/lot.interface';
import { ItemsRepository } from '../items/items.repository';
import { LotsRepository } from '../lots/lots.repository';
import { AdjustmentsRepository } from '../adjustments/adjustments.repository';
import { BulkInventoryRepository } from '../bulk-inventory/bulk-inventory.repository';
import { ProductionRepository } from '../production/production.repository';
import { AdjustmentRecord, NewAdjustment } from '../adjustments/interfaces/adjustment.interface';
import { WeightedAverageState } from '../bulk-inventory/interfaces/weighted-average.interface';
import {
  NewProductionConsumption,
  ProductionRun,
} from '../production/interfaces/production.interface';
import { buildItem, buildLot } from './fixtures';

/**
 * A Kysely instance that compiles queries but never connects anywhere.
 * Every query comes back with no rows; `onQuery` sees the compiled SQL.
 */
export function createDummyKysely(onQuery?: (query: CompiledQuery) => void): DbExecutor {
  return new Kysely<Database>({
    log: (event) => {
      if (event.level === 'query') {
        onQuery?.(event.query);
      }
    },
    dialect: {
      createAdapter: () => new PostgresAdapter(),
      createDriver: () => new DummyDriver(),
      createIntrospector: (db) => new PostgresIntrospector(db),
      createQueryCompiler: () => new PostgresQueryCompiler(),
    },
  });
}

interface Snapshot {
  items: Item[];
  lots: Lot[];
  adjustments: AdjustmentRecord[];
  bulk: WeightedAverageState[];
  runs: ProductionRun[];
}

/**
 * Process-local stand-in for the lot tables. Repositories below read and
 * write it; `FakeDatabaseService` snapshots it around each transaction so a
 * failed unit of work leaves no trace, like a rollback would.
 */
export class InMemoryInventory {
  items: Item[] = [];
  lots: Lot[] = [];
  adjustments: AdjustmentRecord[] = [];
  bulk: WeightedAverageState[] = [];
  runs: ProductionRun[] = [];

  /** Lot ids whose next write fails as if the connection dropped. */
  readonly failingLotWrites = new Set<number>();
  /** Every `findAvailableByItem` call and whether it asked for a row lock. */
  readonly availableLotQueries: { itemId: number; forUpdate: boolean }[] = [];

  private nextId = 1000;

  addItem(overrides: Partial<Item> = {}): Item {
    const item = buildItem(overrides);
    this.items.push(item);
    return item;
  }

  addLot(overrides: Partial<Lot> = {}): Lot {
    const lot = buildLot({ id: this.allocateId(), ...overrides });
    this.lots.push(lot);
    return lot;
  }

  lot(id: number): Lot {
    const lot = this.lots.find((candidate) => candidate.id === id);
    if (!lot) {
      throw new Error(`No lot ${id} in the in-memory store`);
    }
    return lot;
  }

  totalRemaining(itemId: number): Decimal {
    return this.lots
      .filter((lot) => lot.itemId === itemId)
      .reduce((sum, lot) => sum.plus(lot.quantityRemaining), ZERO);
  }

  allocateId(): number {
    this.nextId += 1;
    return this.nextId;
  }

  snapshot(): Snapshot {
    return {
      items: this.items.map((item) => ({ ...item })),
      lots: this.lots.map((lot) => ({ ...lot })),
      adjustments: this.adjustments.map((record) => ({ ...record })),
      bulk: this.bulk.map((state) => ({ ...state })),
      runs: this.runs.map((run) => ({ ...run, consumptions: [...run.consumptions] })),
    };
  }

  restore(snapshot: Snapshot): void {
    this.items = snapshot.items;
    this.lots = snapshot.lots;
    this.adjustments = snapshot.adjustments;
    this.bulk = snapshot.bulk;
    this.runs = snapshot.runs;
  }
}

export class FakeDatabaseService implements Pick<DatabaseService, 'db' | 'transaction'> {
  readonly db = createDummyKysely();
  transactionsStarted = 0;

  constructor(private readonly store: InMemoryInventory) {}

  async transaction<T>(operation: string, work: (trx: DbExecutor) => Promise<T>): Promise<T> {
    this.transactionsStarted += 1;
    const snapshot = this.store.snapshot();
    try {
      return await work(this.db);
    } catch (error) {
      this.store.restore(snapshot);
      if (error instanceof HttpException) {
        throw error;
      }
      throw new TransactionFailedException(operation, error);
    }
  }
}

export class FakeItemsRepository implements Pick<ItemsRepository, 'findById'> {
  constructor(private readonly store: InMemoryInventory) {}

  async findById(id: number): Promise<Item | null> {
    const item = this.store.items.find((candidate) => candidate.id === id);
    return item ? { ...item } : null;
  }
}

const byFifoOrder = (a: Lot, b: Lot) =>
  a.acquisitionDate === b.acquisitionDate
    ? a.id - b.id
    : a.acquisitionDate.localeCompare(b.acquisitionDate);

export class FakeLotsRepository
  implements
    Pick<
      LotsRepository,
      | 'findAvailableByItem'
      | 'findByItem'
      | 'findById'
      | 'create'
      | 'updateRemaining'
      | 'updateRemainingAndNotes'
    >
{
  constructor(private readonly store: InMemoryInventory) {}

  async findAvailableByItem(
    itemId: number,
    epsilon: Decimal,
    options: LockOptions = {},
  ): Promise<Lot[]> {
    this.store.availableLotQueries.push({ itemId, forUpdate: options.forUpdate ?? false });
    return this.store.lots
      .filter((lot) => lot.itemId === itemId && lot.quantityRemaining.greaterThan(epsilon))
      .sort(byFifoOrder)
      .map((lot) => ({ ...lot }));
  }

  async findByItem(itemId: number): Promise<Lot[]> {
    return this.store.lots
      .filter((lot) => lot.itemId === itemId)
      .sort(byFifoOrder)
      .map((lot) => ({ ...lot }));
  }

  async findById(id: number): Promise<Lot | null> {
    const lot = this.store.lots.find((candidate) => candidate.id === id);
    return lot ? { ...lot } : null;
  }

  async create(data: NewLot): Promise<Lot> {
    const { quantity, ...rest } = data;
    return {
      ...this.store.addLot({ ...rest, quantityOriginal: quantity, quantityRemaining: quantity }),
    };
  }

  async updateRemaining(id: number, quantityRemaining: Decimal): Promise<void> {
    this.write(id, quantityRemaining);
  }

  async updateRemainingAndNotes(id: number, quantityRemaining: Decimal, notes: string): Promise<Lot> {
    const lot = this.write(id, quantityRemaining);
    lot.notes = notes;
    return { ...lot };
  }

  private write(id: number, quantityRemaining: Decimal): Lot {
    if (this.store.failingLotWrites.has(id)) {
      throw new Error(`connection reset while writing lot ${id}`);
    }
    const lot = this.store.lot(id);
    if (quantityRemaining.lessThan(0) || quantityRemaining.greaterThan(lot.quantityOriginal)) {
      throw new Error(`lots_remaining_bounds_check violated for lot ${id}`);
    }
    lot.quantityRemaining = quantityRemaining;
    return lot;
  }
}

export class FakeAdjustmentsRepository implements Pick<AdjustmentsRepository, 'insert' | 'findByLot'> {
  constructor(private readonly store: InMemoryInventory) {}

  async insert(data: NewAdjustment): Promise<AdjustmentRecord> {
    const record: AdjustmentRecord = {
      id: this.store.allocateId(),
      ...data,
      createdAt: new Date(),
    };
    this.store.adjustments.push(record);
    return { ...record };
  }

  async findByLot(lotId: number): Promise<AdjustmentRecord[]> {
    return this.store.adjustments
      .filter((record) => record.lotId === lotId)
      .sort((a, b) => b.id - a.id)
      .map((record) => ({ ...record }));
  }
}

export class FakeBulkInventoryRepository
  implements Pick<BulkInventoryRepository, 'findByItem' | 'save'>
{
  constructor(private readonly store: InMemoryInventory) {}

  async findByItem(itemId: number): Promise<WeightedAverageState | null> {
    const state = this.store.bulk.find((candidate) => candidate.itemId === itemId);
    return state ? { ...state } : null;
  }

  async save(
    itemId: number,
    currentQuantity: Decimal,
    weightedAverageCost: Decimal,
  ): Promise<WeightedAverageState> {
    const state: WeightedAverageState = {
      itemId,
      currentQuantity,
      weightedAverageCost,
      updatedAt: new Date(),
    };
    this.store.bulk = [...this.store.bulk.filter((existing) => existing.itemId !== itemId), state];
    return { ...state };
  }
}

export class FakeProductionRepository
  implements Pick<ProductionRepository, 'createRun' | 'findById'>
{
  constructor(private readonly store: InMemoryInventory) {}

  async createRun(
    data: { contextId: string; description: string | null; totalCost: Decimal },
    consumptions: NewProductionConsumption[],
  ): Promise<ProductionRun> {
    const runId = this.store.allocateId();
    const run: ProductionRun = {
      id: runId,
      ...data,
      createdAt: new Date(),
      consumptions: consumptions.map((consumption) => ({
        id: this.store.allocateId(),
        productionRunId: runId,
        ...consumption,
      })),
    };
    this.store.runs.push(run);
    return run;
  }

  async findById(id: number): Promise<ProductionRun | null> {
    return this.store.runs.find((run) => run.id === id) ?? null;
  }
}
