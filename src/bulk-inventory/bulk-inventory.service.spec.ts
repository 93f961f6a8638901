import { Test, TestingModule } from '@nestjs/testing';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { BulkInventoryService, calculateWeightedAverage } from './bulk-inventory.service';
import { BulkInventoryRepository } from './bulk-inventory.repository';
import { ItemsService } from '../items/items.service';
import { ItemsRepository } from '../items/items.repository';
import { DatabaseService } from '../database/database.service';
import {
  CostingModelMismatchException,
  InvalidAdjustmentException,
  InvalidQuantityException,
} from '../common/exceptions';
import { Decimal } from '../common/decimal';
import {
  FakeBulkInventoryRepository,
  FakeDatabaseService,
  FakeItemsRepository,
  InMemoryInventory,
} from '../testing/in-memory-inventory';

describe('BulkInventoryService', () => {
  let service: BulkInventoryService;
  let store: InMemoryInventory;
  let eventEmitter: { emit: jest.Mock };

  beforeEach(async () => {
    store = new InMemoryInventory();
    eventEmitter = { emit: jest.fn() };

    store.addItem({ id: 1, name: 'Bread flour', baseUnit: 'g', costingModel: 'fifo' });
    store.addItem({
      id: 2,
      kind: 'material',
      name: 'Cellophane bags',
      baseUnit: 'each',
      costingModel: 'weighted_average',
    });

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        BulkInventoryService,
        ItemsService,
        { provide: ItemsRepository, useValue: new FakeItemsRepository(store) },
        { provide: BulkInventoryRepository, useValue: new FakeBulkInventoryRepository(store) },
        { provide: DatabaseService, useValue: new FakeDatabaseService(store) },
        { provide: EventEmitter2, useValue: eventEmitter },
      ],
    }).compile();

    service = module.get<BulkInventoryService>(BulkInventoryService);
  });

  describe('calculateWeightedAverage', () => {
    it('should blend 200 @ 0.12 with 100 @ 0.15 into 0.1300', () => {
      expect(calculateWeightedAverage('200', '0.12', '100', '0.15').toFixed(4)).toBe('0.1300');
    });

    it('should take the added cost when nothing is on hand', () => {
      expect(calculateWeightedAverage('0', '0.5', '10', '0.25').toString()).toBe('0.25');
    });

    it('should round half-up to 4 places', () => {
      expect(calculateWeightedAverage('1', '0.1', '2', '0.2').toString()).toBe('0.1667');
    });
  });

  describe('recordAcquisition', () => {
    it('should create the state on first acquisition and blend later ones', async () => {
      const first = await service.recordAcquisition(2, '200', '0.12');
      expect(first.currentQuantity.toString()).toBe('200');
      expect(first.weightedAverageCost.toString()).toBe('0.12');

      const second = await service.recordAcquisition(2, '100', '0.15');
      expect(second.currentQuantity.toString()).toBe('300');
      expect(second.weightedAverageCost.toFixed(4)).toBe('0.1300');

      expect(eventEmitter.emit).toHaveBeenLastCalledWith('bulk.acquired', {
        itemId: 2,
        currentQuantity: '300',
        weightedAverageCost: '0.13',
      });
    });

    it('should reject a quantity that is not positive', async () => {
      await expect(service.recordAcquisition(2, '0', '0.12')).rejects.toThrow(
        'Acquired quantity must be greater than 0 (received 0)',
      );
    });

    it('should reject a negative unit cost', async () => {
      await expect(service.recordAcquisition(2, '10', '-0.01')).rejects.toThrow(
        InvalidQuantityException,
      );
    });

    it.each([
      ['NaN', '0.12'],
      ['10', 'Infinity'],
    ])('should reject non-finite input (%s at %s) without saving', async (quantity, unitCost) => {
      await expect(service.recordAcquisition(2, quantity, unitCost)).rejects.toThrow(
        `Acquired quantity and unit cost must be finite numbers (received ${quantity} at ${unitCost})`,
      );

      expect((await service.getState(2)).currentQuantity.toString()).toBe('0');
    });

    it('should refuse FIFO-tracked items', async () => {
      await expect(service.recordAcquisition(1, '10', '0.12')).rejects.toThrow(
        CostingModelMismatchException,
      );
    });
  });

  describe('adjustInventory', () => {
    beforeEach(async () => {
      await service.recordAcquisition(2, '200', '0.12');
      await service.recordAcquisition(2, '100', '0.15');
    });

    it('should keep a percentage of the quantity and leave the average alone', async () => {
      const state = await service.adjustInventory(2, { percentage: new Decimal(50) });

      expect(state.currentQuantity.toString()).toBe('150');
      expect(state.weightedAverageCost.toFixed(4)).toBe('0.1300');
      expect(eventEmitter.emit).toHaveBeenLastCalledWith('bulk.adjusted', {
        itemId: 2,
        currentQuantity: '150',
        weightedAverageCost: '0.13',
      });
    });

    it('should round a percentage result to 2 places', async () => {
      const state = await service.adjustInventory(2, { percentage: new Decimal('33.333') });

      expect(state.currentQuantity.toString()).toBe('100');
    });

    it('should not raise the quantity when a percentage result rounds up', async () => {
      await service.adjustInventory(2, { newQuantity: new Decimal('10.005') });

      const state = await service.adjustInventory(2, { percentage: new Decimal(100) });

      expect(state.currentQuantity.toString()).toBe('10.005');
    });

    it('should reject non-finite adjustments', async () => {
      await expect(
        service.adjustInventory(2, { percentage: new Decimal(Number.NaN) }),
      ).rejects.toThrow('Percentage must be a finite number (received NaN)');
      await expect(
        service.adjustInventory(2, { newQuantity: new Decimal(Infinity) }),
      ).rejects.toThrow('Quantity must be a finite number (received Infinity)');

      expect((await service.getState(2)).currentQuantity.toString()).toBe('300');
    });

    it('should set an absolute quantity', async () => {
      const state = await service.adjustInventory(2, { newQuantity: new Decimal(120) }, 'recount');

      expect(state.currentQuantity.toString()).toBe('120');
    });

    it('should require exactly one adjustment form', async () => {
      await expect(service.adjustInventory(2, {})).rejects.toThrow(InvalidAdjustmentException);
      await expect(
        service.adjustInventory(2, { newQuantity: new Decimal(1), percentage: new Decimal(1) }),
      ).rejects.toThrow(InvalidAdjustmentException);
    });

    it('should reject a percentage outside 0 to 100', async () => {
      await expect(service.adjustInventory(2, { percentage: new Decimal(101) })).rejects.toThrow(
        InvalidAdjustmentException,
      );
    });

    it('should reject a negative quantity naming the value', async () => {
      await expect(service.adjustInventory(2, { newQuantity: new Decimal(-1) })).rejects.toThrow(
        'Quantity cannot be negative (received -1)',
      );
    });
  });

  describe('getState', () => {
    it('should report zero for an item never acquired', async () => {
      const state = await service.getState(2);

      expect(state.currentQuantity.toString()).toBe('0');
      expect(state.weightedAverageCost.toString()).toBe('0');
      expect(state.updatedAt).toBeNull();
    });
  });
});
