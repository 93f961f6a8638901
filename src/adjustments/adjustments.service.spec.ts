import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { AdjustmentsService, applyAdjustment } from './adjustments.service';
import { AdjustmentsRepository } from './adjustments.repository';
import { LotsRepository } from '../lots/lots.repository';
import { DatabaseService } from '../database/database.service';
import {
  InvalidAdjustmentException,
  InvalidQuantityException,
  LotNotFoundException,
} from '../common/exceptions';
import { Decimal } from '../common/decimal';
import { Lot } from '../lots/interfaces/lot.interface';
import {
  FakeAdjustmentsRepository,
  FakeDatabaseService,
  FakeLotsRepository,
  InMemoryInventory,
} from '../testing/in-memory-inventory';
import { createConfigService } from '../testing/config';

describe('AdjustmentsService', () => {
  let service: AdjustmentsService;
  let store: InMemoryInventory;
  let eventEmitter: { emit: jest.Mock };
  let lot: Lot;

  beforeEach(async () => {
    store = new InMemoryInventory();
    eventEmitter = { emit: jest.fn() };

    store.addItem({ id: 1, name: 'Unsalted butter', baseUnit: 'g' });
    lot = store.addLot({
      itemId: 1,
      quantityOriginal: new Decimal(10),
      quantityRemaining: new Decimal(8),
      unitCost: new Decimal('0.5'),
    });

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AdjustmentsService,
        { provide: AdjustmentsRepository, useValue: new FakeAdjustmentsRepository(store) },
        { provide: LotsRepository, useValue: new FakeLotsRepository(store) },
        { provide: DatabaseService, useValue: new FakeDatabaseService(store) },
        { provide: EventEmitter2, useValue: eventEmitter },
        { provide: ConfigService, useValue: createConfigService() },
      ],
    }).compile();

    service = module.get<AdjustmentsService>(AdjustmentsService);
  });

  const remaining = () => store.lot(lot.id).quantityRemaining.toString();

  describe('adjust', () => {
    it('should subtract from the lot and record the change', async () => {
      const record = await service.adjust(lot.id, 'subtract', '3', 'SPOILAGE', 'mould');

      expect(record.quantityBefore.toString()).toBe('8');
      expect(record.quantityAfter.toString()).toBe('5');
      expect(record.costImpact.toString()).toBe('1.5');
      expect(record.createdBy).toBe('test-user');
      expect(record.notes).toBe('mould');
      expect(remaining()).toBe('5');
      expect(store.lot(lot.id).notes).toMatch(/^\[[^\]]+\] SUBTRACT 3 \(SPOILAGE\): mould$/);
    });

    it('should emit inventory.adjusted after the change', async () => {
      const record = await service.adjust(lot.id, 'set', '6', 'PHYSICAL_COUNT');

      expect(eventEmitter.emit).toHaveBeenCalledWith('inventory.adjusted', {
        adjustmentId: record.id,
        lotId: lot.id,
        itemId: 1,
        adjustmentType: 'set',
        quantityBefore: '8',
        quantityAfter: '6',
        reasonCode: 'PHYSICAL_COUNT',
      });
    });

    it('should add up to the original quantity', async () => {
      const record = await service.adjust(lot.id, 'add', '2', 'CORRECTION');

      expect(record.quantityAfter.toString()).toBe('10');
    });

    it('should keep a percentage of the current quantity, rounded to 2 places', async () => {
      const record = await service.adjust(lot.id, 'percentage', '33.333', 'CORRECTION');

      expect(record.quantityAfter.toString()).toBe('2.67');
      expect(remaining()).toBe('2.67');
    });

    it('should append to existing lot notes', async () => {
      store.lot(lot.id).notes = 'Shelf B';

      await service.adjust(lot.id, 'subtract', '1', 'GIFT');

      const [first, second] = (store.lot(lot.id).notes ?? '').split('\n');
      expect(first).toBe('Shelf B');
      expect(second).toMatch(/^\[[^\]]+\] SUBTRACT 1 \(GIFT\)$/);
    });

    it('should record who made the change when given', async () => {
      const record = await service.adjust(lot.id, 'subtract', '1', 'AD_HOC_USAGE', null, 'night-shift');

      expect(record.createdBy).toBe('night-shift');
    });

    it('should reject subtracting more than the lot holds and leave it unchanged', async () => {
      await expect(service.adjust(lot.id, 'subtract', '9', 'SPOILAGE')).rejects.toThrow(
        `Adjustment would leave lot ${lot.id} at -1 (current 8, subtract 9)`,
      );

      expect(remaining()).toBe('8');
      expect(store.lot(lot.id).notes).toBeNull();
      expect(store.adjustments).toHaveLength(0);
      expect(eventEmitter.emit).not.toHaveBeenCalled();
    });

    it('should reject raising a lot above its original quantity', async () => {
      await expect(service.adjust(lot.id, 'add', '3', 'CORRECTION')).rejects.toThrow(
        InvalidQuantityException,
      );

      expect(remaining()).toBe('8');
    });

    it.each([
      ['percentage', '120'],
      ['percentage', '-1'],
      ['add', '-2'],
      ['set', '-0.5'],
    ] as const)('should reject %s with value %s', async (type, value) => {
      await expect(service.adjust(lot.id, type, value, 'CORRECTION')).rejects.toThrow(
        InvalidAdjustmentException,
      );
    });

    it.each([
      ['subtract', 'NaN'],
      ['set', 'Infinity'],
      ['percentage', 'NaN'],
    ] as const)('should reject %s with non-finite value %s', async (type, value) => {
      await expect(service.adjust(lot.id, type, value, 'SPOILAGE')).rejects.toThrow(
        `Adjustment value for ${type} must be a finite number (received ${value})`,
      );

      expect(remaining()).toBe('8');
      expect(store.adjustments).toHaveLength(0);
    });

    it('should never raise a lot when a percentage result rounds up', async () => {
      const full = store.addLot({ itemId: 1, quantityOriginal: new Decimal('10.005') });

      const record = await service.adjust(full.id, 'percentage', '100', 'PHYSICAL_COUNT');

      expect(record.quantityAfter.toString()).toBe('10.005');
      expect(record.costImpact.toString()).toBe('0');
      expect(store.lot(full.id).quantityRemaining.toString()).toBe('10.005');
    });

    it('should require notes when the reason is OTHER', async () => {
      await expect(service.adjust(lot.id, 'subtract', '1', 'OTHER', '   ')).rejects.toThrow(
        'Notes are required when the reason is OTHER',
      );

      const record = await service.adjust(lot.id, 'subtract', '1', 'OTHER', 'tasting');
      expect(record.notes).toBe('tasting');
    });

    it('should report a missing lot before checking the value', async () => {
      await expect(service.adjust(404, 'percentage', '500', 'CORRECTION')).rejects.toThrow(
        LotNotFoundException,
      );
    });

    it('should check the resulting quantity before the notes requirement', async () => {
      await expect(service.adjust(lot.id, 'subtract', '20', 'OTHER')).rejects.toThrow(
        InvalidQuantityException,
      );
    });
  });

  describe('historyForLot', () => {
    it('should list adjustments newest first', async () => {
      const first = await service.adjust(lot.id, 'subtract', '1', 'SPOILAGE');
      const second = await service.adjust(lot.id, 'subtract', '2', 'GIFT');

      const history = await service.historyForLot(lot.id);

      expect(history.map((record) => record.id)).toEqual([second.id, first.id]);
    });

    it('should throw for an unknown lot', async () => {
      await expect(service.historyForLot(404)).rejects.toThrow(LotNotFoundException);
    });
  });

  describe('applyAdjustment', () => {
    it('should replace the quantity for set', () => {
      expect(applyAdjustment(new Decimal(8), 'set', new Decimal('2.5')).toString()).toBe('2.5');
    });

    it('should cap a rounded percentage at the current quantity', () => {
      expect(applyAdjustment(new Decimal('10.005'), 'percentage', new Decimal(100)).toString()).toBe(
        '10.005',
      );
      expect(applyAdjustment(new Decimal('10.005'), 'percentage', new Decimal(50)).toString()).toBe(
        '5',
      );
    });
  });
});
