import { Decimal } from '../../common/decimal';
import { CostRequirement } from '../../costing/interfaces/costing.interface';

export interface ProductionConsumption {
  id: number;
  productionRunId: number;
  itemId: number;
  lotId: number;
  quantityConsumed: Decimal;
  unitCost: Decimal;
  cost: Decimal;
}

export interface ProductionRun {
  id: number;
  contextId: string;
  description: string | null;
  totalCost: Decimal;
  createdAt: Date;
  consumptions: ProductionConsumption[];
}

export interface RecordProductionInput {
  contextId: string;
  description?: string;
  requirements: CostRequirement[];
}

export type NewProductionConsumption = Omit<ProductionConsumption, 'id' | 'productionRunId'>;

export interface ProductionRecordedEvent {
  productionRunId: number;
  contextId: string;
  totalCost: string;
  itemIds: number[];
}
