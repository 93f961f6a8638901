import { BadRequestException } from '@nestjs/common';

export class CostingModelMismatchException extends BadRequestException {
  constructor(itemName: string, expected: string, actual: string) {
    super(
      `Item "${itemName}" uses ${actual} costing; this operation requires ${expected} costing.`,
    );
  }
}
