import { BadRequestException } from '@nestjs/common';

export class InsufficientStockException extends BadRequestException {
  constructor(itemId: number, required: string, available: string, unit: string) {
    super(
      `Insufficient stock for item ID ${itemId}. Required: ${required} ${unit}, Available: ${available} ${unit}`,
    );
  }
}
