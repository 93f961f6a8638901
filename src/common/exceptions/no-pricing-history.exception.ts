import { UnprocessableEntityException } from '@nestjs/common';

export class NoPricingHistoryException extends UnprocessableEntityException {
  constructor(itemId: number, itemName: string) {
    super(
      `No pricing history for "${itemName}" (item ID ${itemId}); cannot price the shortfall.`,
    );
  }
}
