import { NotFoundException } from '@nestjs/common';

export class LotNotFoundException extends NotFoundException {
  constructor(lotId: number) {
    super(`Lot with ID ${lotId} not found`);
  }
}
