import { BadRequestException } from '@nestjs/common';

export class InvalidAdjustmentException extends BadRequestException {
  constructor(message: string) {
    super(message);
  }
}
