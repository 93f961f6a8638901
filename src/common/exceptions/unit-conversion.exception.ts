import { BadRequestException } from '@nestjs/common';

export class UnitConversionException extends BadRequestException {
  constructor(fromUnit: string, toUnit: string, reason: string) {
    super(`Cannot convert from "${fromUnit}" to "${toUnit}": ${reason}`);
  }
}
