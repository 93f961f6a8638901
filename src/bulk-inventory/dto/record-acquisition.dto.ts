import { IsNumberString } from 'class-validator';

/** Quantity in the item's base unit, cost per base unit. */
export class RecordAcquisitionDto {
  @IsNumberString()
  quantity!: string;

  @IsNumberString()
  unitCost!: string;
}
