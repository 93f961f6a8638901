import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumberString,
  IsOptional,
  IsString,
  Matches,
  Min,
} from 'class-validator';

export const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/** `per_unit`: unitCost is per `unit`; `total`: unitCost is the whole purchase. */
export type CostBasis = 'per_unit' | 'total';

export class ReceiveLotDto {
  @IsInt()
  @Min(1)
  itemId!: number;

  @IsNumberString()
  quantity!: string;

  @IsString()
  @IsNotEmpty()
  unit!: string;

  @IsNumberString()
  unitCost!: string;

  @IsOptional()
  @IsIn(['per_unit', 'total'])
  costBasis?: CostBasis;

  @Matches(ISO_DATE, { message: 'acquisitionDate must be formatted as YYYY-MM-DD' })
  acquisitionDate!: string;

  @IsOptional()
  @Matches(ISO_DATE, { message: 'expirationDate must be formatted as YYYY-MM-DD' })
  expirationDate?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  supplierId?: number;

  @IsOptional()
  @IsString()
  location?: string;

  @IsOptional()
  @IsString()
  notes?: string;
}
