import { IsIn, IsNotEmpty, IsNumberString, IsOptional, IsString, MaxLength } from 'class-validator';
import {
  ADJUSTMENT_TYPES,
  AdjustmentType,
  REASON_CODES,
  ReasonCode,
} from '../interfaces/adjustment.interface';

export class AdjustLotDto {
  @IsIn(ADJUSTMENT_TYPES)
  adjustmentType!: AdjustmentType;

  @IsNumberString()
  value!: string;

  @IsIn(REASON_CODES)
  reasonCode!: ReasonCode;

  @IsOptional()
  @IsString()
  @MaxLength(500)
  notes?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  createdBy?: string;
}
