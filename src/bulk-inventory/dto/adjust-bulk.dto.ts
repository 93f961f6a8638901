import { IsNumberString, IsOptional, IsString, MaxLength } from 'class-validator';

export class AdjustBulkDto {
  @IsOptional()
  @IsNumberString()
  newQuantity?: string;

  @IsOptional()
  @IsNumberString()
  percentage?: string;

  @IsOptional()
  @IsString()
  @MaxLength(500)
  notes?: string;
}
