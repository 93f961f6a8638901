import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  ValidateNested,
} from 'class-validator';
import { CostRequirementDto } from '../../costing/dto';

export class RecordProductionDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  contextId!: string;

  @IsOptional()
  @IsString()
  @MaxLength(500)
  description?: string;

  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => CostRequirementDto)
  requirements!: CostRequirementDto[];
}
