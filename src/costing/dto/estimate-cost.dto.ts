import { Type } from 'class-transformer';
import {
  IsArray,
  IsInt,
  IsNotEmpty,
  IsNumberString,
  IsPositive,
  IsString,
  ValidateNested,
} from 'class-validator';

export class CostRequirementDto {
  @IsInt()
  @IsPositive()
  itemId!: number;

  @IsNumberString()
  quantity!: string;

  @IsString()
  @IsNotEmpty()
  unit!: string;
}

export class EstimateCostDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => CostRequirementDto)
  requirements!: CostRequirementDto[];
}
