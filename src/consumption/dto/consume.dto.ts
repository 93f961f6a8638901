import { IsIn, IsNotEmpty, IsNumberString, IsOptional, IsString, MaxLength } from 'class-validator';
import { ConsumptionMode } from '../interfaces/consumption.interface';

export class ConsumeDto {
  @IsNumberString()
  quantity!: string;

  @IsString()
  @IsNotEmpty()
  unit!: string;

  @IsIn(['preview', 'commit'])
  mode!: ConsumptionMode;

  @IsOptional()
  @IsString()
  @MaxLength(100)
  contextId?: string;
}
