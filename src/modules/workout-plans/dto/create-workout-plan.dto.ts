import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  IsArray,
  IsOptional,
  IsString,
  MaxLength,
  ValidateNested,
} from 'class-validator';
import { PlanRowInput } from '../../../domain/gym/models';

/**
 * Row fields are deliberately loose here: incomplete rows must reach the plan
 * validator so that every problem is reported in one response.
 */
export class WorkoutDetailInputDto implements PlanRowInput {
  @IsOptional()
  exerciseId?: number | string | null;

  @IsOptional()
  sets?: number | string | null;

  @IsOptional()
  reps?: string | null;

  @IsOptional()
  scheduleDay?: string | null;
}

export class CreateWorkoutPlanDto {
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  notes?: string;

  @IsOptional()
  @IsArray()
  @ArrayMaxSize(100)
  @ValidateNested({ each: true })
  @Type(() => WorkoutDetailInputDto)
  details?: WorkoutDetailInputDto[];
}
