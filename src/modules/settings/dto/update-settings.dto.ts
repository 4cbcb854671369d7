import { IsInt, Max, Min } from 'class-validator';
import {
  MAX_TRAINING_DAYS_LIMIT,
  MIN_TRAINING_DAYS_LIMIT,
} from '../settings.constants';

export class UpdateSettingsDto {
  @IsInt()
  @Min(MIN_TRAINING_DAYS_LIMIT)
  @Max(MAX_TRAINING_DAYS_LIMIT)
  maxTrainingDays!: number;
}

export interface SettingsResponseDto {
  maxTrainingDays: number;
}
