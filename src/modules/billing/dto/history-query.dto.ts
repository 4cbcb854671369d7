import { Transform } from 'class-transformer';
import { IsInt, IsOptional, Min } from 'class-validator';
import {
  IsCalendarDate,
} from '../../../core/validation/is-calendar-date.decorator';
import { MonthlyRevenue } from '../../../domain/gym/models';
import { Invoice } from '../entities/invoice.entity';

const emptyToUndefined = ({ value }: { value: unknown }) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

export class HistoryQueryDto {
  @IsOptional()
  @Transform(({ value }) =>
    typeof value === 'string' && value.trim() !== ''
      ? Number.parseInt(value, 10)
      : undefined,
  )
  @IsInt()
  @Min(1)
  memberId?: number;

  /**
   * Inclusive, from 00:00 UTC
   */
  @IsOptional()
  @Transform(emptyToUndefined)
  @IsCalendarDate()
  startDate?: string;

  /**
   * Inclusive, through 23:59:59.999 UTC
   */
  @IsOptional()
  @Transform(emptyToUndefined)
  @IsCalendarDate()
  endDate?: string;
}

export interface HistoryResponseDto {
  invoices: Invoice[];
  revenue: MonthlyRevenue;
}
