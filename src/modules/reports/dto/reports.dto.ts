import { Type } from 'class-transformer';
import { IsInt, IsOptional, Max, Min } from 'class-validator';

export class RevenueQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1970)
  @Max(9999)
  year?: number;
}

export interface OverviewDto {
  staffUsers: number;
  packages: number;
  exercises: number;
}

export interface ActiveMembersDto {
  count: number;
}

export interface MembersPerPackageDto {
  labels: string[];
  data: number[];
}
