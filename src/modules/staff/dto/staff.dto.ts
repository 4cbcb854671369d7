import { Transform } from 'class-transformer';
import {
  IsEmail,
  IsIn,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  MinLength,
} from 'class-validator';
import { STAFF_ROLES, StaffRole } from '../entities/staff-user.entity';

export const MIN_PASSWORD_LENGTH = 6;

const trim = ({ value }: { value: unknown }) =>
  typeof value === 'string' ? value.trim() : value;

export class CreateStaffDto {
  @Transform(trim)
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  username!: string;

  @Transform(trim)
  @IsEmail()
  @MaxLength(120)
  email!: string;

  @IsString()
  @MinLength(MIN_PASSWORD_LENGTH)
  password!: string;

  @IsIn(STAFF_ROLES)
  role!: StaffRole;
}

export class UpdateStaffDto {
  @Transform(trim)
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  username!: string;

  @Transform(trim)
  @IsEmail()
  @MaxLength(120)
  email!: string;

  /**
   * Left out (or empty) to keep the current password
   */
  @IsOptional()
  @Transform(({ value }) => (value === '' ? undefined : value))
  @IsString()
  @MinLength(MIN_PASSWORD_LENGTH)
  password?: string;

  @IsIn(STAFF_ROLES)
  role!: StaffRole;
}

export interface StaffUserView {
  id: number;
  username: string;
  email: string;
  role: StaffRole;
  isActive: boolean;
  createdAt: Date;
}
