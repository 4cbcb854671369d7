import { Transform } from 'class-transformer';
import {
  IsEmail,
  IsInt,
  IsNotEmpty,
  IsString,
  MaxLength,
  Min,
} from 'class-validator';
import {
  IsCalendarDate,
} from '../../../core/validation/is-calendar-date.decorator';
import { Invoice } from '../../billing/entities/invoice.entity';

const trim = ({ value }: { value: unknown }) =>
  typeof value === 'string' ? value.trim() : value;

export class RegisterMemberDto {
  @Transform(trim)
  @IsString()
  @IsNotEmpty()
  @MaxLength(120)
  fullName!: string;

  @Transform(trim)
  @IsString()
  @IsNotEmpty()
  @MaxLength(20)
  gender!: string;

  @Transform(trim)
  @IsCalendarDate()
  dob!: string;

  @Transform(trim)
  @IsString()
  @IsNotEmpty()
  @MaxLength(20)
  phone!: string;

  @Transform(trim)
  @IsEmail()
  @MaxLength(120)
  email!: string;

  @IsInt()
  @Min(1)
  packageId!: number;
}

export interface MemberView {
  id: number;
  fullName: string;
  gender: string;
  dob: string;
  phone: string;
  email: string;
  registrationDate: Date;
  activeUntil: string | null;
  isActive: boolean;
}

export interface RegistrationResultDto {
  member: MemberView;
  invoice: Invoice;
  emailSent: boolean;
}
