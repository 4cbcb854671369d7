import { Transform } from 'class-transformer';
import { IsNotEmpty, IsString } from 'class-validator';
import { StaffUserView } from '../../staff/dto/staff.dto';

export class LoginDto {
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  @IsString()
  @IsNotEmpty()
  username!: string;

  @IsString()
  @IsNotEmpty()
  password!: string;
}

export interface LoginResponseDto {
  accessToken: string;
  user: StaffUserView;
}
