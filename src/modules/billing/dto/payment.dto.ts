import { IsInt, Min } from 'class-validator';
import { MemberView } from '../../members/dto/register-member.dto';
import { Invoice } from '../entities/invoice.entity';

export class CreatePaymentDto {
  @IsInt()
  @Min(1)
  memberId!: number;

  @IsInt()
  @Min(1)
  packageId!: number;
}

export interface PaymentResultDto {
  invoice: Invoice;
  member: MemberView;
}
