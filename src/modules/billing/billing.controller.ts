import {
  Body,
  Controller,
  Get,
  Post,
  Query,
  UseInterceptors,
} from '@nestjs/common';
import { Roles } from '../../core/auth/auth.decorators';
import { Timeout } from '../../core/timeout/timeout.decorator';
import { TimeoutInterceptor } from '../../core/timeout/timeout.interceptor';
import { BillingService } from './billing.service';
import { HistoryQueryDto, HistoryResponseDto } from './dto/history-query.dto';
import { CreatePaymentDto, PaymentResultDto } from './dto/payment.dto';

@Controller('billing')
@Roles('cashier')
@UseInterceptors(TimeoutInterceptor)
export class BillingController {
  constructor(private readonly billingService: BillingService) {}

  @Post('payments')
  recordPayment(@Body() dto: CreatePaymentDto): Promise<PaymentResultDto> {
    return this.billingService.recordPayment(dto);
  }

  @Get('history')
  @Timeout(60000)
  getHistory(@Query() query: HistoryQueryDto): Promise<HistoryResponseDto> {
    return this.billingService.getHistory(query);
  }
}
