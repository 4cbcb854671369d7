import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import {
  Between,
  DataSource,
  FindOptionsWhere,
  LessThanOrEqual,
  MoreThanOrEqual,
  Repository,
} from 'typeorm';
import { logger } from '../../core/logger/logger.config';
import { MonthlyRevenue } from '../../domain/gym/models';
import { MembershipExtension, RevenueAggregator } from '../../domain/gym/rules';
import {
  endOfDay,
  startOfDay,
  todayIsoDate,
  yearBounds,
} from '../../domain/gym/utils/calendar.util';
import { Member } from '../members/entities/member.entity';
import { MembersService } from '../members/members.service';
import { Package } from '../packages/entities/package.entity';
import { HistoryQueryDto, HistoryResponseDto } from './dto/history-query.dto';
import { CreatePaymentDto, PaymentResultDto } from './dto/payment.dto';
import { Invoice } from './entities/invoice.entity';

@Injectable()
export class BillingService {
  private readonly logger = logger();

  constructor(
    @InjectRepository(Invoice)
    private readonly invoiceRepository: Repository<Invoice>,
    @InjectDataSource()
    private readonly dataSource: DataSource,
    private readonly membershipExtension: MembershipExtension,
    private readonly revenueAggregator: RevenueAggregator,
    private readonly membersService: MembersService,
  ) {}

  /**
   * Records a package purchase and extends the member in one transaction.
   * The member row is locked so concurrent payments stack instead of
   * overwriting each other.
   */
  async recordPayment(dto: CreatePaymentDto): Promise<PaymentResultDto> {
    const today = todayIsoDate();

    const { invoice, member, previousActiveUntil } =
      await this.dataSource.transaction(async (manager) => {
        const member = await manager.findOne(Member, {
          where: { id: dto.memberId },
          lock: { mode: 'pessimistic_write' },
        });
        if (!member) {
          throw new NotFoundException(`Member ${dto.memberId} not found`);
        }

        const pkg = await manager.findOne(Package, {
          where: { id: dto.packageId },
        });
        if (!pkg) {
          throw new NotFoundException(`Package ${dto.packageId} not found`);
        }

        const previousActiveUntil = member.activeUntil;
        member.activeUntil = this.membershipExtension.extend(
          member.activeUntil,
          pkg.durationMonths,
          today,
        );

        const invoice = await manager.save(
          manager.create(Invoice, {
            memberId: member.id,
            packageId: pkg.id,
            amount: pkg.price,
          }),
        );
        await manager.save(member);

        return { invoice, member, previousActiveUntil };
      });

    this.logger.info(
      {
        memberId: member.id,
        invoiceId: invoice.id,
        amount: invoice.amount,
        previousActiveUntil,
        activeUntil: member.activeUntil,
      },
      'Payment recorded',
    );

    return { invoice, member: this.membersService.toView(member, today) };
  }

  async getHistory(query: HistoryQueryDto): Promise<HistoryResponseDto> {
    const where: FindOptionsWhere<Invoice> = {};

    if (query.memberId !== undefined) {
      where.memberId = query.memberId;
    }

    if (query.startDate && query.endDate) {
      where.createdAt = Between(
        startOfDay(query.startDate),
        endOfDay(query.endDate),
      );
    } else if (query.startDate) {
      where.createdAt = MoreThanOrEqual(startOfDay(query.startDate));
    } else if (query.endDate) {
      where.createdAt = LessThanOrEqual(endOfDay(query.endDate));
    }

    const invoices = await this.invoiceRepository.find({
      where,
      relations: { member: true, package: true },
      order: { createdAt: 'DESC', id: 'DESC' },
    });

    const revenue = await this.getRevenue(new Date().getUTCFullYear());
    return { invoices, revenue };
  }

  async getRevenue(year: number): Promise<MonthlyRevenue> {
    const { start, end } = yearBounds(year);
    const invoices = await this.invoiceRepository.find({
      select: { id: true, amount: true, createdAt: true },
      where: { createdAt: Between(start, end) },
    });

    const revenue = this.revenueAggregator.summarize(invoices, year);
    this.logger.debug(
      { year, invoices: invoices.length, total: revenue.total },
      'Revenue computed',
    );
    return revenue;
  }
}
