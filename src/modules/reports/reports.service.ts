import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { MoreThanOrEqual, Repository } from 'typeorm';
import { logger } from '../../core/logger/logger.config';
import { MonthlyRevenue } from '../../domain/gym/models';
import { todayIsoDate } from '../../domain/gym/utils/calendar.util';
import { BillingService } from '../billing/billing.service';
import { Invoice } from '../billing/entities/invoice.entity';
import { ExercisesService } from '../exercises/exercises.service';
import { Member } from '../members/entities/member.entity';
import { PackagesService } from '../packages/packages.service';
import { StaffService } from '../staff/staff.service';
import {
  ActiveMembersDto,
  MembersPerPackageDto,
  OverviewDto,
} from './dto/reports.dto';

@Injectable()
export class ReportsService {
  private readonly logger = logger();

  constructor(
    @InjectRepository(Member)
    private readonly memberRepository: Repository<Member>,
    @InjectRepository(Invoice)
    private readonly invoiceRepository: Repository<Invoice>,
    private readonly billingService: BillingService,
    private readonly staffService: StaffService,
    private readonly packagesService: PackagesService,
    private readonly exercisesService: ExercisesService,
  ) {}

  async getOverview(): Promise<OverviewDto> {
    const [staffUsers, packages, exercises] = await Promise.all([
      this.staffService.count(),
      this.packagesService.count(),
      this.exercisesService.count(),
    ]);
    return { staffUsers, packages, exercises };
  }

  getRevenue(
    year: number = new Date().getUTCFullYear(),
  ): Promise<MonthlyRevenue> {
    return this.billingService.getRevenue(year);
  }

  async getActiveMembers(): Promise<ActiveMembersDto> {
    const count = await this.memberRepository.count({
      where: { activeUntil: MoreThanOrEqual(todayIsoDate()) },
    });
    return { count };
  }

  /**
   * Active members grouped by the package of their most recent invoice.
   * Labels keep the order in which packages are first seen.
   */
  async getMembersPerPackage(): Promise<MembersPerPackageDto> {
    const invoices = await this.invoiceRepository.find({
      where: { member: { activeUntil: MoreThanOrEqual(todayIsoDate()) } },
      relations: { package: true },
      order: { createdAt: 'DESC', id: 'DESC' },
    });

    const seenMembers = new Set<number>();
    const countByPackage = new Map<string, number>();

    for (const invoice of invoices) {
      if (seenMembers.has(invoice.memberId)) continue;
      seenMembers.add(invoice.memberId);

      const label = invoice.package?.name ?? `Package ${invoice.packageId}`;
      countByPackage.set(label, (countByPackage.get(label) ?? 0) + 1);
    }

    this.logger.debug(
      { members: seenMembers.size, packages: countByPackage.size },
      'Members per package computed',
    );

    return {
      labels: [...countByPackage.keys()],
      data: [...countByPackage.values()],
    };
  }
}
