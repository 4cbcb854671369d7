import { Controller, Get, Query, UseInterceptors } from '@nestjs/common';
import { Roles } from '../../core/auth/auth.decorators';
import { Timeout } from '../../core/timeout/timeout.decorator';
import { TimeoutInterceptor } from '../../core/timeout/timeout.interceptor';
import { MonthlyRevenue } from '../../domain/gym/models';
import {
  ActiveMembersDto,
  MembersPerPackageDto,
  OverviewDto,
  RevenueQueryDto,
} from './dto/reports.dto';
import { ReportsService } from './reports.service';

@Controller('reports')
@Roles('admin')
@UseInterceptors(TimeoutInterceptor)
export class ReportsController {
  constructor(private readonly reportsService: ReportsService) {}

  @Get('overview')
  getOverview(): Promise<OverviewDto> {
    return this.reportsService.getOverview();
  }

  @Get('revenue')
  @Timeout(60000)
  getRevenue(@Query() query: RevenueQueryDto): Promise<MonthlyRevenue> {
    return this.reportsService.getRevenue(query.year);
  }

  @Get('active-members')
  getActiveMembers(): Promise<ActiveMembersDto> {
    return this.reportsService.getActiveMembers();
  }

  @Get('members-per-package')
  @Timeout(60000)
  getMembersPerPackage(): Promise<MembersPerPackageDto> {
    return this.reportsService.getMembersPerPackage();
  }
}
