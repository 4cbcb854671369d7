import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { BillingModule } from '../billing/billing.module';
import { Invoice } from '../billing/entities/invoice.entity';
import { ExercisesModule } from '../exercises/exercises.module';
import { Member } from '../members/entities/member.entity';
import { PackagesModule } from '../packages/packages.module';
import { StaffModule } from '../staff/staff.module';
import { ReportsController } from './reports.controller';
import { ReportsService } from './reports.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([Member, Invoice]),
    BillingModule,
    StaffModule,
    PackagesModule,
    ExercisesModule,
  ],
  controllers: [ReportsController],
  providers: [ReportsService],
})
export class ReportsModule {}
