import { Global, Module } from '@nestjs/common';
import {
  MembershipExtension,
  PlanScheduleValidator,
  RevenueAggregator,
} from './rules';

@Global()
@Module({
  providers: [MembershipExtension, RevenueAggregator, PlanScheduleValidator],
  exports: [MembershipExtension, RevenueAggregator, PlanScheduleValidator],
})
export class GymRulesModule {}
