import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { CoreModule } from './core/core.module';
import { DatabaseModule } from './core/database/database.module';
import { GymRulesModule } from './domain/gym/gym-rules.module';
import { AuthModule } from './modules/auth/auth.module';
import { BillingModule } from './modules/billing/billing.module';
import { ExercisesModule } from './modules/exercises/exercises.module';
import { HealthModule } from './modules/health/health.module';
import { MembersModule } from './modules/members/members.module';
import { PackagesModule } from './modules/packages/packages.module';
import { ReportsModule } from './modules/reports/reports.module';
import { SettingsModule } from './modules/settings/settings.module';
import { StaffModule } from './modules/staff/staff.module';
import {
  WorkoutPlansModule,
} from './modules/workout-plans/workout-plans.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
    }),
    CoreModule,
    DatabaseModule,
    GymRulesModule,
    AuthModule,
    StaffModule,
    MembersModule,
    PackagesModule,
    ExercisesModule,
    BillingModule,
    WorkoutPlansModule,
    SettingsModule,
    ReportsModule,
    HealthModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
