import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ExercisesModule } from '../exercises/exercises.module';
import { Member } from '../members/entities/member.entity';
import { MembersModule } from '../members/members.module';
import { SettingsModule } from '../settings/settings.module';
import { WorkoutDetail } from './entities/workout-detail.entity';
import { WorkoutPlan } from './entities/workout-plan.entity';
import { WorkoutPlansController } from './workout-plans.controller';
import { WorkoutPlansService } from './workout-plans.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([WorkoutPlan, WorkoutDetail, Member]),
    ExercisesModule,
    MembersModule,
    SettingsModule,
  ],
  controllers: [WorkoutPlansController],
  providers: [WorkoutPlansService],
})
export class WorkoutPlansModule {}
