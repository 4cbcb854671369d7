import {
  Body,
  Controller,
  Get,
  Param,
  ParseIntPipe,
  Post,
} from '@nestjs/common';
import { CurrentStaff, Roles } from '../../core/auth/auth.decorators';
import { StaffPrincipal } from '../../core/auth/auth.types';
import { CreateWorkoutPlanDto } from './dto/create-workout-plan.dto';
import { TrainerMemberDto } from './dto/workout-plan-response.dto';
import { WorkoutPlan } from './entities/workout-plan.entity';
import { WorkoutPlansService } from './workout-plans.service';

@Controller('workout-plans')
@Roles('trainer')
export class WorkoutPlansController {
  constructor(private readonly workoutPlansService: WorkoutPlansService) {}

  @Get('members')
  listMembers(
    @CurrentStaff() trainer: StaffPrincipal,
  ): Promise<TrainerMemberDto[]> {
    return this.workoutPlansService.listMembersForTrainer(trainer);
  }

  @Get('members/:memberId')
  listPlans(
    @Param('memberId', ParseIntPipe) memberId: number,
  ): Promise<WorkoutPlan[]> {
    return this.workoutPlansService.listPlansForMember(memberId);
  }

  @Post('members/:memberId')
  createPlan(
    @Param('memberId', ParseIntPipe) memberId: number,
    @CurrentStaff() trainer: StaffPrincipal,
    @Body() dto: CreateWorkoutPlanDto,
  ): Promise<WorkoutPlan> {
    return this.workoutPlansService.createPlan(memberId, trainer, dto);
  }
}
