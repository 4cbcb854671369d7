import {
  Injectable,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { StaffPrincipal } from '../../core/auth/auth.types';
import { logger } from '../../core/logger/logger.config';
import { PlanRowInput } from '../../domain/gym/models';
import { PlanScheduleValidator } from '../../domain/gym/rules';
import { todayIsoDate } from '../../domain/gym/utils/calendar.util';
import { ExercisesService } from '../exercises/exercises.service';
import { Member } from '../members/entities/member.entity';
import { MembersService } from '../members/members.service';
import { SettingsService } from '../settings/settings.service';
import { CreateWorkoutPlanDto } from './dto/create-workout-plan.dto';
import { TrainerMemberDto } from './dto/workout-plan-response.dto';
import { WorkoutDetail } from './entities/workout-detail.entity';
import { WorkoutPlan } from './entities/workout-plan.entity';

interface PlanCountRow {
  memberId: number | string;
  planCount: number | string;
}

@Injectable()
export class WorkoutPlansService {
  private readonly logger = logger();

  constructor(
    @InjectRepository(WorkoutPlan)
    private readonly planRepository: Repository<WorkoutPlan>,
    @InjectRepository(Member)
    private readonly memberRepository: Repository<Member>,
    @InjectDataSource()
    private readonly dataSource: DataSource,
    private readonly planScheduleValidator: PlanScheduleValidator,
    private readonly exercisesService: ExercisesService,
    private readonly settingsService: SettingsService,
    private readonly membersService: MembersService,
  ) {}

  /**
   * Every member, flagged with the plans the calling trainer wrote for them
   */
  async listMembersForTrainer(
    trainer: StaffPrincipal,
  ): Promise<TrainerMemberDto[]> {
    const today = todayIsoDate();
    const [members, counts] = await Promise.all([
      this.memberRepository.find({ order: { fullName: 'ASC' } }),
      this.planRepository
        .createQueryBuilder('plan')
        .select('plan.memberId', 'memberId')
        .addSelect('COUNT(plan.id)', 'planCount')
        .where('plan.trainerId = :trainerId', { trainerId: trainer.id })
        .groupBy('plan.memberId')
        .getRawMany<PlanCountRow>(),
    ]);

    const countByMember = new Map<number, number>(
      counts.map((row) => [Number(row.memberId), Number(row.planCount)]),
    );

    return members.map((member) => {
      const planCount = countByMember.get(member.id) ?? 0;
      return {
        member: this.membersService.toView(member, today),
        hasPlan: planCount > 0,
        planCount,
      };
    });
  }

  async listPlansForMember(memberId: number): Promise<WorkoutPlan[]> {
    await this.membersService.findOne(memberId);

    return this.planRepository.find({
      where: { memberId },
      relations: { trainer: true, details: { exercise: true } },
      order: { createdAt: 'DESC', id: 'DESC', details: { id: 'ASC' } },
    });
  }

  /**
   * Validates the submission against the current weekly cap and stores the
   * plan with all of its rows, or nothing at all.
   */
  async createPlan(
    memberId: number,
    trainer: StaffPrincipal,
    dto: CreateWorkoutPlanDto,
  ): Promise<WorkoutPlan> {
    const member = await this.membersService.findOne(memberId);
    const rows: PlanRowInput[] = dto.details ?? [];

    const [knownExerciseIds, maxTrainingDays] = await Promise.all([
      this.exercisesService.findExistingIds(this.referencedExerciseIds(rows)),
      this.settingsService.getMaxTrainingDays(),
    ]);

    const result = this.planScheduleValidator.validate(rows, {
      knownExerciseIds,
      maxTrainingDays,
    });

    if (!result.accepted) {
      const errors = this.planScheduleValidator
        .violations(result)
        .map((violation) => violation.message);

      this.logger.warn(
        { memberId, trainerId: trainer.id, maxTrainingDays, errors },
        'Workout plan rejected',
      );
      throw new UnprocessableEntityException({
        message: 'Workout plan rejected',
        errors,
      });
    }

    const notes = dto.notes?.trim() || null;
    const plan = await this.dataSource.transaction(async (manager) => {
      const saved = await manager.save(
        manager.create(WorkoutPlan, {
          memberId: member.id,
          trainerId: trainer.id,
          notes,
        }),
      );

      saved.details = await manager.save(
        result.rows.map((row) =>
          manager.create(WorkoutDetail, {
            planId: saved.id,
            exerciseId: row.exerciseId,
            sets: row.sets,
            reps: row.reps,
            scheduleDay: row.scheduleDay,
          }),
        ),
      );

      return saved;
    });

    this.logger.info(
      {
        planId: plan.id,
        memberId,
        trainerId: trainer.id,
        exercises: result.rows.length,
        trainingDays: result.trainingDays,
      },
      'Workout plan created',
    );
    return plan;
  }

  private referencedExerciseIds(rows: readonly PlanRowInput[]): number[] {
    const ids: number[] = [];
    for (const row of rows) {
      const raw =
        typeof row.exerciseId === 'string'
          ? row.exerciseId.trim()
          : row.exerciseId;
      const id =
        typeof raw === 'string' && /^\d+$/.test(raw)
          ? Number.parseInt(raw, 10)
          : raw;
      if (typeof id === 'number' && Number.isInteger(id) && id > 0) {
        ids.push(id);
      }
    }
    return ids;
  }
}
