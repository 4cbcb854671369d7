import {
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { getDataSourceToken, getRepositoryToken } from '@nestjs/typeorm';
import { PlanScheduleValidator } from '../../domain/gym/rules';
import { ExercisesService } from '../exercises/exercises.service';
import { Member } from '../members/entities/member.entity';
import { MembersService } from '../members/members.service';
import { SettingsService } from '../settings/settings.service';
import { WorkoutPlan } from './entities/workout-plan.entity';
import { WorkoutPlansService } from './workout-plans.service';

const trainer = { id: 3, username: 'trainer', role: 'trainer' as const };
const member = { id: 7, fullName: 'Sam Doe', activeUntil: '2024-06-01' };

const rejectionOf = async (promise: Promise<unknown>) => {
  const error = await promise.then(
    () => {
      throw new Error('expected the plan to be rejected');
    },
    (caught: unknown) => caught,
  );
  expect(error).toBeInstanceOf(UnprocessableEntityException);
  return (error as UnprocessableEntityException).getResponse();
};

describe('WorkoutPlansService', () => {
  let service: WorkoutPlansService;

  const queryBuilder = {
    select: jest.fn().mockReturnThis(),
    addSelect: jest.fn().mockReturnThis(),
    where: jest.fn().mockReturnThis(),
    groupBy: jest.fn().mockReturnThis(),
    getRawMany: jest.fn(),
  };
  const planRepository = {
    find: jest.fn(),
    createQueryBuilder: jest.fn(() => queryBuilder),
  };
  const memberRepository = { find: jest.fn() };

  const manager = {
    create: jest.fn((_entity: unknown, data: object) => ({ ...data })),
    save: jest.fn(async (value: object | object[]) =>
      Array.isArray(value)
        ? value.map((detail, index) => ({ ...detail, id: 100 + index }))
        : { ...value, id: 10 },
    ),
  };
  const dataSource = {
    transaction: jest.fn((work: (m: typeof manager) => Promise<unknown>) =>
      work(manager),
    ),
  };

  const exercisesService = {
    findExistingIds: jest.fn(
      async (ids: readonly number[]) =>
        new Set(ids.filter((id) => [1, 2, 3].includes(id))),
    ),
  };
  const settingsService = { getMaxTrainingDays: jest.fn() };
  const membersService = {
    findOne: jest.fn(),
    toView: jest.fn((m: { id: number }) => ({ id: m.id })),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    membersService.findOne.mockResolvedValue(member);
    settingsService.getMaxTrainingDays.mockResolvedValue(6);

    const moduleRef = await Test.createTestingModule({
      providers: [
        WorkoutPlansService,
        PlanScheduleValidator,
        { provide: getRepositoryToken(WorkoutPlan), useValue: planRepository },
        { provide: getRepositoryToken(Member), useValue: memberRepository },
        { provide: getDataSourceToken(), useValue: dataSource },
        { provide: ExercisesService, useValue: exercisesService },
        { provide: SettingsService, useValue: settingsService },
        { provide: MembersService, useValue: membersService },
      ],
    }).compile();

    service = moduleRef.get(WorkoutPlansService);
  });

  describe('createPlan', () => {
    it('stores the plan and then its rows inside one transaction', async () => {
      const plan = await service.createPlan(7, trainer, {
        notes: '   ',
        details: [
          { exerciseId: 1, sets: 3, reps: '10', scheduleDay: 'Mon, Wed' },
          { exerciseId: '2', sets: '4', reps: ' 8-12 ', scheduleDay: 'fri' },
        ],
      });

      expect(exercisesService.findExistingIds).toHaveBeenCalledWith([1, 2]);
      expect(dataSource.transaction).toHaveBeenCalledTimes(1);
      expect(manager.save).toHaveBeenNthCalledWith(1, {
        memberId: 7,
        trainerId: 3,
        notes: null,
      });
      expect(manager.save).toHaveBeenNthCalledWith(2, [
        {
          planId: 10,
          exerciseId: 1,
          sets: 3,
          reps: '10',
          scheduleDay: 'Mon, Wed',
        },
        {
          planId: 10,
          exerciseId: 2,
          sets: 4,
          reps: '8-12',
          scheduleDay: 'fri',
        },
      ]);
      expect(plan.id).toBe(10);
      expect(plan.details).toHaveLength(2);
    });

    it('accepts exactly the configured number of training days', async () => {
      settingsService.getMaxTrainingDays.mockResolvedValue(2);

      await service.createPlan(7, trainer, {
        details: [
          { exerciseId: 1, sets: 3, reps: '10', scheduleDay: 'Mon' },
          { exerciseId: 2, sets: 3, reps: '10', scheduleDay: 'mon, Tue' },
        ],
      });

      expect(dataSource.transaction).toHaveBeenCalledTimes(1);
    });

    it('rejects too many training days and writes nothing', async () => {
      const days = ['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun'];

      const response = await rejectionOf(
        service.createPlan(7, trainer, {
          details: days.map((day) => ({
            exerciseId: 1,
            sets: 3,
            reps: '10',
            scheduleDay: day,
          })),
        }),
      );

      expect(response).toEqual({
        message: 'Workout plan rejected',
        errors: [
          'The schedule exceeds the maximum of 6 training days per week: 7 ' +
            'days selected',
        ],
      });
      expect(dataSource.transaction).not.toHaveBeenCalled();
      expect(manager.save).not.toHaveBeenCalled();
    });

    it('reports every row problem in one response', async () => {
      const response = await rejectionOf(
        service.createPlan(7, trainer, {
          details: [
            { exerciseId: 99, sets: 3, reps: '10', scheduleDay: 'mon' },
            { exerciseId: 1, sets: 0, reps: '10', scheduleDay: 'tue' },
            { exerciseId: 1, sets: 2, reps: '', scheduleDay: 'wed' },
          ],
        }),
      );

      expect(response).toEqual({
        message: 'Workout plan rejected',
        errors: [
          'Row 1: exercise not found',
          'Row 2: sets must be a positive whole number',
          'Row 3: every exercise needs an exercise, sets, reps and a ' +
            'schedule day',
          'A workout plan needs at least one exercise',
        ],
      });
      expect(dataSource.transaction).not.toHaveBeenCalled();
    });

    it('treats a submission without rows as an empty plan', async () => {
      const response = await rejectionOf(service.createPlan(7, trainer, {}));

      expect(response).toEqual({
        message: 'Workout plan rejected',
        errors: ['A workout plan needs at least one exercise'],
      });
    });

    it('applies a changed day limit on the very next submission', async () => {
      settingsService.getMaxTrainingDays
        .mockResolvedValueOnce(3)
        .mockResolvedValueOnce(4);
      const dto = {
        details: [
          {
            exerciseId: 1,
            sets: 3,
            reps: '10',
            scheduleDay: 'mon,tue,wed,thu',
          },
        ],
      };

      const response = await rejectionOf(service.createPlan(7, trainer, dto));
      expect(response).toEqual({
        message: 'Workout plan rejected',
        errors: [
          'The schedule exceeds the maximum of 3 training days per week: 4 ' +
            'days selected',
        ],
      });

      await service.createPlan(7, trainer, dto);
      expect(settingsService.getMaxTrainingDays).toHaveBeenCalledTimes(2);
      expect(dataSource.transaction).toHaveBeenCalledTimes(1);
    });

    it('fails with not found for an unknown member', async () => {
      membersService.findOne.mockRejectedValue(
        new NotFoundException('Member 8 not found'),
      );

      await expect(
        service.createPlan(8, trainer, {
          details: [{ exerciseId: 1, sets: 3, reps: '10', scheduleDay: 'mon' }],
        }),
      ).rejects.toBeInstanceOf(NotFoundException);
      expect(dataSource.transaction).not.toHaveBeenCalled();
    });
  });

  describe('listMembersForTrainer', () => {
    it('flags members that have plans from the calling trainer', async () => {
      memberRepository.find.mockResolvedValue([{ id: 1 }, { id: 2 }]);
      queryBuilder.getRawMany.mockResolvedValue([
        { memberId: '2', planCount: '3' },
      ]);

      const result = await service.listMembersForTrainer(trainer);

      expect(queryBuilder.where).toHaveBeenCalledWith(
        'plan.trainerId = :trainerId',
        { trainerId: 3 },
      );
      expect(result).toEqual([
        { member: { id: 1 }, hasPlan: false, planCount: 0 },
        { member: { id: 2 }, hasPlan: true, planCount: 3 },
      ]);
    });
  });

  describe('listPlansForMember', () => {
    it('loads plans newest first with their exercises', async () => {
      planRepository.find.mockResolvedValue([]);

      await service.listPlansForMember(7);

      expect(membersService.findOne).toHaveBeenCalledWith(7);
      expect(planRepository.find).toHaveBeenCalledWith({
        where: { memberId: 7 },
        relations: { trainer: true, details: { exercise: true } },
        order: { createdAt: 'DESC', id: 'DESC', details: { id: 'ASC' } },
      });
    });
  });
});
