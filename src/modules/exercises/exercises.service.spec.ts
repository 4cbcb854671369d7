import { ConflictException, NotFoundException } from '@nestjs/common';
import { In, Repository } from 'typeorm';
import { WorkoutDetail } from '../workout-plans/entities/workout-detail.entity';
import { Exercise } from './entities/exercise.entity';
import { ExercisesService } from './exercises.service';

describe('ExercisesService', () => {
  const exerciseRepository = {
    find: jest.fn(),
    findOne: jest.fn(),
    remove: jest.fn(),
  };
  const detailRepository = { count: jest.fn() };
  const service = new ExercisesService(
    exerciseRepository as unknown as Repository<Exercise>,
    detailRepository as unknown as Repository<WorkoutDetail>,
  );

  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('findExistingIds', () => {
    it('looks each id up once', async () => {
      exerciseRepository.find.mockResolvedValue([{ id: 1 }, { id: 3 }]);

      const ids = await service.findExistingIds([3, 1, 3, 8]);

      expect(exerciseRepository.find).toHaveBeenCalledWith({
        select: { id: true },
        where: { id: In([3, 1, 8]) },
      });
      expect([...ids]).toEqual([1, 3]);
    });

    it('skips the query when there is nothing to look up', async () => {
      await expect(service.findExistingIds([])).resolves.toEqual(new Set());
      expect(exerciseRepository.find).not.toHaveBeenCalled();
    });
  });

  describe('remove', () => {
    it('keeps exercises used by a workout plan', async () => {
      exerciseRepository.findOne.mockResolvedValue({ id: 2, name: 'Squat' });
      detailRepository.count.mockResolvedValue(1);

      await expect(service.remove(2)).rejects.toBeInstanceOf(ConflictException);
      expect(exerciseRepository.remove).not.toHaveBeenCalled();
    });

    it('fails for an unknown exercise', async () => {
      exerciseRepository.findOne.mockResolvedValue(null);

      await expect(service.remove(5)).rejects.toThrow(
        new NotFoundException('Exercise 5 not found'),
      );
    });
  });
});
