import {
  ConflictException,
  Injectable,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { logger } from '../../core/logger/logger.config';
import { WorkoutDetail } from '../workout-plans/entities/workout-detail.entity';
import { ExerciseDto } from './dto/exercise.dto';
import { Exercise } from './entities/exercise.entity';

@Injectable()
export class ExercisesService {
  private readonly logger = logger();

  constructor(
    @InjectRepository(Exercise)
    private readonly exerciseRepository: Repository<Exercise>,
    @InjectRepository(WorkoutDetail)
    private readonly detailRepository: Repository<WorkoutDetail>,
  ) {}

  list(): Promise<Exercise[]> {
    return this.exerciseRepository.find({ order: { name: 'ASC' } });
  }

  async findOne(id: number): Promise<Exercise> {
    const exercise = await this.exerciseRepository.findOne({ where: { id } });
    if (!exercise) {
      throw new NotFoundException(`Exercise ${id} not found`);
    }
    return exercise;
  }

  /**
   * Which of the given ids exist
   */
  async findExistingIds(ids: readonly number[]): Promise<Set<number>> {
    if (ids.length === 0) return new Set();

    const found = await this.exerciseRepository.find({
      select: { id: true },
      where: { id: In([...new Set(ids)]) },
    });
    return new Set(found.map((exercise) => exercise.id));
  }

  async create(dto: ExerciseDto): Promise<Exercise> {
    const exercise = await this.exerciseRepository.save(
      this.exerciseRepository.create({
        name: dto.name,
        description: dto.description ?? null,
        bodyPart: dto.bodyPart ?? null,
      }),
    );
    this.logger.info(
      { exerciseId: exercise.id, name: exercise.name },
      'Exercise created',
    );
    return exercise;
  }

  async update(id: number, dto: ExerciseDto): Promise<Exercise> {
    const exercise = await this.findOne(id);
    exercise.name = dto.name;
    exercise.description = dto.description ?? null;
    exercise.bodyPart = dto.bodyPart ?? null;

    const saved = await this.exerciseRepository.save(exercise);
    this.logger.info({ exerciseId: id }, 'Exercise updated');
    return saved;
  }

  async remove(id: number): Promise<void> {
    const exercise = await this.findOne(id);
    const usage = await this.detailRepository.count({
      where: { exerciseId: id },
    });
    if (usage > 0) {
      throw new ConflictException(
        'Cannot delete an exercise that is used in a workout plan',
      );
    }

    await this.exerciseRepository.remove(exercise);
    this.logger.info(
      { exerciseId: id, name: exercise.name },
      'Exercise deleted',
    );
  }

  count(): Promise<number> {
    return this.exerciseRepository.count();
  }
}
