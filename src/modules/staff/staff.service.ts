import {
  BadRequestException,
  ConflictException,
  Injectable,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { StaffPrincipal } from '../../core/auth/auth.types';
import { hashPassword } from '../../core/auth/password.util';
import { isDuplicateKeyError } from '../../core/database/duplicate-key.util';
import { logger } from '../../core/logger/logger.config';
import { WorkoutPlan } from '../workout-plans/entities/workout-plan.entity';
import { CreateStaffDto, StaffUserView, UpdateStaffDto } from './dto/staff.dto';
import { StaffUser } from './entities/staff-user.entity';

@Injectable()
export class StaffService {
  private readonly logger = logger();

  constructor(
    @InjectRepository(StaffUser)
    private readonly staffRepository: Repository<StaffUser>,
    @InjectRepository(WorkoutPlan)
    private readonly planRepository: Repository<WorkoutPlan>,
  ) {}

  async list(): Promise<StaffUserView[]> {
    const users = await this.staffRepository.find({
      order: { role: 'ASC', username: 'ASC' },
    });
    return users.map((user) => this.toView(user));
  }

  async create(dto: CreateStaffDto): Promise<StaffUserView> {
    await this.assertUnique(dto.username, dto.email);

    const user = await this.saveUnique(
      this.staffRepository.create({
        username: dto.username,
        email: dto.email,
        role: dto.role,
        isActive: true,
        passwordHash: await hashPassword(dto.password),
      }),
    );

    this.logger.info(
      { staffId: user.id, role: user.role },
      'Staff user created',
    );
    return this.toView(user);
  }

  async update(id: number, dto: UpdateStaffDto): Promise<StaffUserView> {
    const user = await this.findOrFail(id);
    await this.assertUnique(dto.username, dto.email, id);

    user.username = dto.username;
    user.email = dto.email;
    user.role = dto.role;
    if (dto.password) {
      user.passwordHash = await hashPassword(dto.password);
    }

    const saved = await this.saveUnique(user);
    this.logger.info(
      { staffId: id, passwordChanged: !!dto.password },
      'Staff user updated',
    );
    return this.toView(saved);
  }

  async toggleActive(
    id: number,
    actor: StaffPrincipal,
  ): Promise<StaffUserView> {
    if (id === actor.id) {
      throw new BadRequestException('You cannot deactivate your own account');
    }

    const user = await this.findOrFail(id);
    user.isActive = !user.isActive;
    const saved = await this.staffRepository.save(user);

    this.logger.info(
      { staffId: id, isActive: saved.isActive },
      'Staff user activation toggled',
    );
    return this.toView(saved);
  }

  async remove(id: number, actor: StaffPrincipal): Promise<void> {
    if (id === actor.id) {
      throw new BadRequestException('You cannot delete your own account');
    }

    const user = await this.findOrFail(id);
    const planCount = await this.planRepository.count({
      where: { trainerId: id },
    });
    if (planCount > 0) {
      throw new ConflictException(
        'Cannot delete a user who has authored workout plans',
      );
    }

    await this.staffRepository.remove(user);
    this.logger.info({ staffId: id }, 'Staff user deleted');
  }

  async count(): Promise<number> {
    return this.staffRepository.count();
  }

  findById(id: number): Promise<StaffUser | null> {
    return this.staffRepository.findOne({ where: { id } });
  }

  /**
   * Loads a user together with the password hash, which normal reads omit
   */
  async findWithPassword(username: string): Promise<StaffUser | null> {
    return this.staffRepository
      .createQueryBuilder('user')
      .addSelect('user.passwordHash')
      .where('user.username = :username', { username })
      .getOne();
  }

  toView(user: StaffUser): StaffUserView {
    return {
      id: user.id,
      username: user.username,
      email: user.email,
      role: user.role,
      isActive: user.isActive,
      createdAt: user.createdAt,
    };
  }

  private async findOrFail(id: number): Promise<StaffUser> {
    const user = await this.staffRepository.findOne({ where: { id } });
    if (!user) {
      throw new NotFoundException(`Staff user ${id} not found`);
    }
    return user;
  }

  private async assertUnique(
    username: string,
    email: string,
    exceptId?: number,
  ): Promise<void> {
    const byUsername = await this.staffRepository.findOne({
      where: { username },
    });
    if (byUsername && byUsername.id !== exceptId) {
      throw new ConflictException('Username already exists');
    }

    const byEmail = await this.staffRepository.findOne({ where: { email } });
    if (byEmail && byEmail.id !== exceptId) {
      throw new ConflictException('Email is already in use');
    }
  }

  /**
   * The lookups in `assertUnique` race with concurrent writes; the unique
   * indexes have the final say.
   */
  private async saveUnique(user: StaffUser): Promise<StaffUser> {
    try {
      return await this.staffRepository.save(user);
    } catch (error: unknown) {
      if (isDuplicateKeyError(error)) {
        throw new ConflictException('Username or email already in use');
      }
      throw error;
    }
  }
}
