import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { hashPassword } from '../core/auth/password.util';
import { logger } from '../core/logger/logger.config';
import { Exercise } from '../modules/exercises/entities/exercise.entity';
import { Package } from '../modules/packages/entities/package.entity';
import { SettingsService } from '../modules/settings/settings.service';
import {
  MAX_TRAINING_DAYS_DESCRIPTION,
  MAX_TRAINING_DAYS_KEY,
} from '../modules/settings/settings.constants';
import {
  STAFF_ROLES,
  StaffRole,
  StaffUser,
} from '../modules/staff/entities/staff-user.entity';

export interface SeedData {
  staff: { username: string; email: string; password: string; role: string }[];
  packages: {
    name: string;
    durationMonths: number;
    price: number;
    description?: string;
  }[];
  exercises: { name: string; bodyPart?: string; description?: string }[];
  settings: { maxTrainingDays: number };
}

export interface SeedSummary {
  staff: number;
  packages: number;
  exercises: number;
  settings: number;
}

const toStaffRole = (value: string): StaffRole => {
  const role = STAFF_ROLES.find((candidate) => candidate === value);
  if (!role) {
    throw new Error(`Unknown staff role in seed data: ${value}`);
  }
  return role;
};

/**
 * Inserts the default rows. Anything that already exists, matched by its
 * natural key, is left untouched.
 */
@Injectable()
export class SeedService {
  private readonly logger = logger();

  constructor(
    @InjectRepository(StaffUser)
    private readonly staffRepository: Repository<StaffUser>,
    @InjectRepository(Package)
    private readonly packageRepository: Repository<Package>,
    @InjectRepository(Exercise)
    private readonly exerciseRepository: Repository<Exercise>,
    private readonly settingsService: SettingsService,
  ) {}

  async run(data: SeedData): Promise<SeedSummary> {
    const summary: SeedSummary = {
      staff: 0,
      packages: 0,
      exercises: 0,
      settings: 0,
    };

    for (const row of data.staff) {
      const taken = await this.staffRepository.exists({
        where: { username: row.username },
      });
      if (taken) continue;

      await this.staffRepository.save(
        this.staffRepository.create({
          username: row.username,
          email: row.email,
          role: toStaffRole(row.role),
          passwordHash: await hashPassword(row.password),
          isActive: true,
        }),
      );
      summary.staff += 1;
    }

    for (const row of data.packages) {
      const known = await this.packageRepository.exists({
        where: { name: row.name },
      });
      if (known) continue;

      await this.packageRepository.save(
        this.packageRepository.create({
          name: row.name,
          durationMonths: row.durationMonths,
          price: row.price,
          description: row.description ?? null,
        }),
      );
      summary.packages += 1;
    }

    for (const row of data.exercises) {
      const known = await this.exerciseRepository.exists({
        where: { name: row.name },
      });
      if (known) continue;

      await this.exerciseRepository.save(
        this.exerciseRepository.create({
          name: row.name,
          bodyPart: row.bodyPart ?? null,
          description: row.description ?? null,
        }),
      );
      summary.exercises += 1;
    }

    const currentMax = await this.settingsService.getValue(
      MAX_TRAINING_DAYS_KEY,
      '',
    );
    if (currentMax === '') {
      await this.settingsService.setValue(
        MAX_TRAINING_DAYS_KEY,
        String(data.settings.maxTrainingDays),
        MAX_TRAINING_DAYS_DESCRIPTION,
      );
      summary.settings += 1;
    }

    this.logger.info(summary, 'Seed completed');
    return summary;
  }
}
