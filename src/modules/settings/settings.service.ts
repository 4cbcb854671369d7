import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { logger } from '../../core/logger/logger.config';
import { DEFAULT_MAX_TRAINING_DAYS } from '../../domain/gym/models';
import {
  SettingsResponseDto,
  UpdateSettingsDto,
} from './dto/update-settings.dto';
import { SystemSetting } from './entities/system-setting.entity';
import {
  MAX_TRAINING_DAYS_DESCRIPTION,
  MAX_TRAINING_DAYS_KEY,
} from './settings.constants';

@Injectable()
export class SettingsService {
  private readonly logger = logger();

  constructor(
    @InjectRepository(SystemSetting)
    private readonly settingsRepository: Repository<SystemSetting>,
  ) {}

  async getValue(key: string, defaultValue: string): Promise<string> {
    const setting = await this.settingsRepository.findOne({ where: { key } });
    return setting ? setting.value : defaultValue;
  }

  async setValue(
    key: string,
    value: string,
    description?: string,
  ): Promise<SystemSetting> {
    const existing = await this.settingsRepository.findOne({ where: { key } });
    const setting =
      existing ??
      this.settingsRepository.create({
        key,
        value,
        description: description ?? null,
      });

    setting.value = value;
    if (description !== undefined) {
      setting.description = description;
    }

    const saved = await this.settingsRepository.save(setting);
    this.logger.info({ key, value }, 'System setting updated');
    return saved;
  }

  /**
   * Read from storage on every call so an admin change applies to the very
   * next plan submission.
   */
  async getMaxTrainingDays(): Promise<number> {
    const raw = await this.getValue(
      MAX_TRAINING_DAYS_KEY,
      String(DEFAULT_MAX_TRAINING_DAYS),
    );
    const value = Number.parseInt(raw, 10);

    if (!Number.isInteger(value) || String(value) !== raw.trim()) {
      this.logger.warn(
        { key: MAX_TRAINING_DAYS_KEY, value: raw },
        'Unparsable setting, using default',
      );
      return DEFAULT_MAX_TRAINING_DAYS;
    }
    return value;
  }

  async getSettings(): Promise<SettingsResponseDto> {
    return { maxTrainingDays: await this.getMaxTrainingDays() };
  }

  async updateSettings(dto: UpdateSettingsDto): Promise<SettingsResponseDto> {
    await this.setValue(
      MAX_TRAINING_DAYS_KEY,
      String(dto.maxTrainingDays),
      MAX_TRAINING_DAYS_DESCRIPTION,
    );
    return { maxTrainingDays: dto.maxTrainingDays };
  }
}
