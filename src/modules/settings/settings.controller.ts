import { Body, Controller, Get, Patch } from '@nestjs/common';
import { Roles } from '../../core/auth/auth.decorators';
import {
  SettingsResponseDto,
  UpdateSettingsDto,
} from './dto/update-settings.dto';
import { SettingsService } from './settings.service';

@Controller('settings')
@Roles('admin')
export class SettingsController {
  constructor(private readonly settingsService: SettingsService) {}

  @Get()
  getSettings(): Promise<SettingsResponseDto> {
    return this.settingsService.getSettings();
  }

  @Patch()
  updateSettings(@Body() dto: UpdateSettingsDto): Promise<SettingsResponseDto> {
    return this.settingsService.updateSettings(dto);
  }
}
