import { ConfigService } from '@nestjs/config';

/**
 * Environment values reach ConfigService as strings; these read them back
 * as the types the code expects, falling back when the value is unusable.
 */

export const getNumber = (
  configService: ConfigService,
  key: string,
  defaultValue: number,
): number => {
  const raw = configService.get<string | number>(key);
  if (raw === undefined || raw === null || raw === '') return defaultValue;

  const value = typeof raw === 'number' ? raw : Number(raw);
  return Number.isFinite(value) ? value : defaultValue;
};

export const getBoolean = (
  configService: ConfigService,
  key: string,
  defaultValue: boolean,
): boolean => {
  const raw = configService.get<string | boolean>(key);
  if (raw === undefined || raw === null || raw === '') return defaultValue;
  if (typeof raw === 'boolean') return raw;

  return ['true', '1', 'yes'].includes(raw.toLowerCase());
};
