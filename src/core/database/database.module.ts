import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { getBoolean, getNumber } from '../config/config.util';

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        type: 'mysql' as const,
        host: configService.get<string>('DB_HOST', 'localhost'),
        port: getNumber(configService, 'DB_PORT', 3306),
        username: configService.get<string>('DB_USER', 'root'),
        password: configService.get<string>('DB_PASSWORD', ''),
        database: configService.get<string>('DB_NAME', 'gym_manager'),
        autoLoadEntities: true,
        synchronize: getBoolean(configService, 'DB_SYNCHRONIZE', false),
        timezone: 'Z',
        dateStrings: ['DATE'],
      }),
    }),
  ],
})
export class DatabaseModule {}
