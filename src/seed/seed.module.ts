import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DatabaseModule } from '../core/database/database.module';
import { SettingsModule } from '../modules/settings/settings.module';
import { SEED_ENTITIES } from './seed.entities';
import { SeedService } from './seed.service';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
    }),
    DatabaseModule,
    TypeOrmModule.forFeature(SEED_ENTITIES),
    SettingsModule,
  ],
  providers: [SeedService],
})
export class SeedModule {}
