import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { logger } from './core/logger/logger.config';
import seedData from './seed/seed-data.json';
import { SeedModule } from './seed/seed.module';
import { SeedService } from './seed/seed.service';

async function seed() {
  const app = await NestFactory.createApplicationContext(SeedModule, {
    logger: false,
  });
  try {
    await app.get(SeedService).run(seedData);
  } finally {
    await app.close();
  }
}

seed().catch((error: unknown) => {
  logger().error(
    error instanceof Error
      ? { error: error.message, stack: error.stack }
      : { error: String(error) },
    'Seeding failed',
  );
  process.exit(1);
});
