import 'reflect-metadata';
import { ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { getNumber } from './core/config/config.util';
import {
  GymRuleExceptionFilter,
} from './core/errors/gym-rule-exception.filter';
import { logger } from './core/logger/logger.config';

const describeError = (error: unknown) =>
  error instanceof Error
    ? { error: error.message, stack: error.stack }
    : { error: String(error) };

async function bootstrap() {
  const pinoLogger = logger();

  try {
    const app = await NestFactory.create(AppModule, {
      logger: false,
    });

    const configService = app.get(ConfigService);

    app.useGlobalPipes(
      new ValidationPipe({
        whitelist: true,
        forbidNonWhitelisted: true,
        transform: true,
        transformOptions: {
          enableImplicitConversion: true,
        },
      }),
    );
    app.useGlobalFilters(new GymRuleExceptionFilter());

    app.setGlobalPrefix('api');
    app.enableCors();

    const port = getNumber(configService, 'PORT', 3001);
    await app.listen(port);

    pinoLogger.info(`Application running on: http://localhost:${port}/api`);
  } catch (error: unknown) {
    pinoLogger.error(describeError(error), 'Bootstrap failed');
    throw error;
  }
}

bootstrap().catch((error: unknown) => {
  const pinoLogger = logger();
  pinoLogger.error(describeError(error), 'Failed to start application');
  process.exit(1);
});
