/**
 * Webhook Dispatch Service Main Entry Point
 */

import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe } from '@nestjs/common';
import { AppModule } from './app.module';
import { AppDataSource } from './data-source';
import { LoggerService } from '../shared/logger/logger.service';

async function runMigrations(logger: LoggerService): Promise<void> {
  await AppDataSource.initialize();
  try {
    const run = await AppDataSource.runMigrations();
    if (run.length > 0) {
      logger.log(`Ran ${run.length} migration(s): ${run.map((m) => m.name).join(', ')}`, 'Bootstrap');
    }
  } finally {
    await AppDataSource.destroy();
  }
}

async function bootstrap() {
  const logger = new LoggerService();

  // Single deploy step: pending migrations run before the app starts taking traffic
  if (process.env.RUN_MIGRATIONS === 'true') {
    await runMigrations(logger);
  }

  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(app.get(LoggerService));

  app.enableCors({
    origin: process.env.CORS_ORIGIN || '*',
    credentials: true,
  });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
    }),
  );

  app.enableShutdownHooks();

  const port = parseInt(process.env.PORT || '3368', 10);
  await app.listen(port);

  logger.log(`Webhook dispatch service is running on: http://localhost:${port}`, 'Bootstrap');
}

bootstrap().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Failed to start webhook dispatch service', err);
  process.exit(1);
});
