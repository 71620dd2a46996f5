/**
 * Notification Dispatch Service Main Entry Point
 */

import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { AppDataSource } from './data-source';
import { LoggerService } from '../shared/logger/logger.service';

async function bootstrap() {
  // Run pending migrations at startup (single deploy step; no separate migration container)
  const logger = new Logger('Bootstrap');
  try {
    await AppDataSource.initialize();
    const run = await AppDataSource.runMigrations();
    await AppDataSource.destroy();
    if (run.length > 0) {
      logger.log(`Ran ${run.length} migration(s): ${run.map((m) => m.name).join(', ')}`);
    }
  } catch (err) {
    logger.error('Migration failed at startup', err instanceof Error ? err.stack : String(err));
    process.exit(1);
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

  const port = app.get(ConfigService).get<number>('port') ?? 3368;
  await app.listen(port);

  logger.log(`Notification dispatch service is running on: http://localhost:${port}`);
}

bootstrap().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Failed to start', err);
  process.exit(1);
});
