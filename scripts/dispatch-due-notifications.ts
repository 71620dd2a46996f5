/**
 * Dispatch queued notifications whose scheduled time has passed, once.
 * For hosts that run their own scheduler instead of the in-process cron job.
 *
 * Usage: npm run build && npm run dispatch:due
 */

import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../src/app.module';
import { NotificationsService } from '../src/notifications/notifications.service';

async function run() {
  const app = await NestFactory.createApplicationContext(AppModule);
  const notificationsService = app.get(NotificationsService);

  try {
    const result = await notificationsService.processDueNotifications();
    if (!result.success) {
      console.error(`[DISPATCH] ${result.error.code}: ${result.error.message}`);
      process.exitCode = 1;
      return;
    }
    const { processed, delivered, failed } = result.data;
    console.log(`[DISPATCH] processed=${processed}, delivered=${delivered}, failed=${failed}`);
  } finally {
    await app.close();
  }
}

run().catch((error: unknown) => {
  console.error('[DISPATCH] Fatal:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
