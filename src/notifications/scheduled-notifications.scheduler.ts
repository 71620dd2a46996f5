/**
 * Scheduler: dispatches queued notifications once due and purges old ones nightly.
 * The poller only runs when NOTIFICATIONS_SCHEDULER_ENABLED is true.
 */

import { Inject, Injectable } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { LoggerService } from '../../shared/logger/logger.service';
import { NotificationOptions } from '../config/notification-options';
import { NotificationsService } from './notifications.service';

/** Default: every minute. Override via NOTIFICATIONS_SCHEDULER_CRON in .env. */
const DEFAULT_CRON = '* * * * *';

@Injectable()
export class ScheduledNotificationsScheduler {
  private running = false;

  constructor(
    private readonly notificationsService: NotificationsService,
    private readonly options: NotificationOptions,
    @Inject(LoggerService)
    private readonly logger: LoggerService,
  ) {}

  @Cron(process.env.NOTIFICATIONS_SCHEDULER_CRON || DEFAULT_CRON)
  async handleDueNotifications(): Promise<void> {
    if (!this.options.schedulerEnabled) {
      return;
    }
    // a slow run must not overlap the next tick
    if (this.running) {
      this.logger.warn('[SCHEDULER] Previous run still in progress, skipping', 'ScheduledNotificationsScheduler');
      return;
    }

    this.running = true;
    try {
      const result = await this.notificationsService.processDueNotifications();
      if (!result.success) {
        this.logger.error(
          `[SCHEDULER] Run failed: ${result.error.message}`,
          undefined,
          'ScheduledNotificationsScheduler',
        );
      }
    } finally {
      this.running = false;
    }
  }

  @Cron(CronExpression.EVERY_DAY_AT_3AM)
  async handleCleanup(): Promise<void> {
    if (!this.options.cleanupEnabled) {
      return;
    }
    const purged = await this.notificationsService.cleanupOldNotifications();
    this.logger.log(`[CLEANUP] Removed ${purged} notifications`, 'ScheduledNotificationsScheduler');
  }
}
