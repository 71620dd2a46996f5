/**
 * Notifications Module
 */

import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { DeliveryModule } from '../delivery/delivery.module';
import { PersistenceModule } from '../persistence/persistence.module';
import { PreferencesModule } from '../preferences/preferences.module';
import { NotificationsController } from './notifications.controller';
import { NotificationsService } from './notifications.service';
import { ScheduledNotificationsScheduler } from './scheduled-notifications.scheduler';

@Module({
  imports: [AuthModule, PersistenceModule, PreferencesModule, DeliveryModule],
  controllers: [NotificationsController],
  providers: [NotificationsService, ScheduledNotificationsScheduler],
  exports: [NotificationsService],
})
export class NotificationsModule {}
