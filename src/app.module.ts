/**
 * Notification Dispatch Service App Module
 */

import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import configuration from './config/configuration';
import { NotificationConfigModule } from './config/notification-config.module';
import { NotificationsModule } from './notifications/notifications.module';
import { PreferencesModule } from './preferences/preferences.module';
import { HealthModule } from './health/health.module';
import { DatabaseModule } from '../shared/database/database.module';
import { LoggerModule } from '../shared/logger/logger.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env'],
      load: [configuration],
    }),
    ScheduleModule.forRoot(),
    DatabaseModule,
    LoggerModule,
    NotificationConfigModule,
    PreferencesModule,
    NotificationsModule,
    HealthModule,
  ],
})
export class AppModule {}
