import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Notification } from '../notifications/entities/notification.entity';
import { NotificationDeliveryLog } from '../notifications/entities/notification-delivery-log.entity';
import { NotificationPreference } from '../preferences/entities/notification-preference.entity';
import { NotificationPersistence } from './notification-persistence';
import { TypeOrmNotificationPersistence } from './typeorm-notification-persistence';

@Module({
  imports: [TypeOrmModule.forFeature([Notification, NotificationDeliveryLog, NotificationPreference])],
  providers: [{ provide: NotificationPersistence, useClass: TypeOrmNotificationPersistence }],
  exports: [NotificationPersistence],
})
export class PersistenceModule {}
