/**
 * Database Module
 */

import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Notification } from '../../src/notifications/entities/notification.entity';
import { NotificationDeliveryLog } from '../../src/notifications/entities/notification-delivery-log.entity';
import { NotificationPreference } from '../../src/preferences/entities/notification-preference.entity';

interface DatabaseSettings {
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
  runMigrations: boolean;
  synchronize: boolean;
}

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => {
        const database = config.getOrThrow<DatabaseSettings>('database');
        return {
          type: 'postgres',
          host: database.host,
          port: database.port,
          username: database.username,
          password: database.password,
          database: database.database,
          entities: [Notification, NotificationDeliveryLog, NotificationPreference],
          migrations: ['dist/src/migrations/*.js'],
          migrationsRun: database.runMigrations,
          synchronize: database.synchronize,
          logging: process.env.NODE_ENV === 'development',
        };
      },
    }),
  ],
  exports: [TypeOrmModule],
})
export class DatabaseModule {}
