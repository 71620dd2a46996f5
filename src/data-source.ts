import { DataSource } from 'typeorm';
import * as dotenv from 'dotenv';
import { Notification } from './notifications/entities/notification.entity';
import { NotificationDeliveryLog } from './notifications/entities/notification-delivery-log.entity';
import { NotificationPreference } from './preferences/entities/notification-preference.entity';

dotenv.config();

/** Used by the startup migration step and the TypeORM CLI. */
export const AppDataSource = new DataSource({
  type: 'postgres',
  host: process.env.DB_HOST || 'localhost',
  port: parseInt(process.env.DB_PORT || '5432', 10),
  username: process.env.DB_USER || 'notifications',
  password: process.env.DB_PASSWORD || '',
  database: process.env.DB_NAME || 'notifications',
  entities: [Notification, NotificationDeliveryLog, NotificationPreference],
  // dist/src/migrations/*.js at runtime, src/migrations/*.ts from the CLI
  migrations: [__dirname + '/migrations/*.' + (process.env.NODE_ENV === 'production' ? 'js' : 'ts')],
  synchronize: false,
  logging: process.env.NODE_ENV === 'development',
});
