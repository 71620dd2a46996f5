import { loadNotificationOptions } from './notification-options';

export default () => ({
  port: parseInt(process.env.PORT || '3368', 10),
  serviceName: process.env.SERVICE_NAME || 'notifications-service',
  jwtSecret: process.env.JWT_SECRET,
  database: {
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    username: process.env.DB_USER || 'notifications',
    password: process.env.DB_PASSWORD || '',
    database: process.env.DB_NAME || 'notifications',
    runMigrations: process.env.RUN_MIGRATIONS === 'true',
    synchronize: process.env.DB_SYNC === 'true',
  },
  notifications: loadNotificationOptions(process.env),
});
