import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NotificationOptions } from './notification-options';

@Global()
@Module({
  providers: [
    {
      provide: NotificationOptions,
      inject: [ConfigService],
      useFactory: (config: ConfigService): NotificationOptions =>
        config.getOrThrow<NotificationOptions>('notifications'),
    },
  ],
  exports: [NotificationOptions],
})
export class NotificationConfigModule {}
