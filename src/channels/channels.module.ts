import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { NOTIFICATION_PROVIDERS, NotificationProvider } from './notification-provider';
import { NotificationStreamService } from './notification-stream.service';
import { InAppNotificationProvider } from './in-app.provider';
import { EmailNotificationProvider } from './email.provider';
import { WebPushNotificationProvider } from './web-push.provider';
import { WebhookNotificationProvider } from './webhook.provider';
import { TeamsWebhookNotificationProvider } from './teams-webhook.provider';

const CHANNEL_PROVIDERS = [
  InAppNotificationProvider,
  EmailNotificationProvider,
  WebPushNotificationProvider,
  WebhookNotificationProvider,
  TeamsWebhookNotificationProvider,
];

@Module({
  imports: [HttpModule],
  providers: [
    NotificationStreamService,
    ...CHANNEL_PROVIDERS,
    {
      provide: NOTIFICATION_PROVIDERS,
      inject: CHANNEL_PROVIDERS,
      useFactory: (...providers: NotificationProvider[]): NotificationProvider[] => providers,
    },
  ],
  exports: [NOTIFICATION_PROVIDERS, NotificationStreamService],
})
export class ChannelsModule {}
