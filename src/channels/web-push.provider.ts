import { Injectable, Inject } from '@nestjs/common';
import { sendNotification, WebPushError } from 'web-push';
import { LoggerService } from '../../shared/logger/logger.service';
import { NotificationOptions } from '../config/notification-options';
import { Notification } from '../notifications/entities/notification.entity';
import { NotificationChannel } from '../notifications/notification-channel';
import { BaseNotificationProvider } from './base-notification.provider';
import { RecipientContact } from './notification-provider';

interface VapidDetails {
  subject: string;
  publicKey: string;
  privateKey: string;
}

/** Web push delivery to a browser subscription, signed with the VAPID key pair. */
@Injectable()
export class WebPushNotificationProvider extends BaseNotificationProvider {
  readonly channel = NotificationChannel.PUSH;
  readonly name = 'web-push';
  readonly priority = 10;

  private readonly vapid: VapidDetails | null;

  constructor(
    @Inject(LoggerService)
    private logger: LoggerService,
    private readonly options: NotificationOptions,
  ) {
    super();
    const { vapidSubject, vapidPublicKey, vapidPrivateKey } = options;
    this.vapid =
      vapidSubject && vapidPublicKey && vapidPrivateKey
        ? { subject: vapidSubject, publicKey: vapidPublicKey, privateKey: vapidPrivateKey }
        : null;
  }

  protected hasRecipient(_notification: Notification, contact: RecipientContact): boolean {
    return this.vapid !== null && contact.pushSubscription !== null;
  }

  protected async deliver(notification: Notification, contact: RecipientContact): Promise<string | null> {
    const subscription = contact.pushSubscription;
    if (!subscription || !this.vapid) {
      throw new Error('Push subscription or VAPID keys missing');
    }

    const result = await sendNotification(
      {
        endpoint: subscription.endpoint,
        keys: { p256dh: subscription.publicKey, auth: subscription.auth },
      },
      JSON.stringify(this.buildPayload(notification)),
      {
        vapidDetails: this.vapid,
        TTL: this.options.pushTtlSeconds,
      },
    );

    this.logger.debug(
      `Push sent for notification ${notification.id}, status ${result.statusCode}`,
      'WebPushNotificationProvider',
    );
    return `${result.statusCode} ${result.body}`.trim();
  }

  buildPayload(notification: Notification): Record<string, unknown> {
    return {
      title: notification.title,
      body: notification.message,
      icon: notification.imageUrl ?? undefined,
      data: {
        notificationId: notification.id,
        url: notification.actionUrl ?? undefined,
        type: notification.type,
        category: notification.category ?? undefined,
      },
    };
  }

  protected describeError(error: unknown): string {
    if (error instanceof WebPushError) {
      if (error.statusCode === 404 || error.statusCode === 410) {
        return `Push subscription is no longer valid (status ${error.statusCode})`;
      }
      return `Push service error (status ${error.statusCode}): ${error.message}`;
    }
    return super.describeError(error);
  }
}
