import { Injectable } from '@nestjs/common';
import { Notification } from '../notifications/entities/notification.entity';
import { NotificationChannel } from '../notifications/notification-channel';
import { BaseNotificationProvider } from './base-notification.provider';
import { NotificationStreamService } from './notification-stream.service';

/**
 * In-app delivery: the stored notification is the inbox entry. The live push
 * to stream subscribers happens after the delivery is committed, in
 * NotificationsService.
 */
@Injectable()
export class InAppNotificationProvider extends BaseNotificationProvider {
  readonly channel = NotificationChannel.IN_APP;
  readonly name = 'in-app';
  readonly priority = 10;

  constructor(private readonly stream: NotificationStreamService) {
    super();
  }

  protected hasRecipient(notification: Notification): boolean {
    return Boolean(notification.recipientUserId);
  }

  protected async deliver(notification: Notification): Promise<string> {
    const userId = notification.recipientUserId ?? '';
    return `live subscribers: ${this.stream.subscriberCount(userId)}`;
  }
}
