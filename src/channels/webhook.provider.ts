/**
 * Webhook Provider
 * POSTs notifications as JSON to the recipient's webhook URL
 */

import { Injectable, Inject } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { isAxiosError } from 'axios';
import { createHmac } from 'crypto';
import { firstValueFrom } from 'rxjs';
import { LoggerService } from '../../shared/logger/logger.service';
import { NotificationOptions } from '../config/notification-options';
import { Notification } from '../notifications/entities/notification.entity';
import { NotificationChannel } from '../notifications/notification-channel';
import { priorityName } from '../notifications/notification.enums';
import { BaseNotificationProvider, describeBody, metadataString } from './base-notification.provider';
import { RecipientContact } from './notification-provider';

export const SIGNATURE_HEADER = 'X-Notification-Signature';

export function signPayload(body: string, secret: string): string {
  return `sha256=${createHmac('sha256', secret).update(body).digest('hex')}`;
}

@Injectable()
export class WebhookNotificationProvider extends BaseNotificationProvider {
  readonly channel = NotificationChannel.WEBHOOK;
  readonly name = 'webhook';
  readonly priority = 20;

  constructor(
    private httpService: HttpService,
    @Inject(LoggerService)
    private logger: LoggerService,
    private readonly options: NotificationOptions,
  ) {
    super();
  }

  protected hasRecipient(notification: Notification, contact: RecipientContact): boolean {
    return this.targetUrl(notification, contact) !== null;
  }

  protected async deliver(notification: Notification, contact: RecipientContact): Promise<string | null> {
    const url = this.targetUrl(notification, contact);
    if (!url) {
      throw new Error('Webhook URL missing');
    }

    const body = JSON.stringify({
      event: 'notification.delivered',
      timestamp: new Date().toISOString(),
      data: {
        id: notification.id,
        title: notification.title,
        message: notification.message,
        type: notification.type,
        priority: priorityName(notification.priority),
        category: notification.category,
        recipientUserId: notification.recipientUserId,
        tenantId: notification.tenantId,
        actionUrl: notification.actionUrl,
        imageUrl: notification.imageUrl,
        metadata: notification.metadata,
        createdAt: notification.createdAt.toISOString(),
      },
    });

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'X-Notification-Id': notification.id,
    };
    if (this.options.webhookSigningSecret) {
      headers[SIGNATURE_HEADER] = signPayload(body, this.options.webhookSigningSecret);
    }

    const response = await firstValueFrom(
      this.httpService.post(url, body, {
        headers,
        timeout: this.options.webhookTimeoutMs,
      }),
    );

    this.logger.log(
      `[WEBHOOK] Delivered notification ${notification.id} - Status: ${response.status}`,
      'WebhookNotificationProvider',
    );
    return `${response.status} ${describeBody(response.data)}`.trim();
  }

  protected describeError(error: unknown): string {
    if (isAxiosError(error) && error.response) {
      return `Webhook responded with status ${error.response.status}`;
    }
    return super.describeError(error);
  }

  private targetUrl(notification: Notification, contact: RecipientContact): string | null {
    return contact.webhookUrl ?? metadataString(notification, 'webhookUrl');
  }
}
