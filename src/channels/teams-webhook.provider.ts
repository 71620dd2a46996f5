/**
 * Teams Webhook Provider
 * Posts notifications to a team-chat incoming webhook as a MessageCard.
 * Runs after the generic webhook provider on the same channel.
 */

import { Injectable, Inject } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { isAxiosError } from 'axios';
import { firstValueFrom } from 'rxjs';
import { LoggerService } from '../../shared/logger/logger.service';
import { NotificationOptions } from '../config/notification-options';
import { Notification } from '../notifications/entities/notification.entity';
import { NotificationChannel } from '../notifications/notification-channel';
import { NotificationType, priorityName } from '../notifications/notification.enums';
import { BaseNotificationProvider, describeBody, metadataString } from './base-notification.provider';

interface MessageCardFact {
  name: string;
  value: string;
}

interface MessageCardAction {
  '@type': 'OpenUri';
  name: string;
  targets: { os: string; uri: string }[];
}

export interface MessageCard {
  '@type': 'MessageCard';
  '@context': string;
  summary: string;
  themeColor: string;
  sections: {
    activityTitle: string;
    activitySubtitle: string;
    activityImage?: string;
    text: string;
    facts: MessageCardFact[];
  }[];
  potentialAction?: MessageCardAction[];
}

const THEME_COLORS: Record<NotificationType, string> = {
  [NotificationType.SUCCESS]: '00FF00',
  [NotificationType.WARNING]: 'FFA500',
  [NotificationType.ERROR]: 'FF0000',
  [NotificationType.ALERT]: 'FF0000',
  [NotificationType.INFO]: '0078D4',
  [NotificationType.SYSTEM]: '808080',
};

@Injectable()
export class TeamsWebhookNotificationProvider extends BaseNotificationProvider {
  readonly channel = NotificationChannel.WEBHOOK;
  readonly name = 'teams-webhook';
  readonly priority = 21;

  constructor(
    private httpService: HttpService,
    @Inject(LoggerService)
    private logger: LoggerService,
    private readonly options: NotificationOptions,
  ) {
    super();
  }

  protected hasRecipient(notification: Notification): boolean {
    return this.targetUrl(notification) !== null;
  }

  protected async deliver(notification: Notification): Promise<string | null> {
    const url = this.targetUrl(notification);
    if (!url) {
      throw new Error('Teams webhook URL not configured');
    }

    const response = await firstValueFrom(
      this.httpService.post(url, this.buildCard(notification), {
        headers: { 'Content-Type': 'application/json' },
        timeout: this.options.webhookTimeoutMs,
      }),
    );

    this.logger.log(
      `[TEAMS] Delivered notification ${notification.id} - Status: ${response.status}`,
      'TeamsWebhookNotificationProvider',
    );
    return describeBody(response.data) || String(response.status);
  }

  buildCard(notification: Notification): MessageCard {
    const facts: MessageCardFact[] = [
      { name: 'Type', value: notification.type },
      { name: 'Priority', value: priorityName(notification.priority) },
    ];
    if (notification.category) {
      facts.push({ name: 'Category', value: notification.category });
    }
    if (notification.recipientUserId) {
      facts.push({ name: 'Recipient', value: notification.recipientUserId });
    }
    facts.push({ name: 'Timestamp', value: notification.createdAt.toISOString() });

    const card: MessageCard = {
      '@type': 'MessageCard',
      '@context': 'https://schema.org/extensions',
      summary: notification.title,
      themeColor: THEME_COLORS[notification.type] ?? THEME_COLORS[NotificationType.INFO],
      sections: [
        {
          activityTitle: notification.title,
          activitySubtitle: `Priority: ${priorityName(notification.priority)}`,
          ...(notification.imageUrl ? { activityImage: notification.imageUrl } : {}),
          text: notification.message,
          facts,
        },
      ],
    };

    if (notification.actionUrl) {
      card.potentialAction = [
        {
          '@type': 'OpenUri',
          name: 'View Details',
          targets: [{ os: 'default', uri: notification.actionUrl }],
        },
      ];
    }
    return card;
  }

  protected describeError(error: unknown): string {
    if (isAxiosError(error) && error.response) {
      return `Teams webhook responded with status ${error.response.status}`;
    }
    return super.describeError(error);
  }

  private targetUrl(notification: Notification): string | null {
    return metadataString(notification, 'teamsWebhookUrl') ?? this.options.teamsWebhookUrl;
  }
}
