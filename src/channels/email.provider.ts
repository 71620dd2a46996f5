/**
 * Email Provider
 * Delivers notifications via SendGrid
 */

import { Injectable, Inject } from '@nestjs/common';
import sgMail from '@sendgrid/mail';
import { LoggerService } from '../../shared/logger/logger.service';
import { NotificationOptions } from '../config/notification-options';
import { Notification } from '../notifications/entities/notification.entity';
import { NotificationChannel } from '../notifications/notification-channel';
import { BaseNotificationProvider } from './base-notification.provider';
import { RecipientContact } from './notification-provider';

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

@Injectable()
export class EmailNotificationProvider extends BaseNotificationProvider {
  readonly channel = NotificationChannel.EMAIL;
  readonly name = 'email';
  readonly priority = 10;

  private readonly configured: boolean;

  constructor(
    @Inject(LoggerService)
    private logger: LoggerService,
    private readonly options: NotificationOptions,
  ) {
    super();
    this.configured = Boolean(options.sendgridApiKey);
    if (options.sendgridApiKey) {
      sgMail.setApiKey(options.sendgridApiKey);
    }
  }

  protected hasRecipient(_notification: Notification, contact: RecipientContact): boolean {
    return this.configured && Boolean(contact.email);
  }

  protected async deliver(notification: Notification, contact: RecipientContact): Promise<string | null> {
    const to = contact.email ?? '';
    this.logger.log(`Sending email to ${to} with subject: ${notification.title}`, 'EmailNotificationProvider');

    try {
      const response = await sgMail.send({
        to,
        from: {
          email: this.options.emailFromAddress,
          name: this.options.emailFromName,
        },
        subject: notification.title,
        text: notification.actionUrl ? `${notification.message}\n\n${notification.actionUrl}` : notification.message,
        html: this.formatHtmlMessage(notification),
      });
      const messageId: unknown = response[0]?.headers?.['x-message-id'];

      this.logger.log(
        `Email sent successfully to ${to}, messageId: ${String(messageId)}`,
        'EmailNotificationProvider',
      );
      return typeof messageId === 'string' ? messageId : null;
    } catch (error: unknown) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      const errorStack = error instanceof Error ? error.stack : undefined;
      this.logger.error(`Email sending failed to ${to}: ${errorMessage}`, errorStack, 'EmailNotificationProvider');
      throw new Error(`Email sending failed: ${errorMessage}`);
    }
  }

  formatHtmlMessage(notification: Notification): string {
    let html = escapeHtml(notification.message).replace(/\n/g, '<br>');

    // {{key}} placeholders are filled from scalar metadata values
    if (notification.metadata) {
      Object.entries(notification.metadata).forEach(([key, value]) => {
        if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
          html = html.split(`{{${key}}}`).join(escapeHtml(String(value)));
        }
      });
    }

    const action = notification.actionUrl
      ? `<p><a href="${escapeHtml(notification.actionUrl)}">View details</a></p>`
      : '';

    return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <style>
    body { font-family: Arial, sans-serif; line-height: 1.6; color: #333; }
    .container { max-width: 600px; margin: 0 auto; padding: 20px; }
  </style>
</head>
<body>
  <div class="container">
    <h2>${escapeHtml(notification.title)}</h2>
    <p>${html}</p>
    ${action}
  </div>
</body>
</html>`;
  }
}
