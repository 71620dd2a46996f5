import { Notification } from '../notifications/entities/notification.entity';
import { NotificationChannel, hasChannel } from '../notifications/notification-channel';
import { errorMessageOf } from '../../shared/utils/service-result.util';
import { DeliveryResult, NotificationProvider, RecipientContact } from './notification-provider';

export const MAX_PROVIDER_RESPONSE_LENGTH = 2000;

export function truncate(value: string | null, maxLength: number): string | null {
  if (value === null || value.length <= maxLength) {
    return value;
  }
  return value.slice(0, maxLength);
}

export function metadataString(notification: Notification, key: string): string | null {
  const value = notification.metadata?.[key];
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : null;
}

export function describeBody(data: unknown): string {
  if (data === undefined || data === null || data === '') {
    return '';
  }
  return typeof data === 'string' ? data : JSON.stringify(data);
}

export abstract class BaseNotificationProvider implements NotificationProvider {
  abstract readonly channel: NotificationChannel;
  abstract readonly name: string;
  abstract readonly priority: number;

  canDeliver(notification: Notification, contact: RecipientContact): boolean {
    return hasChannel(notification.channels, this.channel) && this.hasRecipient(notification, contact);
  }

  async send(notification: Notification, contact: RecipientContact): Promise<DeliveryResult> {
    const startedAt = Date.now();
    try {
      const response = await this.deliver(notification, contact);
      return this.success(response, startedAt);
    } catch (error) {
      return this.failure(this.describeError(error), startedAt);
    }
  }

  /** Provider-specific recipient check layered on top of the channel bit. */
  protected abstract hasRecipient(notification: Notification, contact: RecipientContact): boolean;

  /** Performs the send and returns the provider payload to keep; throws on failure. */
  protected abstract deliver(notification: Notification, contact: RecipientContact): Promise<string | null>;

  protected describeError(error: unknown): string {
    return errorMessageOf(error);
  }

  protected success(providerResponse: string | null, startedAt: number): DeliveryResult {
    return {
      success: true,
      errorMessage: null,
      providerResponse: truncate(providerResponse, MAX_PROVIDER_RESPONSE_LENGTH),
      durationMs: Date.now() - startedAt,
    };
  }

  protected failure(errorMessage: string, startedAt: number, providerResponse: string | null = null): DeliveryResult {
    return {
      success: false,
      errorMessage,
      providerResponse: truncate(providerResponse, MAX_PROVIDER_RESPONSE_LENGTH),
      durationMs: Date.now() - startedAt,
    };
  }
}
