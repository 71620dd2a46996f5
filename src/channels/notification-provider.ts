import { Notification } from '../notifications/entities/notification.entity';
import { NotificationChannel } from '../notifications/notification-channel';

/** Multi-provider token collecting every channel provider. */
export const NOTIFICATION_PROVIDERS = Symbol('NOTIFICATION_PROVIDERS');

export interface PushSubscriptionKeys {
  endpoint: string;
  publicKey: string;
  auth: string;
}

/** Contact data resolved for one recipient from the request and their preferences. */
export interface RecipientContact {
  email: string | null;
  phone: string | null;
  pushSubscription: PushSubscriptionKeys | null;
  webhookUrl: string | null;
}

export interface DeliveryResult {
  success: boolean;
  errorMessage: string | null;
  /** Opaque provider payload, bounded before it is stored. */
  providerResponse: string | null;
  durationMs: number;
}

/**
 * Delivers notifications on exactly one channel. Ordinary delivery failures
 * are returned as a failed result, not thrown.
 */
export interface NotificationProvider {
  readonly channel: NotificationChannel;
  readonly name: string;
  /** Lower runs first among providers of the same channel. */
  readonly priority: number;
  canDeliver(notification: Notification, contact: RecipientContact): boolean;
  send(notification: Notification, contact: RecipientContact): Promise<DeliveryResult>;
}
