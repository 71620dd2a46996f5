import { LoggerService } from '../shared/logger/logger.service';
import { NotificationOptions } from '../src/config/notification-options';
import { NotificationChannel } from '../src/notifications/notification-channel';
import { Notification } from '../src/notifications/entities/notification.entity';
import { NotificationPriority, NotificationStatus, NotificationType } from '../src/notifications/notification.enums';
import {
  DeliveryResult,
  NotificationProvider,
  RecipientContact,
} from '../src/channels/notification-provider';

export type LoggerMock = jest.Mocked<Pick<LoggerService, 'log' | 'error' | 'warn' | 'debug' | 'verbose'>>;

export function createLoggerMock(): LoggerMock {
  return {
    log: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
    verbose: jest.fn(),
  };
}

export function buildOptions(overrides: Partial<NotificationOptions> = {}): NotificationOptions {
  return Object.assign(new NotificationOptions(), overrides);
}

export function emptyContact(overrides: Partial<RecipientContact> = {}): RecipientContact {
  return { email: null, phone: null, pushSubscription: null, webhookUrl: null, ...overrides };
}

export function buildNotification(overrides: Partial<Notification> = {}): Notification {
  return Object.assign(new Notification(), {
    id: 'notification-1',
    title: 'Build finished',
    message: 'Your build completed',
    type: NotificationType.INFO,
    priority: NotificationPriority.NORMAL,
    category: null,
    channels: NotificationChannel.IN_APP,
    recipientUserId: 'user-1',
    recipientEmail: null,
    recipientPhone: null,
    senderUserId: null,
    tenantId: null,
    status: NotificationStatus.PENDING,
    scheduledFor: null,
    deliveredAt: null,
    readAt: null,
    expiresAt: null,
    deliveryAttempts: 0,
    errorMessage: null,
    metadata: null,
    actionUrl: null,
    imageUrl: null,
    isDeleted: false,
    deletedAt: null,
    createdAt: new Date('2026-01-01T00:00:00.000Z'),
    updatedAt: new Date('2026-01-01T00:00:00.000Z'),
    ...overrides,
  });
}

type SendBehaviour = DeliveryResult | Error | ((notification: Notification) => Promise<DeliveryResult>);

/** Scriptable provider recording every call it receives. */
export class StubProvider implements NotificationProvider {
  readonly sent: Notification[] = [];
  readonly contacts: RecipientContact[] = [];
  eligible = true;

  constructor(
    readonly channel: NotificationChannel,
    readonly name: string,
    readonly priority = 10,
    private behaviour: SendBehaviour = { success: true, errorMessage: null, providerResponse: 'ok', durationMs: 1 },
  ) {}

  willReturn(behaviour: SendBehaviour): this {
    this.behaviour = behaviour;
    return this;
  }

  canDeliver(): boolean {
    return this.eligible;
  }

  async send(notification: Notification, contact: RecipientContact): Promise<DeliveryResult> {
    this.sent.push(notification);
    this.contacts.push(contact);
    const behaviour = this.behaviour;
    if (behaviour instanceof Error) {
      throw behaviour;
    }
    if (typeof behaviour === 'function') {
      return behaviour(notification);
    }
    return behaviour;
  }
}

export function failed(errorMessage: string): DeliveryResult {
  return { success: false, errorMessage, providerResponse: null, durationMs: 1 };
}
