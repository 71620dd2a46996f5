/**
 * Persistence contract consumed by the dispatch engine.
 * Every read on notifications excludes soft-deleted rows.
 */

import { Notification } from '../notifications/entities/notification.entity';
import { NotificationDeliveryLog } from '../notifications/entities/notification-delivery-log.entity';
import { NotificationPreference } from '../preferences/entities/notification-preference.entity';
import { NotificationChannel } from '../notifications/notification-channel';

export interface UserNotificationQuery {
  includeRead: boolean;
}

export interface NotificationRepository {
  findById(id: string): Promise<Notification | null>;
  findByIds(ids: string[]): Promise<Notification[]>;
  /** Newest first. */
  findForUser(userId: string, query: UserNotificationQuery): Promise<Notification[]>;
  /** Unread and not expired at `now`. */
  findUnreadForUser(userId: string, now: Date): Promise<Notification[]>;
  countUnread(userId: string): Promise<number>;
  /** Queued notifications whose scheduled time has passed, oldest schedule first. */
  findDueScheduled(now: Date, limit: number): Promise<Notification[]>;
  save(notification: Notification): Promise<Notification>;
  saveMany(notifications: Notification[]): Promise<Notification[]>;
  /**
   * Physically removes delivered/read notifications created before the cutoff
   * and soft-deleted ones deleted before it. Returns the number removed.
   */
  purge(cutoff: Date): Promise<number>;
}

export interface DeliveryLogRepository {
  insert(log: NotificationDeliveryLog): Promise<NotificationDeliveryLog>;
  findByNotification(notificationId: string): Promise<NotificationDeliveryLog[]>;
  countByChannel(notificationId: string, channel: NotificationChannel): Promise<number>;
}

/** Thrown by `PreferenceRepository.save` when the user already has a row for the category. */
export class DuplicatePreferenceError extends Error {
  constructor(userId: string, category: string | null) {
    super(`Preference for ${userId} (${category ?? 'default'}) already exists`);
    this.name = 'DuplicatePreferenceError';
  }
}

export interface PreferenceRepository {
  findOne(userId: string, category: string | null): Promise<NotificationPreference | null>;
  findAllForUser(userId: string): Promise<NotificationPreference[]>;
  /** Rejects with `DuplicatePreferenceError` when inserting a second row for (user, category). */
  save(preference: NotificationPreference): Promise<NotificationPreference>;
}

export interface NotificationUnitOfWork {
  readonly notifications: NotificationRepository;
  readonly deliveryLogs: DeliveryLogRepository;
  readonly preferences: PreferenceRepository;
}

/**
 * Injection token and base type for the store. `transaction` hands `work` a
 * view of the repositories whose writes commit or roll back together.
 */
export abstract class NotificationPersistence implements NotificationUnitOfWork {
  abstract readonly notifications: NotificationRepository;
  abstract readonly deliveryLogs: DeliveryLogRepository;
  abstract readonly preferences: PreferenceRepository;

  abstract transaction<T>(work: (unitOfWork: NotificationUnitOfWork) => Promise<T>): Promise<T>;
}
