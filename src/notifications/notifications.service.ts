/**
 * Notifications Service
 * Creates notifications, runs them through preference resolution and the
 * channel providers, and tracks their read state
 */

import { Injectable, Inject } from '@nestjs/common';
import { from, lastValueFrom } from 'rxjs';
import { mergeMap, toArray } from 'rxjs/operators';
import { LoggerService } from '../../shared/logger/logger.service';
import {
  ServiceFailure,
  ServiceResult,
  ServiceResultUtil,
  errorMessageOf,
  errorStackOf,
} from '../../shared/utils/service-result.util';
import { NotificationOptions } from '../config/notification-options';
import { NotificationPersistence, NotificationUnitOfWork } from '../persistence/notification-persistence';
import { PreferencesService } from '../preferences/preferences.service';
import { DeliveryDispatcher } from '../delivery/delivery-dispatcher.service';
import { truncate } from '../channels/base-notification.provider';
import { NotificationStreamService } from '../channels/notification-stream.service';
import { Notification } from './entities/notification.entity';
import { NotificationDeliveryLog } from './entities/notification-delivery-log.entity';
import {
  ChannelSet,
  NotificationChannel,
  channelName,
  combineChannels,
  formatChannels,
  hasChannel,
  isValidChannelSet,
} from './notification-channel';
import { NotificationPriority, NotificationStatus, NotificationType } from './notification.enums';
import { DueNotificationsSummary, NotificationRequest } from './notifications.types';

export const MAX_TITLE_LENGTH = 200;
export const MAX_MESSAGE_LENGTH = 2000;
export const MAX_ERROR_MESSAGE_LENGTH = 1000;

export const NO_DELIVERABLE_CHANNELS = 'No deliverable channels after applying recipient preferences';
export const DELIVERY_CANCELLED = 'Delivery cancelled before dispatch';
export const EXPIRED_BEFORE_DELIVERY = 'Notification expired before scheduled delivery';
export const OPERATION_CANCELLED = 'Operation cancelled';

const DAY_MS = 24 * 60 * 60 * 1000;

export function validateNotificationRequest(request: NotificationRequest): string | null {
  if (!request.title?.trim()) {
    return 'Title is required';
  }
  if (request.title.length > MAX_TITLE_LENGTH) {
    return `Title must be at most ${MAX_TITLE_LENGTH} characters`;
  }
  if (!request.message?.trim()) {
    return 'Message is required';
  }
  if (request.message.length > MAX_MESSAGE_LENGTH) {
    return `Message must be at most ${MAX_MESSAGE_LENGTH} characters`;
  }
  if (!request.recipientUserId && !request.recipientEmail && !request.recipientPhone) {
    return 'A recipient user id, email or phone is required';
  }
  if (
    request.channels !== undefined &&
    (request.channels === NotificationChannel.NONE || !isValidChannelSet(request.channels))
  ) {
    return 'At least one valid channel is required';
  }
  return null;
}

@Injectable()
export class NotificationsService {
  constructor(
    private readonly persistence: NotificationPersistence,
    private readonly preferences: PreferencesService,
    private readonly dispatcher: DeliveryDispatcher,
    private readonly options: NotificationOptions,
    private readonly stream: NotificationStreamService,
    @Inject(LoggerService)
    private logger: LoggerService,
  ) {}

  /**
   * Creates the notification and dispatches it. Delivery failures are kept on
   * the notification; only validation and storage errors fail the call.
   */
  async send(request: NotificationRequest, signal?: AbortSignal): Promise<ServiceResult<Notification>> {
    const invalid = validateNotificationRequest(request);
    if (invalid) {
      return ServiceResultUtil.failure('VALIDATION_FAILED', invalid);
    }

    try {
      const { notification, succeeded } = await this.persistence.transaction(async (unitOfWork) => {
        const created = await unitOfWork.notifications.save(this.build(request, NotificationStatus.PENDING, null));
        this.logger.log(
          `Sending notification ${created.id} to ${this.describeRecipient(created)} via ${formatChannels(created.channels)}`,
          'NotificationsService',
        );
        const succeeded = await this.deliver(unitOfWork, created, signal);
        return { notification: await unitOfWork.notifications.save(created), succeeded };
      });
      this.publish(notification, succeeded);
      return ServiceResultUtil.success(notification);
    } catch (error: unknown) {
      return this.persistenceFailure('send notification', error);
    }
  }

  async sendBatch(requests: NotificationRequest[], signal?: AbortSignal): Promise<ServiceResult<Notification[]>> {
    if (signal?.aborted) {
      return ServiceResultUtil.failure('CANCELLED', OPERATION_CANCELLED);
    }
    if (!this.options.batchProcessingEnabled) {
      return ServiceResultUtil.failure('VALIDATION_FAILED', 'Batch processing is not enabled');
    }
    if (requests.length > this.options.maxBatchSize) {
      return ServiceResultUtil.failure(
        'VALIDATION_FAILED',
        `Batch size ${requests.length} exceeds maximum ${this.options.maxBatchSize}`,
      );
    }
    for (let index = 0; index < requests.length; index++) {
      const invalid = validateNotificationRequest(requests[index]);
      if (invalid) {
        return ServiceResultUtil.failure('VALIDATION_FAILED', `Invalid notification at index ${index}: ${invalid}`);
      }
    }

    this.logger.log(`Sending batch of ${requests.length} notifications`, 'NotificationsService');

    const settled = await lastValueFrom(
      from(requests.map((request, index) => ({ request, index }))).pipe(
        mergeMap(
          async ({ request, index }) => ({ index, result: await this.send(request, signal) }),
          this.options.batchConcurrency,
        ),
        toArray(),
      ),
    );

    const notifications: Notification[] = [];
    for (const { index, result } of settled.sort((a, b) => a.index - b.index)) {
      if (result.success) {
        notifications.push(result.data);
      } else {
        this.logger.error(
          `Batch item ${index} failed: ${result.error.message}`,
          undefined,
          'NotificationsService',
        );
      }
    }
    return ServiceResultUtil.success(notifications);
  }

  /** One independent notification per user id, sent as a batch. */
  async sendToMultiple(
    request: NotificationRequest,
    userIds: string[],
    signal?: AbortSignal,
  ): Promise<ServiceResult<Notification[]>> {
    if (userIds.length === 0) {
      return ServiceResultUtil.failure('VALIDATION_FAILED', 'At least one recipient user id is required');
    }
    return this.sendBatch(
      userIds.map((recipientUserId) => ({ ...request, recipientUserId })),
      signal,
    );
  }

  /** Stores the notification as queued; the scheduler dispatches it once due. */
  async schedule(request: NotificationRequest, scheduledFor: Date): Promise<ServiceResult<Notification>> {
    const invalid = validateNotificationRequest(request);
    if (invalid) {
      return ServiceResultUtil.failure('VALIDATION_FAILED', invalid);
    }
    if (Number.isNaN(scheduledFor.getTime()) || scheduledFor.getTime() <= Date.now()) {
      return ServiceResultUtil.failure('VALIDATION_FAILED', 'Scheduled time must be in the future');
    }
    if (request.expiresAt && request.expiresAt.getTime() <= scheduledFor.getTime()) {
      return ServiceResultUtil.failure('VALIDATION_FAILED', 'Expiry must be after the scheduled time');
    }

    try {
      const notification = await this.persistence.notifications.save(
        this.build(request, NotificationStatus.QUEUED, scheduledFor),
      );
      this.logger.log(
        `Scheduled notification ${notification.id} for ${scheduledFor.toISOString()}`,
        'NotificationsService',
      );
      return ServiceResultUtil.success(notification);
    } catch (error: unknown) {
      return this.persistenceFailure('schedule notification', error);
    }
  }

  /** Dispatches one queued notification. Expired ones are moved back to pending without sending. */
  async dispatchScheduled(id: string, signal?: AbortSignal): Promise<ServiceResult<Notification>> {
    return this.runScheduled(id, new Date(), signal);
  }

  async processDueNotifications(
    now: Date = new Date(),
    signal?: AbortSignal,
  ): Promise<ServiceResult<DueNotificationsSummary>> {
    if (signal?.aborted) {
      return ServiceResultUtil.failure('CANCELLED', OPERATION_CANCELLED);
    }
    let due: Notification[];
    try {
      due = await this.persistence.notifications.findDueScheduled(now, this.options.schedulerBatchSize);
    } catch (error: unknown) {
      return this.persistenceFailure('load due notifications', error);
    }

    const summary: DueNotificationsSummary = { processed: 0, delivered: 0, failed: 0 };
    for (const notification of due) {
      if (signal?.aborted) {
        break;
      }
      const result = await this.runScheduled(notification.id, now, signal);
      summary.processed += 1;
      if (result.success && result.data.status === NotificationStatus.DELIVERED) {
        summary.delivered += 1;
      } else {
        summary.failed += 1;
      }
    }

    if (summary.processed > 0) {
      this.logger.log(
        `Processed ${summary.processed} due notifications: delivered=${summary.delivered}, failed=${summary.failed}`,
        'NotificationsService',
      );
    }
    return ServiceResultUtil.success(summary);
  }

  /** Re-runs delivery for a pending notification. */
  async retryDelivery(id: string, signal?: AbortSignal): Promise<ServiceResult<Notification>> {
    try {
      const notification = await this.persistence.notifications.findById(id);
      if (!notification) {
        return ServiceResultUtil.failure('NOT_FOUND', 'Notification not found');
      }
      if (notification.status === NotificationStatus.DELIVERED || notification.status === NotificationStatus.READ) {
        return ServiceResultUtil.failure('INVALID_STATE', 'Notification has already been delivered');
      }
      if (notification.status === NotificationStatus.QUEUED) {
        return ServiceResultUtil.failure(
          'INVALID_STATE',
          'Notification is scheduled; it will be dispatched by the scheduler',
        );
      }
      if (notification.deliveryAttempts >= this.options.maxDeliveryAttempts) {
        return ServiceResultUtil.failure(
          'INVALID_STATE',
          `Maximum delivery attempts (${this.options.maxDeliveryAttempts}) exceeded`,
        );
      }

      const { retried, succeeded } = await this.persistence.transaction(async (unitOfWork) => {
        const succeeded = await this.deliver(unitOfWork, notification, signal);
        return { retried: await unitOfWork.notifications.save(notification), succeeded };
      });
      this.publish(retried, succeeded);
      return ServiceResultUtil.success(retried);
    } catch (error: unknown) {
      return this.persistenceFailure(`retry notification ${id}`, error);
    }
  }

  /** Idempotent: an already read notification is returned unchanged. */
  async markAsRead(id: string): Promise<ServiceResult<Notification>> {
    try {
      const notification = await this.persistence.notifications.findById(id);
      if (!notification) {
        return ServiceResultUtil.failure('NOT_FOUND', 'Notification not found');
      }
      if (notification.isRead) {
        return ServiceResultUtil.success(notification);
      }
      this.applyRead(notification, new Date());
      return ServiceResultUtil.success(await this.persistence.notifications.save(notification));
    } catch (error: unknown) {
      return this.persistenceFailure(`mark notification ${id} as read`, error);
    }
  }

  /** Marks every unread, unexpired notification of the user; returns how many changed. */
  async markAllAsReadForUser(userId: string): Promise<ServiceResult<number>> {
    try {
      const now = new Date();
      const unread = await this.persistence.notifications.findUnreadForUser(userId, now);
      unread.forEach((notification) => this.applyRead(notification, now));
      if (unread.length > 0) {
        await this.persistence.notifications.saveMany(unread);
      }
      this.logger.log(`Marked ${unread.length} notifications as read for ${userId}`, 'NotificationsService');
      return ServiceResultUtil.success(unread.length);
    } catch (error: unknown) {
      return this.persistenceFailure(`mark notifications as read for ${userId}`, error);
    }
  }

  async markManyAsRead(ids: string[]): Promise<ServiceResult<number>> {
    try {
      const now = new Date();
      const unread = (await this.persistence.notifications.findByIds(ids)).filter(
        (notification) => !notification.isRead,
      );
      unread.forEach((notification) => this.applyRead(notification, now));
      if (unread.length > 0) {
        await this.persistence.notifications.saveMany(unread);
      }
      return ServiceResultUtil.success(unread.length);
    } catch (error: unknown) {
      return this.persistenceFailure('mark notifications as read', error);
    }
  }

  async getNotification(id: string): Promise<ServiceResult<Notification>> {
    try {
      const notification = await this.persistence.notifications.findById(id);
      return notification
        ? ServiceResultUtil.success(notification)
        : ServiceResultUtil.failure('NOT_FOUND', 'Notification not found');
    } catch (error: unknown) {
      return this.persistenceFailure(`load notification ${id}`, error);
    }
  }

  async getUserNotifications(userId: string, includeRead = false): Promise<ServiceResult<Notification[]>> {
    try {
      return ServiceResultUtil.success(await this.persistence.notifications.findForUser(userId, { includeRead }));
    } catch (error: unknown) {
      return this.persistenceFailure(`load notifications for ${userId}`, error);
    }
  }

  async getUnreadCount(userId: string): Promise<ServiceResult<number>> {
    try {
      return ServiceResultUtil.success(await this.persistence.notifications.countUnread(userId));
    } catch (error: unknown) {
      return this.persistenceFailure(`count unread notifications for ${userId}`, error);
    }
  }

  async getDeliveryLogs(id: string): Promise<ServiceResult<NotificationDeliveryLog[]>> {
    try {
      const notification = await this.persistence.notifications.findById(id);
      if (!notification) {
        return ServiceResultUtil.failure('NOT_FOUND', 'Notification not found');
      }
      return ServiceResultUtil.success(await this.persistence.deliveryLogs.findByNotification(id));
    } catch (error: unknown) {
      return this.persistenceFailure(`load delivery logs for ${id}`, error);
    }
  }

  /** Soft delete; the row is purged later by the cleanup job. */
  async remove(id: string): Promise<ServiceResult<void>> {
    try {
      const notification = await this.persistence.notifications.findById(id);
      if (!notification) {
        return ServiceResultUtil.failure('NOT_FOUND', 'Notification not found');
      }
      notification.isDeleted = true;
      notification.deletedAt = new Date();
      await this.persistence.notifications.save(notification);
      this.logger.log(`Deleted notification ${id}`, 'NotificationsService');
      return ServiceResultUtil.success(undefined);
    } catch (error: unknown) {
      return this.persistenceFailure(`delete notification ${id}`, error);
    }
  }

  /** Purges settled and deleted rows past the retention window; 0 when disabled or on failure. */
  async cleanupOldNotifications(now: Date = new Date()): Promise<number> {
    if (!this.options.cleanupEnabled) {
      return 0;
    }
    const cutoff = new Date(now.getTime() - this.options.cleanupAfterDays * DAY_MS);
    try {
      const purged = await this.persistence.notifications.purge(cutoff);
      this.logger.log(
        `Purged ${purged} notifications older than ${cutoff.toISOString()}`,
        'NotificationsService',
      );
      return purged;
    } catch (error: unknown) {
      this.logger.error(
        `Notification cleanup failed: ${errorMessageOf(error)}`,
        errorStackOf(error),
        'NotificationsService',
      );
      return 0;
    }
  }

  private async runScheduled(id: string, now: Date, signal?: AbortSignal): Promise<ServiceResult<Notification>> {
    try {
      const notification = await this.persistence.notifications.findById(id);
      if (!notification) {
        return ServiceResultUtil.failure('NOT_FOUND', 'Notification not found');
      }
      if (notification.status !== NotificationStatus.QUEUED) {
        return ServiceResultUtil.failure(
          'INVALID_STATE',
          `Notification is not queued (status: ${notification.status})`,
        );
      }

      if (notification.expiresAt && notification.expiresAt.getTime() <= now.getTime()) {
        notification.status = NotificationStatus.PENDING;
        notification.errorMessage = EXPIRED_BEFORE_DELIVERY;
        this.logger.warn(`Scheduled notification ${id} expired before delivery`, 'NotificationsService');
        return ServiceResultUtil.success(await this.persistence.notifications.save(notification));
      }

      const { dispatched, succeeded } = await this.persistence.transaction(async (unitOfWork) => {
        const succeeded = await this.deliver(unitOfWork, notification, signal);
        if (succeeded === NotificationChannel.NONE) {
          notification.status = NotificationStatus.PENDING;
        }
        return { dispatched: await unitOfWork.notifications.save(notification), succeeded };
      });
      this.publish(dispatched, succeeded);
      return ServiceResultUtil.success(dispatched);
    } catch (error: unknown) {
      return this.persistenceFailure(`dispatch scheduled notification ${id}`, error);
    }
  }

  /**
   * Resolves the delivery plan, runs the providers and folds the outcome
   * into the notification. Does not save the notification itself.
   * Returns the channels that succeeded.
   */
  private async deliver(
    unitOfWork: NotificationUnitOfWork,
    notification: Notification,
    signal?: AbortSignal,
  ): Promise<ChannelSet> {
    const plan = await this.preferences.resolveDelivery(
      {
        recipientUserId: notification.recipientUserId,
        recipientEmail: notification.recipientEmail,
        recipientPhone: notification.recipientPhone,
        category: notification.category,
        channels: notification.channels,
        priority: notification.priority,
      },
      unitOfWork.preferences,
    );

    if (plan.channels === NotificationChannel.NONE) {
      notification.errorMessage = NO_DELIVERABLE_CHANNELS;
      this.logger.log(`Notification ${notification.id} has no deliverable channels`, 'NotificationsService');
      return NotificationChannel.NONE;
    }

    const outcome = await this.dispatcher.dispatch(
      notification,
      plan.channels,
      plan.contact,
      unitOfWork.deliveryLogs,
      signal,
    );
    if (outcome.cancelled) {
      notification.errorMessage = DELIVERY_CANCELLED;
      return NotificationChannel.NONE;
    }

    notification.deliveryAttempts += outcome.attempts.length;
    const failures = outcome.attempts
      .filter((attempt) => !attempt.result.success)
      .map((attempt) => `${channelName(attempt.channel)}: ${attempt.result.errorMessage ?? 'Unknown error'}`);
    const succeeded = combineChannels(
      ...outcome.attempts.filter((attempt) => attempt.result.success).map((attempt) => attempt.channel),
    );
    const delivered = succeeded !== NotificationChannel.NONE;

    notification.errorMessage = truncate(failures.length > 0 ? failures.join('; ') : null, MAX_ERROR_MESSAGE_LENGTH);
    if (delivered) {
      notification.status = NotificationStatus.DELIVERED;
      notification.deliveredAt = new Date();
    }

    this.logger.log(
      `Notification ${notification.id} ${delivered ? 'delivered' : 'not delivered'} (${outcome.attempts.length - failures.length}/${outcome.attempts.length} channels succeeded)`,
      'NotificationsService',
    );
    return succeeded;
  }

  /** Live in-app push, only once the delivery has been committed. */
  private publish(notification: Notification, succeeded: ChannelSet): void {
    if (hasChannel(succeeded, NotificationChannel.IN_APP)) {
      this.stream.emit(notification);
    }
  }

  private build(request: NotificationRequest, status: NotificationStatus, scheduledFor: Date | null): Notification {
    const notification = new Notification();
    notification.title = request.title.trim();
    notification.message = request.message;
    notification.type = request.type ?? NotificationType.INFO;
    notification.priority = request.priority ?? NotificationPriority.NORMAL;
    notification.category = request.category ?? null;
    notification.channels = request.channels ?? NotificationChannel.IN_APP;
    notification.recipientUserId = request.recipientUserId ?? null;
    notification.recipientEmail = request.recipientEmail ?? null;
    notification.recipientPhone = request.recipientPhone ?? null;
    notification.senderUserId = request.senderUserId ?? null;
    notification.tenantId = request.tenantId ?? null;
    notification.status = status;
    notification.scheduledFor = scheduledFor;
    notification.deliveredAt = null;
    notification.readAt = null;
    // A scheduled notification's lifetime starts when it becomes due
    const lifetimeStart = scheduledFor?.getTime() ?? Date.now();
    notification.expiresAt =
      request.expiresAt ?? new Date(lifetimeStart + this.options.defaultExpirationDays * DAY_MS);
    notification.deliveryAttempts = 0;
    notification.errorMessage = null;
    notification.metadata = request.metadata ?? null;
    notification.actionUrl = request.actionUrl ?? null;
    notification.imageUrl = request.imageUrl ?? null;
    notification.isDeleted = false;
    notification.deletedAt = null;
    return notification;
  }

  private applyRead(notification: Notification, now: Date): void {
    notification.readAt = now;
    notification.status = NotificationStatus.READ;
  }

  private describeRecipient(notification: Notification): string {
    return notification.recipientUserId ?? notification.recipientEmail ?? notification.recipientPhone ?? 'unknown';
  }

  private persistenceFailure(action: string, error: unknown): ServiceFailure {
    const message = errorMessageOf(error);
    this.logger.error(`Failed to ${action}: ${message}`, errorStackOf(error), 'NotificationsService');
    return ServiceResultUtil.failure('PERSISTENCE_FAILED', `Failed to ${action}: ${message}`);
  }
}
