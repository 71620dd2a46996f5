/**
 * Unit tests for NotificationsService, wired to the real resolver and
 * dispatcher over the in-memory store
 */

import { Test, TestingModule } from '@nestjs/testing';
import { Subscription } from 'rxjs';
import {
  DELIVERY_CANCELLED,
  EXPIRED_BEFORE_DELIVERY,
  NO_DELIVERABLE_CHANNELS,
  NotificationsService,
} from './notifications.service';
import { NotificationRequest } from './notifications.types';
import { NotificationChannel } from './notification-channel';
import { NotificationPriority, NotificationStatus, NotificationType } from './notification.enums';
import { PreferencesService } from '../preferences/preferences.service';
import { DeliveryDispatcher } from '../delivery/delivery-dispatcher.service';
import { DeliveryLogService } from '../delivery/delivery-log.service';
import { ProviderRegistry } from '../delivery/provider-registry';
import { NOTIFICATION_PROVIDERS } from '../channels/notification-provider';
import { NotificationStreamService, StreamEvent } from '../channels/notification-stream.service';
import { NotificationPersistence } from '../persistence/notification-persistence';
import { NotificationOptions } from '../config/notification-options';
import { LoggerService } from '../../shared/logger/logger.service';
import { InMemoryNotificationPersistence } from '../../test/in-memory-notification-persistence';
import { StubProvider, buildOptions, createLoggerMock, failed } from '../../test/test-helpers';

const { IN_APP, EMAIL, PUSH, ALL } = NotificationChannel;
const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

function request(overrides: Partial<NotificationRequest> = {}): NotificationRequest {
  return { title: 'Deploy finished', message: 'Release 1.4.0 is live', recipientUserId: 'user-1', ...overrides };
}

describe('NotificationsService', () => {
  let service: NotificationsService;
  let persistence: InMemoryNotificationPersistence;
  let inApp: StubProvider;
  let email: StubProvider;
  let stream: NotificationStreamService;

  async function createService(overrides: Partial<NotificationOptions> = {}): Promise<NotificationsService> {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        NotificationsService,
        PreferencesService,
        DeliveryDispatcher,
        DeliveryLogService,
        ProviderRegistry,
        { provide: NOTIFICATION_PROVIDERS, useValue: [inApp, email] },
        { provide: NotificationPersistence, useValue: persistence },
        { provide: NotificationStreamService, useValue: stream },
        { provide: NotificationOptions, useValue: buildOptions({ defaultChannels: ALL, ...overrides }) },
        { provide: LoggerService, useValue: createLoggerMock() },
      ],
    }).compile();
    return module.get<NotificationsService>(NotificationsService);
  }

  beforeEach(async () => {
    persistence = new InMemoryNotificationPersistence();
    inApp = new StubProvider(IN_APP, 'in-app');
    email = new StubProvider(EMAIL, 'email');
    stream = new NotificationStreamService();
    service = await createService();
  });

  describe('send', () => {
    it('applies defaults and delivers in-app', async () => {
      const before = Date.now();

      const result = await service.send(request());

      expect(result.success).toBe(true);
      if (!result.success) return;
      const notification = result.data;
      expect(notification.type).toBe(NotificationType.INFO);
      expect(notification.priority).toBe(NotificationPriority.NORMAL);
      expect(notification.channels).toBe(IN_APP);
      expect(notification.status).toBe(NotificationStatus.DELIVERED);
      expect(notification.deliveredAt).toBeInstanceOf(Date);
      expect(notification.deliveryAttempts).toBe(1);
      expect(notification.errorMessage).toBeNull();
      expect(notification.expiresAt?.getTime()).toBeGreaterThanOrEqual(before + 30 * DAY_MS);
      expect(notification.expiresAt?.getTime()).toBeLessThanOrEqual(Date.now() + 30 * DAY_MS);
      expect(inApp.sent).toHaveLength(1);

      const logs = await persistence.deliveryLogs.findByNotification(notification.id);
      expect(logs).toHaveLength(1);
      expect(logs[0]).toEqual(
        expect.objectContaining({ channel: IN_APP, providerName: 'in-app', attemptNumber: 1, isSuccess: true }),
      );
    });

    it('is delivered when one channel succeeds and another fails', async () => {
      email.willReturn(failed('SMTP down'));

      const result = await service.send(
        request({ channels: IN_APP | EMAIL, recipientEmail: 'ada@example.com' }),
      );

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.status).toBe(NotificationStatus.DELIVERED);
      expect(result.data.errorMessage).toBe('email: SMTP down');
      expect(email.contacts[0].email).toBe('ada@example.com');
      const logs = await persistence.deliveryLogs.findByNotification(result.data.id);
      expect(logs.map((log) => [log.channel, log.isSuccess])).toEqual([
        [IN_APP, true],
        [EMAIL, false],
      ]);
    });

    it('stays pending with every failure listed when all channels fail', async () => {
      inApp.willReturn(failed('stream closed'));
      email.willReturn(new Error('boom'));

      const result = await service.send(request({ channels: IN_APP | EMAIL }));

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.status).toBe(NotificationStatus.PENDING);
      expect(result.data.deliveredAt).toBeNull();
      expect(result.data.deliveryAttempts).toBe(2);
      expect(result.data.errorMessage).toBe('in_app: stream closed; email: boom');
    });

    it('invokes no provider when preferences block the notification', async () => {
      await persistence.seedPreference({
        userId: 'user-1',
        enabledChannels: ALL,
        minimumPriority: NotificationPriority.HIGH,
      });

      const result = await service.send(request({ priority: NotificationPriority.NORMAL }));

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.status).toBe(NotificationStatus.PENDING);
      expect(result.data.errorMessage).toBe(NO_DELIVERABLE_CHANNELS);
      expect(inApp.sent).toHaveLength(0);
      expect(await persistence.deliveryLogs.findByNotification(result.data.id)).toEqual([]);
    });

    it('logs a failed attempt when no provider serves the channel', async () => {
      const result = await service.send(request({ channels: PUSH }));

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.errorMessage).toBe('push: No eligible provider for channel push');
      const logs = await persistence.deliveryLogs.findByNotification(result.data.id);
      expect(logs).toHaveLength(1);
      expect(logs[0].providerName).toBeNull();
      expect(logs[0].errorMessage).toBe('No eligible provider for channel push');
    });

    it('records the cancellation without calling providers', async () => {
      const controller = new AbortController();
      controller.abort();

      const result = await service.send(request(), controller.signal);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.errorMessage).toBe(DELIVERY_CANCELLED);
      expect(result.data.deliveryAttempts).toBe(0);
      expect(inApp.sent).toHaveLength(0);
    });

    it('rejects a request without any recipient', async () => {
      const result = await service.send(request({ recipientUserId: null }));

      expect(result).toEqual({
        success: false,
        error: { code: 'VALIDATION_FAILED', message: 'A recipient user id, email or phone is required' },
      });
      expect(persistence.notifications.rows.size).toBe(0);
    });

    it('rejects an over-long title', async () => {
      const result = await service.send(request({ title: 'x'.repeat(201) }));

      expect(result).toEqual({
        success: false,
        error: { code: 'VALIDATION_FAILED', message: 'Title must be at most 200 characters' },
      });
    });

    it('reports storage failures and keeps nothing', async () => {
      jest.spyOn(persistence.deliveryLogs, 'insert').mockRejectedValue(new Error('db down'));

      const result = await service.send(request());

      expect(result).toEqual({
        success: false,
        error: { code: 'PERSISTENCE_FAILED', message: 'Failed to send notification: db down' },
      });
      expect(persistence.notifications.rows.size).toBe(0);
    });
  });

  describe('live stream', () => {
    let events: StreamEvent[];
    let subscription: Subscription;

    beforeEach(() => {
      events = [];
      subscription = stream.createStream('user-1').subscribe((event) => events.push(event));
    });

    afterEach(() => subscription.unsubscribe());

    it('pushes a committed in-app delivery to the recipient', async () => {
      const result = await service.send(request());

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(events.map((event) => [event.type, event.id])).toEqual([
        ['ready', undefined],
        ['notification', result.data.id],
      ]);
    });

    it('pushes nothing when the send is rolled back', async () => {
      const save = persistence.notifications.save.bind(persistence.notifications);
      jest
        .spyOn(persistence.notifications, 'save')
        .mockImplementationOnce(save)
        .mockRejectedValueOnce(new Error('db down'));

      const result = await service.send(request());

      expect(result).toEqual({
        success: false,
        error: { code: 'PERSISTENCE_FAILED', message: 'Failed to send notification: db down' },
      });
      expect(persistence.notifications.rows.size).toBe(0);
      expect(inApp.sent).toHaveLength(1);
      expect(events.map((event) => event.type)).toEqual(['ready']);
    });

    it('pushes nothing when only another channel succeeded', async () => {
      inApp.willReturn(failed('stream closed'));

      const result = await service.send(request({ channels: IN_APP | EMAIL, recipientEmail: 'ada@example.com' }));

      expect(result.success).toBe(true);
      expect(events.map((event) => event.type)).toEqual(['ready']);
    });

    it('pushes a retried delivery once it is committed', async () => {
      inApp.willReturn(failed('offline'));
      const sent = await service.send(request());
      if (!sent.success) throw new Error('send failed');
      inApp.willReturn({ success: true, errorMessage: null, providerResponse: null, durationMs: 1 });

      await service.retryDelivery(sent.data.id);

      expect(events.map((event) => [event.type, event.id])).toEqual([
        ['ready', undefined],
        ['notification', sent.data.id],
      ]);
    });
  });

  describe('sendBatch', () => {
    it('fails without creating anything above the batch limit', async () => {
      service = await createService({ maxBatchSize: 2 });

      const result = await service.sendBatch([request(), request(), request()]);

      expect(result).toEqual({
        success: false,
        error: { code: 'VALIDATION_FAILED', message: 'Batch size 3 exceeds maximum 2' },
      });
      expect(persistence.notifications.rows.size).toBe(0);
    });

    it('returns one notification per request in input order', async () => {
      service = await createService({ batchConcurrency: 2 });
      let calls = 0;
      inApp.willReturn(async () => {
        calls += 1;
        await new Promise((resolve) => setTimeout(resolve, calls === 1 ? 20 : 0));
        return { success: true, errorMessage: null, providerResponse: null, durationMs: 1 };
      });

      const result = await service.sendBatch([
        request({ title: 'first' }),
        request({ title: 'second' }),
        request({ title: 'third' }),
      ]);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.map((notification) => notification.title)).toEqual(['first', 'second', 'third']);
    });

    it('names the first invalid item', async () => {
      const result = await service.sendBatch([request(), request({ message: '' })]);

      expect(result).toEqual({
        success: false,
        error: { code: 'VALIDATION_FAILED', message: 'Invalid notification at index 1: Message is required' },
      });
    });

    it('is refused when batch processing is disabled', async () => {
      service = await createService({ batchProcessingEnabled: false });

      const result = await service.sendBatch([request()]);

      expect(result).toEqual({
        success: false,
        error: { code: 'VALIDATION_FAILED', message: 'Batch processing is not enabled' },
      });
    });
  });

  describe('sendToMultiple', () => {
    it('creates one notification per recipient', async () => {
      const result = await service.sendToMultiple(request({ recipientUserId: null }), ['a', 'b', 'c']);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.map((notification) => notification.recipientUserId)).toEqual(['a', 'b', 'c']);
      expect(new Set(result.data.map((notification) => notification.id)).size).toBe(3);
    });

    it('rejects an empty recipient list', async () => {
      const result = await service.sendToMultiple(request(), []);

      expect(result).toEqual({
        success: false,
        error: { code: 'VALIDATION_FAILED', message: 'At least one recipient user id is required' },
      });
    });
  });

  describe('scheduling', () => {
    it('queues without dispatching', async () => {
      const when = new Date(Date.now() + HOUR_MS);

      const result = await service.schedule(request(), when);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.status).toBe(NotificationStatus.QUEUED);
      expect(result.data.scheduledFor).toEqual(when);
      expect(inApp.sent).toHaveLength(0);
    });

    it('rejects a time in the past', async () => {
      const result = await service.schedule(request(), new Date(Date.now() - HOUR_MS));

      expect(result).toEqual({
        success: false,
        error: { code: 'VALIDATION_FAILED', message: 'Scheduled time must be in the future' },
      });
    });

    it('dispatches a queued notification', async () => {
      const scheduled = await service.schedule(request(), new Date(Date.now() + HOUR_MS));
      if (!scheduled.success) throw new Error('schedule failed');

      const result = await service.dispatchScheduled(scheduled.data.id);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.status).toBe(NotificationStatus.DELIVERED);
      expect(inApp.sent).toHaveLength(1);
    });

    it('moves an expired notification back to pending without sending', async () => {
      const scheduled = await service.schedule(
        request({ expiresAt: new Date(Date.now() + 2 * HOUR_MS) }),
        new Date(Date.now() + HOUR_MS),
      );
      if (!scheduled.success) throw new Error('schedule failed');

      const result = await service.processDueNotifications(new Date(Date.now() + 3 * HOUR_MS));

      expect(result).toEqual({ success: true, data: { processed: 1, delivered: 0, failed: 1 } });
      const stored = persistence.stored(scheduled.data.id);
      expect(stored?.status).toBe(NotificationStatus.PENDING);
      expect(stored?.errorMessage).toBe(EXPIRED_BEFORE_DELIVERY);
      expect(inApp.sent).toHaveLength(0);
    });

    it('starts the default expiry at the scheduled time', async () => {
      const when = new Date(Date.now() + 45 * DAY_MS);

      const scheduled = await service.schedule(request(), when);
      if (!scheduled.success) throw new Error('schedule failed');
      expect(scheduled.data.expiresAt).toEqual(new Date(when.getTime() + 30 * DAY_MS));

      const result = await service.processDueNotifications(new Date(when.getTime() + 1000));

      expect(result).toEqual({ success: true, data: { processed: 1, delivered: 1, failed: 0 } });
      expect(persistence.stored(scheduled.data.id)?.status).toBe(NotificationStatus.DELIVERED);
      expect(inApp.sent).toHaveLength(1);
    });

    it('rejects an expiry at or before the scheduled time', async () => {
      const when = new Date(Date.now() + HOUR_MS);

      const result = await service.schedule(request({ expiresAt: when }), when);

      expect(result).toEqual({
        success: false,
        error: { code: 'VALIDATION_FAILED', message: 'Expiry must be after the scheduled time' },
      });
      expect(persistence.notifications.rows.size).toBe(0);
    });

    it('refuses notifications that are not queued', async () => {
      const sent = await service.send(request());
      if (!sent.success) throw new Error('send failed');

      const result = await service.dispatchScheduled(sent.data.id);

      expect(result).toEqual({
        success: false,
        error: { code: 'INVALID_STATE', message: 'Notification is not queued (status: delivered)' },
      });
    });

    it('processes due notifications and reports the outcome', async () => {
      const when = new Date(Date.now() + HOUR_MS);
      await service.schedule(request(), when);
      await service.schedule(request({ recipientUserId: null, recipientEmail: 'x@example.com', channels: PUSH }), when);

      const result = await service.processDueNotifications(new Date(when.getTime() + HOUR_MS));

      expect(result).toEqual({ success: true, data: { processed: 2, delivered: 1, failed: 1 } });
      const pending = [...persistence.notifications.rows.values()].filter(
        ({ row }) => row.status === NotificationStatus.PENDING,
      );
      expect(pending).toHaveLength(1);
    });

    it('leaves notifications that are not yet due', async () => {
      await service.schedule(request(), new Date(Date.now() + DAY_MS));

      const result = await service.processDueNotifications(new Date(Date.now() + HOUR_MS));

      expect(result).toEqual({ success: true, data: { processed: 0, delivered: 0, failed: 0 } });
    });
  });

  describe('retryDelivery', () => {
    it('re-runs delivery and numbers the attempt per channel', async () => {
      inApp.willReturn(failed('offline'));
      const sent = await service.send(request());
      if (!sent.success) throw new Error('send failed');
      inApp.willReturn({ success: true, errorMessage: null, providerResponse: null, durationMs: 1 });

      const result = await service.retryDelivery(sent.data.id);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.status).toBe(NotificationStatus.DELIVERED);
      expect(result.data.deliveryAttempts).toBe(2);
      const logs = await persistence.deliveryLogs.findByNotification(sent.data.id);
      expect(logs.map((log) => [log.attemptNumber, log.isSuccess])).toEqual([
        [1, false],
        [2, true],
      ]);
    });

    it('refuses a delivered notification', async () => {
      const sent = await service.send(request());
      if (!sent.success) throw new Error('send failed');

      const result = await service.retryDelivery(sent.data.id);

      expect(result).toEqual({
        success: false,
        error: { code: 'INVALID_STATE', message: 'Notification has already been delivered' },
      });
    });

    it('stops at the attempt limit', async () => {
      service = await createService({ maxDeliveryAttempts: 1 });
      inApp.willReturn(failed('offline'));
      const sent = await service.send(request());
      if (!sent.success) throw new Error('send failed');

      const result = await service.retryDelivery(sent.data.id);

      expect(result).toEqual({
        success: false,
        error: { code: 'INVALID_STATE', message: 'Maximum delivery attempts (1) exceeded' },
      });
    });
  });

  describe('read tracking', () => {
    it('marks as read idempotently', async () => {
      const sent = await service.send(request());
      if (!sent.success) throw new Error('send failed');

      const first = await service.markAsRead(sent.data.id);
      const second = await service.markAsRead(sent.data.id);

      expect(first.success && first.data.status).toBe(NotificationStatus.READ);
      expect(second.success && second.data.status).toBe(NotificationStatus.READ);
      expect(second.success && second.data.readAt?.getTime()).toBe(first.success && first.data.readAt?.getTime());
    });

    it('reports a missing notification', async () => {
      expect(await service.markAsRead('missing')).toEqual({
        success: false,
        error: { code: 'NOT_FOUND', message: 'Notification not found' },
      });
    });

    it('counts unread notifications', async () => {
      const ids: string[] = [];
      for (let i = 0; i < 3; i++) {
        const sent = await service.send(request());
        if (sent.success) ids.push(sent.data.id);
      }
      await service.markAsRead(ids[0]);

      expect(await service.getUnreadCount('user-1')).toEqual({ success: true, data: 2 });
    });

    it('marks all unexpired notifications of a user', async () => {
      await service.send(request());
      await service.send(request());
      await service.send(request({ expiresAt: new Date(Date.now() - 1000) }));
      await service.send(request({ recipientUserId: 'user-2' }));

      expect(await service.markAllAsReadForUser('user-1')).toEqual({ success: true, data: 2 });
      expect(await service.getUnreadCount('user-1')).toEqual({ success: true, data: 1 });
      expect(await service.getUnreadCount('user-2')).toEqual({ success: true, data: 1 });
    });

    it('marks a list of ids and counts only the newly read ones', async () => {
      const first = await service.send(request());
      const second = await service.send(request());
      if (!first.success || !second.success) throw new Error('send failed');
      await service.markAsRead(first.data.id);

      expect(await service.markManyAsRead([first.data.id, second.data.id, 'missing'])).toEqual({
        success: true,
        data: 1,
      });
    });

    it('lists unread notifications newest first unless read ones are requested', async () => {
      const older = await service.send(request({ title: 'older' }));
      await service.send(request({ title: 'newer' }));
      if (!older.success) throw new Error('send failed');
      await service.markAsRead(older.data.id);

      const unread = await service.getUserNotifications('user-1');
      const all = await service.getUserNotifications('user-1', true);

      expect(unread.success && unread.data.map((n) => n.title)).toEqual(['newer']);
      expect(all.success && all.data.map((n) => n.title)).toEqual(['newer', 'older']);
    });
  });

  describe('remove', () => {
    it('soft deletes and hides the notification', async () => {
      const sent = await service.send(request());
      if (!sent.success) throw new Error('send failed');

      expect(await service.remove(sent.data.id)).toEqual({ success: true, data: undefined });

      expect(persistence.stored(sent.data.id)?.isDeleted).toBe(true);
      expect(await service.getNotification(sent.data.id)).toEqual({
        success: false,
        error: { code: 'NOT_FOUND', message: 'Notification not found' },
      });
      expect(await service.getUnreadCount('user-1')).toEqual({ success: true, data: 0 });
    });
  });

  describe('getDeliveryLogs', () => {
    it('reports a missing notification', async () => {
      expect(await service.getDeliveryLogs('missing')).toEqual({
        success: false,
        error: { code: 'NOT_FOUND', message: 'Notification not found' },
      });
    });
  });

  describe('cleanupOldNotifications', () => {
    it('does nothing when disabled', async () => {
      await service.send(request());

      expect(await service.cleanupOldNotifications(new Date(Date.now() + 365 * DAY_MS))).toBe(0);
      expect(persistence.notifications.rows.size).toBe(1);
    });

    it('purges delivered rows past the retention window', async () => {
      service = await createService({ cleanupEnabled: true, cleanupAfterDays: 1 });
      await service.send(request());
      inApp.willReturn(failed('offline'));
      await service.send(request());

      expect(await service.cleanupOldNotifications(new Date(Date.now() + 2 * DAY_MS))).toBe(1);
      expect(persistence.notifications.rows.size).toBe(1);
    });
  });
});
