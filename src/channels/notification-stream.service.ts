import { Injectable, MessageEvent } from '@nestjs/common';
import { Observable, Subject, defer, interval, merge } from 'rxjs';
import { filter, finalize, map, startWith } from 'rxjs/operators';
import { Notification } from '../notifications/entities/notification.entity';
import { priorityName } from '../notifications/notification.enums';

export const STREAM_KEEP_ALIVE_MS = 25000;

export type StreamEvent = MessageEvent;

export interface NotificationStreamPayload {
  id: string;
  title: string;
  message: string;
  type: string;
  priority: string;
  category: string | null;
  actionUrl: string | null;
  imageUrl: string | null;
  createdAt: string;
}

/**
 * In-process fan-out of in-app notifications to live SSE subscribers.
 */
@Injectable()
export class NotificationStreamService {
  private readonly notificationSubject = new Subject<Notification>();
  private readonly subscribers = new Map<string, number>();

  emit(notification: Notification): void {
    this.notificationSubject.next(notification);
  }

  subscriberCount(userId: string): number {
    return this.subscribers.get(userId) ?? 0;
  }

  createStream(userId: string): Observable<StreamEvent> {
    const notifications = this.notificationSubject.asObservable().pipe(
      filter((notification) => notification.recipientUserId === userId),
      map((notification) => ({
        type: 'notification',
        id: notification.id,
        data: this.toPayload(notification),
      })),
    );

    const keepAlive = interval(STREAM_KEEP_ALIVE_MS).pipe(
      map(() => ({
        type: 'ping',
        data: { ts: Date.now() },
      })),
    );

    return defer(() => {
      this.track(userId, 1);
      return merge(notifications, keepAlive).pipe(
        startWith({
          type: 'ready',
          data: { ok: true },
        }),
      );
    }).pipe(finalize(() => this.track(userId, -1)));
  }

  private track(userId: string, delta: number): void {
    const next = this.subscriberCount(userId) + delta;
    if (next <= 0) {
      this.subscribers.delete(userId);
    } else {
      this.subscribers.set(userId, next);
    }
  }

  private toPayload(notification: Notification): NotificationStreamPayload {
    return {
      id: notification.id,
      title: notification.title,
      message: notification.message,
      type: notification.type,
      priority: priorityName(notification.priority),
      category: notification.category,
      actionUrl: notification.actionUrl,
      imageUrl: notification.imageUrl,
      createdAt: notification.createdAt.toISOString(),
    };
  }
}
