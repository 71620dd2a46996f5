import { Notification } from './entities/notification.entity';
import { NotificationDeliveryLog } from './entities/notification-delivery-log.entity';
import { channelName, listChannels } from './notification-channel';
import { NotificationStatus, NotificationType, PriorityName, priorityName } from './notification.enums';

/** JSON shape of a notification on the HTTP surface: channels and priority by name. */
export interface NotificationView {
  id: string;
  title: string;
  message: string;
  type: NotificationType;
  priority: PriorityName;
  category: string | null;
  channels: string[];
  recipientUserId: string | null;
  recipientEmail: string | null;
  recipientPhone: string | null;
  senderUserId: string | null;
  tenantId: string | null;
  status: NotificationStatus;
  isRead: boolean;
  scheduledFor: string | null;
  deliveredAt: string | null;
  readAt: string | null;
  expiresAt: string | null;
  deliveryAttempts: number;
  errorMessage: string | null;
  metadata: Record<string, unknown> | null;
  actionUrl: string | null;
  imageUrl: string | null;
  createdAt: string;
}

export interface DeliveryLogView {
  channel: string;
  providerName: string | null;
  attemptNumber: number;
  isSuccess: boolean;
  errorMessage: string | null;
  providerResponse: string | null;
  durationMs: number;
  createdAt: string;
}

function iso(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}

export function toNotificationView(notification: Notification): NotificationView {
  return {
    id: notification.id,
    title: notification.title,
    message: notification.message,
    type: notification.type,
    priority: priorityName(notification.priority),
    category: notification.category,
    channels: listChannels(notification.channels).map(channelName),
    recipientUserId: notification.recipientUserId,
    recipientEmail: notification.recipientEmail,
    recipientPhone: notification.recipientPhone,
    senderUserId: notification.senderUserId,
    tenantId: notification.tenantId,
    status: notification.status,
    isRead: notification.isRead,
    scheduledFor: iso(notification.scheduledFor),
    deliveredAt: iso(notification.deliveredAt),
    readAt: iso(notification.readAt),
    expiresAt: iso(notification.expiresAt),
    deliveryAttempts: notification.deliveryAttempts,
    errorMessage: notification.errorMessage,
    metadata: notification.metadata,
    actionUrl: notification.actionUrl,
    imageUrl: notification.imageUrl,
    createdAt: notification.createdAt.toISOString(),
  };
}

export function toDeliveryLogView(log: NotificationDeliveryLog): DeliveryLogView {
  return {
    channel: channelName(log.channel),
    providerName: log.providerName,
    attemptNumber: log.attemptNumber,
    isSuccess: log.isSuccess,
    errorMessage: log.errorMessage,
    providerResponse: log.providerResponse,
    durationMs: log.durationMs,
    createdAt: log.createdAt.toISOString(),
  };
}
