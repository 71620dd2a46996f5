import { ChannelSet } from './notification-channel';
import { NotificationPriority, NotificationType } from './notification.enums';

/** Input for creating a notification. Omitted fields take their defaults. */
export interface NotificationRequest {
  title: string;
  message: string;
  type?: NotificationType;
  priority?: NotificationPriority;
  category?: string | null;
  channels?: ChannelSet;
  recipientUserId?: string | null;
  recipientEmail?: string | null;
  recipientPhone?: string | null;
  senderUserId?: string | null;
  tenantId?: string | null;
  expiresAt?: Date | null;
  metadata?: Record<string, unknown> | null;
  actionUrl?: string | null;
  imageUrl?: string | null;
}

export interface DueNotificationsSummary {
  processed: number;
  delivered: number;
  failed: number;
}
