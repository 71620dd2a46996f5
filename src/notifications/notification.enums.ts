export enum NotificationType {
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error',
  SUCCESS = 'success',
  ALERT = 'alert',
  SYSTEM = 'system',
}

/** Ordered; compared numerically against a preference's minimum priority. */
export enum NotificationPriority {
  LOW = 0,
  NORMAL = 1,
  HIGH = 2,
  CRITICAL = 3,
}

export enum NotificationStatus {
  PENDING = 'pending',
  QUEUED = 'queued',
  DELIVERED = 'delivered',
  READ = 'read',
}

export type PriorityName = 'low' | 'normal' | 'high' | 'critical';

export const PRIORITY_NAMES: readonly PriorityName[] = ['low', 'normal', 'high', 'critical'];

const PRIORITY_BY_NAME: Record<PriorityName, NotificationPriority> = {
  low: NotificationPriority.LOW,
  normal: NotificationPriority.NORMAL,
  high: NotificationPriority.HIGH,
  critical: NotificationPriority.CRITICAL,
};

export function priorityFromName(name: PriorityName): NotificationPriority {
  return PRIORITY_BY_NAME[name];
}

export function priorityName(priority: NotificationPriority): PriorityName {
  return PRIORITY_NAMES[priority] ?? 'normal';
}
