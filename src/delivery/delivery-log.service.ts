import { Injectable } from '@nestjs/common';
import { NotificationDeliveryLog } from '../notifications/entities/notification-delivery-log.entity';
import { NotificationChannel } from '../notifications/notification-channel';
import { DeliveryLogRepository } from '../persistence/notification-persistence';
import { DeliveryResult } from '../channels/notification-provider';
import { MAX_PROVIDER_RESPONSE_LENGTH, truncate } from '../channels/base-notification.provider';

export const MAX_LOG_ERROR_LENGTH = 1000;

export interface DeliveryLogEntry {
  notificationId: string;
  channel: NotificationChannel;
  providerName: string | null;
  attemptNumber: number;
  result: DeliveryResult;
}

/**
 * Append-only writer of delivery attempts. Takes the repository of the
 * caller's unit of work so the row commits with the notification.
 */
@Injectable()
export class DeliveryLogService {
  async record(logs: DeliveryLogRepository, entry: DeliveryLogEntry): Promise<NotificationDeliveryLog> {
    const log = new NotificationDeliveryLog();
    log.notificationId = entry.notificationId;
    log.channel = entry.channel;
    log.providerName = entry.providerName;
    log.attemptNumber = entry.attemptNumber;
    log.isSuccess = entry.result.success;
    log.errorMessage = truncate(entry.result.errorMessage, MAX_LOG_ERROR_LENGTH);
    log.providerResponse = truncate(entry.result.providerResponse, MAX_PROVIDER_RESPONSE_LENGTH);
    log.durationMs = Math.max(0, Math.round(entry.result.durationMs));
    return logs.insert(log);
  }

  findByNotification(logs: DeliveryLogRepository, notificationId: string): Promise<NotificationDeliveryLog[]> {
    return logs.findByNotification(notificationId);
  }

  async nextAttemptNumber(logs: DeliveryLogRepository, notificationId: string, channel: NotificationChannel): Promise<number> {
    return (await logs.countByChannel(notificationId, channel)) + 1;
  }
}
