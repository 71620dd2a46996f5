/**
 * Delivery Dispatcher
 * Runs the providers of each effective channel and records one log row per attempt
 */

import { Inject, Injectable } from '@nestjs/common';
import { firstValueFrom, from, throwError } from 'rxjs';
import { timeout } from 'rxjs/operators';
import { LoggerService } from '../../shared/logger/logger.service';
import { errorMessageOf } from '../../shared/utils/service-result.util';
import { NotificationOptions } from '../config/notification-options';
import { Notification } from '../notifications/entities/notification.entity';
import { ChannelSet, NotificationChannel, channelName, listChannels } from '../notifications/notification-channel';
import { DeliveryLogRepository } from '../persistence/notification-persistence';
import { DeliveryResult, NotificationProvider, RecipientContact } from '../channels/notification-provider';
import { DeliveryLogService } from './delivery-log.service';
import { ProviderRegistry } from './provider-registry';

export interface ChannelAttempt {
  channel: NotificationChannel;
  providerName: string | null;
  attemptNumber: number;
  result: DeliveryResult;
}

export interface DispatchOutcome {
  attempts: ChannelAttempt[];
  /** True when the signal was aborted before any channel started. */
  cancelled: boolean;
}

@Injectable()
export class DeliveryDispatcher {
  constructor(
    private readonly registry: ProviderRegistry,
    private readonly deliveryLogs: DeliveryLogService,
    private readonly options: NotificationOptions,
    @Inject(LoggerService)
    private logger: LoggerService,
  ) {}

  async dispatch(
    notification: Notification,
    channels: ChannelSet,
    contact: RecipientContact,
    logs: DeliveryLogRepository,
    signal?: AbortSignal,
  ): Promise<DispatchOutcome> {
    if (signal?.aborted) {
      this.logger.warn(`Dispatch of ${notification.id} cancelled before start`, 'DeliveryDispatcher');
      return { attempts: [], cancelled: true };
    }

    // Channels are independent; once started, each attempt runs to completion and is logged.
    const attempts = await Promise.all(
      listChannels(channels).map((channel) => this.dispatchChannel(notification, channel, contact, logs)),
    );
    return { attempts, cancelled: false };
  }

  private async dispatchChannel(
    notification: Notification,
    channel: NotificationChannel,
    contact: RecipientContact,
    logs: DeliveryLogRepository,
  ): Promise<ChannelAttempt> {
    const provider = this.selectProvider(notification, channel, contact);
    const attemptNumber = await this.deliveryLogs.nextAttemptNumber(logs, notification.id, channel);

    const result: DeliveryResult = provider
      ? await this.invoke(provider, notification, contact)
      : {
          success: false,
          errorMessage: `No eligible provider for channel ${channelName(channel)}`,
          providerResponse: null,
          durationMs: 0,
        };

    const attempt: ChannelAttempt = {
      channel,
      providerName: provider?.name ?? null,
      attemptNumber,
      result,
    };
    await this.deliveryLogs.record(logs, { notificationId: notification.id, ...attempt });

    if (result.success) {
      this.logger.debug(
        `Delivered ${notification.id} on ${channelName(channel)} via ${attempt.providerName} (attempt ${attemptNumber}, ${result.durationMs}ms)`,
        'DeliveryDispatcher',
      );
    } else {
      this.logger.warn(
        `Delivery of ${notification.id} on ${channelName(channel)} failed (attempt ${attemptNumber}): ${result.errorMessage}`,
        'DeliveryDispatcher',
      );
    }
    return attempt;
  }

  private selectProvider(
    notification: Notification,
    channel: NotificationChannel,
    contact: RecipientContact,
  ): NotificationProvider | null {
    for (const provider of this.registry.forChannel(channel)) {
      try {
        if (provider.canDeliver(notification, contact)) {
          return provider;
        }
      } catch (error) {
        this.logger.warn(
          `Provider ${provider.name} failed its eligibility check: ${errorMessageOf(error)}`,
          'DeliveryDispatcher',
        );
      }
    }
    return null;
  }

  private async invoke(
    provider: NotificationProvider,
    notification: Notification,
    contact: RecipientContact,
  ): Promise<DeliveryResult> {
    const startedAt = Date.now();
    const limit = this.options.providerTimeoutMs;
    try {
      return await firstValueFrom(
        from(provider.send(notification, contact)).pipe(
          timeout({
            first: limit,
            with: () => throwError(() => new Error(`Provider ${provider.name} timed out after ${limit}ms`)),
          }),
        ),
      );
    } catch (error) {
      this.logger.error(
        `Provider ${provider.name} threw while sending ${notification.id}: ${errorMessageOf(error)}`,
        error instanceof Error ? error.stack : undefined,
        'DeliveryDispatcher',
      );
      return {
        success: false,
        errorMessage: errorMessageOf(error),
        providerResponse: null,
        durationMs: Date.now() - startedAt,
      };
    }
  }
}
