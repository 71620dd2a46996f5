import { Inject, Injectable } from '@nestjs/common';
import { LoggerService } from '../../shared/logger/logger.service';
import { NotificationOptions } from '../config/notification-options';
import { NotificationChannel, channelName } from '../notifications/notification-channel';
import { NOTIFICATION_PROVIDERS, NotificationProvider } from '../channels/notification-provider';

/** Providers enabled at startup, grouped by channel in ascending priority. */
@Injectable()
export class ProviderRegistry {
  private readonly providers: readonly NotificationProvider[];

  constructor(
    @Inject(NOTIFICATION_PROVIDERS)
    registered: NotificationProvider[],
    options: NotificationOptions,
    @Inject(LoggerService)
    private logger: LoggerService,
  ) {
    const disabled = new Set(options.disabledProviders);
    this.providers = registered
      .filter((provider) => !disabled.has(provider.name))
      .sort((a, b) => a.priority - b.priority);

    for (const name of disabled) {
      if (!registered.some((provider) => provider.name === name)) {
        this.logger.warn(`Unknown provider "${name}" in disabled providers`, 'ProviderRegistry');
      }
    }
    this.logger.log(
      `Registered providers: ${this.providers.map((p) => `${p.name}(${channelName(p.channel)})`).join(', ') || 'none'}`,
      'ProviderRegistry',
    );
  }

  forChannel(channel: NotificationChannel): NotificationProvider[] {
    return this.providers.filter((provider) => provider.channel === channel);
  }

  all(): readonly NotificationProvider[] {
    return this.providers;
  }
}
