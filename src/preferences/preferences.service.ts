/**
 * Preferences Service
 * Stores per-user delivery preferences and resolves the channels a notification may use
 */

import { Inject, Injectable } from '@nestjs/common';
import { LoggerService } from '../../shared/logger/logger.service';
import {
  ServiceFailure,
  ServiceResult,
  ServiceResultUtil,
  errorMessageOf,
  errorStackOf,
} from '../../shared/utils/service-result.util';
import { NotificationOptions } from '../config/notification-options';
import {
  ChannelSet,
  NotificationChannel,
  formatChannels,
  hasChannel,
  intersectChannels,
  isValidChannelSet,
  withChannel,
  withoutChannel,
} from '../notifications/notification-channel';
import { NotificationPriority } from '../notifications/notification.enums';
import {
  DuplicatePreferenceError,
  NotificationPersistence,
  PreferenceRepository,
} from '../persistence/notification-persistence';
import { PushSubscriptionKeys, RecipientContact } from '../channels/notification-provider';
import { NotificationPreference } from './entities/notification-preference.entity';

export interface PreferenceUpdate {
  userId: string;
  category?: string | null;
  tenantId?: string | null;
  enabledChannels?: ChannelSet;
  isEnabled?: boolean;
  minimumPriority?: NotificationPriority;
  email?: string | null;
  phone?: string | null;
  webhookUrl?: string | null;
}

/** What the resolver needs to know about a notification. */
export interface DeliveryTarget {
  recipientUserId: string | null;
  recipientEmail: string | null;
  recipientPhone: string | null;
  category: string | null;
  channels: ChannelSet;
  priority: NotificationPriority;
}

export interface DeliveryPlan {
  channels: ChannelSet;
  contact: RecipientContact;
}

function pushSubscriptionOf(preference: NotificationPreference | null): PushSubscriptionKeys | null {
  if (!preference?.pushEndpoint || !preference.pushPublicKey || !preference.pushAuth) {
    return null;
  }
  return { endpoint: preference.pushEndpoint, publicKey: preference.pushPublicKey, auth: preference.pushAuth };
}

@Injectable()
export class PreferencesService {
  constructor(
    private readonly persistence: NotificationPersistence,
    private readonly options: NotificationOptions,
    @Inject(LoggerService)
    private logger: LoggerService,
  ) {}

  /**
   * Preference governing (userId, category): the category row, else the
   * default row, else an unsaved default built from configuration.
   */
  async getPreference(userId: string, category: string | null = null): Promise<ServiceResult<NotificationPreference>> {
    try {
      return ServiceResultUtil.success(await this.governingPreference(this.persistence.preferences, userId, category));
    } catch (error) {
      return this.persistenceFailure(`load preference for ${userId}`, error);
    }
  }

  async getAllPreferences(userId: string): Promise<ServiceResult<NotificationPreference[]>> {
    try {
      return ServiceResultUtil.success(await this.persistence.preferences.findAllForUser(userId));
    } catch (error) {
      return this.persistenceFailure(`load preferences for ${userId}`, error);
    }
  }

  /** Upsert that only touches the fields present on the update. */
  async updatePreference(update: PreferenceUpdate): Promise<ServiceResult<NotificationPreference>> {
    if (!update.userId?.trim()) {
      return ServiceResultUtil.failure('VALIDATION_FAILED', 'User id is required');
    }
    if (update.enabledChannels !== undefined && !isValidChannelSet(update.enabledChannels)) {
      return ServiceResultUtil.failure('VALIDATION_FAILED', `Invalid channel set: ${update.enabledChannels}`);
    }

    return this.upsert(update.userId, update.category ?? null, (preference) => {
      if (update.tenantId !== undefined) preference.tenantId = update.tenantId;
      if (update.enabledChannels !== undefined) preference.enabledChannels = update.enabledChannels;
      if (update.isEnabled !== undefined) preference.isEnabled = update.isEnabled;
      if (update.minimumPriority !== undefined) preference.minimumPriority = update.minimumPriority;
      if (update.email !== undefined) preference.email = update.email;
      if (update.phone !== undefined) preference.phone = update.phone;
      if (update.webhookUrl !== undefined) preference.webhookUrl = update.webhookUrl;
    });
  }

  async setEnabledChannels(
    userId: string,
    channels: ChannelSet,
    category: string | null = null,
  ): Promise<ServiceResult<NotificationPreference>> {
    if (!isValidChannelSet(channels)) {
      return ServiceResultUtil.failure('VALIDATION_FAILED', `Invalid channel set: ${channels}`);
    }
    return this.upsert(userId, category, (preference) => {
      preference.enabledChannels = channels;
    });
  }

  async registerPushSubscription(
    userId: string,
    subscription: PushSubscriptionKeys,
    category: string | null = null,
  ): Promise<ServiceResult<NotificationPreference>> {
    if (!subscription.endpoint || !subscription.publicKey || !subscription.auth) {
      return ServiceResultUtil.failure('VALIDATION_FAILED', 'Push subscription requires endpoint, public key and auth');
    }
    return this.upsert(userId, category, (preference) => {
      preference.pushEndpoint = subscription.endpoint;
      preference.pushPublicKey = subscription.publicKey;
      preference.pushAuth = subscription.auth;
      preference.enabledChannels = withChannel(preference.enabledChannels, NotificationChannel.PUSH);
    });
  }

  /** Clears the subscription and the push bit; succeeds with null when there is no preference row. */
  async removePushSubscription(
    userId: string,
    category: string | null = null,
  ): Promise<ServiceResult<NotificationPreference | null>> {
    try {
      const preference = await this.persistence.preferences.findOne(userId, category);
      if (!preference) {
        return ServiceResultUtil.success(null);
      }
      preference.pushEndpoint = null;
      preference.pushPublicKey = null;
      preference.pushAuth = null;
      preference.enabledChannels = withoutChannel(preference.enabledChannels, NotificationChannel.PUSH);
      const saved = await this.persistence.preferences.save(preference);
      this.logger.log(`Removed push subscription for ${userId}`, 'PreferencesService');
      return ServiceResultUtil.success(saved);
    } catch (error) {
      return this.persistenceFailure(`remove push subscription for ${userId}`, error);
    }
  }

  /** Checks one channel against the user's default preference. Rejects on storage failure. */
  async isChannelEnabled(userId: string, channel: NotificationChannel): Promise<boolean> {
    const preference = await this.governingPreference(this.persistence.preferences, userId, null);
    return preference.isEnabled && hasChannel(preference.enabledChannels, channel);
  }

  /**
   * Requested channels narrowed by the governing preference. NONE when the
   * preference is switched off or the priority is below its floor.
   * Rejects on storage failure.
   */
  async getEffectiveChannels(
    userId: string,
    requestedChannels: ChannelSet,
    priority: NotificationPriority,
    category: string | null = null,
    preferences: PreferenceRepository = this.persistence.preferences,
  ): Promise<ChannelSet> {
    const preference = await this.governingPreference(preferences, userId, category);
    return this.narrow(preference, requestedChannels, priority);
  }

  /**
   * Effective channels plus contact data. Request fields win over the
   * category preference, which wins over the default preference.
   */
  async resolveDelivery(
    target: DeliveryTarget,
    preferences: PreferenceRepository = this.persistence.preferences,
  ): Promise<DeliveryPlan> {
    if (!target.recipientUserId) {
      return {
        channels: target.channels,
        contact: {
          email: target.recipientEmail,
          phone: target.recipientPhone,
          pushSubscription: null,
          webhookUrl: null,
        },
      };
    }

    const userId = target.recipientUserId;
    const categoryPreference = target.category ? await preferences.findOne(userId, target.category) : null;
    const defaultPreference = await preferences.findOne(userId, null);
    const governing = categoryPreference ?? defaultPreference ?? this.virtualDefault(userId, target.category);
    const channels = this.narrow(governing, target.channels, target.priority);

    this.logger.debug(
      `Resolved channels for ${userId}: requested ${formatChannels(target.channels)}, effective ${formatChannels(channels)}`,
      'PreferencesService',
    );

    return {
      channels,
      contact: {
        email: target.recipientEmail ?? categoryPreference?.email ?? defaultPreference?.email ?? null,
        phone: target.recipientPhone ?? categoryPreference?.phone ?? defaultPreference?.phone ?? null,
        pushSubscription: pushSubscriptionOf(categoryPreference) ?? pushSubscriptionOf(defaultPreference),
        webhookUrl: categoryPreference?.webhookUrl ?? defaultPreference?.webhookUrl ?? null,
      },
    };
  }

  private narrow(preference: NotificationPreference, requested: ChannelSet, priority: NotificationPriority): ChannelSet {
    if (!preference.isEnabled || priority < preference.minimumPriority) {
      return NotificationChannel.NONE;
    }
    return intersectChannels(requested, preference.enabledChannels);
  }

  private async governingPreference(
    preferences: PreferenceRepository,
    userId: string,
    category: string | null,
  ): Promise<NotificationPreference> {
    if (category !== null) {
      const categoryPreference = await preferences.findOne(userId, category);
      if (categoryPreference) {
        return categoryPreference;
      }
    }
    return (await preferences.findOne(userId, null)) ?? this.virtualDefault(userId, category);
  }

  private virtualDefault(userId: string, category: string | null): NotificationPreference {
    const preference = new NotificationPreference();
    preference.userId = userId;
    preference.tenantId = null;
    preference.category = category;
    preference.enabledChannels = this.options.defaultChannels;
    preference.isEnabled = true;
    preference.minimumPriority = NotificationPriority.LOW;
    preference.email = null;
    preference.phone = null;
    preference.pushEndpoint = null;
    preference.pushPublicKey = null;
    preference.pushAuth = null;
    preference.webhookUrl = null;
    return preference;
  }

  private async upsert(
    userId: string,
    category: string | null,
    apply: (preference: NotificationPreference) => void,
  ): Promise<ServiceResult<NotificationPreference>> {
    try {
      const saved = await this.applyAndSave(userId, category, apply).catch((error: unknown) => {
        if (!(error instanceof DuplicatePreferenceError)) {
          throw error;
        }
        // A concurrent first write created the row; apply the update on top of it
        this.logger.debug(`Preference for ${userId} created concurrently, re-applying`, 'PreferencesService');
        return this.applyAndSave(userId, category, apply);
      });
      this.logger.log(
        `Saved preference for ${userId}${category ? ` (${category})` : ''}: channels ${formatChannels(saved.enabledChannels)}`,
        'PreferencesService',
      );
      return ServiceResultUtil.success(saved);
    } catch (error) {
      return this.persistenceFailure(`save preference for ${userId}`, error);
    }
  }

  private async applyAndSave(
    userId: string,
    category: string | null,
    apply: (preference: NotificationPreference) => void,
  ): Promise<NotificationPreference> {
    const preference =
      (await this.persistence.preferences.findOne(userId, category)) ?? this.virtualDefault(userId, category);
    apply(preference);
    return this.persistence.preferences.save(preference);
  }

  private persistenceFailure(action: string, error: unknown): ServiceFailure {
    const message = errorMessageOf(error);
    this.logger.error(`Failed to ${action}: ${message}`, errorStackOf(error), 'PreferencesService');
    return ServiceResultUtil.failure('PERSISTENCE_FAILED', `Failed to ${action}: ${message}`);
  }
}
