/**
 * Notification engine options, read once from the environment at startup.
 */

import { IsBoolean, IsInt, IsOptional, IsString, IsUrl, Max, Min, validateSync } from 'class-validator';
import { ChannelSet, NotificationChannel, parseChannelList } from '../notifications/notification-channel';

export class NotificationOptions {
  @IsInt()
  @Min(NotificationChannel.NONE)
  @Max(NotificationChannel.ALL)
  defaultChannels: ChannelSet = NotificationChannel.IN_APP;

  @IsInt()
  @Min(1)
  defaultExpirationDays = 30;

  @IsInt()
  @Min(1)
  @Max(10000)
  maxBatchSize = 100;

  @IsBoolean()
  batchProcessingEnabled = true;

  @IsInt()
  @Min(1)
  @Max(100)
  batchConcurrency = 5;

  @IsInt()
  @Min(1)
  maxDeliveryAttempts = 5;

  @IsInt()
  @Min(100)
  providerTimeoutMs = 30000;

  @IsString({ each: true })
  disabledProviders: string[] = [];

  @IsBoolean()
  schedulerEnabled = false;

  @IsInt()
  @Min(1)
  @Max(1000)
  schedulerBatchSize = 50;

  @IsBoolean()
  cleanupEnabled = false;

  @IsInt()
  @Min(1)
  cleanupAfterDays = 90;

  @IsOptional()
  @IsString()
  sendgridApiKey: string | null = null;

  @IsString()
  emailFromAddress = 'noreply@example.com';

  @IsString()
  emailFromName = 'Notifications';

  @IsOptional()
  @IsString()
  vapidSubject: string | null = null;

  @IsOptional()
  @IsString()
  vapidPublicKey: string | null = null;

  @IsOptional()
  @IsString()
  vapidPrivateKey: string | null = null;

  @IsInt()
  @Min(0)
  pushTtlSeconds = 86400;

  @IsOptional()
  @IsString()
  webhookSigningSecret: string | null = null;

  @IsInt()
  @Min(100)
  webhookTimeoutMs = 20000;

  @IsOptional()
  @IsUrl({ require_tld: false })
  teamsWebhookUrl: string | null = null;
}

type Env = Record<string, string | undefined>;

function text(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function int(value: string | undefined, fallback: number): number {
  const raw = text(value);
  return raw === null ? fallback : Number(raw);
}

function bool(value: string | undefined, fallback: boolean): boolean {
  const raw = text(value);
  return raw === null ? fallback : raw.toLowerCase() === 'true';
}

/**
 * Builds and validates the options from environment variables.
 * Throws listing every invalid setting.
 */
export function loadNotificationOptions(env: Env): NotificationOptions {
  const options = new NotificationOptions();
  const errors: string[] = [];

  const channels = text(env.NOTIFICATIONS_DEFAULT_CHANNELS);
  if (channels !== null) {
    const parsed = parseChannelList(channels);
    if (parsed === null) {
      errors.push(`NOTIFICATIONS_DEFAULT_CHANNELS: unknown channel in "${channels}"`);
    } else {
      options.defaultChannels = parsed;
    }
  }

  options.defaultExpirationDays = int(env.NOTIFICATIONS_DEFAULT_EXPIRATION_DAYS, options.defaultExpirationDays);
  options.maxBatchSize = int(env.NOTIFICATIONS_MAX_BATCH_SIZE, options.maxBatchSize);
  options.batchProcessingEnabled = bool(env.NOTIFICATIONS_BATCH_ENABLED, options.batchProcessingEnabled);
  options.batchConcurrency = int(env.NOTIFICATIONS_BATCH_CONCURRENCY, options.batchConcurrency);
  options.maxDeliveryAttempts = int(env.NOTIFICATIONS_MAX_DELIVERY_ATTEMPTS, options.maxDeliveryAttempts);
  options.providerTimeoutMs = int(env.NOTIFICATIONS_PROVIDER_TIMEOUT_MS, options.providerTimeoutMs);
  options.disabledProviders = (text(env.NOTIFICATIONS_DISABLED_PROVIDERS) ?? '')
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
  options.schedulerEnabled = bool(env.NOTIFICATIONS_SCHEDULER_ENABLED, options.schedulerEnabled);
  options.schedulerBatchSize = int(env.NOTIFICATIONS_SCHEDULER_BATCH_SIZE, options.schedulerBatchSize);
  options.cleanupEnabled = bool(env.NOTIFICATIONS_CLEANUP_ENABLED, options.cleanupEnabled);
  options.cleanupAfterDays = int(env.NOTIFICATIONS_CLEANUP_AFTER_DAYS, options.cleanupAfterDays);

  options.sendgridApiKey = text(env.SENDGRID_API_KEY);
  options.emailFromAddress = text(env.SENDGRID_FROM_EMAIL) ?? options.emailFromAddress;
  options.emailFromName = text(env.SENDGRID_FROM_NAME) ?? options.emailFromName;

  options.vapidSubject = text(env.VAPID_SUBJECT);
  options.vapidPublicKey = text(env.VAPID_PUBLIC_KEY);
  options.vapidPrivateKey = text(env.VAPID_PRIVATE_KEY);
  options.pushTtlSeconds = int(env.PUSH_TTL_SECONDS, options.pushTtlSeconds);

  options.webhookSigningSecret = text(env.WEBHOOK_SIGNING_SECRET);
  options.webhookTimeoutMs = int(env.WEBHOOK_TIMEOUT_MS, options.webhookTimeoutMs);
  options.teamsWebhookUrl = text(env.TEAMS_WEBHOOK_URL);

  for (const error of validateSync(options)) {
    const constraints = Object.values(error.constraints ?? {});
    errors.push(`${error.property}: ${constraints.join(', ')}`);
  }

  if (errors.length > 0) {
    throw new Error(`Invalid notification configuration: ${errors.join('; ')}`);
  }
  return options;
}
