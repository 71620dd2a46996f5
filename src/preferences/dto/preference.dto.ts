/**
 * Preference request DTOs
 */

import { Type } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsEmail,
  IsIn,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  MaxLength,
  ValidateBy,
  ValidateNested,
  ValidationOptions,
  buildMessage,
  isIP,
  isURL,
} from 'class-validator';
import { CHANNEL_NAMES, channelSetFromNames } from '../../notifications/notification-channel';
import { PRIORITY_NAMES, PriorityName, priorityFromName } from '../../notifications/notification.enums';
import { PushSubscriptionKeys } from '../../channels/notification-provider';
import { PreferenceUpdate } from '../preferences.service';

const CHANNEL_INPUTS = [...CHANNEL_NAMES, 'all'];

/** https with a real domain name; IP literals and single-label hosts are refused. */
export function isPublicHttpsUrl(value: unknown): boolean {
  if (typeof value !== 'string' || !isURL(value, { protocols: ['https'], require_protocol: true, require_tld: true })) {
    return false;
  }
  const host = new URL(value).hostname.replace(/^\[|\]$/g, '');
  return !isIP(host);
}

export function IsPublicHttpsUrl(validationOptions?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: 'isPublicHttpsUrl',
      validator: {
        validate: (value): boolean => isPublicHttpsUrl(value),
        defaultMessage: buildMessage(
          (eachPrefix) => `${eachPrefix}$property must be a public https URL`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}

export class UpdatePreferenceDto {
  @IsString()
  @MaxLength(100)
  @IsOptional()
  category?: string | null;

  @IsString()
  @IsOptional()
  tenantId?: string | null;

  @IsArray()
  @IsIn(CHANNEL_INPUTS, { each: true })
  @IsOptional()
  enabledChannels?: string[];

  @IsBoolean()
  @IsOptional()
  isEnabled?: boolean;

  @IsIn([...PRIORITY_NAMES])
  @IsOptional()
  minimumPriority?: PriorityName;

  @IsEmail()
  @IsOptional()
  email?: string | null;

  @IsString()
  @IsOptional()
  phone?: string | null;

  @IsPublicHttpsUrl()
  @MaxLength(500)
  @IsOptional()
  webhookUrl?: string | null;
}

export class SetChannelsDto {
  @IsArray()
  @IsIn(CHANNEL_INPUTS, { each: true })
  channels!: string[];

  @IsString()
  @IsOptional()
  category?: string;
}

class PushKeysDto {
  @IsString()
  @IsNotEmpty()
  p256dh!: string;

  @IsString()
  @IsNotEmpty()
  auth!: string;
}

/** Mirrors the browser's PushSubscription.toJSON() shape. */
export class PushSubscriptionDto {
  @IsUrl()
  endpoint!: string;

  @ValidateNested()
  @Type(() => PushKeysDto)
  keys!: PushKeysDto;

  @IsString()
  @IsOptional()
  category?: string;
}

export function toPreferenceUpdate(userId: string, dto: UpdatePreferenceDto): PreferenceUpdate {
  return {
    userId,
    category: dto.category,
    tenantId: dto.tenantId,
    enabledChannels: dto.enabledChannels ? channelSetFromNames(dto.enabledChannels) : undefined,
    isEnabled: dto.isEnabled,
    minimumPriority: dto.minimumPriority ? priorityFromName(dto.minimumPriority) : undefined,
    email: dto.email,
    phone: dto.phone,
    webhookUrl: dto.webhookUrl,
  };
}

export function toPushSubscription(dto: PushSubscriptionDto): PushSubscriptionKeys {
  return { endpoint: dto.endpoint, publicKey: dto.keys.p256dh, auth: dto.keys.auth };
}
