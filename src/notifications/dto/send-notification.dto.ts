/**
 * Notification request DTOs
 */

import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsDateString,
  IsEmail,
  IsEnum,
  IsIn,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  IsUrl,
  MaxLength,
  ValidateNested,
} from 'class-validator';
import { CHANNEL_NAMES, channelSetFromNames } from '../notification-channel';
import { NotificationType, PRIORITY_NAMES, PriorityName, priorityFromName } from '../notification.enums';
import { NotificationRequest } from '../notifications.types';

const CHANNEL_INPUTS = [...CHANNEL_NAMES, 'all'];

export class SendNotificationDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  title!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(2000)
  message!: string;

  @IsEnum(NotificationType)
  @IsOptional()
  type?: NotificationType;

  @IsIn([...PRIORITY_NAMES])
  @IsOptional()
  priority?: PriorityName;

  @IsString()
  @MaxLength(100)
  @IsOptional()
  category?: string;

  /** Channel names (in_app, email, push, webhook, or all). */
  @IsArray()
  @IsIn(CHANNEL_INPUTS, { each: true })
  @IsOptional()
  channels?: string[];

  @IsString()
  @IsOptional()
  recipientUserId?: string;

  @IsEmail()
  @IsOptional()
  recipientEmail?: string;

  @IsString()
  @IsOptional()
  recipientPhone?: string;

  @IsString()
  @IsOptional()
  senderUserId?: string;

  @IsString()
  @IsOptional()
  tenantId?: string;

  @IsDateString()
  @IsOptional()
  expiresAt?: string;

  @IsObject()
  @IsOptional()
  metadata?: Record<string, unknown>;

  @IsUrl({ require_tld: false })
  @IsOptional()
  actionUrl?: string;

  @IsUrl({ require_tld: false })
  @IsOptional()
  imageUrl?: string;
}

export class ScheduleNotificationDto extends SendNotificationDto {
  @IsDateString()
  scheduledFor!: string;
}

export class SendBatchDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SendNotificationDto)
  notifications!: SendNotificationDto[];
}

export class SendToMultipleDto {
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  userIds!: string[];

  @ValidateNested()
  @Type(() => SendNotificationDto)
  notification!: SendNotificationDto;
}

export class MarkNotificationsReadDto {
  @IsArray()
  @IsString({ each: true })
  ids!: string[];
}

export function toNotificationRequest(dto: SendNotificationDto): NotificationRequest {
  return {
    title: dto.title,
    message: dto.message,
    type: dto.type,
    priority: dto.priority ? priorityFromName(dto.priority) : undefined,
    category: dto.category ?? null,
    channels: dto.channels ? channelSetFromNames(dto.channels) : undefined,
    recipientUserId: dto.recipientUserId ?? null,
    recipientEmail: dto.recipientEmail ?? null,
    recipientPhone: dto.recipientPhone ?? null,
    senderUserId: dto.senderUserId ?? null,
    tenantId: dto.tenantId ?? null,
    expiresAt: dto.expiresAt ? new Date(dto.expiresAt) : null,
    metadata: dto.metadata ?? null,
    actionUrl: dto.actionUrl ?? null,
    imageUrl: dto.imageUrl ?? null,
  };
}
