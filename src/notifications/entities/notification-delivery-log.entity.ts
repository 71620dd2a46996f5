/**
 * Notification delivery log entity: one row per delivery attempt on one channel.
 * Append-only audit trail; removed only together with its notification.
 */

import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  Index,
  ManyToOne,
  JoinColumn,
} from 'typeorm';
import { NotificationChannel } from '../notification-channel';
import { Notification } from './notification.entity';

@Entity('notification_delivery_logs')
@Index('idx_notification_delivery_logs_notification_channel', ['notificationId', 'channel'])
export class NotificationDeliveryLog {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid', name: 'notification_id' })
  @Index('idx_notification_delivery_logs_notification_id')
  notificationId!: string;

  @Column({ type: 'int' })
  channel!: NotificationChannel;

  /** Name of the provider that handled the attempt; null when none was eligible. */
  @Column({ type: 'varchar', length: 100, nullable: true, name: 'provider_name' })
  providerName!: string | null;

  /** 1-based, counted per (notification, channel). */
  @Column({ type: 'int', name: 'attempt_number' })
  attemptNumber!: number;

  @Column({ type: 'boolean', name: 'is_success' })
  isSuccess!: boolean;

  @Column({ type: 'varchar', length: 1000, nullable: true, name: 'error_message' })
  errorMessage!: string | null;

  @Column({ type: 'varchar', length: 2000, nullable: true, name: 'provider_response' })
  providerResponse!: string | null;

  @Column({ type: 'int', default: 0, name: 'duration_ms' })
  durationMs!: number;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @ManyToOne(() => Notification, (notification) => notification.deliveryLogs, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'notification_id' })
  notification?: Notification;
}
