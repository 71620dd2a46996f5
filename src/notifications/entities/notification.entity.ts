/**
 * Notification Entity
 * One delivery intent for one recipient
 */

import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
  OneToMany,
} from 'typeorm';
import { NotificationChannel, ChannelSet } from '../notification-channel';
import { NotificationPriority, NotificationStatus, NotificationType } from '../notification.enums';
import { NotificationDeliveryLog } from './notification-delivery-log.entity';

@Entity('notifications')
@Index('idx_notifications_recipient_read', ['recipientUserId', 'readAt'])
export class Notification {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 200 })
  title!: string;

  @Column({ type: 'text' })
  message!: string;

  @Column({ type: 'varchar', length: 20, default: NotificationType.INFO })
  type!: NotificationType;

  @Column({ type: 'smallint', default: NotificationPriority.NORMAL })
  priority!: NotificationPriority;

  @Column({ type: 'varchar', length: 100, nullable: true })
  category!: string | null;

  /** Requested channels, as a bit set. */
  @Column({ type: 'int', default: NotificationChannel.IN_APP })
  channels!: ChannelSet;

  @Column({ type: 'varchar', length: 255, nullable: true, name: 'recipient_user_id' })
  @Index('idx_notifications_recipient_user_id')
  recipientUserId!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true, name: 'recipient_email' })
  recipientEmail!: string | null;

  @Column({ type: 'varchar', length: 50, nullable: true, name: 'recipient_phone' })
  recipientPhone!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true, name: 'sender_user_id' })
  senderUserId!: string | null;

  @Column({ type: 'varchar', length: 100, nullable: true, name: 'tenant_id' })
  tenantId!: string | null;

  @Column({ type: 'varchar', length: 20, default: NotificationStatus.PENDING })
  @Index('idx_notifications_status')
  status!: NotificationStatus;

  @Column({ type: 'timestamptz', nullable: true, name: 'scheduled_for' })
  @Index('idx_notifications_scheduled_for')
  scheduledFor!: Date | null;

  @Column({ type: 'timestamptz', nullable: true, name: 'delivered_at' })
  deliveredAt!: Date | null;

  @Column({ type: 'timestamptz', nullable: true, name: 'read_at' })
  readAt!: Date | null;

  @Column({ type: 'timestamptz', nullable: true, name: 'expires_at' })
  expiresAt!: Date | null;

  @Column({ type: 'int', default: 0, name: 'delivery_attempts' })
  deliveryAttempts!: number;

  @Column({ type: 'varchar', length: 1000, nullable: true, name: 'error_message' })
  errorMessage!: string | null;

  @Column({ type: 'jsonb', nullable: true })
  metadata!: Record<string, unknown> | null;

  @Column({ type: 'varchar', length: 500, nullable: true, name: 'action_url' })
  actionUrl!: string | null;

  @Column({ type: 'varchar', length: 500, nullable: true, name: 'image_url' })
  imageUrl!: string | null;

  @Column({ type: 'boolean', default: false, name: 'is_deleted' })
  isDeleted!: boolean;

  @Column({ type: 'timestamptz', nullable: true, name: 'deleted_at' })
  deletedAt!: Date | null;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  @Index('idx_notifications_created_at')
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;

  @OneToMany(() => NotificationDeliveryLog, (log) => log.notification)
  deliveryLogs?: NotificationDeliveryLog[];

  get isRead(): boolean {
    return this.readAt !== null && this.readAt !== undefined;
  }
}
