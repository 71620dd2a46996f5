import { Entity, PrimaryGeneratedColumn, Column, Index, CreateDateColumn, UpdateDateColumn } from 'typeorm';
import { ChannelSet, NotificationChannel } from '../../notifications/notification-channel';
import { NotificationPriority } from '../../notifications/notification.enums';

/**
 * Delivery preferences of one user for one category.
 * A null category holds the user's default preference.
 * Uniqueness of (user_id, category) is enforced by an expression index in the migration.
 */
@Entity('notification_preferences')
export class NotificationPreference {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 255, name: 'user_id' })
  @Index('idx_notification_preferences_user_id')
  userId!: string;

  @Column({ type: 'varchar', length: 100, nullable: true, name: 'tenant_id' })
  tenantId!: string | null;

  @Column({ type: 'varchar', length: 100, nullable: true })
  category!: string | null;

  @Column({ type: 'int', default: NotificationChannel.IN_APP, name: 'enabled_channels' })
  enabledChannels!: ChannelSet;

  @Column({ type: 'boolean', default: true, name: 'is_enabled' })
  isEnabled!: boolean;

  @Column({ type: 'smallint', default: NotificationPriority.LOW, name: 'minimum_priority' })
  minimumPriority!: NotificationPriority;

  @Column({ type: 'varchar', length: 255, nullable: true })
  email!: string | null;

  @Column({ type: 'varchar', length: 50, nullable: true })
  phone!: string | null;

  // Web push subscription: endpoint plus the p256dh public key and auth secret
  @Column({ type: 'varchar', length: 1000, nullable: true, name: 'push_endpoint' })
  pushEndpoint!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true, name: 'push_public_key' })
  pushPublicKey!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true, name: 'push_auth' })
  pushAuth!: string | null;

  @Column({ type: 'varchar', length: 500, nullable: true, name: 'webhook_url' })
  webhookUrl!: string | null;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;
}
