import { MigrationInterface, QueryRunner, Table, TableIndex, TableForeignKey } from 'typeorm';

const timestamps = [
  {
    name: 'created_at',
    type: 'timestamptz',
    default: 'CURRENT_TIMESTAMP',
  },
  {
    name: 'updated_at',
    type: 'timestamptz',
    default: 'CURRENT_TIMESTAMP',
  },
];

export class CreateNotificationTables1760000000000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query('CREATE EXTENSION IF NOT EXISTS "uuid-ossp"');

    await queryRunner.createTable(
      new Table({
        name: 'notifications',
        columns: [
          { name: 'id', type: 'uuid', isPrimary: true, generationStrategy: 'uuid', default: 'uuid_generate_v4()' },
          { name: 'title', type: 'varchar', length: '200' },
          { name: 'message', type: 'text' },
          { name: 'type', type: 'varchar', length: '20', default: "'info'" },
          { name: 'priority', type: 'smallint', default: 1 },
          { name: 'category', type: 'varchar', length: '100', isNullable: true },
          { name: 'channels', type: 'int', default: 1 },
          { name: 'recipient_user_id', type: 'varchar', length: '255', isNullable: true },
          { name: 'recipient_email', type: 'varchar', length: '255', isNullable: true },
          { name: 'recipient_phone', type: 'varchar', length: '50', isNullable: true },
          { name: 'sender_user_id', type: 'varchar', length: '255', isNullable: true },
          { name: 'tenant_id', type: 'varchar', length: '100', isNullable: true },
          { name: 'status', type: 'varchar', length: '20', default: "'pending'" },
          { name: 'scheduled_for', type: 'timestamptz', isNullable: true },
          { name: 'delivered_at', type: 'timestamptz', isNullable: true },
          { name: 'read_at', type: 'timestamptz', isNullable: true },
          { name: 'expires_at', type: 'timestamptz', isNullable: true },
          { name: 'delivery_attempts', type: 'int', default: 0 },
          { name: 'error_message', type: 'varchar', length: '1000', isNullable: true },
          { name: 'metadata', type: 'jsonb', isNullable: true },
          { name: 'action_url', type: 'varchar', length: '500', isNullable: true },
          { name: 'image_url', type: 'varchar', length: '500', isNullable: true },
          { name: 'is_deleted', type: 'boolean', default: false },
          { name: 'deleted_at', type: 'timestamptz', isNullable: true },
          ...timestamps,
        ],
      }),
      true,
    );

    for (const [name, columnNames] of [
      ['idx_notifications_recipient_user_id', ['recipient_user_id']],
      ['idx_notifications_recipient_read', ['recipient_user_id', 'read_at']],
      ['idx_notifications_status', ['status']],
      ['idx_notifications_scheduled_for', ['scheduled_for']],
      ['idx_notifications_created_at', ['created_at']],
    ] as const) {
      await queryRunner.createIndex('notifications', new TableIndex({ name, columnNames: [...columnNames] }));
    }

    await queryRunner.createTable(
      new Table({
        name: 'notification_delivery_logs',
        columns: [
          { name: 'id', type: 'uuid', isPrimary: true, generationStrategy: 'uuid', default: 'uuid_generate_v4()' },
          { name: 'notification_id', type: 'uuid' },
          { name: 'channel', type: 'int' },
          { name: 'provider_name', type: 'varchar', length: '100', isNullable: true },
          { name: 'attempt_number', type: 'int' },
          { name: 'is_success', type: 'boolean' },
          { name: 'error_message', type: 'varchar', length: '1000', isNullable: true },
          { name: 'provider_response', type: 'varchar', length: '2000', isNullable: true },
          { name: 'duration_ms', type: 'int', default: 0 },
          { name: 'created_at', type: 'timestamptz', default: 'CURRENT_TIMESTAMP' },
        ],
      }),
      true,
    );

    await queryRunner.createIndex(
      'notification_delivery_logs',
      new TableIndex({
        name: 'idx_notification_delivery_logs_notification_id',
        columnNames: ['notification_id'],
      }),
    );

    await queryRunner.createIndex(
      'notification_delivery_logs',
      new TableIndex({
        name: 'idx_notification_delivery_logs_notification_channel',
        columnNames: ['notification_id', 'channel'],
      }),
    );

    await queryRunner.createForeignKey(
      'notification_delivery_logs',
      new TableForeignKey({
        columnNames: ['notification_id'],
        referencedTableName: 'notifications',
        referencedColumnNames: ['id'],
        onDelete: 'CASCADE',
      }),
    );

    await queryRunner.createTable(
      new Table({
        name: 'notification_preferences',
        columns: [
          { name: 'id', type: 'uuid', isPrimary: true, generationStrategy: 'uuid', default: 'uuid_generate_v4()' },
          { name: 'user_id', type: 'varchar', length: '255' },
          { name: 'tenant_id', type: 'varchar', length: '100', isNullable: true },
          { name: 'category', type: 'varchar', length: '100', isNullable: true },
          { name: 'enabled_channels', type: 'int', default: 1 },
          { name: 'is_enabled', type: 'boolean', default: true },
          { name: 'minimum_priority', type: 'smallint', default: 0 },
          { name: 'email', type: 'varchar', length: '255', isNullable: true },
          { name: 'phone', type: 'varchar', length: '50', isNullable: true },
          { name: 'push_endpoint', type: 'varchar', length: '1000', isNullable: true },
          { name: 'push_public_key', type: 'varchar', length: '255', isNullable: true },
          { name: 'push_auth', type: 'varchar', length: '255', isNullable: true },
          { name: 'webhook_url', type: 'varchar', length: '500', isNullable: true },
          ...timestamps,
        ],
      }),
      true,
    );

    await queryRunner.createIndex(
      'notification_preferences',
      new TableIndex({
        name: 'idx_notification_preferences_user_id',
        columnNames: ['user_id'],
      }),
    );

    // One default (null category) row per user; TableIndex cannot express the COALESCE
    await queryRunner.query(
      `CREATE UNIQUE INDEX "uq_notification_preferences_user_category" ON "notification_preferences" ("user_id", COALESCE("category", ''))`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query('DROP INDEX IF EXISTS "uq_notification_preferences_user_category"');
    await queryRunner.dropTable('notification_preferences', true);
    await queryRunner.dropTable('notification_delivery_logs', true);
    await queryRunner.dropTable('notifications', true);
  }
}
