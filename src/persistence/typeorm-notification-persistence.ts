/**
 * TypeORM implementation of the persistence contract (PostgreSQL)
 */

import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import {
  DataSource,
  EntityManager,
  In,
  IsNull,
  LessThan,
  LessThanOrEqual,
  MoreThan,
  QueryFailedError,
  Repository,
} from 'typeorm';
import { Notification } from '../notifications/entities/notification.entity';
import { NotificationDeliveryLog } from '../notifications/entities/notification-delivery-log.entity';
import { NotificationPreference } from '../preferences/entities/notification-preference.entity';
import { NotificationChannel } from '../notifications/notification-channel';
import { NotificationStatus } from '../notifications/notification.enums';
import {
  DeliveryLogRepository,
  DuplicatePreferenceError,
  NotificationPersistence,
  NotificationRepository,
  NotificationUnitOfWork,
  PreferenceRepository,
  UserNotificationQuery,
} from './notification-persistence';

export class TypeOrmNotificationRepository implements NotificationRepository {
  constructor(private readonly repository: Repository<Notification>) {}

  findById(id: string): Promise<Notification | null> {
    return this.repository.findOne({ where: { id, isDeleted: false } });
  }

  async findByIds(ids: string[]): Promise<Notification[]> {
    if (ids.length === 0) {
      return [];
    }
    return this.repository.find({ where: { id: In(ids), isDeleted: false } });
  }

  findForUser(userId: string, query: UserNotificationQuery): Promise<Notification[]> {
    return this.repository.find({
      where: {
        recipientUserId: userId,
        isDeleted: false,
        ...(query.includeRead ? {} : { readAt: IsNull() }),
      },
      order: { createdAt: 'DESC' },
    });
  }

  findUnreadForUser(userId: string, now: Date): Promise<Notification[]> {
    const unread = { recipientUserId: userId, isDeleted: false, readAt: IsNull() };
    return this.repository.find({
      where: [
        { ...unread, expiresAt: IsNull() },
        { ...unread, expiresAt: MoreThan(now) },
      ],
    });
  }

  countUnread(userId: string): Promise<number> {
    return this.repository.count({
      where: { recipientUserId: userId, isDeleted: false, readAt: IsNull() },
    });
  }

  findDueScheduled(now: Date, limit: number): Promise<Notification[]> {
    return this.repository.find({
      where: {
        status: NotificationStatus.QUEUED,
        isDeleted: false,
        scheduledFor: LessThanOrEqual(now),
      },
      order: { scheduledFor: 'ASC' },
      take: limit,
    });
  }

  save(notification: Notification): Promise<Notification> {
    return this.repository.save(notification);
  }

  saveMany(notifications: Notification[]): Promise<Notification[]> {
    return this.repository.save(notifications);
  }

  async purge(cutoff: Date): Promise<number> {
    const settled = await this.repository.delete({
      status: In([NotificationStatus.DELIVERED, NotificationStatus.READ]),
      createdAt: LessThan(cutoff),
    });
    const deleted = await this.repository.delete({
      isDeleted: true,
      deletedAt: LessThan(cutoff),
    });
    return (settled.affected ?? 0) + (deleted.affected ?? 0);
  }
}

export class TypeOrmDeliveryLogRepository implements DeliveryLogRepository {
  constructor(private readonly repository: Repository<NotificationDeliveryLog>) {}

  insert(log: NotificationDeliveryLog): Promise<NotificationDeliveryLog> {
    return this.repository.save(log);
  }

  findByNotification(notificationId: string): Promise<NotificationDeliveryLog[]> {
    return this.repository.find({
      where: { notificationId },
      order: { createdAt: 'ASC', attemptNumber: 'ASC' },
    });
  }

  countByChannel(notificationId: string, channel: NotificationChannel): Promise<number> {
    return this.repository.count({ where: { notificationId, channel } });
  }
}

export class TypeOrmPreferenceRepository implements PreferenceRepository {
  constructor(private readonly repository: Repository<NotificationPreference>) {}

  findOne(userId: string, category: string | null): Promise<NotificationPreference | null> {
    return this.repository.findOne({
      where: { userId, category: category === null ? IsNull() : category },
    });
  }

  findAllForUser(userId: string): Promise<NotificationPreference[]> {
    return this.repository.find({ where: { userId }, order: { createdAt: 'ASC' } });
  }

  async save(preference: NotificationPreference): Promise<NotificationPreference> {
    try {
      return await this.repository.save(preference);
    } catch (error: unknown) {
      if (isUniqueViolation(error)) {
        throw new DuplicatePreferenceError(preference.userId, preference.category);
      }
      throw error;
    }
  }
}

const PG_UNIQUE_VIOLATION = '23505';

function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const driverError: unknown = error.driverError;
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    driverError.code === PG_UNIQUE_VIOLATION
  );
}

function unitOfWorkFor(manager: EntityManager): NotificationUnitOfWork {
  return {
    notifications: new TypeOrmNotificationRepository(manager.getRepository(Notification)),
    deliveryLogs: new TypeOrmDeliveryLogRepository(manager.getRepository(NotificationDeliveryLog)),
    preferences: new TypeOrmPreferenceRepository(manager.getRepository(NotificationPreference)),
  };
}

@Injectable()
export class TypeOrmNotificationPersistence extends NotificationPersistence {
  readonly notifications: NotificationRepository;
  readonly deliveryLogs: DeliveryLogRepository;
  readonly preferences: PreferenceRepository;

  constructor(
    @InjectDataSource()
    private readonly dataSource: DataSource,
  ) {
    super();
    const root = unitOfWorkFor(dataSource.manager);
    this.notifications = root.notifications;
    this.deliveryLogs = root.deliveryLogs;
    this.preferences = root.preferences;
  }

  transaction<T>(work: (unitOfWork: NotificationUnitOfWork) => Promise<T>): Promise<T> {
    return this.dataSource.transaction((manager) => work(unitOfWorkFor(manager)));
  }
}
