/**
 * Notifications Controller
 */

import {
  Body,
  Controller,
  Delete,
  Get,
  MessageEvent,
  Param,
  Post,
  Query,
  Sse,
  UseGuards,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { ApiResponseUtil } from '../../shared/utils/api-response.util';
import { AllowOwner } from '../auth/roles.decorator';
import { JwtRolesGuard } from '../auth/jwt-roles.guard';
import { NotificationStreamService } from '../channels/notification-stream.service';
import { NotificationsService } from './notifications.service';
import {
  MarkNotificationsReadDto,
  ScheduleNotificationDto,
  SendBatchDto,
  SendNotificationDto,
  SendToMultipleDto,
  toNotificationRequest,
} from './dto/send-notification.dto';
import { toDeliveryLogView, toNotificationView } from './notification.view';
import { Notification } from './entities/notification.entity';

const toViews = (notifications: Notification[]) => notifications.map(toNotificationView);
const toCount = (count: number) => ({ count });

@Controller('notifications')
@UseGuards(JwtRolesGuard)
export class NotificationsController {
  constructor(
    private notificationsService: NotificationsService,
    private streamService: NotificationStreamService,
  ) {}

  @Post('send')
  async sendNotification(@Body() dto: SendNotificationDto) {
    const result = await this.notificationsService.send(toNotificationRequest(dto));
    return ApiResponseUtil.fromResult(result, toNotificationView);
  }

  @Post('batch')
  async sendBatch(@Body() dto: SendBatchDto) {
    const result = await this.notificationsService.sendBatch(dto.notifications.map(toNotificationRequest));
    return ApiResponseUtil.fromResult(result, toViews);
  }

  @Post('fan-out')
  async sendToMultiple(@Body() dto: SendToMultipleDto) {
    const result = await this.notificationsService.sendToMultiple(
      toNotificationRequest(dto.notification),
      dto.userIds,
    );
    return ApiResponseUtil.fromResult(result, toViews);
  }

  @Post('schedule')
  async schedule(@Body() dto: ScheduleNotificationDto) {
    const result = await this.notificationsService.schedule(toNotificationRequest(dto), new Date(dto.scheduledFor));
    return ApiResponseUtil.fromResult(result, toNotificationView);
  }

  @Post('read')
  async markManyAsRead(@Body() dto: MarkNotificationsReadDto) {
    const result = await this.notificationsService.markManyAsRead(dto.ids);
    return ApiResponseUtil.fromResult(result, toCount);
  }

  @Get('users/:userId')
  @AllowOwner('userId')
  async getUserNotifications(@Param('userId') userId: string, @Query('includeRead') includeRead?: string) {
    const result = await this.notificationsService.getUserNotifications(userId, includeRead === 'true');
    return ApiResponseUtil.fromResult(result, toViews);
  }

  @Get('users/:userId/unread-count')
  @AllowOwner('userId')
  async getUnreadCount(@Param('userId') userId: string) {
    const result = await this.notificationsService.getUnreadCount(userId);
    return ApiResponseUtil.fromResult(result, toCount);
  }

  @Post('users/:userId/read-all')
  @AllowOwner('userId')
  async markAllAsRead(@Param('userId') userId: string) {
    const result = await this.notificationsService.markAllAsReadForUser(userId);
    return ApiResponseUtil.fromResult(result, toCount);
  }

  /** Live in-app notifications for one user as server-sent events. */
  @Sse('users/:userId/stream')
  @AllowOwner('userId')
  stream(@Param('userId') userId: string): Observable<MessageEvent> {
    return this.streamService.createStream(userId);
  }

  @Get(':id')
  async getNotification(@Param('id') id: string) {
    const result = await this.notificationsService.getNotification(id);
    return ApiResponseUtil.fromResult(result, toNotificationView);
  }

  @Get(':id/logs')
  async getDeliveryLogs(@Param('id') id: string) {
    const result = await this.notificationsService.getDeliveryLogs(id);
    return ApiResponseUtil.fromResult(result, (logs) => logs.map(toDeliveryLogView));
  }

  @Post(':id/dispatch')
  async dispatchScheduled(@Param('id') id: string) {
    const result = await this.notificationsService.dispatchScheduled(id);
    return ApiResponseUtil.fromResult(result, toNotificationView);
  }

  @Post(':id/retry')
  async retryDelivery(@Param('id') id: string) {
    const result = await this.notificationsService.retryDelivery(id);
    return ApiResponseUtil.fromResult(result, toNotificationView);
  }

  @Post(':id/read')
  async markAsRead(@Param('id') id: string) {
    const result = await this.notificationsService.markAsRead(id);
    return ApiResponseUtil.fromResult(result, toNotificationView);
  }

  @Delete(':id')
  async remove(@Param('id') id: string) {
    const result = await this.notificationsService.remove(id);
    return ApiResponseUtil.fromResult(result, () => ({ id }));
  }
}
