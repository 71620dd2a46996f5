/**
 * Preferences Controller
 */

import {
  Body,
  Controller,
  Delete,
  Get,
  HttpException,
  HttpStatus,
  Param,
  Post,
  Put,
  Query,
  UseGuards,
} from '@nestjs/common';
import { ApiResponseUtil } from '../../shared/utils/api-response.util';
import { errorMessageOf } from '../../shared/utils/service-result.util';
import { AllowOwner } from '../auth/roles.decorator';
import { JwtRolesGuard } from '../auth/jwt-roles.guard';
import { channelFromName, channelSetFromNames, isChannelName } from '../notifications/notification-channel';
import { PreferencesService } from './preferences.service';
import { PushSubscriptionDto, SetChannelsDto, UpdatePreferenceDto, toPreferenceUpdate, toPushSubscription } from './dto/preference.dto';
import { toPreferenceView } from './preference.view';

@Controller('preferences/:userId')
@UseGuards(JwtRolesGuard)
@AllowOwner('userId')
export class PreferencesController {
  constructor(private preferencesService: PreferencesService) {}

  @Get()
  async getPreference(@Param('userId') userId: string, @Query('category') category?: string) {
    const result = await this.preferencesService.getPreference(userId, category || null);
    return ApiResponseUtil.fromResult(result, toPreferenceView);
  }

  @Get('all')
  async getAllPreferences(@Param('userId') userId: string) {
    const result = await this.preferencesService.getAllPreferences(userId);
    return ApiResponseUtil.fromResult(result, (preferences) => preferences.map(toPreferenceView));
  }

  @Put()
  async updatePreference(@Param('userId') userId: string, @Body() dto: UpdatePreferenceDto) {
    const result = await this.preferencesService.updatePreference(toPreferenceUpdate(userId, dto));
    return ApiResponseUtil.fromResult(result, toPreferenceView);
  }

  @Put('channels')
  async setEnabledChannels(@Param('userId') userId: string, @Body() dto: SetChannelsDto) {
    const result = await this.preferencesService.setEnabledChannels(
      userId,
      channelSetFromNames(dto.channels),
      dto.category ?? null,
    );
    return ApiResponseUtil.fromResult(result, toPreferenceView);
  }

  @Get('channels/:channel')
  async isChannelEnabled(@Param('userId') userId: string, @Param('channel') channel: string) {
    if (!isChannelName(channel)) {
      throw new HttpException(
        ApiResponseUtil.error('VALIDATION_FAILED', `Unknown channel: ${channel}`),
        HttpStatus.BAD_REQUEST,
      );
    }
    try {
      const enabled = await this.preferencesService.isChannelEnabled(userId, channelFromName(channel));
      return ApiResponseUtil.success({ channel, enabled });
    } catch (error: unknown) {
      throw new HttpException(
        ApiResponseUtil.error('PERSISTENCE_FAILED', errorMessageOf(error)),
        HttpStatus.INTERNAL_SERVER_ERROR,
      );
    }
  }

  @Post('push-subscription')
  async registerPushSubscription(@Param('userId') userId: string, @Body() dto: PushSubscriptionDto) {
    const result = await this.preferencesService.registerPushSubscription(
      userId,
      toPushSubscription(dto),
      dto.category ?? null,
    );
    return ApiResponseUtil.fromResult(result, toPreferenceView);
  }

  @Delete('push-subscription')
  async removePushSubscription(@Param('userId') userId: string, @Query('category') category?: string) {
    const result = await this.preferencesService.removePushSubscription(userId, category || null);
    return ApiResponseUtil.fromResult(result, (preference) => (preference ? toPreferenceView(preference) : null));
  }
}
