/**
 * Health Check Controller
 */

import { Controller, Get, UseGuards } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtRolesGuard } from '../auth/jwt-roles.guard';
import { Public } from '../auth/roles.decorator';
import { ProviderRegistry } from '../delivery/provider-registry';
import { channelName } from '../notifications/notification-channel';

@Controller('health')
@UseGuards(JwtRolesGuard)
export class HealthController {
  constructor(
    private registry: ProviderRegistry,
    private config: ConfigService,
  ) {}

  @Get()
  @Public()
  health() {
    return {
      success: true,
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: this.config.get<string>('serviceName') ?? 'notifications-service',
      providers: this.registry.all().map((provider) => ({
        name: provider.name,
        channel: channelName(provider.channel),
        priority: provider.priority,
      })),
    };
  }
}
