import { Module } from '@nestjs/common';
import { ChannelsModule } from '../channels/channels.module';
import { DeliveryLogService } from './delivery-log.service';
import { ProviderRegistry } from './provider-registry';
import { DeliveryDispatcher } from './delivery-dispatcher.service';

@Module({
  imports: [ChannelsModule],
  providers: [DeliveryLogService, ProviderRegistry, DeliveryDispatcher],
  exports: [DeliveryLogService, ProviderRegistry, DeliveryDispatcher, ChannelsModule],
})
export class DeliveryModule {}
